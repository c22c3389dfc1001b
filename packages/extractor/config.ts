import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./errors";
import { DATASET_FORMATS, type DatasetFormat } from "./types";

const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "..", "..");

export const IMAGE_FORMATS = ["png", "jpeg", "webp", "tiff"] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export interface ImageSettings {
  maxDim: number;
  /** left, top, right, bottom in pixels */
  margins: [number, number, number, number];
  contrastFactor: number;
  outputFormat: ImageFormat;
}

export interface ExtractorConfig {
  gemini: {
    apiKey: string;
    model: string;
  };
  storage: {
    inputRoot: string;
    outputRoot: string;
  };
  extract: {
    runName: string;
    outputFormat: DatasetFormat;
    delimiter: string;
    concurrency: number;
    flushEvery: number;
    extensions: string[];
    schemaPath: string;
    promptPath: string;
  };
  image: ImageSettings;
}

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .pipe(z.number().int().min(1));

const envSchema = z.object({
  GEMINI_API_KEY: z.string().default(""),
  EXTRACT_MODEL: z.string().min(1).default("gemini-2.5-flash"),
  EXTRACT_INPUT_ROOT: z.string().min(1).default("./data"),
  EXTRACT_OUTPUT_ROOT: z.string().min(1).default("./runs"),
  EXTRACT_RUN_NAME: z
    .string()
    .regex(/^[\w.-]+$/, "only letters, digits, '_', '-' and '.'")
    .default("dataset"),
  EXTRACT_OUTPUT_FORMAT: z.enum(["csv", "jsonl"]).default("csv"),
  EXTRACT_DELIMITER: z.string().length(1).refine((value) => !/["\r\n]/.test(value), {
    message: "cannot be a quote or line break",
  }).default("$"),
  EXTRACT_CONCURRENCY: positiveInt("8"),
  EXTRACT_FLUSH_EVERY: positiveInt("25"),
  EXTRACT_EXTENSIONS: z
    .string()
    .default(".png,.jpg,.jpeg,.tif,.tiff,.webp")
    .transform((value) =>
      value
        .split(",")
        .map((ext) => ext.trim().toLowerCase())
        .filter((ext) => ext.length > 0)
        .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`)),
    )
    .pipe(z.array(z.string()).min(1)),
  EXTRACT_SCHEMA_PATH: z.string().default(join(PROJECT_ROOT, "schemas", "journal.schema.json")),
  EXTRACT_PROMPT_PATH: z.string().default(join(PROJECT_ROOT, "prompts", "journal.txt")),
  IMAGE_MAX_DIM: positiveInt("3000"),
  IMAGE_MARGINS: z
    .string()
    .default("0,0,0,0")
    .transform((value) => value.split(",").map((part) => Number(part.trim())))
    .pipe(z.tuple([z.number(), z.number(), z.number(), z.number()]))
    .refine((margins) => margins.every((m) => Number.isInteger(m) && m >= 0), {
      message: "expected four non-negative integers",
    }),
  IMAGE_CONTRAST: z
    .string()
    .default("1")
    .transform(Number)
    .pipe(z.number().positive()),
  IMAGE_FORMAT: z.enum(IMAGE_FORMATS).default("png"),
});

/**
 * Build the configuration from environment variables. Throws ConfigError
 * listing every invalid value.
 */
export function loadExtractorConfig(env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Environment validation failed:\n${issues.join("\n")}`);
  }

  const values = parsed.data;
  return {
    gemini: {
      apiKey: values.GEMINI_API_KEY,
      model: values.EXTRACT_MODEL,
    },
    storage: {
      inputRoot: values.EXTRACT_INPUT_ROOT,
      outputRoot: values.EXTRACT_OUTPUT_ROOT,
    },
    extract: {
      runName: values.EXTRACT_RUN_NAME,
      outputFormat: values.EXTRACT_OUTPUT_FORMAT,
      delimiter: values.EXTRACT_DELIMITER,
      concurrency: values.EXTRACT_CONCURRENCY,
      flushEvery: values.EXTRACT_FLUSH_EVERY,
      extensions: values.EXTRACT_EXTENSIONS,
      schemaPath: values.EXTRACT_SCHEMA_PATH,
      promptPath: values.EXTRACT_PROMPT_PATH,
    },
    image: {
      maxDim: values.IMAGE_MAX_DIM,
      margins: values.IMAGE_MARGINS,
      contrastFactor: values.IMAGE_CONTRAST,
      outputFormat: values.IMAGE_FORMAT,
    },
  };
}

/**
 * Check if the generation service key is configured
 */
export function hasGeminiCredentials(config: ExtractorConfig): boolean {
  return !!config.gemini.apiKey;
}

export function isDatasetFormat(value: string): value is DatasetFormat {
  return DATASET_FORMATS.some((format) => format === value);
}

/**
 * Configuration as recorded in a run's snapshot, without secrets.
 */
export function snapshotConfig(config: ExtractorConfig): Record<string, unknown> {
  return {
    ...config,
    gemini: { ...config.gemini, apiKey: config.gemini.apiKey ? "<redacted>" : "" },
  };
}

const jsonObjectSchema = z.record(z.string(), z.unknown());

/**
 * Load the JSON Schema records are requested in.
 */
export async function loadSchema(path: string): Promise<Record<string, unknown>> {
  const text = await readRequired(path, "schema");
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Schema is not valid JSON: ${path}`, { cause: err });
  }
  const parsed = jsonObjectSchema.safeParse(value);
  if (!parsed.success) throw new ConfigError(`Schema must be a JSON object: ${path}`);
  return parsed.data;
}

export async function loadPrompt(path: string): Promise<string> {
  const prompt = (await readRequired(path, "prompt")).trim();
  if (!prompt) throw new ConfigError(`Prompt file is empty: ${path}`);
  return prompt;
}

async function readRequired(path: string, what: string): Promise<string> {
  const full = isAbsolute(path) ? path : resolve(path);
  try {
    return await readFile(full, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read ${what} file: ${full}`, { cause: err });
  }
}
