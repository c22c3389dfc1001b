/**
 * Extraction through the Gemini API: one page image in, one JSON record out,
 * constrained by the configured JSON Schema.
 */

import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import type { ImageSettings } from "./config";
import { ExtractionResponseError } from "./errors";
import { preprocessImage, type PreparedImage } from "./preprocess";
import { extractedRecordSchema, type DocumentRef, type ExtractFn, type ExtractedRecord } from "./types";

/**
 * The slice of the Gemini client the extractor needs. `GoogleGenAI.models`
 * satisfies it; tests pass a fake.
 */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

export interface GeminiExtractorOptions {
  generator: ContentGenerator;
  model: string;
  prompt: string;
  schema: Record<string, unknown>;
  image?: Partial<ImageSettings>;
  /** Replaces the sharp pipeline, mainly for tests */
  preprocess?: (path: string, settings: Partial<ImageSettings>) => Promise<PreparedImage>;
}

export function createGeminiGenerator(apiKey: string): ContentGenerator {
  return new GoogleGenAI({ apiKey }).models;
}

export function createGeminiExtractor(options: GeminiExtractorOptions): ExtractFn {
  const { generator, model, prompt, schema, image = {}, preprocess = preprocessImage } = options;

  return async (ref: DocumentRef, signal: AbortSignal): Promise<ExtractedRecord> => {
    const { data, mimeType } = await preprocess(ref, image);
    signal.throwIfAborted();

    const response = await generator.generateContent({
      model,
      contents: [
        {
          role: "user",
          parts: [{ inlineData: { mimeType, data: data.toString("base64") } }, { text: prompt }],
        },
      ],
      config: {
        responseMimeType: "application/json",
        responseJsonSchema: schema,
        abortSignal: signal,
      },
    });

    return parseRecord(ref, response.text);
  };
}

/**
 * Parse the model's JSON answer into a record.
 */
export function parseRecord(ref: DocumentRef, text: string | undefined): ExtractedRecord {
  if (!text?.trim()) {
    throw new ExtractionResponseError(ref, "Empty response text");
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new ExtractionResponseError(ref, "Response is not valid JSON", { cause: err });
  }

  const parsed = extractedRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw new ExtractionResponseError(ref, "Response is not a JSON object");
  }
  return parsed.data;
}
