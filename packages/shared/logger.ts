import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type { Logger } from "pino";

/**
 * Render an error's stack followed by every `cause` beneath it.
 */
export function formatErrorChain(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    const text =
      current instanceof Error ? current.stack || `${current.name}: ${current.message}` : String(current);
    parts.push(parts.length === 0 ? text : `Caused by: ${text}`);
    current = current instanceof Error ? current.cause : undefined;
  }

  return parts.join("\n");
}

const errSerializer = (err: unknown) => {
  if (!(err instanceof Error)) return { message: String(err) };
  return {
    type: err.name,
    message: err.message,
    stack: formatErrorChain(err),
  };
};

/**
 * Create a logger writing JSON lines to the given stream.
 */
export function createLogger(
  destination: DestinationStream,
  bindings: Record<string, unknown> = {},
  level: pino.Level = "debug",
): Logger {
  return pino(
    {
      level,
      base: bindings,
      formatters: {
        level: (label) => ({ level: label }),
      },
      serializers: { err: errSerializer },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}

/**
 * Create a logger appending synchronously to a file, so every line is on
 * disk before the call returns.
 */
export function createFileLogger(
  path: string,
  bindings: Record<string, unknown> = {},
  level: pino.Level = "debug",
): Logger {
  return createLogger(pino.destination({ dest: path, sync: true, mkdir: true }), bindings, level);
}

/**
 * Logger that drops everything.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
