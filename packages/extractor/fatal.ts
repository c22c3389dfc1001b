/**
 * Decides whether a failed document means the whole run should stop.
 * Classifiers only see the thrown error, never the document it came from.
 */
export interface FatalErrorClassifier {
  isFatal(error: unknown): boolean;
}

/**
 * Markers of account, quota and auth level failures. Matched
 * case-insensitively against the error text.
 */
export const DEFAULT_FATAL_MARKERS: readonly string[] = [
  "quota",
  "resource_exhausted",
  "resource exhausted",
  "rate limit",
  "ratelimit",
  "rate_limit",
  "too many requests",
  "permission denied",
  "permission_denied",
  "unauthorized",
  "unauthenticated",
  "forbidden",
  "api key not valid",
  "invalid api key",
  "api_key_invalid",
  "invalid credentials",
  "billing",
  "token limit",
  "context length",
  "context window",
  "maximum number of tokens",
];

/**
 * Text the classifier matches against: name, message, any HTTP-ish status
 * and the same again for every cause. Nothing else about the failure is
 * matched, so errors raised for a document keep its path out of their
 * messages.
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);

    if (current instanceof Error) {
      parts.push(`${current.name}: ${current.message}`);
      for (const field of ["status", "code"] as const) {
        if (field in current) parts.push(String(Reflect.get(current, field)));
      }
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
  }

  return parts.join(" | ");
}

export function createLexicalClassifier(
  markers: readonly string[] = DEFAULT_FATAL_MARKERS,
): FatalErrorClassifier {
  const needles = markers.map((marker) => marker.toLowerCase());

  return {
    isFatal(error: unknown): boolean {
      const text = describeError(error).toLowerCase();
      return needles.some((needle) => text.includes(needle));
    },
  };
}

export const defaultClassifier = createLexicalClassifier();

export function isFatal(error: unknown): boolean {
  return defaultClassifier.isFatal(error);
}
