import type { ErrorClass } from "./types";

// Whole word only: ids and byte counts in fatal messages may contain the digits.
const STATUS_429 = /\b429\b/;

const RATE_LIMIT_MARKERS = [
  "rate limit",
  "ratelimit",
  "quota",
  "resource_exhausted",
  "resource exhausted",
  "too many requests",
];

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("code" in error && typeof error.code === "number") return error.code;
  return undefined;
}

/** Best-effort text of any thrown value. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Decide whether a failed model call should rotate to the next model (rate_limited)
 * or abort the request (fatal). Pure: looks only at the error's status and text.
 */
export function classifyError(error: unknown): ErrorClass {
  if (readStatus(error) === 429) return "rate_limited";

  const text = [
    errorMessage(error),
    error instanceof Error ? error.name : "",
  ]
    .join(" ")
    .toLowerCase();

  if (STATUS_429.test(text)) return "rate_limited";
  return RATE_LIMIT_MARKERS.some((marker) => text.includes(marker)) ? "rate_limited" : "fatal";
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
