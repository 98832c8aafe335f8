// Provider contracts for the text-extraction model.

export interface InputImage {
  /** e.g. "image/png" or "image/jpeg" */
  mimeType: string;
  /** base64 (no data: prefix) */
  base64: string;
}

/**
 * A remote vision model reachable under several interchangeable model names.
 * Implementations throw whatever the transport throws; classification happens in the failover engine.
 */
export interface TextExtractionProvider {
  readonly name: string;
  generateText(model: string, prompt: string, image: InputImage): Promise<string>;
}

export interface ModelIdentity {
  name: string;
  requestCount: number;
  /** Epoch millis of the last attempt, null until first use. */
  lastUsedAt: number | null;
  errorCount: number;
}

export type ErrorClass = "rate_limited" | "fatal";

/** Observer for each attempt the failover engine makes. */
export interface AttemptListener {
  onAttempt?(model: string, attempt: number): void | Promise<void>;
  onRotate?(from: string, to: string): void | Promise<void>;
}

/** Anything that turns one image into text: the failover engine, or a fake in tests. */
export interface TextExtractor {
  extract(image: InputImage, prompt: string, listener?: AttemptListener): Promise<string>;
}
