// Extraction failures surfaced to the conversation layer.

export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

/** Every attempt in the budget hit a rate-limit/quota condition. */
export class ExhaustedError extends ExtractionError {
  constructor(readonly attempts: number, cause?: unknown) {
    super(`All models are rate limited (gave up after ${attempts} attempts)`, { cause });
    this.name = "ExhaustedError";
  }
}

/** A non rate-limit failure from the remote call. Never retried. */
export class FatalExtractionError extends ExtractionError {
  constructor(readonly model: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "FatalExtractionError";
  }
}
