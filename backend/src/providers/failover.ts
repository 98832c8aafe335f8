// Failover Retry Engine: one logical "extract text from this image" request.
// Rate-limit/quota failures rotate the shared model pool and retry after a fixed back-off;
// any other failure ends the request immediately.

import type { AttemptListener, InputImage, TextExtractionProvider, TextExtractor } from "./types";
import type { ModelPool } from "./registry";
import { ExhaustedError, FatalExtractionError } from "./errors";
import { classifyError, errorMessage, sleep as defaultSleep } from "./utils";
import { providerLog } from "../logger";
import { FAILOVER } from "../constants";

export interface FailoverOptions {
  /** Attempts allowed per pool member; the budget is retryFactor × pool size. */
  retryFactor?: number;
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

type AttemptState =
  | { kind: "attempting"; attempt: number; failures: number }
  | { kind: "success"; text: string }
  | { kind: "rotate"; attempt: number; failures: number; error: unknown }
  | { kind: "fatal"; model: string; error: unknown }
  | { kind: "exhausted"; failures: number; error: unknown };

export class FailoverExtractor implements TextExtractor {
  private readonly retryFactor: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly pool: ModelPool,
    private readonly provider: TextExtractionProvider,
    options: FailoverOptions = {},
  ) {
    this.retryFactor = options.retryFactor ?? FAILOVER.DEFAULT_RETRY_FACTOR;
    this.backoffMs = options.backoffMs ?? FAILOVER.DEFAULT_BACKOFF_MS;
    this.sleep = options.sleep ?? defaultSleep;
    if (!Number.isInteger(this.retryFactor) || this.retryFactor < 1) {
      throw new Error(`retryFactor must be a positive integer, got ${this.retryFactor}`);
    }
  }

  get maxAttempts(): number {
    return this.retryFactor * this.pool.size;
  }

  async extract(image: InputImage, prompt: string, listener?: AttemptListener): Promise<string> {
    const maxAttempts = this.maxAttempts;
    let state: AttemptState = { kind: "attempting", attempt: 1, failures: 0 };

    for (;;) {
      switch (state.kind) {
        case "attempting":
          state = await this.attempt(state.attempt, state.failures, maxAttempts, image, prompt, listener);
          break;

        case "rotate": {
          const from = this.pool.current().name;
          const to = this.pool.advance().name;
          providerLog.warn(
            { from, to, attempt: state.attempt, failures: state.failures, error: errorMessage(state.error) },
            "Model rate limited, rotating",
          );
          await listener?.onRotate?.(from, to);
          await this.sleep(this.backoffMs);
          state = { kind: "attempting", attempt: state.attempt + 1, failures: state.failures };
          break;
        }

        case "success":
          return state.text;

        case "fatal":
          providerLog.error({ model: state.model, error: errorMessage(state.error) }, "Model call failed");
          throw new FatalExtractionError(state.model, state.error);

        case "exhausted":
          providerLog.error({ attempts: state.failures, provider: this.provider.name }, "Every model attempt was rate limited");
          throw new ExhaustedError(state.failures, state.error);
      }
    }
  }

  private async attempt(
    attempt: number,
    failures: number,
    maxAttempts: number,
    image: InputImage,
    prompt: string,
    listener: AttemptListener | undefined,
  ): Promise<AttemptState> {
    const identity = this.pool.current();
    this.pool.recordAttempt(identity);
    await listener?.onAttempt?.(identity.name, attempt);
    providerLog.debug({ model: identity.name, attempt, maxAttempts }, "Calling model");

    try {
      const text = await this.provider.generateText(identity.name, prompt, image);
      return { kind: "success", text };
    } catch (error) {
      if (classifyError(error) === "fatal") {
        return { kind: "fatal", model: identity.name, error };
      }
      const total = failures + 1;
      if (total >= maxAttempts) {
        return { kind: "exhausted", failures: total, error };
      }
      return { kind: "rotate", attempt, failures: total, error };
    }
  }
}
