// Model Pool Registry: ordered, interchangeable model identities plus the shared failover cursor.
// One instance per process; every conversation's requests go through it.
// No locking: interleaved callers may race on counters and the cursor, which only steer load.

import type { ModelIdentity } from "./types";
import { providerLog } from "../logger";

export interface ModelPoolSnapshot {
  cursor: number;
  models: ModelIdentity[];
}

export class ModelPool {
  private readonly identities: ModelIdentity[];
  private cursor = 0;

  constructor(
    names: readonly string[],
    private readonly now: () => number = Date.now,
  ) {
    if (names.length === 0) {
      throw new Error("Model pool needs at least one model name");
    }
    this.identities = names.map((name) => ({
      name,
      requestCount: 0,
      lastUsedAt: null,
      errorCount: 0,
    }));
  }

  get size(): number {
    return this.identities.length;
  }

  get position(): number {
    return this.cursor;
  }

  /** The identity that serves the next request. */
  current(): ModelIdentity {
    return this.at(this.cursor);
  }

  /**
   * Charge a failure to the current identity and move the cursor to the next one.
   * Called only on rate-limit/quota failures.
   */
  advance(): ModelIdentity {
    const previous = this.current();
    previous.errorCount += 1;
    this.cursor = (this.cursor + 1) % this.identities.length;
    const next = this.current();
    providerLog.info({ from: previous.name, to: next.name, errors: previous.errorCount }, "Failover cursor advanced");
    return next;
  }

  recordAttempt(identity: ModelIdentity): void {
    identity.requestCount += 1;
    identity.lastUsedAt = this.now();
  }

  /** Copies of every identity, for status output. */
  snapshot(): ModelPoolSnapshot {
    return {
      cursor: this.cursor,
      models: this.identities.map((identity) => ({ ...identity })),
    };
  }

  private at(index: number): ModelIdentity {
    const identity = this.identities[index];
    if (!identity) throw new Error(`Model pool cursor out of range: ${index}`);
    return identity;
  }
}
