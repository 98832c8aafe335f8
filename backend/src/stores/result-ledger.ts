// Result Ledger: extraction handle → full extracted text, one ledger per conversation.
// Bridges the gap between producing a result and the later "Send to Email" tap.
// Lives for the process lifetime; nothing is evicted.

export class NotFoundError extends Error {
  constructor(readonly handle: string) {
    super(`No extracted text stored for ${handle}`);
    this.name = "NotFoundError";
  }
}

export class ResultLedger {
  private entries = new Map<string, string>();

  /** Insert or overwrite. Handle uniqueness is the caller's job. */
  store(handle: string, text: string): void {
    this.entries.set(handle, text);
  }

  retrieve(handle: string): string {
    const text = this.entries.get(handle);
    if (text === undefined) throw new NotFoundError(handle);
    return text;
  }

  has(handle: string): boolean {
    return this.entries.has(handle);
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Partitions ledgers by conversation so one chat never sees another's results. */
export class ResultLedgerStore {
  private ledgers = new Map<string, ResultLedger>();

  /** The conversation's ledger, created on first use. */
  forConversation(conversationId: string): ResultLedger {
    let ledger = this.ledgers.get(conversationId);
    if (!ledger) {
      ledger = new ResultLedger();
      this.ledgers.set(conversationId, ledger);
    }
    return ledger;
  }

  /** Read-only lookup; never creates. */
  peek(conversationId: string): ResultLedger | undefined {
    return this.ledgers.get(conversationId);
  }

  get conversationCount(): number {
    return this.ledgers.size;
  }
}
