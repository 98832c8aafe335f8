/**
 * Unit Tests: Result Ledger
 */

import { describe, it, expect } from "vitest";
import { NotFoundError, ResultLedger, ResultLedgerStore } from "../../src/stores/result-ledger";

describe("ResultLedger", () => {
  it("returns exactly what was stored", () => {
    const ledger = new ResultLedger();
    const long = "متن فارسی ".repeat(2_000);

    ledger.store("img_1", "سلام");
    ledger.store("img_2", "");
    ledger.store("pdf_3", long);

    expect(ledger.retrieve("img_1")).toBe("سلام");
    expect(ledger.retrieve("img_2")).toBe("");
    expect(ledger.retrieve("pdf_3")).toBe(long);
    expect(ledger.size).toBe(3);
  });

  it("overwrites an existing handle", () => {
    const ledger = new ResultLedger();
    ledger.store("img_1", "first");
    ledger.store("img_1", "second");

    expect(ledger.retrieve("img_1")).toBe("second");
    expect(ledger.size).toBe(1);
  });

  it("throws NotFoundError for an unknown handle", () => {
    const ledger = new ResultLedger();

    expect(() => ledger.retrieve("img_404")).toThrow(NotFoundError);
    try {
      ledger.retrieve("img_404");
    } catch (err) {
      expect(err instanceof NotFoundError && err.handle).toBe("img_404");
    }
  });
});

describe("ResultLedgerStore", () => {
  it("creates one ledger per conversation on first use", () => {
    const store = new ResultLedgerStore();

    expect(store.peek("telegram-1")).toBeUndefined();
    const ledger = store.forConversation("telegram-1");

    expect(store.forConversation("telegram-1")).toBe(ledger);
    expect(store.peek("telegram-1")).toBe(ledger);
    expect(store.conversationCount).toBe(1);
  });

  it("keeps conversations apart", () => {
    const store = new ResultLedgerStore();
    store.forConversation("telegram-1").store("img_5", "private");

    expect(store.forConversation("telegram-2").has("img_5")).toBe(false);
    expect(() => store.forConversation("telegram-2").retrieve("img_5")).toThrow(NotFoundError);
  });
});
