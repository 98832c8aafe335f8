/**
 * Unit Tests: Model Pool Registry
 */

import { describe, it, expect } from "vitest";
import { ModelPool } from "../../src/providers/registry";

describe("ModelPool", () => {
  it("starts at the first configured model", () => {
    const pool = new ModelPool(["m1", "m2", "m3"]);
    expect(pool.current().name).toBe("m1");
    expect(pool.position).toBe(0);
    expect(pool.size).toBe(3);
  });

  it("charges the error to the model it advances away from", () => {
    const pool = new ModelPool(["m1", "m2", "m3"]);
    const next = pool.advance();

    expect(next.name).toBe("m2");
    expect(pool.current().name).toBe("m2");
    const [m1, m2] = pool.snapshot().models;
    expect(m1?.errorCount).toBe(1);
    expect(m2?.errorCount).toBe(0);
  });

  it("returns to the starting position after pool-size advances", () => {
    for (const size of [1, 2, 3, 5]) {
      const names = Array.from({ length: size }, (_, i) => `m${i + 1}`);
      const pool = new ModelPool(names);
      pool.advance();
      const start = pool.position;

      for (let i = 0; i < size; i++) pool.advance();

      expect(pool.position).toBe(start);
    }
  });

  it("wraps from the last model to the first", () => {
    const pool = new ModelPool(["m1", "m2"]);
    pool.advance();
    expect(pool.advance().name).toBe("m1");
    expect(pool.snapshot().models.map((m) => m.errorCount)).toEqual([1, 1]);
  });

  it("records attempts with the injected clock", () => {
    let now = 1_000;
    const pool = new ModelPool(["m1"], () => now);

    pool.recordAttempt(pool.current());
    now = 2_500;
    pool.recordAttempt(pool.current());

    expect(pool.snapshot().models[0]).toEqual({
      name: "m1",
      requestCount: 2,
      lastUsedAt: 2_500,
      errorCount: 0,
    });
  });

  it("hands out copies in snapshots", () => {
    const pool = new ModelPool(["m1"]);
    const snap = pool.snapshot();
    const first = snap.models[0];
    if (first) first.requestCount = 99;

    expect(pool.current().requestCount).toBe(0);
    expect(pool.snapshot().models[0]?.lastUsedAt).toBeNull();
  });

  it("rejects an empty pool", () => {
    expect(() => new ModelPool([])).toThrow("Model pool needs at least one model name");
  });
});
