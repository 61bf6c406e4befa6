import { describe, it, expect } from "vitest";
import { createPrng } from "./prng.ts";

describe("createPrng", () => {
  it("same seed, same sequence", () => {
    const a = createPrng("seed-a");
    const b = createPrng("seed-a");
    for (let i = 0; i < 10; i++) expect(a.nextFloat()).toBe(b.nextFloat());
  });

  it("stays in range", () => {
    const p = createPrng(7);
    for (let i = 0; i < 200; i++) {
      const f = p.nextFloat();
      expect(f).toBeGreaterThanOrEqual(0);
      expect(f).toBeLessThan(1);
      const n = p.int(5);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(5);
    }
    expect(p.int(0)).toBe(0);
  });

  it("pick refuses an empty list", () => {
    expect(() => createPrng(1).pick([])).toThrow("pick() from empty array");
  });
});
