import { describe, it, expect } from "vitest";
import { createRandom } from "@/lib/random";
import { DEFAULT_MODEL } from "../model";
import { exponentialInterval, weightedChoice } from "../sampling";
import type { Severity, WeightTable } from "../types";
import { sequenceRandom } from "./fake-random";

describe("weightedChoice", () => {
  const table = DEFAULT_MODEL.severities;

  it("returns the first label whose cumulative mass reaches the draw", () => {
    expect(weightedChoice(table, sequenceRandom([0]))).toBe("INFO");
    expect(weightedChoice(table, sequenceRandom([0.5]))).toBe("INFO");
    expect(weightedChoice(table, sequenceRandom([0.75]))).toBe("NOTICE");
    expect(weightedChoice(table, sequenceRandom([0.85]))).toBe("WARNING");
    expect(weightedChoice(table, sequenceRandom([0.95]))).toBe("ERROR");
    expect(weightedChoice(table, sequenceRandom([0.99]))).toBe("CRITICAL");
  });

  it("falls back to the last label when the weights fall short of the draw", () => {
    const short: WeightTable<"A" | "B"> = [
      ["A", 0.3],
      ["B", 0.3],
    ];
    expect(weightedChoice(short, sequenceRandom([0.9]))).toBe("B");
  });

  it("throws on an empty table", () => {
    expect(() => weightedChoice([], sequenceRandom([0.1]))).toThrow("Weight table is empty");
  });

  it("converges on the configured severity weights", () => {
    const rng = createRandom(20251020);
    const draws = 100_000;
    const counts = new Map<Severity, number>();
    for (let i = 0; i < draws; i++) {
      const label = weightedChoice(table, rng);
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }
    for (const [label, weight] of table) {
      const observed = (counts.get(label) ?? 0) / draws;
      expect(Math.abs(observed - weight)).toBeLessThan(0.01);
    }
  });

  it("converges on the configured action weights", () => {
    const rng = createRandom(8);
    const draws = 50_000;
    let accepted = 0;
    for (let i = 0; i < draws; i++) {
      if (weightedChoice(DEFAULT_MODEL.actions, rng) === "ACCEPT") accepted++;
    }
    expect(Math.abs(accepted / draws - 0.6)).toBeLessThan(0.01);
  });
});

describe("exponentialInterval", () => {
  it("inverts the uniform draw", () => {
    expect(exponentialInterval(1.2, sequenceRandom([0.5]))).toBeCloseTo(Math.LN2 * 1.2, 10);
  });

  it("never returns a negative interval", () => {
    const rng = createRandom(11);
    for (let i = 0; i < 10_000; i++) {
      expect(exponentialInterval(1.2, rng)).toBeGreaterThanOrEqual(0);
    }
  });

  it("has the configured mean", () => {
    const rng = createRandom(13);
    const samples = 20_000;
    let total = 0;
    for (let i = 0; i < samples; i++) total += exponentialInterval(1.2, rng);
    expect(Math.abs(total / samples - 1.2)).toBeLessThan(0.05);
  });
});
