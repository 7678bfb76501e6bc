import type { Random } from "@/lib/random";
import type { WeightTable } from "./types";

/**
 * Weighted categorical draw by cumulative mass.
 *
 * Returns the first label whose cumulative probability reaches the uniform
 * draw. If rounding leaves the total just under the draw, the last label wins.
 */
export function weightedChoice<T extends string>(table: WeightTable<T>, rng: Random): T {
  if (table.length === 0) {
    throw new RangeError("Weight table is empty");
  }
  const r = rng.next();
  let cumulative = 0;
  for (const [label, weight] of table) {
    cumulative += weight;
    if (cumulative >= r) return label;
  }
  return table[table.length - 1][0];
}

/**
 * Exponentially distributed interval in seconds with the given mean,
 * by inverse transform of a uniform draw.
 */
export function exponentialInterval(meanSeconds: number, rng: Random): number {
  return -Math.log(1 - rng.next()) * meanSeconds;
}
