import { createAggregate } from "./aggregate";
import type { RunningAggregate } from "./types";

function mergeCounts<K>(target: Map<K, number>, source: Map<K, number>): void {
  for (const [key, count] of source) {
    target.set(key, (target.get(key) ?? 0) + count);
  }
}

function pickTimestamp(
  a: number | null,
  b: number | null,
  choose: (x: number, y: number) => number
): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return choose(a, b);
}

/**
 * Combine aggregates built over consecutive shards of one file.
 *
 * Each shard must already have applied the same filter, since signature
 * counts are filtered per line and cannot be re-filtered here. Keys keep
 * first-occurrence order across `first` then `second`. Neither input is
 * modified.
 */
export function mergeAggregates(first: RunningAggregate, second: RunningAggregate): RunningAggregate {
  const merged = createAggregate();
  merged.totalLines = first.totalLines + second.totalLines;
  mergeCounts(merged.levelCounts, first.levelCounts);
  mergeCounts(merged.levelCounts, second.levelCounts);
  mergeCounts(merged.signatures, first.signatures);
  mergeCounts(merged.signatures, second.signatures);
  merged.firstTimestamp = pickTimestamp(first.firstTimestamp, second.firstTimestamp, Math.min);
  merged.lastTimestamp = pickTimestamp(first.lastTimestamp, second.lastTimestamp, Math.max);
  return merged;
}
