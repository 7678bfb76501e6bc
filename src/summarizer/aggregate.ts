import { ERROR_LEVELS, SIGNATURE_TOKEN_COUNT, TOP_SIGNATURE_LIMIT } from "@/lib/constants";
import type { ParsedRecord, RunningAggregate, SignatureCount, SummaryFilter } from "./types";

export function createAggregate(): RunningAggregate {
  return {
    totalLines: 0,
    levelCounts: new Map(),
    firstTimestamp: null,
    lastTimestamp: null,
    signatures: new Map(),
  };
}

/**
 * Grouping key for an error message: drop the first whitespace-separated
 * token, keep up to the next seven.
 */
export function errorSignature(message: string): string {
  return message
    .split(/\s+/)
    .filter(Boolean)
    .slice(1, 1 + SIGNATURE_TOKEN_COUNT)
    .join(" ");
}

/** True when the record is excluded from signature ranking */
export function isFilteredOut(record: ParsedRecord, filter: SummaryFilter): boolean {
  const { timestamp } = record;
  if (timestamp !== null) {
    if (filter.start !== undefined && timestamp < filter.start) return true;
    if (filter.end !== undefined && timestamp > filter.end) return true;
  }
  if (filter.keyword && !record.message.toLowerCase().includes(filter.keyword.toLowerCase())) {
    return true;
  }
  return false;
}

/**
 * Fold one parsed line into the aggregate.
 *
 * Line totals, level counts and the time span always see every line.
 * Only the error-signature counts honour the keyword and date window.
 */
export function accumulate(
  aggregate: RunningAggregate,
  record: ParsedRecord,
  filter: SummaryFilter = {}
): void {
  aggregate.totalLines++;
  aggregate.levelCounts.set(record.level, (aggregate.levelCounts.get(record.level) ?? 0) + 1);

  const { timestamp } = record;
  if (timestamp !== null) {
    if (aggregate.firstTimestamp === null || timestamp < aggregate.firstTimestamp) {
      aggregate.firstTimestamp = timestamp;
    }
    if (aggregate.lastTimestamp === null || timestamp > aggregate.lastTimestamp) {
      aggregate.lastTimestamp = timestamp;
    }
  }

  if (isFilteredOut(record, filter)) return;

  if (ERROR_LEVELS.has(record.level)) {
    const signature = errorSignature(record.message);
    aggregate.signatures.set(signature, (aggregate.signatures.get(signature) ?? 0) + 1);
  }
}

/**
 * Most frequent signatures, highest count first. Array.prototype.sort is
 * stable, so ties keep first-seen order.
 */
export function topSignatures(
  aggregate: RunningAggregate,
  limit: number = TOP_SIGNATURE_LIMIT
): SignatureCount[] {
  return Array.from(aggregate.signatures, ([signature, count]) => ({ signature, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}
