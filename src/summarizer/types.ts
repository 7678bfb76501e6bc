import type { LEVELS, UNKNOWN_LEVEL } from "@/lib/constants";

export type Level = (typeof LEVELS)[number] | typeof UNKNOWN_LEVEL;

export interface ParsedRecord {
  /** Epoch ms, null when the line has no recognizable timestamp */
  timestamp: number | null;
  level: Level;
  /** The line with surrounding whitespace trimmed */
  message: string;
}

/**
 * Pulls structured fields out of one raw line. Aggregation only depends on
 * this interface, so a stricter grammar can replace the regex version.
 */
export interface LineExtractor {
  extract(line: string): ParsedRecord;
}

export interface SummaryFilter {
  keyword?: string;
  /** Inclusive lower bound, epoch ms */
  start?: number;
  /** Inclusive upper bound, epoch ms */
  end?: number;
}

export interface RunningAggregate {
  totalLines: number;
  /** Insertion order is first occurrence */
  levelCounts: Map<Level, number>;
  firstTimestamp: number | null;
  lastTimestamp: number | null;
  /** Insertion order is first occurrence */
  signatures: Map<string, number>;
}

export interface SignatureCount {
  signature: string;
  count: number;
}

export interface LogSummary {
  filePath: string;
  aggregate: RunningAggregate;
}
