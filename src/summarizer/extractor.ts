import { LEVELS, UNKNOWN_LEVEL } from "@/lib/constants";
import { parseTimestamp } from "@/lib/time";
import type { Level, LineExtractor, ParsedRecord } from "./types";

/** 2025-10-20 13:05:09 or 2025-10-20T13:05:09 */
const TIMESTAMP_REGEX = /\b(\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2})\b/;

const LEVEL_REGEX = new RegExp(`\\b(${LEVELS.join("|")})\\b`);

const KNOWN_LEVELS: ReadonlySet<string> = new Set(LEVELS);

function isLevel(value: string): value is Level {
  return KNOWN_LEVELS.has(value);
}

/**
 * Try to extract a timestamp from a line.
 * Returns epoch milliseconds, or null if absent or not a real calendar time.
 */
export function extractTimestamp(line: string): number | null {
  const match = TIMESTAMP_REGEX.exec(line);
  return match ? parseTimestamp(match[1]) : null;
}

/** First whole-word level token, or UNKNOWN. Matching is case-sensitive. */
export function extractLevel(line: string): Level {
  const match = LEVEL_REGEX.exec(line);
  return match && isLevel(match[1]) ? match[1] : UNKNOWN_LEVEL;
}

export const regexExtractor: LineExtractor = {
  extract(line: string): ParsedRecord {
    return {
      timestamp: extractTimestamp(line),
      level: extractLevel(line),
      message: line.trim(),
    };
  },
};
