import { REPORT_HEADER, TOP_SIGNATURE_LIMIT } from "@/lib/constants";
import { formatDateTime } from "@/lib/time";
import { topSignatures } from "./aggregate";
import type { RunningAggregate } from "./types";

function timeSpan(aggregate: RunningAggregate): string {
  const { firstTimestamp, lastTimestamp } = aggregate;
  if (firstTimestamp === null || lastTimestamp === null) return "Time span: N/A";
  return `Time span: ${formatDateTime(firstTimestamp)} → ${formatDateTime(lastTimestamp)}`;
}

/**
 * Render the plain-text summary. Pure: the same aggregate always renders to
 * the same text.
 */
export function renderReport(filePath: string, aggregate: RunningAggregate): string {
  const lines = [
    REPORT_HEADER,
    `File: ${filePath}`,
    timeSpan(aggregate),
    `Total lines processed: ${aggregate.totalLines}`,
    "",
    "Log Level Counts:",
  ];

  for (const [level, count] of aggregate.levelCounts) {
    lines.push(`  ${level}: ${count}`);
  }

  lines.push("", `Top ${TOP_SIGNATURE_LIMIT} Repeated Error Messages:`);
  for (const { signature, count } of topSignatures(aggregate, TOP_SIGNATURE_LIMIT)) {
    lines.push(`  (${count}x) ${signature}`);
  }

  return lines.join("\n");
}
