import { createReadStream, type Stats } from "fs";
import { stat, writeFile } from "fs/promises";
import { createInterface } from "readline";
import { LogIoError } from "@/lib/errors";
import { accumulate, createAggregate } from "./aggregate";
import { regexExtractor } from "./extractor";
import type { LineExtractor, LogSummary, SummaryFilter } from "./types";

export { accumulate, createAggregate, errorSignature, isFilteredOut, topSignatures } from "./aggregate";
export { extractLevel, extractTimestamp, regexExtractor } from "./extractor";
export { mergeAggregates } from "./merger";
export { renderReport } from "./report";
export type * from "./types";

/**
 * Summarize a log file in one forward pass.
 *
 * Lines are read through readline, so memory is bounded by the number of
 * distinct levels and error signatures, not by file size. Malformed UTF-8 is
 * decoded with replacement characters rather than failing the run.
 */
export async function summarizeLog(
  filePath: string,
  filter: SummaryFilter = {},
  extractor: LineExtractor = regexExtractor
): Promise<LogSummary> {
  let info: Stats;
  try {
    info = await stat(filePath);
  } catch (error) {
    throw new LogIoError("open", filePath, error);
  }
  if (!info.isFile()) {
    throw new LogIoError("open", filePath, "not a regular file");
  }

  const rl = createInterface({
    input: createReadStream(filePath, { encoding: "utf-8" }),
    crlfDelay: Infinity,
  });

  const aggregate = createAggregate();
  try {
    for await (const line of rl) {
      accumulate(aggregate, extractor.extract(line), filter);
    }
  } catch (error) {
    throw new LogIoError("read", filePath, error);
  } finally {
    rl.close();
  }

  return { filePath, aggregate };
}

/**
 * Deliver a rendered report: to `outputPath` when given, otherwise to stdout.
 * The file receives exactly the text that would have been printed.
 */
export async function writeReport(report: string, outputPath?: string): Promise<void> {
  if (!outputPath) {
    console.log(report);
    return;
  }
  try {
    await writeFile(outputPath, report, "utf-8");
  } catch (error) {
    throw new LogIoError("write", outputPath, error);
  }
  console.log(`Summary written to ${outputPath}`);
}
