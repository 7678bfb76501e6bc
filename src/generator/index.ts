import { createWriteStream } from "fs";
import { rm } from "fs/promises";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { LogIoError } from "@/lib/errors";
import { createRandom, type Random } from "@/lib/random";
import { parseGenerateOptions } from "@/lib/validations/options";
import { DEFAULT_MODEL } from "./model";
import { formatRecord, makeRecord } from "./record";
import { exponentialInterval } from "./sampling";
import type { GenerateOptions, GenerateResult, GeneratorModel, LogRecord } from "./types";

export { DEFAULT_MODEL } from "./model";
export { randomIpv4, isReservedIpv4, RESERVED_BLOCKS } from "./address";
export { weightedChoice, exponentialInterval } from "./sampling";
export { makeRecord, formatRecord, stripControlChars } from "./record";
export type * from "./types";

/**
 * Lazily draw `count` records.
 *
 * The process id is drawn once, then the clock advances by an exponential
 * interval (at least one millisecond) before every record, so record
 * timestamps strictly increase.
 */
export function* generateRecords(
  count: number,
  startTime: number,
  rng: Random,
  model: GeneratorModel = DEFAULT_MODEL
): Generator<LogRecord> {
  const pid = rng.int(1000, 9999);
  let timestamp = startTime;
  for (let i = 0; i < count; i++) {
    const intervalMs = Math.round(exponentialInterval(model.meanIntervalSeconds, rng) * 1000);
    timestamp += Math.max(1, intervalMs);
    yield makeRecord(timestamp, pid, rng, model);
  }
}

/** Newline-terminated syslog lines for {@link generateRecords}. */
export function* generateLines(
  count: number,
  startTime: number,
  rng: Random,
  model: GeneratorModel = DEFAULT_MODEL
): Generator<string> {
  for (const record of generateRecords(count, startTime, rng, model)) {
    yield formatRecord(record) + "\n";
  }
}

/**
 * Write `count` synthetic firewall log lines to `outPath`.
 *
 * Output is streamed, so memory does not grow with `count`. With the same
 * seed, count and start time the file is byte-identical across runs.
 * A file left behind by a failed write is removed before the error is thrown.
 */
export async function generateLogs(
  options: GenerateOptions,
  model: GeneratorModel = DEFAULT_MODEL
): Promise<GenerateResult> {
  const { count, outPath, seed, startTime } = parseGenerateOptions(options);
  const rng = createRandom(seed);
  const lines = generateLines(count, startTime ?? Date.now(), rng, model);

  try {
    await pipeline(Readable.from(lines), createWriteStream(outPath, { encoding: "utf-8" }));
  } catch (error) {
    const operation = error instanceof Error && "syscall" in error && error.syscall === "open" ? "open" : "write";
    if (operation === "write") {
      await rm(outPath, { force: true }).catch((cleanupError: unknown) => {
        console.error(
          `Could not remove partial output ${outPath}:`,
          cleanupError instanceof Error ? cleanupError.message : cleanupError
        );
      });
    }
    throw new LogIoError(operation, outPath, error);
  }

  return { outPath, count, seed: rng.seed };
}
