#!/usr/bin/env -S npx tsx
/**
 * Summarize a log file: level counts, time span and the most repeated
 * error messages.
 *
 * Usage:
 *   npm run summarize -- /var/log/syslog
 *   npm run summarize -- app.log --keyword database
 *   npm run summarize -- app.log --start "2025-10-20 00:00:00" --end "2025-10-22 23:59:59"
 *   npm run summarize -- app.log --output summary.txt
 */

import { parseArgs } from "util";
import { EXIT_OK, isEntrypoint, reportError } from "@/lib/cli";
import { OptionsError } from "@/lib/errors";
import { parseSummarizeOptions } from "@/lib/validations/options";
import { renderReport, summarizeLog, writeReport } from "@/summarizer";

export const USAGE = `Usage: logforge-summarize <logfile> [options]

Options:
  --keyword WORD    Only rank error lines containing WORD (case-insensitive)
  --start TS        Only rank error lines at or after TS (YYYY-MM-DD HH:MM:SS)
  --end TS          Only rank error lines at or before TS (YYYY-MM-DD HH:MM:SS)
  --output PATH     Write the summary to PATH instead of the console
  -h, --help        Show this help

Filters narrow the repeated-error ranking only; totals, level counts and the
time span always cover the whole file.`;

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        keyword: { type: "string" },
        start: { type: "string" },
        end: { type: "string" },
        output: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: true,
    });
  } catch (error) {
    throw new OptionsError([error instanceof Error ? error.message : String(error)]);
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const { values, positionals } = parseCommandLine(argv);
    if (values.help) {
      console.log(USAGE);
      return EXIT_OK;
    }
    if (positionals.length > 1) {
      throw new OptionsError([`expected one log file, got ${positionals.length}`]);
    }

    const options = parseSummarizeOptions({
      logfile: positionals[0] ?? "",
      keyword: values.keyword,
      start: values.start,
      end: values.end,
      output: values.output,
    });

    const { filePath, aggregate } = await summarizeLog(options.logfile, {
      keyword: options.keyword,
      start: options.start,
      end: options.end,
    });
    await writeReport(renderReport(filePath, aggregate), options.output);
    return EXIT_OK;
  } catch (error) {
    return reportError(error, USAGE);
  }
}

if (isEntrypoint(import.meta.url)) {
  process.exitCode = await main();
}
