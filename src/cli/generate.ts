#!/usr/bin/env -S npx tsx
/**
 * Generate firewall-style syslog entries (INFO/NOTICE/WARNING/ERROR/CRITICAL)
 * for testing, analytics or demos.
 *
 * Usage:
 *   npm run generate -- --count 500 --out ./firewall_sample.log --seed 42
 *   npm run generate -- --count 1000 --out /tmp/fw.log --start "2025-10-20 08:00:00"
 */

import { parseArgs } from "util";
import { generateLogs } from "@/generator";
import { EXIT_OK, isEntrypoint, reportError } from "@/lib/cli";
import { SEED_ENV_VAR } from "@/lib/constants";
import { OptionsError } from "@/lib/errors";
import { parseGenerateCliOptions } from "@/lib/validations/options";

export const USAGE = `Usage: logforge-generate [options]

Options:
  --count N         Number of log entries to generate (default 500)
  --out PATH        Output file path (default ./firewall_sample.log)
  --seed S          Seed in [0, 4294967295] for reproducible output (env: ${SEED_ENV_VAR})
  --start TS        Clock before the first entry, e.g. "2025-10-20 08:00:00" (UTC). Defaults to now.
  --burstiness B    Accepted for compatibility (0.0 - 1.0); currently has no effect
  -h, --help        Show this help`;

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        count: { type: "string" },
        out: { type: "string" },
        seed: { type: "string" },
        start: { type: "string" },
        burstiness: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new OptionsError([error instanceof Error ? error.message : String(error)]);
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const values = parseCommandLine(argv);
    if (values.help) {
      console.log(USAGE);
      return EXIT_OK;
    }

    const options = parseGenerateCliOptions({
      count: values.count,
      out: values.out,
      seed: values.seed ?? (process.env[SEED_ENV_VAR] || undefined),
      start: values.start,
      burstiness: values.burstiness,
    });

    const result = await generateLogs({
      count: options.count,
      outPath: options.out,
      seed: options.seed,
      startTime: options.start,
      burstiness: options.burstiness,
    });

    console.log(`Wrote ${result.count} log lines to: ${result.outPath} (seed ${result.seed})`);
    return EXIT_OK;
  } catch (error) {
    return reportError(error, USAGE);
  }
}

if (isEntrypoint(import.meta.url)) {
  process.exitCode = await main();
}
