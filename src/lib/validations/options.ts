import { z } from "zod/v4";
import type { GenerateOptions } from "@/generator/types";
import { DEFAULT_BURSTINESS, DEFAULT_COUNT, DEFAULT_OUT_PATH, MAX_SEED } from "@/lib/constants";
import { OptionsError } from "@/lib/errors";
import { parseTimestamp } from "@/lib/time";

const timestampSchema = z.string().transform((value, ctx) => {
  const ms = parseTimestamp(value);
  if (ms === null) {
    ctx.issues.push({
      code: "custom",
      message: `Invalid timestamp "${value}" (expected YYYY-MM-DD HH:MM:SS)`,
      input: value,
    });
    return z.NEVER;
  }
  return ms;
});

const countSchema = z.number().int("must be a whole number").min(0, "must be zero or more");

// The PRNG keeps only 32 bits of its seed; wider values would alias
const seedSchema = z
  .number()
  .int(`must be an integer between 0 and ${MAX_SEED}`)
  .min(0, `must be an integer between 0 and ${MAX_SEED}`)
  .max(MAX_SEED, `must be an integer between 0 and ${MAX_SEED}`);

const burstinessSchema = z
  .number()
  .min(0, "must be between 0 and 1")
  .max(1, "must be between 0 and 1");

/** Options passed to generateLogs */
export const generateOptionsSchema = z.object({
  count: countSchema,
  outPath: z.string().min(1, "an output path is required"),
  startTime: z.number().optional(),
  seed: seedSchema.optional(),
  burstiness: burstinessSchema.optional(),
});

/** Raw command-line values; the same field rules after coercion */
export const generateCliSchema = z.object({
  count: z.coerce.number().pipe(countSchema).default(DEFAULT_COUNT),
  out: z.string().min(1).default(DEFAULT_OUT_PATH),
  seed: z.coerce.number().pipe(seedSchema).optional(),
  start: timestampSchema.optional(),
  burstiness: z.coerce.number().pipe(burstinessSchema).default(DEFAULT_BURSTINESS),
});

export const summarizeOptionsSchema = z
  .object({
    logfile: z.string().min(1, "a log file path is required"),
    keyword: z.string().min(1).optional(),
    start: timestampSchema.optional(),
    end: timestampSchema.optional(),
    output: z.string().min(1).optional(),
  })
  .refine((o) => o.start === undefined || o.end === undefined || o.start <= o.end, {
    message: "start must not be later than end",
    path: ["start"],
  });

export type GenerateCliOptions = z.output<typeof generateCliSchema>;
export type SummarizeCliOptions = z.output<typeof summarizeOptionsSchema>;

export function parseGenerateOptions(options: GenerateOptions): GenerateOptions {
  const result = generateOptionsSchema.safeParse(options);
  if (!result.success) throw OptionsError.fromZod(result.error);
  return result.data;
}

export function parseGenerateCliOptions(raw: Record<string, unknown>): GenerateCliOptions {
  const result = generateCliSchema.safeParse(raw);
  if (!result.success) throw OptionsError.fromZod(result.error);
  return result.data;
}

export function parseSummarizeOptions(raw: Record<string, unknown>): SummarizeCliOptions {
  const result = summarizeOptionsSchema.safeParse(raw);
  if (!result.success) throw OptionsError.fromZod(result.error);
  return result.data;
}
