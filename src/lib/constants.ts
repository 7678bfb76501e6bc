export const DEFAULT_COUNT = 500;
export const DEFAULT_OUT_PATH = "./firewall_sample.log";

/** Accepted for compatibility; see DESIGN.md. It does not shape timing. */
export const DEFAULT_BURSTINESS = 0.2;

/** Largest seed the generator accepts (unsigned 32-bit) */
export const MAX_SEED = 2 ** 32 - 1;

export const SEED_ENV_VAR = "LOGFORGE_SEED";

export const LEVELS = ["INFO", "WARN", "WARNING", "ERROR", "DEBUG", "CRITICAL"] as const;
export const UNKNOWN_LEVEL = "UNKNOWN";

/** Levels whose messages feed the repeated-error ranking */
export const ERROR_LEVELS: ReadonlySet<string> = new Set(["ERROR", "CRITICAL"]);

export const SIGNATURE_TOKEN_COUNT = 7;
export const TOP_SIGNATURE_LIMIT = 5;

export const REPORT_HEADER = "===== LOG SUMMARY =====";
