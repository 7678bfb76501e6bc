import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { LogIoError, OptionsError } from "@/lib/errors";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** True when the module at `moduleUrl` is the script node was started with. */
export function isEntrypoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

/** Print an error for a CLI user and pick the exit code. */
export function reportError(error: unknown, usage: string): number {
  if (error instanceof OptionsError) {
    console.error(`Error: ${error.message}`);
    console.error(usage);
    return EXIT_USAGE;
  }
  if (error instanceof LogIoError) {
    console.error(`Error: ${error.message}`);
    return EXIT_FAILURE;
  }
  console.error("Unexpected error:", error instanceof Error ? error.stack ?? error.message : error);
  return EXIT_FAILURE;
}
