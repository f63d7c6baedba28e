import log from "../logger";

/** Print an error for the user and mark the process as failed. */
export function reportError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  log.debug({ err }, "Command failed");
  console.error(`Error: ${message}`);
  process.exitCode = 1;
}
