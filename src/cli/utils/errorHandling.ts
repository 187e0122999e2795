/**
 * Shared error handling utilities for the CLI.
 */

/**
 * Renders an unknown thrown value as a single message.
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the CLI entry and turns its outcome into the process exit code.
 *
 * - On success: sets the returned exit code
 * - On error: logs `Error: <message>` and sets exit code 1
 *
 * The exit code is set rather than forced, so pending output is flushed.
 *
 * @param fn - The function to wrap (sync or async).
 */
export function withErrorHandling(fn: () => number | Promise<number>): void {
  void (async () => {
    try {
      process.exitCode = await fn();
    } catch (error) {
      console.error(`Error: ${formatError(error)}`);
      process.exitCode = 1;
    }
  })();
}
