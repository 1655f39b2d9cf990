/**
 * Top-level error handling for the CLI entry point.
 */

import { classifyError, exitCodeFor, formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult, DisplayOptions } from '../types.js';

/**
 * Runs a command and turns its result or failure into the process exit code.
 *
 * Errors that escape the command are printed with the suggestions for their
 * type and exit with that type's code. The exit code is set on `process`
 * without forcing an exit.
 *
 * @param fn - The command to run (sync or async).
 * @param options - Display options for an escaped error.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: DisplayOptions = { colors: false }
): void {
  void (async () => {
    try {
      const result = await fn();
      process.exitCode = result.exitCode;
    } catch (error) {
      const errorType = classifyError(error);
      const message = error instanceof Error ? error.message : String(error);
      console.error(formatErrorWithSuggestions(message, { errorType }, options));
      process.exitCode = exitCodeFor(errorType);
    }
  })();
}
