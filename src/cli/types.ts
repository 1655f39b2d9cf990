/**
 * CLI types and interfaces for the gwt-prose command.
 */

/**
 * Streams the CLI reads from and writes to. Injected so the CLI can run in
 * process under test.
 */
export interface CliIo {
  /**
   * Writes rendered output.
   */
  stdout: (text: string) => void;

  /**
   * Writes diagnostics and log entries.
   */
  stderr: (text: string) => void;

  /**
   * Reads all of standard input.
   */
  readStdin: () => Promise<string>;

  /**
   * Whether diagnostics may use ANSI colors.
   */
  colors: boolean;
}

/**
 * Display options for formatted diagnostics.
 */
export interface DisplayOptions {
  /**
   * Whether to use colors in output.
   */
  colors: boolean;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code: 0 success, 1 unreadable source, 2 usage or configuration error.
   */
  exitCode: number;
}
