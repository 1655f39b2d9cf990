/**
 * Configuration types for gwt-prose.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Output markup style.
 */
export type OutputStyle = 'text' | 'markdown';

/**
 * How positional command-line inputs are interpreted.
 * - `file`: each input is a source file (or `-` for stdin) scanned for test macros
 * - `name`: each input is a literal test name (`-` reads one name per stdin line)
 */
export type InputMode = 'file' | 'name';

/**
 * Output layout settings.
 */
export interface OutputConfig {
  /** Brief layout: one line per test, absent clauses omitted instead of shown as unspecified. */
  readonly brief: boolean;
  /** Markup style for rendered output. */
  readonly style: OutputStyle;
  /** Whether the last test of an input unit is followed by a blank line. */
  readonly trailing_blank_line: boolean;
}

/**
 * Input interpretation settings.
 */
export interface InputConfig {
  /** Interpretation of positional inputs. */
  readonly mode: InputMode;
}

/**
 * Diagnostic logging settings.
 */
export interface LoggingConfig {
  /** Whether debug-level JSON log entries are written to stderr. */
  readonly debug: boolean;
}

/**
 * Complete configuration, passed explicitly to parsing, rephrasing and rendering.
 */
export interface Config {
  readonly output: OutputConfig;
  readonly input: InputConfig;
  readonly logging: LoggingConfig;
}

/**
 * Partial configuration used for layered overrides (file, environment, flags).
 */
export interface PartialConfig {
  readonly output?: Partial<OutputConfig>;
  readonly input?: Partial<InputConfig>;
  readonly logging?: Partial<LoggingConfig>;
}
