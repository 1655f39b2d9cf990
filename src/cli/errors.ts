/**
 * Fatal and per-source error reporting for the gwt-prose CLI.
 *
 * Every error is classified into an {@link ErrorType}, which picks both the
 * hints printed under the message and the exit code.
 *
 * @packageDocumentation
 */

import { ConfigParseError, EnvCoercionError } from '../config/index.js';
import { PathValidationError } from '../utils/safe-fs.js';
import { CliUsageError } from './args.js';
import { SourceReadError } from './inputs.js';
import type { DisplayOptions } from './types.js';

/**
 * Error types that can stop or degrade a run.
 */
export type ErrorType = 'usage' | 'config' | 'source_unreadable' | 'unknown';

/**
 * A hint printed under an error, with an optional command to try.
 */
export interface Suggestion {
  readonly text: string;
  readonly action?: string;
}

/**
 * What is known about a failure when it is reported.
 */
export interface ErrorContext {
  errorType: ErrorType;
  details?: {
    /** Config or source file involved. */
    filePath?: string;
    /** GWT_PROSE_* variable involved. */
    envVar?: string;
  };
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  usage: [
    {
      text: 'Check the option names and their values',
      action: 'gwt-prose --help',
    },
  ],

  config: [
    {
      text: 'Check gwt-prose.toml for TOML syntax errors and value types',
    },
    {
      text: 'Check GWT_PROSE_* environment variables',
      action: 'env | grep GWT_PROSE_',
    },
  ],

  source_unreadable: [
    {
      text: 'Check that the file exists and is readable',
    },
    {
      text: 'Pass literal test names with --names instead of file paths',
      action: 'gwt-prose --names Test_Pop__throws',
    },
  ],

  unknown: [
    {
      text: 'Run with debug logging for more detail',
      action: 'gwt-prose --debug <inputs>',
    },
  ],
};

/**
 * Maps a thrown value to its error type. Anything unrecognized is `unknown`.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof CliUsageError) {
    return 'usage';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof EnvCoercionError ||
    error instanceof PathValidationError
  ) {
    return 'config';
  }
  if (error instanceof SourceReadError) {
    return 'source_unreadable';
  }
  return 'unknown';
}

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
} as const;

type AnsiStyle = Exclude<keyof typeof ANSI, 'reset'>;

function paint(style: AnsiStyle, text: string, options: DisplayOptions): string {
  return options.colors ? `${ANSI[style]}${text}${ANSI.reset}` : text;
}

function suggestionLines(suggestions: readonly Suggestion[], options: DisplayOptions): string[] {
  return suggestions.flatMap(({ text, action }, i) => {
    const numbered = `  ${paint('yellow', `${String(i + 1)}.`, options)} ${text}`;
    return action === undefined ? [numbered] : [numbered, `    ${paint('dim', action, options)}`];
  });
}

/**
 * Formats an error message followed by the numbered suggestions for its type.
 *
 * @example
 * ```typescript
 * formatErrorWithSuggestions("Unknown option: --x", { errorType: 'usage' }, { colors: false });
 * // Error: Unknown option: --x
 * //
 * // Suggestions:
 * //   1. Check the option names and their values
 * //     gwt-prose --help
 * ```
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true }
): string {
  const lines = [`${paint('red', 'Error:', options)} ${errorMessage}`];
  const details = context.details ?? {};
  if (details.filePath !== undefined) {
    lines.push(`  ${paint('yellow', 'File:', options)} ${details.filePath}`);
  }
  if (details.envVar !== undefined) {
    lines.push(`  ${paint('yellow', 'Variable:', options)} ${details.envVar}`);
  }
  lines.push('', paint('bold', 'Suggestions:', options));
  lines.push(...suggestionLines(ERROR_SUGGESTIONS[context.errorType ?? 'unknown'], options));
  return lines.join('\n');
}

/**
 * Exit code for an error type: 2 when nothing could run, 1 otherwise.
 */
export function exitCodeFor(errorType: ErrorType): number {
  switch (errorType) {
    case 'usage':
      return 2;
    case 'config':
      return 2;
    case 'source_unreadable':
      return 1;
    case 'unknown':
      return 1;
    default: {
      const exhaustiveCheck: never = errorType;
      return exhaustiveCheck;
    }
  }
}
