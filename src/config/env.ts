/**
 * GWT_PROSE_* environment variables as a configuration layer.
 *
 * They sit between the config file and command-line flags.
 *
 * @packageDocumentation
 */

import { mergePartialConfig } from './merge.js';
import { VALID_INPUT_MODES, VALID_OUTPUT_STYLES } from './parser.js';
import type { PartialConfig } from './types.js';

/** Shape of `process.env`. */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Thrown when a GWT_PROSE_* value is not one the variable accepts.
 */
export class EnvCoercionError extends Error {
  public readonly envVar: string;
  public readonly rawValue: string;
  /** Accepted values, e.g. `boolean` or `text | markdown`. */
  public readonly expectedType: string;

  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const TRUE_WORDS: readonly string[] = ['true', '1', 'yes', 'on'];
const FALSE_WORDS: readonly string[] = ['false', '0', 'no', 'off'];

// Case-insensitive, surrounding whitespace ignored.
function coerceToBoolean(value: string, envVar: string): boolean {
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) {
    return true;
  }
  if (FALSE_WORDS.includes(word)) {
    return false;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUE_WORDS, ...FALSE_WORDS].join(', ')}`
  );
}

function coerceToChoice<T extends string>(value: string, allowed: readonly T[], envVar: string): T {
  const trimmed = value.trim().toLowerCase();
  const choice = allowed.find((candidate) => candidate === trimmed);
  if (choice === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      allowed.join(' | '),
      `Cannot coerce '${envVar}' value '${value}'. Expected one of: ${allowed.join(', ')}`
    );
  }
  return choice;
}

interface EnvMapping {
  /** Shown in `--help`. */
  readonly description: string;
  readonly type: string;
  readonly read: (value: string, envVar: string) => PartialConfig;
}

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  GWT_PROSE_BRIEF: {
    description: 'Use the brief layout (output.brief)',
    type: 'boolean',
    read: (value, envVar) => ({ output: { brief: coerceToBoolean(value, envVar) } }),
  },
  GWT_PROSE_STYLE: {
    description: 'Output markup style (output.style)',
    type: VALID_OUTPUT_STYLES.join(' | '),
    read: (value, envVar) => ({
      output: { style: coerceToChoice(value, VALID_OUTPUT_STYLES, envVar) },
    }),
  },
  GWT_PROSE_TRAILING_BLANK_LINE: {
    description: 'Blank line after the last test of each input (output.trailing_blank_line)',
    type: 'boolean',
    read: (value, envVar) => ({
      output: { trailing_blank_line: coerceToBoolean(value, envVar) },
    }),
  },
  GWT_PROSE_MODE: {
    description: 'Interpretation of positional inputs (input.mode)',
    type: VALID_INPUT_MODES.join(' | '),
    read: (value, envVar) => ({ input: { mode: coerceToChoice(value, VALID_INPUT_MODES, envVar) } }),
  },
  GWT_PROSE_DEBUG: {
    description: 'Write debug log entries to stderr (logging.debug)',
    type: 'boolean',
    read: (value, envVar) => ({ logging: { debug: coerceToBoolean(value, envVar) } }),
  },
};

/**
 * Reads every GWT_PROSE_* variable into configuration overrides. Unset and
 * empty variables are skipped.
 *
 * @throws EnvCoercionError on the first bad value.
 *
 * @example
 * ```typescript
 * readEnvOverrides({ GWT_PROSE_STYLE: 'markdown' }).output?.style; // "markdown"
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): PartialConfig {
  let overrides: PartialConfig = {};

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }
    overrides = mergePartialConfig(overrides, mapping.read(value, envVar));
  }

  return overrides;
}

/**
 * Whether an environment value spells true. Values that are not booleans at
 * all count as false instead of throwing.
 */
export function isTrueEnvValue(value: string | undefined): boolean {
  return value !== undefined && TRUE_WORDS.includes(value.trim().toLowerCase());
}

/**
 * Description and accepted values of each supported variable.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
