/**
 * TOML configuration parser for gwt-prose.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_INPUT, DEFAULT_LOGGING, DEFAULT_OUTPUT } from './defaults.js';
import type { Config, InputConfig, InputMode, LoggingConfig, OutputConfig, OutputStyle } from './types.js';

/**
 * Thrown when config content cannot be turned into a {@link Config}.
 */
export class ConfigParseError extends Error {
  /** TOML parser error behind a syntax failure. */
  public override readonly cause: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

export const VALID_OUTPUT_STYLES: readonly OutputStyle[] = ['text', 'markdown'];

export const VALID_INPUT_MODES: readonly InputMode[] = ['file', 'name'];

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateTable(value: unknown, fieldPath: string): Table | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table, got ${typeof value}`);
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function choiceValidator<T extends string>(
  allowed: readonly T[]
): (value: unknown, fieldPath: string) => T {
  return (value, fieldPath) => {
    if (typeof value !== 'string') {
      throw new ConfigParseError(
        `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
      );
    }
    const choice = allowed.find((candidate) => candidate === value);
    if (choice === undefined) {
      throw new ConfigParseError(
        `Invalid value for '${fieldPath}': expected one of [${allowed.join(', ')}], got '${value}'`
      );
    }
    return choice;
  };
}

const validateOutputStyle = choiceValidator(VALID_OUTPUT_STYLES);
const validateInputMode = choiceValidator(VALID_INPUT_MODES);

/**
 * Reads one key of a section, falling back to its default when the key is
 * missing. Field paths in errors are `section.key`.
 */
function readField<T>(
  section: string,
  table: Table | undefined,
  key: string,
  validate: (value: unknown, fieldPath: string) => T,
  fallback: T
): T {
  if (table === undefined || !(key in table)) {
    return fallback;
  }
  return validate(table[key], `${section}.${key}`);
}

function parseOutput(table: Table | undefined): OutputConfig {
  return {
    brief: readField('output', table, 'brief', validateBoolean, DEFAULT_OUTPUT.brief),
    style: readField('output', table, 'style', validateOutputStyle, DEFAULT_OUTPUT.style),
    trailing_blank_line: readField(
      'output',
      table,
      'trailing_blank_line',
      validateBoolean,
      DEFAULT_OUTPUT.trailing_blank_line
    ),
  };
}

function parseInput(table: Table | undefined): InputConfig {
  return { mode: readField('input', table, 'mode', validateInputMode, DEFAULT_INPUT.mode) };
}

function parseLogging(table: Table | undefined): LoggingConfig {
  return { debug: readField('logging', table, 'debug', validateBoolean, DEFAULT_LOGGING.debug) };
}

/**
 * Parses gwt-prose.toml content. Missing keys take their defaults; unknown
 * sections and keys are ignored.
 *
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [output]
 * brief = true
 * style = "markdown"
 * `);
 * console.log(config.output.style); // "markdown"
 * console.log(config.input.mode); // "file"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    output: parseOutput(validateTable(parsed.output, 'output')),
    input: parseInput(validateTable(parsed.input, 'input')),
    logging: parseLogging(validateTable(parsed.logging, 'logging')),
  };
}
