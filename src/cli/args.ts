/**
 * Command-line argument parsing.
 *
 * @packageDocumentation
 */

import { VALID_OUTPUT_STYLES } from '../config/index.js';
import type { InputConfig, LoggingConfig, OutputConfig, OutputStyle, PartialConfig } from '../config/index.js';

/**
 * Error for unknown options, missing option values and invalid choices.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parsed command line.
 */
export interface ParsedArgs {
  readonly help: boolean;
  readonly version: boolean;
  /** Explicit config file; undefined means look for the default file. */
  readonly configPath: string | undefined;
  /** Settings given by flags, which take precedence over every other layer. */
  readonly overrides: PartialConfig;
  /** Files, names or `-` for stdin, in order. */
  readonly inputs: readonly string[];
}

const VALUE_OPTIONS: readonly string[] = ['--style', '--config'];

function parseStyle(value: string): OutputStyle {
  const style = VALID_OUTPUT_STYLES.find((candidate) => candidate === value);
  if (style === undefined) {
    throw new CliUsageError(
      `Invalid value for --style: '${value}' (expected one of ${VALID_OUTPUT_STYLES.join(', ')})`
    );
  }
  return style;
}

/**
 * Parses command-line arguments (without the node and script paths).
 *
 * Options and inputs may be mixed; `--` ends option parsing and `-` is an
 * input meaning standard input. Value options accept `--style markdown` and
 * `--style=markdown`.
 *
 * @param argv - Arguments after the command name.
 * @returns The parsed command line.
 * @throws CliUsageError for unknown options, missing values or invalid styles.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  let help = false;
  let version = false;
  let configPath: string | undefined;
  let output: Partial<OutputConfig> = {};
  let input: Partial<InputConfig> = {};
  let logging: Partial<LoggingConfig> = {};
  const inputs: string[] = [];

  let index = 0;
  const takeValue = (option: string, inline: string | undefined): string => {
    if (inline !== undefined) {
      return inline;
    }
    index += 1;
    const value = argv[index];
    if (value === undefined) {
      throw new CliUsageError(`Missing value for ${option}`);
    }
    return value;
  };

  let optionsEnded = false;
  for (; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';

    if (optionsEnded || arg === '-' || !arg.startsWith('-')) {
      inputs.push(arg);
      continue;
    }

    const equals = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const option = equals === -1 ? arg : arg.slice(0, equals);
    const inline = equals === -1 ? undefined : arg.slice(equals + 1);
    if (inline !== undefined && !VALUE_OPTIONS.includes(option)) {
      throw new CliUsageError(`Option ${option} does not take a value`);
    }

    switch (option) {
      case '--':
        optionsEnded = true;
        break;
      case '-h':
      case '--help':
        help = true;
        break;
      case '-v':
      case '--version':
        version = true;
        break;
      case '-b':
      case '--brief':
        output = { ...output, brief: true };
        break;
      case '-s':
      case '--style':
        output = { ...output, style: parseStyle(takeValue(option, inline)) };
        break;
      case '-m':
      case '--markdown':
        output = { ...output, style: 'markdown' };
        break;
      case '-T':
      case '--no-trailing-blank-line':
        output = { ...output, trailing_blank_line: false };
        break;
      case '-n':
      case '--names':
        input = { ...input, mode: 'name' };
        break;
      case '-c':
      case '--config':
        configPath = takeValue(option, inline);
        break;
      case '--debug':
        logging = { ...logging, debug: true };
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return { help, version, configPath, overrides: { output, input, logging }, inputs };
}
