/**
 * gwt-prose command: configuration loading and the run loop.
 */

import {
  ConfigParseError,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  EnvCoercionError,
  getEnvVarDocumentation,
  isTrueEnvValue,
  mergeConfig,
  parseConfig,
  readEnvOverrides,
} from '../config/index.js';
import type { Config, EnvRecord, PartialConfig } from '../config/index.js';
import type { ExtractedTest } from '../extract/index.js';
import { processUnit } from '../pipeline.js';
import { Logger } from '../utils/logger.js';
import { PathValidationError, safeExistsSync, safeReadTextFileSync } from '../utils/safe-fs.js';
import { CliUsageError, parseArgs } from './args.js';
import { classifyError, exitCodeFor, formatErrorWithSuggestions } from './errors.js';
import { SourceReadError, loadUnit, planUnits, unitLabel } from './inputs.js';
import type { CliCommandResult, CliIo } from './types.js';
import { getVersion } from './version.js';

function environmentSection(): string {
  return Object.entries(getEnvVarDocumentation())
    .map(([envVar, { description, type }]) => `  ${envVar.padEnd(31)}${description} [${type}]\n`)
    .join('');
}

/**
 * Usage text for `--help`.
 */
export const HELP_TEXT = `gwt-prose - turn Given/When/Then test names into prose

USAGE:
  gwt-prose [options] [inputs...]

INPUTS:
  Source files scanned for TEST, TEST_F, TYPED_TEST_P and TYPED_TEST,
  or literal test names with --names. "-" or no inputs reads stdin.

OPTIONS:
  -b, --brief                    One line per test, omit unspecified clauses
  -s, --style <text|markdown>    Output markup style (default: text)
  -m, --markdown                 Same as --style markdown
  -n, --names                    Treat inputs as test names, not files
  -T, --no-trailing-blank-line   No blank line after the last test of an input
  -c, --config <path>            Config file (default: ${DEFAULT_CONFIG_FILE})
      --debug                    Write JSON debug log entries to stderr
  -h, --help                     Show this help message
  -v, --version                  Show version information

ENVIRONMENT:
${environmentSection()}
EXAMPLES:
  gwt-prose refcount_test.cpp
  gwt-prose --brief --markdown tests/*.cpp
  gwt-prose --names Test_AddRef__increments_the_reference_count
`;

/**
 * Loads the config file layer.
 *
 * With an explicit path the file must exist and parse. Without one, the
 * default file is used when present; if it fails to load a warning is written
 * and defaults are used.
 *
 * @param configPath - Explicit config file, if any.
 * @param warn - Receives warning lines.
 * @returns The file configuration merged over defaults.
 * @throws ConfigParseError if an explicit config file is missing or invalid.
 */
export function loadConfigFile(
  configPath: string | undefined,
  warn: (message: string) => void = console.warn
): Config {
  if (configPath !== undefined) {
    if (!safeExistsSync(configPath)) {
      throw new ConfigParseError(`Config file not found: ${configPath}`);
    }
    return parseConfig(safeReadTextFileSync(configPath));
  }

  const configFilePath = DEFAULT_CONFIG_FILE;

  if (safeExistsSync(configFilePath)) {
    try {
      return parseConfig(safeReadTextFileSync(configFilePath));
    } catch (error) {
      const errorMessage = error instanceof ConfigParseError ? error.message : String(error);
      warn(`Warning: Failed to load config from ${configFilePath}: ${errorMessage}`);
      warn('Using default settings.');
    }
  }

  return DEFAULT_CONFIG;
}

/**
 * Builds the effective configuration: flags over environment over file over defaults.
 *
 * @throws ConfigParseError for an unusable explicit config file.
 * @throws EnvCoercionError for an environment variable with an invalid value.
 */
export function resolveConfig(
  configPath: string | undefined,
  flags: PartialConfig,
  env: EnvRecord,
  warn: (message: string) => void
): Config {
  const fileConfig = loadConfigFile(configPath, warn);
  return mergeConfig(mergeConfig(fileConfig, readEnvOverrides(env)), flags);
}

function errorDetails(error: unknown): { filePath?: string; envVar?: string } {
  if (error instanceof EnvCoercionError) {
    return { envVar: error.envVar };
  }
  if (error instanceof SourceReadError) {
    return { filePath: error.path };
  }
  return {};
}

/**
 * Debug mode for a run that stopped before its configuration was resolved.
 * The config file is not consulted, and an invalid GWT_PROSE_DEBUG counts as
 * off.
 */
function earlyDebugMode(
  argv: readonly string[],
  flags: PartialConfig | undefined,
  env: EnvRecord
): boolean {
  const flagged = flags === undefined ? argv.includes('--debug') : flags.logging?.debug === true;
  return flagged || isTrueEnvValue(env.GWT_PROSE_DEBUG);
}

function logFatal(logger: Logger, error: unknown): void {
  if (logger.isDebugEnabled) {
    logger.error('fatal_error', {
      errorType: classifyError(error),
      message: error instanceof Error ? error.message : String(error),
    });
  }
}

function reportFatal(error: Error, io: CliIo, logger: Logger): CliCommandResult {
  const errorType = classifyError(error);
  io.stderr(
    formatErrorWithSuggestions(error.message, { errorType, details: errorDetails(error) }, { colors: io.colors }) +
      '\n'
  );
  logFatal(logger, error);
  return { exitCode: exitCodeFor(errorType) };
}

/**
 * Runs the gwt-prose command.
 *
 * Units are read, rephrased and printed one at a time in input order. An
 * unreadable file or standard input is reported and skipped; the remaining
 * inputs still run.
 *
 * @param argv - Arguments after the command name.
 * @param io - Output streams and stdin reader.
 * @param env - Environment for GWT_PROSE_* overrides.
 * @returns Exit code 0 on success, 1 if any source was unreadable, 2 for usage or configuration errors.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo,
  env: EnvRecord = process.env
): Promise<CliCommandResult> {
  let config: Config;
  let inputs: readonly string[];
  let flags: PartialConfig | undefined;

  try {
    const args = parseArgs(argv);
    flags = args.overrides;
    if (args.help) {
      io.stdout(HELP_TEXT);
      return { exitCode: 0 };
    }
    if (args.version) {
      io.stdout(`gwt-prose v${getVersion()}\n`);
      return { exitCode: 0 };
    }
    config = resolveConfig(args.configPath, args.overrides, env, (message) => {
      io.stderr(`${message}\n`);
    });
    inputs = args.inputs;
  } catch (error) {
    if (
      error instanceof CliUsageError ||
      error instanceof ConfigParseError ||
      error instanceof EnvCoercionError ||
      error instanceof PathValidationError
    ) {
      const debugMode = earlyDebugMode(argv, flags, env);
      return reportFatal(error, io, new Logger({ component: 'cli', debugMode, sink: io.stderr }));
    }
    throw error;
  }

  const logger = new Logger({ component: 'cli', debugMode: config.logging.debug, sink: io.stderr });
  const pipelineLogger = logger.child('pipeline');
  let failed = false;

  try {
    for (const unit of planUnits(inputs, config.input.mode)) {
      let tests: ExtractedTest[];
      try {
        tests = await loadUnit(unit, config.input.mode, io.readStdin);
      } catch (error) {
        if (!(error instanceof SourceReadError)) {
          throw error;
        }
        io.stderr(`Error: ${error.message}\n`);
        if (logger.isDebugEnabled) {
          logger.warn('source_unreadable', { source: error.path, reason: error.reason });
        }
        failed = true;
        continue;
      }

      const { lines } = processUnit(unitLabel(unit), tests, config, pipelineLogger);
      io.stdout(lines.map((line) => `${line}\n`).join(''));
    }
  } catch (error) {
    logFatal(logger, error);
    throw error;
  }

  return { exitCode: failed ? exitCodeFor('source_unreadable') : 0 };
}
