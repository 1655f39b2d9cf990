/**
 * Configuration module for gwt-prose.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides. The resulting {@link Config} is an immutable value
 * passed explicitly to every stage.
 *
 * Override precedence: command-line flags > env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, VALID_INPUT_MODES, VALID_OUTPUT_STYLES, parseConfig } from './parser.js';
export type {
  Config,
  InputConfig,
  InputMode,
  LoggingConfig,
  OutputConfig,
  OutputStyle,
  PartialConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_INPUT,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
} from './defaults.js';
export { mergeConfig, mergePartialConfig } from './merge.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  isTrueEnvValue,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvRecord } from './env.js';
