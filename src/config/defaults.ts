/**
 * Default configuration values for gwt-prose.toml.
 *
 * @packageDocumentation
 */

import type { Config, InputConfig, LoggingConfig, OutputConfig } from './types.js';

/** Name of the config file looked up in the working directory. */
export const DEFAULT_CONFIG_FILE = 'gwt-prose.toml';

/**
 * Default output settings: verbose plain text with a blank line after every test.
 */
export const DEFAULT_OUTPUT: OutputConfig = {
  brief: false,
  style: 'text',
  trailing_blank_line: true,
};

/**
 * Default input settings.
 */
export const DEFAULT_INPUT: InputConfig = {
  mode: 'file',
};

/**
 * Default logging settings (debug off).
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  output: DEFAULT_OUTPUT,
  input: DEFAULT_INPUT,
  logging: DEFAULT_LOGGING,
};
