/**
 * Layering of partial configurations over a complete one.
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - Values that take precedence over `base`.
 * @returns A new configuration; neither argument is modified.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    output: { ...base.output, ...partial.output },
    input: { ...base.input, ...partial.input },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Merges two partial configurations, section by section.
 *
 * @param lower - Lower-precedence overrides.
 * @param higher - Higher-precedence overrides.
 * @returns The combined overrides.
 */
export function mergePartialConfig(lower: PartialConfig, higher: PartialConfig): PartialConfig {
  return {
    output: { ...lower.output, ...higher.output },
    input: { ...lower.input, ...higher.input },
    logging: { ...lower.logging, ...higher.logging },
  };
}
