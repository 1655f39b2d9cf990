/**
 * gwt-prose
 *
 * Turns Given/When/Then-shaped test names into structured prose.
 *
 * @packageDocumentation
 */

import { getVersion } from './cli/version.js';
import { DEFAULT_CONFIG, mergeConfig } from './config/index.js';
import type { PartialConfig } from './config/index.js';
import { namesToTests } from './extract/index.js';
import { processUnit } from './pipeline.js';
import { Logger } from './utils/logger.js';

/**
 * Library version, as recorded in package.json.
 */
export const VERSION = getVersion();

export { GRAMMAR_FORMS, parseTestName, toWords } from './grammar/index.js';
export type { CaptureSet, GrammarFormName, ParsedName } from './grammar/index.js';
export {
  UNSPECIFIED_CLAUSE,
  findMethodName,
  rephraseTest,
  resolveSoThatKeyword,
  splitClause,
} from './rephrase/index.js';
export type {
  ClauseNode,
  DisplayClause,
  InvalidRephrasedTest,
  RephrasedTest,
  RephraseOptions,
  ValidRephrasedTest,
} from './rephrase/index.js';
export { TEST_MACROS, extractTestNames } from './extract/index.js';
export type { ExtractedTest } from './extract/index.js';
export { RenderStyleError, renderTest, renderUnit } from './render/index.js';
export type { RenderPosition } from './render/index.js';
export { processUnit } from './pipeline.js';
export type { UnitResult } from './pipeline.js';
export { ConfigParseError, DEFAULT_CONFIG, parseConfig } from './config/index.js';
export type { Config, OutputConfig, OutputStyle, PartialConfig } from './config/index.js';
export { Logger } from './utils/logger.js';

/**
 * Renders literal test names as one unit.
 *
 * @param names - Raw test names.
 * @param overrides - Settings layered over the defaults.
 * @returns The rendered text, one line per output line.
 *
 * @example
 * ```typescript
 * import { describeNames } from 'gwt-prose';
 *
 * describeNames(['Test_Pop__throws'], { output: { brief: true, trailing_blank_line: false } });
 * // "WHEN Pop is called THEN it throws\n"
 * ```
 */
export function describeNames(names: readonly string[], overrides: PartialConfig = {}): string {
  const config = mergeConfig(DEFAULT_CONFIG, overrides);
  const logger = new Logger({ component: 'gwt-prose', debugMode: config.logging.debug });
  const { lines } = processUnit('<names>', namesToTests(names), config, logger);
  return lines.map((line) => `${line}\n`).join('');
}
