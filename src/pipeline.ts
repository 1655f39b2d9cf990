/**
 * Processing of one input unit: parse, rephrase and render its tests.
 *
 * @packageDocumentation
 */

import { rephraseTest } from './rephrase/index.js';
import type { RephrasedTest } from './rephrase/index.js';
import { renderUnit } from './render/index.js';
import type { Config } from './config/index.js';
import type { ExtractedTest } from './extract/index.js';
import type { Logger } from './utils/logger.js';

/**
 * Result of processing one input unit.
 */
export interface UnitResult {
  readonly tests: readonly RephrasedTest[];
  /** Rendered output lines, without trailing newlines. */
  readonly lines: readonly string[];
}

/**
 * Rephrases and renders the tests of one input unit.
 *
 * @param source - Label of the unit for log entries (a path, `<stdin>` or `<names>`).
 * @param tests - Extracted tests in input order.
 * @param config - Effective configuration.
 * @param logger - Receives debug entries for each test.
 * @returns The rephrased tests and rendered lines.
 */
export function processUnit(
  source: string,
  tests: readonly ExtractedTest[],
  config: Config,
  logger: Logger
): UnitResult {
  logger.debug('unit_started', { source, testCount: tests.length });

  const rephrased = tests.map((test) => {
    const result = rephraseTest(test, { brief: config.output.brief });
    if (result.kind === 'invalid') {
      logger.debug('name_invalid', { source, testcaseName: test.testcaseName, rawName: test.rawName });
    } else {
      logger.debug('name_parsed', {
        source,
        testcaseName: test.testcaseName,
        rawName: test.rawName,
        isCalled: result.isCalled,
      });
    }
    return result;
  });

  const lines = renderUnit(rephrased, config.output);
  logger.debug('unit_finished', { source, lineCount: lines.length });

  return { tests: rephrased, lines };
}
