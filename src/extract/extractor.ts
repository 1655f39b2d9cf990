/**
 * Test extractor.
 *
 * Finds `TEST`, `TEST_F`, `TYPED_TEST_P` and `TYPED_TEST` invocations in
 * program text and yields their (testcase, name) pairs in source order.
 *
 * @packageDocumentation
 */

import type { ExtractedTest } from './types.js';

/** Test macros whose invocations are extracted. */
export const TEST_MACROS: readonly string[] = ['TEST', 'TEST_F', 'TYPED_TEST_P', 'TYPED_TEST'];

// The name expression may hold one level of parentheses, e.g. MAKE_TEST_NAME(a, b, c).
const NAME_EXPRESSION = '((?:[^()]|\\([^()]*\\))*)';

function invocationPattern(): RegExp {
  return new RegExp(
    `\\b(?:${TEST_MACROS.join('|')})\\s*\\(\\s*([A-Za-z_][A-Za-z0-9_]*)\\s*,${NAME_EXPRESSION}\\)`,
    'g'
  );
}

/**
 * Extracts every test invocation from program text.
 *
 * Invocations that do not fit `(testcase, name)` with at most one level of
 * nested parentheses are skipped.
 *
 * @param source - Program text.
 * @returns Tests in the order they appear.
 *
 * @example
 * ```typescript
 * extractTestNames('TEST(Stack, Test_Pop__throws) {}');
 * // [{ testcaseName: 'Stack', rawName: 'Test_Pop__throws' }]
 * ```
 */
export function extractTestNames(source: string): ExtractedTest[] {
  const tests: ExtractedTest[] = [];
  for (const match of source.matchAll(invocationPattern())) {
    const testcaseName = match[1];
    const rawName = match[2]?.trim();
    if (testcaseName === undefined || rawName === undefined || rawName === '') {
      continue;
    }
    tests.push({ testcaseName, rawName });
  }
  return tests;
}

/**
 * Wraps literal test names, which carry no testcase.
 */
export function namesToTests(names: readonly string[]): ExtractedTest[] {
  return names.map((rawName) => ({ testcaseName: undefined, rawName }));
}

/**
 * Reads one literal test name per non-blank line.
 *
 * @param text - Text holding one name per line.
 * @returns Names trimmed of surrounding whitespace.
 */
export function extractNameLines(text: string): ExtractedTest[] {
  return namesToTests(
    text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '')
  );
}
