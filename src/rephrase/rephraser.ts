/**
 * Clause rephraser.
 *
 * Turns raw clause captures into display clauses. WHEN clauses that start
 * with a method name read as a call ("AddRef is called"), and the THEN clause
 * that follows such a call reads as what "it" does.
 *
 * @packageDocumentation
 */

import { parseTestName, toWords } from '../grammar/index.js';
import type { CaptureSet } from '../grammar/index.js';
import type { ExtractedTest } from '../extract/types.js';
import type {
  DisplayClause,
  RephrasedTest,
  RephraseOptions,
  ValidRephrasedTest,
} from './types.js';

/** Text shown for an absent clause outside brief mode. */
export const UNSPECIFIED_CLAUSE = '(unspecified)';

/** Keyword used when a name has no explicit so-that keyword. */
export const DEFAULT_SOTHAT_KEYWORD = 'SO THAT';

/**
 * Shapes of a leading method name in a WHEN clause.
 */
export type MethodNameForm = 'conversion-operator' | 'named-operator' | 'operator-named' | 'plain';

/**
 * A method name found at the start of a WHEN clause.
 */
export interface MethodName {
  readonly form: MethodNameForm;
  /** The method name exactly as written. */
  readonly name: string;
}

/**
 * Method name shapes in precedence order. The first pattern that matches is
 * used even when a later one would also match.
 */
const METHOD_NAME_FORMS: readonly { readonly form: MethodNameForm; readonly pattern: RegExp }[] = [
  { form: 'conversion-operator', pattern: /^(?:cast|conversion)_operator_(?:to_)?[A-Za-z0-9]+/i },
  { form: 'named-operator', pattern: /^[A-Za-z0-9]+_operator(?![A-Za-z0-9])/i },
  { form: 'operator-named', pattern: /^operator_[A-Za-z0-9]+/i },
  { form: 'plain', pattern: /^[A-Za-z0-9]+/ },
];

const IS_CALLED_SUFFIX = /^_is_called/i;
const WITH_JOINER = /^_WITH_/i;
const IT_PREFIX = /^it_/i;

function absentClause(options: RephraseOptions): DisplayClause {
  return options.brief ? '' : UNSPECIFIED_CLAUSE;
}

/**
 * Finds the method name a WHEN clause starts with.
 *
 * @param when - Raw WHEN text.
 * @returns The first matching method name shape, or undefined when the text starts with no word.
 */
export function findMethodName(when: string): MethodName | undefined {
  for (const { form, pattern } of METHOD_NAME_FORMS) {
    const match = pattern.exec(when);
    if (match !== null) {
      return { form, name: match[0] };
    }
  }
  return undefined;
}

/**
 * Rephrases a GIVEN clause. Absent and empty clauses become the placeholder.
 */
export function rephraseGiven(given: string | undefined, options: RephraseOptions): DisplayClause {
  return given === undefined || given === '' ? absentClause(options) : given;
}

/**
 * Result of rephrasing a WHEN clause.
 */
export interface WhenRephrasing {
  readonly text: DisplayClause;
  /** Whether the clause reads as a call of its leading method. */
  readonly isCalled: boolean;
}

/**
 * Rephrases a WHEN clause.
 *
 * - `<method>_is_called...` is kept as written and counts as a call.
 * - A bare `<method>`, or `<method>_WITH_...`, becomes
 *   `<method>_is_called` followed by the rest.
 * - Anything else is kept as written and is not a call.
 *
 * @param when - Raw WHEN text, or undefined when absent.
 * @param options - Rephrase options.
 *
 * @example
 * ```typescript
 * rephraseWhen('Add_WITH_a_null_pointer', { brief: false });
 * // { text: 'Add_is_called_WITH_a_null_pointer', isCalled: true }
 * ```
 */
export function rephraseWhen(when: string | undefined, options: RephraseOptions): WhenRephrasing {
  if (when === undefined || when === '') {
    return { text: absentClause(options), isCalled: false };
  }

  const method = findMethodName(when);
  if (method === undefined) {
    return { text: when, isCalled: false };
  }

  const rest = when.slice(method.name.length);
  if (IS_CALLED_SUFFIX.test(rest)) {
    return { text: when, isCalled: true };
  }
  if (rest === '' || WITH_JOINER.test(rest)) {
    return { text: `${method.name}_is_called${rest}`, isCalled: true };
  }
  return { text: when, isCalled: false };
}

/**
 * Rephrases a THEN clause, prefixing "it" after a call unless already present.
 */
export function rephraseThen(
  then: string | undefined,
  isCalled: boolean,
  options: RephraseOptions
): DisplayClause {
  if (then === undefined || then === '') {
    return absentClause(options);
  }
  return isCalled && !IT_PREFIX.test(then) ? `it_${then}` : then;
}

/**
 * So-that clauses pass through unchanged; an absent one is never rendered.
 */
export function rephraseSoThat(sothat: string | undefined): DisplayClause | undefined {
  return sothat;
}

/**
 * Resolves the keyword shown before a so-that clause.
 *
 * @param keyword - Keyword as written in the name, if any.
 * @returns `SO THAT` for a missing or `SoThat` keyword (any case), otherwise the keyword upper-cased.
 */
export function resolveSoThatKeyword(keyword: string | undefined): string {
  if (keyword === undefined || keyword.toLowerCase() === 'sothat') {
    return DEFAULT_SOTHAT_KEYWORD;
  }
  return keyword.toUpperCase();
}

/**
 * Rephrases every clause of a successful parse.
 */
export function rephraseCaptures(
  captures: CaptureSet,
  testcaseName: string | undefined,
  options: RephraseOptions
): ValidRephrasedTest {
  const when = rephraseWhen(captures.when, options);

  return {
    kind: 'valid',
    testcaseName,
    disabled: captures.disabled,
    given: rephraseGiven(captures.given, options),
    when: when.text,
    then: rephraseThen(captures.then, when.isCalled, options),
    sothat: rephraseSoThat(captures.sothat),
    sothatKeyword: resolveSoThatKeyword(captures.sothatKeyword),
    isCalled: when.isCalled,
  };
}

/**
 * Parses and rephrases one extracted test.
 *
 * @param test - Testcase name and raw test name.
 * @param options - Rephrase options.
 * @returns The rephrased clauses, or an invalid result carrying the name with spaces for underscores.
 *
 * @example
 * ```typescript
 * const result = rephraseTest(
 *   { testcaseName: 'RefCount', rawName: 'Test_AddRef__increments_the_count' },
 *   { brief: false }
 * );
 * // result.when === 'AddRef_is_called', result.then === 'it_increments_the_count'
 * ```
 */
export function rephraseTest(test: ExtractedTest, options: RephraseOptions): RephrasedTest {
  const parsed = parseTestName(test.rawName);
  if (parsed === undefined) {
    return {
      kind: 'invalid',
      testcaseName: test.testcaseName,
      invalidRawName: toWords(test.rawName),
    };
  }
  return rephraseCaptures(parsed.captures, test.testcaseName, options);
}
