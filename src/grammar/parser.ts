/**
 * Test name parser.
 *
 * Tries an ordered list of grammar forms against a raw test name; the first
 * form that matches the whole name wins. Each form pairs an anchored,
 * case-insensitive pattern with an extractor that turns its groups into a
 * {@link CaptureSet}, so precedence is carried by list order alone.
 *
 * @packageDocumentation
 */

import { CONTENT_TOKEN_SOURCE, stripKeyword } from './token.js';
import type { CaptureSet, GrammarFormName, ParsedName } from './types.js';

/**
 * One entry of the ordered grammar.
 */
export interface GrammarForm {
  /** Form identifier. */
  readonly name: GrammarFormName;
  /** Anchored pattern for the whole raw name. */
  readonly pattern: RegExp;
  /** Builds captures from a successful match. */
  readonly extract: (match: RegExpExecArray) => CaptureSet;
}

/** Keywords that may introduce the so-that clause, most preferred first. */
export const SOTHAT_KEYWORDS: readonly string[] = ['SoThat', 'Because'];

const TOKEN = `(${CONTENT_TOKEN_SOURCE})`;
const OPTIONAL_TOKEN = `(${CONTENT_TOKEN_SOURCE})?`;
const CLAUSE_BREAK = '__';
const DIRECT_PREFIX = '^(?:(DISABLED_)?Test_)?';
const ARGUMENT_BREAK = '\\s*,\\s*';
const MACRO_CLOSE = '\\s*\\)$';

function directPattern(clauseCount: number): RegExp {
  const clauses = Array.from({ length: clauseCount }, () => TOKEN).join(CLAUSE_BREAK);
  return new RegExp(`${DIRECT_PREFIX}${clauses}$`, 'i');
}

function macroPattern(aritySuffix: string, args: readonly string[]): RegExp {
  return new RegExp(
    `^MAKE_(DISABLED_)?TEST_NAME${aritySuffix}\\s*\\(\\s*${args.join(ARGUMENT_BREAK)}${MACRO_CLOSE}`,
    'i'
  );
}

interface RawClauses {
  readonly given?: string | undefined;
  readonly when?: string | undefined;
  readonly then?: string | undefined;
  readonly sothat?: string | undefined;
}

/**
 * Keyword-qualified bindings for a lone clause, in precedence order.
 * An unqualified lone clause falls through to `when`.
 */
const SINGLE_CLAUSE_BINDINGS: readonly {
  readonly keyword: string;
  readonly bind: (text: string) => RawClauses;
}[] = [
  { keyword: 'When', bind: (text) => ({ when: text }) },
  { keyword: 'Then', bind: (text) => ({ then: text }) },
  { keyword: 'Given', bind: (text) => ({ given: text }) },
];

/**
 * Strips per-clause keyword prefixes and assembles the capture set.
 */
function buildCaptures(disabledMarker: string | undefined, raw: RawClauses): CaptureSet {
  const sothat = raw.sothat === undefined ? undefined : stripKeyword(raw.sothat, SOTHAT_KEYWORDS);

  return {
    disabled: disabledMarker !== undefined,
    given: raw.given === undefined ? undefined : stripKeyword(raw.given, ['Given']).text,
    when: raw.when === undefined ? undefined : stripKeyword(raw.when, ['When']).text,
    then: raw.then === undefined ? undefined : stripKeyword(raw.then, ['Then']).text,
    sothatKeyword: sothat?.keyword,
    sothat: sothat?.text,
  };
}

/**
 * Binds a lone clause to WHEN, THEN or GIVEN.
 *
 * A `When_`, `Then_` or `Given_` prefix selects that clause (tried in that
 * order); anything else is a WHEN clause.
 */
function bindSingleClause(disabledMarker: string | undefined, token: string): CaptureSet {
  for (const { keyword, bind } of SINGLE_CLAUSE_BINDINGS) {
    const split = stripKeyword(token, [keyword]);
    if (split.keyword !== undefined) {
      return buildCaptures(disabledMarker, bind(split.text));
    }
  }
  return buildCaptures(disabledMarker, { when: token });
}

/**
 * The grammar, in precedence order.
 */
export const GRAMMAR_FORMS: readonly GrammarForm[] = [
  {
    name: 'direct-4',
    pattern: directPattern(4),
    extract: (m) => buildCaptures(m[1], { given: m[2], when: m[3], then: m[4], sothat: m[5] }),
  },
  {
    name: 'direct-3',
    pattern: directPattern(3),
    extract: (m) => buildCaptures(m[1], { given: m[2], when: m[3], then: m[4] }),
  },
  {
    name: 'direct-2',
    pattern: directPattern(2),
    extract: (m) => buildCaptures(m[1], { when: m[2], then: m[3] }),
  },
  {
    name: 'direct-1',
    pattern: directPattern(1),
    extract: (m) => bindSingleClause(m[1], m[2] ?? ''),
  },
  {
    name: 'macro-4',
    pattern: macroPattern('4', [TOKEN, TOKEN, TOKEN, TOKEN]),
    extract: (m) => buildCaptures(m[1], { given: m[2], when: m[3], then: m[4], sothat: m[5] }),
  },
  {
    name: 'macro-3',
    pattern: macroPattern('3?', [OPTIONAL_TOKEN, TOKEN, TOKEN]),
    extract: (m) => buildCaptures(m[1], { given: m[2] ?? '', when: m[3], then: m[4] }),
  },
  {
    name: 'macro-2',
    pattern: macroPattern('2', [TOKEN, TOKEN]),
    extract: (m) => buildCaptures(m[1], { when: m[2], then: m[3] }),
  },
  {
    name: 'macro-1',
    pattern: macroPattern('1', [TOKEN]),
    extract: (m) => bindSingleClause(m[1], m[2] ?? ''),
  },
];

/**
 * Parses a raw test name.
 *
 * @param rawName - The test name as written in source or on the command line.
 * @returns The first matching form and its captures, or `undefined` when no form matches.
 *
 * @example
 * ```typescript
 * const parsed = parseTestName('Test_AddRef__increments_the_reference_count');
 * parsed?.form; // 'direct-2'
 * parsed?.captures.when; // 'AddRef'
 * ```
 */
export function parseTestName(rawName: string): ParsedName | undefined {
  for (const form of GRAMMAR_FORMS) {
    const match = form.pattern.exec(rawName);
    if (match !== null) {
      return { form: form.name, captures: form.extract(match) };
    }
  }
  return undefined;
}
