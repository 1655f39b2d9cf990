/**
 * Types produced by the test name parser.
 *
 * @packageDocumentation
 */

/**
 * Grammar forms, listed in the order they are tried.
 *
 * Direct forms separate clauses with double underscores
 * (`Test_Given__When__Then`); macro forms pass one argument per clause
 * (`MAKE_TEST_NAME(Given, When, Then)`).
 */
export type GrammarFormName =
  | 'direct-4'
  | 'direct-3'
  | 'direct-2'
  | 'direct-1'
  | 'macro-4'
  | 'macro-3'
  | 'macro-2'
  | 'macro-1';

/**
 * Raw clause captures from a successful parse.
 *
 * `undefined` means the matched form does not offer the clause at all.
 * An empty string only occurs for the optional `given` argument of the
 * three-argument macro form, and is treated like an absent clause later on.
 */
export interface CaptureSet {
  /** Whether the name carried a `DISABLED_` marker. */
  readonly disabled: boolean;
  readonly given: string | undefined;
  readonly when: string | undefined;
  readonly then: string | undefined;
  /** The so-that keyword as written (`SoThat`, `Because`), if any. */
  readonly sothatKeyword: string | undefined;
  readonly sothat: string | undefined;
}

/**
 * A raw name that matched one of the grammar forms.
 */
export interface ParsedName {
  /** The form that matched first. */
  readonly form: GrammarFormName;
  /** Clause captures with keyword prefixes already stripped. */
  readonly captures: CaptureSet;
}
