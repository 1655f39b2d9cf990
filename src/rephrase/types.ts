/**
 * Types produced by the clause rephraser and splitter.
 *
 * @packageDocumentation
 */

/**
 * A rephrased clause, still underscore-joined and not yet split on joiners.
 * Empty text marks a clause that is omitted from brief output.
 */
export type DisplayClause = string;

/**
 * One node of a split clause.
 *
 * The root is tagged with the clause keyword (`GIVEN`, `WHEN`, `THEN`,
 * `SO THAT`, `BECAUSE`); children are tagged with the joiner that
 * introduced them (`AND`, `WITH`, `BUT`).
 */
export interface ClauseNode {
  readonly tag: string;
  /** Words separated by single spaces. */
  readonly body: string;
  /** Nested clauses in their original left-to-right order. */
  readonly children: readonly ClauseNode[];
}

/**
 * A test whose name matched the grammar.
 */
export interface ValidRephrasedTest {
  readonly kind: 'valid';
  /** Grouping name from the enclosing test macro, if any. */
  readonly testcaseName: string | undefined;
  readonly disabled: boolean;
  readonly given: DisplayClause;
  readonly when: DisplayClause;
  readonly then: DisplayClause;
  /** Absent so-that clauses are never rendered. */
  readonly sothat: DisplayClause | undefined;
  /** `SO THAT` or the upper-cased keyword from the name. */
  readonly sothatKeyword: string;
  /** Whether the WHEN clause reads as a method call, which makes THEN start with "it". */
  readonly isCalled: boolean;
}

/**
 * A test whose name matched none of the grammar forms.
 */
export interface InvalidRephrasedTest {
  readonly kind: 'invalid';
  readonly testcaseName: string | undefined;
  /** The raw name with underscores replaced by spaces. */
  readonly invalidRawName: string;
}

/**
 * Result of rephrasing one raw test name.
 */
export type RephrasedTest = ValidRephrasedTest | InvalidRephrasedTest;

/**
 * Options that affect rephrasing.
 */
export interface RephraseOptions {
  /** Brief mode replaces the unspecified placeholder with an empty clause. */
  readonly brief: boolean;
}
