/**
 * Clause splitter.
 *
 * @packageDocumentation
 */

import { toWords } from '../grammar/index.js';
import type { ClauseNode } from './types.js';

/** Joiners that split one clause into a parent and nested children. */
export const JOINERS = ['AND', 'WITH', 'BUT'] as const;

export type Joiner = (typeof JOINERS)[number];

/**
 * One joiner occurrence and the text up to the next joiner.
 */
export interface JoinedSegment {
  readonly joiner: Joiner;
  readonly text: string;
}

/**
 * A clause cut at every joiner.
 */
export interface ClauseTokens {
  /** Text before the first joiner. */
  readonly head: string;
  readonly joins: readonly JoinedSegment[];
}

function toJoiner(word: string): Joiner {
  const upper = word.toUpperCase();
  const joiner = JOINERS.find((candidate) => candidate === upper);
  if (joiner === undefined) {
    throw new Error(`Unexpected joiner '${word}'`);
  }
  return joiner;
}

/**
 * Cuts underscore-joined clause text at each `_AND_`, `_WITH_` and `_BUT_`
 * (any case). Matching runs against the underscored text, so a joiner is only
 * recognized as a whole word.
 *
 * @param text - Underscore-joined clause text.
 *
 * @example
 * ```typescript
 * tokenizeClause('A_AND_B_WITH_C');
 * // { head: 'A', joins: [{ joiner: 'AND', text: 'B' }, { joiner: 'WITH', text: 'C' }] }
 * ```
 */
export function tokenizeClause(text: string): ClauseTokens {
  const pattern = /_(AND|WITH|BUT)_/gi;
  const joins: JoinedSegment[] = [];
  let head: string | undefined;
  let pendingJoiner: Joiner | undefined;
  let segmentStart = 0;

  let match = pattern.exec(text);
  while (match !== null) {
    const segment = text.slice(segmentStart, match.index);
    if (pendingJoiner === undefined) {
      head = segment;
    } else {
      joins.push({ joiner: pendingJoiner, text: segment });
    }
    pendingJoiner = toJoiner(match[1] ?? '');
    // The closing underscore may open the next joiner, as in `A_AND_WITH_B`.
    segmentStart = match.index + match[0].length;
    pattern.lastIndex = segmentStart - 1;
    match = pattern.exec(text);
  }

  const tail = text.slice(segmentStart);
  if (pendingJoiner === undefined) {
    return { head: tail, joins };
  }
  joins.push({ joiner: pendingJoiner, text: tail });
  return { head: head ?? '', joins };
}

/**
 * Splits a rephrased clause into a tree.
 *
 * The text before the first joiner becomes the node body. Each later
 * (joiner, segment) pair becomes a child tagged with the joiner; children are
 * split the same way.
 *
 * @param tag - Tag of the root node, such as `THEN`.
 * @param text - Underscore-joined clause text.
 * @returns The clause tree with underscores in bodies replaced by spaces.
 */
export function splitClause(tag: string, text: string): ClauseNode {
  const { head, joins } = tokenizeClause(text);
  return {
    tag,
    body: toWords(head),
    children: joins.map((join) => splitClause(join.joiner, join.text)),
  };
}
