/**
 * Rephrase module: clause heuristics and the clause splitter.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_SOTHAT_KEYWORD,
  UNSPECIFIED_CLAUSE,
  findMethodName,
  rephraseCaptures,
  rephraseGiven,
  rephraseSoThat,
  rephraseTest,
  rephraseThen,
  rephraseWhen,
  resolveSoThatKeyword,
} from './rephraser.js';
export type { MethodName, MethodNameForm, WhenRephrasing } from './rephraser.js';
export { JOINERS, splitClause, tokenizeClause } from './splitter.js';
export type { ClauseTokens, JoinedSegment, Joiner } from './splitter.js';
export type {
  ClauseNode,
  DisplayClause,
  InvalidRephrasedTest,
  RephrasedTest,
  RephraseOptions,
  ValidRephrasedTest,
} from './types.js';
