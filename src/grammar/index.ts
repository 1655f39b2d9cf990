/**
 * Grammar module: content tokens and the ordered test name parser.
 *
 * @packageDocumentation
 */

export { GRAMMAR_FORMS, SOTHAT_KEYWORDS, parseTestName } from './parser.js';
export type { GrammarForm } from './parser.js';
export { CONTENT_TOKEN_SOURCE, WORD_SOURCE, isContentToken, stripKeyword, toWords } from './token.js';
export type { KeywordSplit } from './token.js';
export type { CaptureSet, GrammarFormName, ParsedName } from './types.js';
