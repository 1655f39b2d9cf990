/**
 * Content token grammar shared by every name pattern.
 *
 * A content token is one alphanumeric run, optionally followed by further
 * runs each joined by a single underscore. Two consecutive underscores never
 * occur inside a token; in direct-form names they are the clause boundary.
 *
 * @packageDocumentation
 */

/** One alphanumeric run. */
export const WORD_SOURCE = '[A-Za-z0-9]+';

/** Regex source for a content token, without anchors or groups. */
export const CONTENT_TOKEN_SOURCE = `${WORD_SOURCE}(?:_${WORD_SOURCE})*`;

const CONTENT_TOKEN_PATTERN = new RegExp(`^${CONTENT_TOKEN_SOURCE}$`);

/**
 * Checks whether a string is exactly one content token.
 *
 * @param text - Candidate fragment.
 * @returns True when the whole string is a content token.
 */
export function isContentToken(text: string): boolean {
  return CONTENT_TOKEN_PATTERN.test(text);
}

/**
 * A content token split into its optional leading keyword and the rest.
 */
export interface KeywordSplit {
  /** The keyword exactly as written in the name, if one was stripped. */
  readonly keyword: string | undefined;
  /** The remaining text. */
  readonly text: string;
}

/**
 * Strips a leading `Keyword_` from a content token.
 *
 * Keywords are compared case-insensitively and tried in the given order.
 * A token that is only the keyword (no underscore after it) is left intact,
 * since nothing would remain for the clause.
 *
 * @param token - A content token.
 * @param keywords - Candidate keywords, most preferred first.
 * @returns The stripped keyword (as written) and the remaining text.
 *
 * @example
 * ```typescript
 * stripKeyword('Because_the_cache_is_warm', ['SoThat', 'Because']);
 * // { keyword: 'Because', text: 'the_cache_is_warm' }
 * ```
 */
export function stripKeyword(token: string, keywords: readonly string[]): KeywordSplit {
  for (const keyword of keywords) {
    const prefix = `${keyword}_`;
    if (token.length > prefix.length && token.slice(0, prefix.length).toLowerCase() === prefix.toLowerCase()) {
      return { keyword: token.slice(0, keyword.length), text: token.slice(prefix.length) };
    }
  }
  return { keyword: undefined, text: token };
}

/**
 * Replaces every underscore with a single space.
 *
 * @param text - Underscore-joined text.
 * @returns The same words separated by spaces.
 */
export function toWords(text: string): string {
  return text.replace(/_/g, ' ');
}
