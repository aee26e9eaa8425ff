/** Case-insensitive; `.` also matches line breaks, as `%` does in SQL. */
export const LIKE_REGEX_FLAGS = 'is';

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/]/g;

/**
 * Translate a LIKE pattern into an anchored regular expression source:
 * `%` matches any run of characters, `_` exactly one.
 */
export function likePatternToRegexSource(pattern: string): string {
  let out = '';
  for (const ch of pattern) {
    if (ch === '%') out += '.*';
    else if (ch === '_') out += '.';
    else out += ch.replace(REGEX_SPECIALS, '\\$&');
  }
  return `^${out}$`;
}
