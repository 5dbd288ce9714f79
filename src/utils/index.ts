/**
 * Result of a counted text substitution
 */
export interface ReplaceResult {
  html: string;
  count: number;
}

export type MatchReplacer = string | ((match: RegExpMatchArray) => string);

/**
 * Escape a literal string for use inside a RegExp source
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Replace matches of `pattern` and report how many were replaced.
 *
 * String replacements are inserted literally (no `$1` expansion); pass a
 * function to build the replacement from capture groups. `limit` caps the
 * number of replacements, leaving later matches untouched.
 */
export function replaceCounting(
  input: string,
  pattern: RegExp,
  replacer: MatchReplacer,
  limit = Number.POSITIVE_INFINITY,
): ReplaceResult {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  const globalPattern = new RegExp(pattern.source, flags);

  let html = "";
  let cursor = 0;
  let count = 0;

  for (const match of input.matchAll(globalPattern)) {
    if (count >= limit) break;

    const start = match.index ?? cursor;
    html += input.slice(cursor, start);
    html += typeof replacer === "string" ? replacer : replacer(match);
    cursor = start + match[0].length;
    count++;
  }

  if (count === 0) {
    return { html: input, count: 0 };
  }

  return { html: html + input.slice(cursor), count };
}

/**
 * Replace every literal occurrence of `search` and count them
 */
export function replaceLiteral(
  input: string,
  search: string,
  replacement: string,
): ReplaceResult {
  const parts = input.split(search);
  const count = parts.length - 1;
  return count === 0
    ? { html: input, count: 0 }
    : { html: parts.join(replacement), count };
}
