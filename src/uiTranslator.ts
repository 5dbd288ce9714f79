/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import {
  replaceCounting,
  replaceLiteral,
  type MatchReplacer,
  type ReplaceResult,
} from "./utils/index.ts";

/**
 * One interface-string substitution. Every rule is a no-op on text it has
 * already translated.
 */
export type UiStringRule =
  | { kind: "pattern"; id: string; pattern: RegExp; replacement: MatchReplacer }
  | { kind: "literal"; id: string; search: string; replacement: string };

const pattern = (
  id: string,
  regex: RegExp,
  replacement: MatchReplacer,
): UiStringRule => ({ kind: "pattern", id, pattern: regex, replacement });

const literal = (id: string, search: string, replacement: string): UiStringRule => ({
  kind: "literal",
  id,
  search,
  replacement,
});

/**
 * English → Dutch interface strings. Order matters: the longer reading-time
 * phrases run before the generic "N min read".
 */
export const UI_STRING_RULES: readonly UiStringRule[] = [
  pattern("skip-link", />\s*Skip to main content\s*</gi, ">Ga naar hoofdinhoud<"),
  pattern("previous-lesson-label", /aria-label="Previous lesson"/gi, 'aria-label="Vorige les"'),
  pattern("next-lesson-label", /aria-label="Next lesson"/gi, 'aria-label="Volgende les"'),
  pattern(
    "previous-caption",
    /(<div[^>]*class="text-xs\s+text-gray-400\s+mb-1"[^>]*>)\s*Previous\s*(<\/div>)/gi,
    (m) => `${m[1]}Vorige${m[2]}`,
  ),
  pattern(
    "next-caption",
    /(<div[^>]*class="text-xs\s+text-gray-400\s+mb-1"[^>]*>)\s*Next\s*(<\/div>)/gi,
    (m) => `${m[1]}Volgende${m[2]}`,
  ),
  pattern(
    "autoplay-caption",
    /(<span[^>]*class="text-sm\s+text-gray-300"[^>]*>)\s*Autoplay\s*(<\/span>)/gi,
    (m) => `${m[1]}Automatisch afspelen${m[2]}`,
  ),

  // Lessons-list toggles appear quoted, entity-quoted (x-text) and bare
  literal("hide-list-quoted", "'Hide Lessons List'", "'Verberg lessenlijst'"),
  literal("show-list-quoted", "'Show Lessons List'", "'Toon lessenlijst'"),
  literal("hide-list-entity", "&#39;Hide Lessons List&#39;", "&#39;Verberg lessenlijst&#39;"),
  literal("show-list-entity", "&#39;Show Lessons List&#39;", "&#39;Toon lessenlijst&#39;"),
  literal("hide-list", "Hide Lessons List", "Verberg lessenlijst"),
  literal("show-list", "Show Lessons List", "Toon lessenlijst"),

  literal("scroll-to-top", 'aria-label="Scroll to top"', 'aria-label="Naar boven"'),
  literal("copy-label", 'aria-label="Copy to Clipboard"', 'aria-label="Kopieer naar klembord"'),
  literal("copy-title", 'title="Copy to Clipboard"', 'title="Kopieer naar klembord"'),

  pattern(
    "lesson-counter",
    /(<span>\s*)Lesson(\s*[0-9]{1,2}\s*\/\s*[0-9]{1,2}\s*<\/span>)/gi,
    (m) => `${m[1]}Les${m[2]}`,
  ),

  pattern(
    "sidebar-reading-time",
    /(<span[^>]*class="text-xs\s+text-gray-400\s+flex-shrink-0"[^>]*>)\s*(\d+)\s*min\s+read\s*(<\/span>)/gi,
    (m) => `${m[1]}${m[2]} min leestijd${m[3]}`,
  ),
  pattern(
    "hour-reading-time",
    /\b(\d+)\s*h\s+(\d+)\s*min\s+read\b/gi,
    (m) => `${m[1]} u ${m[2]} min leestijd`,
  ),
  pattern("minute-reading-time", /\b(\d+)\s*min\s+read\b/gi, (m) => `${m[1]} min leestijd`),
  // Finish pages where an earlier run translated "min read" but kept "h"
  pattern(
    "hour-reading-time-completion",
    /\b(\d+)\s*h\s+(\d+)\s*min\s+leestijd\b/gi,
    (m) => `${m[1]} u ${m[2]} min leestijd`,
  ),
];

function applyUiRule(html: string, rule: UiStringRule): ReplaceResult {
  return rule.kind === "literal"
    ? replaceLiteral(html, rule.search, rule.replacement)
    : replaceCounting(html, rule.pattern, rule.replacement);
}

/**
 * Translate the short interface strings of a lesson page. Lesson body
 * prose is never touched here.
 */
export function translateUiStrings(
  html: string,
  rules: readonly UiStringRule[] = UI_STRING_RULES,
): ReplaceResult {
  let current = html;
  let translated = 0;

  for (const rule of rules) {
    const { html: next, count } = applyUiRule(current, rule);
    current = next;
    translated += count;
  }

  return { html: current, count: translated };
}
