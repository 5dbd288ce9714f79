/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { replaceCounting, type ReplaceResult } from "./utils/index.ts";

export type RemovalRuleId =
  | "breadcrumb"
  | "feedback-markup"
  | "feedback-scripts"
  | "completed-button"
  | "spotlight"
  | "livewire-assets"
  | "easymde-assets"
  | "comments-editor-scripts"
  | "comments-section";

interface RemovalRuleBase {
  id: RemovalRuleId;
  name: string;
  description?: string;
  /** Exactly one match per lesson page is expected */
  expectSingle?: boolean;
}

/**
 * Deletes every match of each pattern, in order
 */
export interface PatternRemovalRule extends RemovalRuleBase {
  kind: "pattern";
  patterns: readonly RegExp[];
  replacement: string;
}

/**
 * Deletes `<script>` blocks whose source mentions any of the needles
 */
export interface ScriptRemovalRule extends RemovalRuleBase {
  kind: "script";
  needles: readonly string[];
}

export type RemovalRule = PatternRemovalRule | ScriptRemovalRule;

const SCRIPT_BLOCK_RE = /<script\b[^>]*>.*?<\/script>/gis;

// Lazy spans inside a Livewire component must not run past its end marker.
const WITHIN_COMPONENT = "(?:(?!wire-end:)[\\s\\S])*?";

export const BREADCRUMB_RULE: PatternRemovalRule = {
  kind: "pattern",
  id: "breadcrumb",
  name: "Breadcrumb navigation",
  expectSingle: true,
  patterns: [
    /\n\s*<!-- Breadcrumbs -->\s*\n\s*<nav class="mb-6" aria-label="Breadcrumb">.*?<\/nav>\s*\n/gs,
  ],
  replacement: "\n",
};

export const FEEDBACK_MARKUP_RULE: PatternRemovalRule = {
  kind: "pattern",
  id: "feedback-markup",
  name: "Feedback button and modal",
  expectSingle: true,
  patterns: [
    /\n\s*<!-- Feedback Modal -->\s*\n\s*<!-- Feedback Button -->.*?<\/dialog>\s*\n/gis,
  ],
  replacement: "\n",
};

export const FEEDBACK_SCRIPTS_RULE: ScriptRemovalRule = {
  kind: "script",
  id: "feedback-scripts",
  name: "Feedback scripts",
  needles: ["feedbackModal", "feedbackForm"],
};

export const COMPLETED_BUTTON_RULE: PatternRemovalRule = {
  kind: "pattern",
  id: "completed-button",
  name: "Livewire completed button",
  description: "Dead toggleCompleted component, including its wire-end marker",
  patterns: [
    new RegExp(
      `\\n\\s*<div\\s+wire:id="[^"]+">${WITHIN_COMPONENT}wire:click="toggleCompleted"${WITHIN_COMPONENT}` +
        `\\n\\s*</div>\\s*\\n\\s*<!--\\s*Livewire Component wire-end:[^>]*-->\\s*`,
      "gi",
    ),
  ],
  replacement: "\n",
};

export const SPOTLIGHT_RULE: PatternRemovalRule = {
  kind: "pattern",
  id: "spotlight",
  name: "Spotlight search overlay",
  patterns: [
    /\n\s*<div\s+wire:id="[^"]+">\s*\n\s*<div[^>]*x-data="Spotlight\.config\(.*?\n\s*<\/div>\s*\n\s*<\/div>\s*\n\s*<!--\s*Livewire Component wire-end:[^>]*-->\s*/gis,
  ],
  replacement: "\n",
};

export const LIVEWIRE_ASSETS_RULE: PatternRemovalRule = {
  kind: "pattern",
  id: "livewire-assets",
  name: "Livewire assets",
  patterns: [
    /\s*<script\s+src="\.\/[^"]*livewire\.js"[^>]*><\/script>\s*/gi,
    /\s*<script\b[^>]*>\s*window\.livewire\s*=.*?<\/script>\s*/gis,
  ],
  replacement: "\n",
};

export const EASYMDE_ASSETS_RULE: PatternRemovalRule = {
  kind: "pattern",
  id: "easymde-assets",
  name: "EasyMDE assets",
  patterns: [
    /<script\s+src="\.\/[^"]*easymde(?:\.min)?\.js"[^>]*>\s*<\/script>/gi,
    /<link\b[^>]*href="\.\/[^"]*easymde(?:\.min)?\.css"[^>]*>/gi,
  ],
  replacement: "",
};

export const COMMENTS_EDITOR_SCRIPTS_RULE: ScriptRemovalRule = {
  kind: "script",
  id: "comments-editor-scripts",
  name: "Comment editor scripts",
  needles: [
    "Laravel Comments scripts were loaded",
    "EasyMDE",
    "loadEasyMDE",
    'Alpine.data("compose"',
  ],
};

export const COMMENTS_SECTION_RULE: PatternRemovalRule = {
  kind: "pattern",
  id: "comments-section",
  name: "Comments section",
  description: "Everything from the comments marker up to the closing </main>",
  expectSingle: true,
  patterns: [/\n\s*<!-- Comments Section -->.*?(?=\n\s*<\/main>)/gis],
  replacement: "\n",
};

export const REMOVAL_RULES: Readonly<Record<RemovalRuleId, RemovalRule>> = {
  breadcrumb: BREADCRUMB_RULE,
  "feedback-markup": FEEDBACK_MARKUP_RULE,
  "feedback-scripts": FEEDBACK_SCRIPTS_RULE,
  "completed-button": COMPLETED_BUTTON_RULE,
  spotlight: SPOTLIGHT_RULE,
  "livewire-assets": LIVEWIRE_ASSETS_RULE,
  "easymde-assets": EASYMDE_ASSETS_RULE,
  "comments-editor-scripts": COMMENTS_EDITOR_SCRIPTS_RULE,
  "comments-section": COMMENTS_SECTION_RULE,
};

/**
 * Remove `<script>` blocks containing any of the given needles
 */
export function removeScriptBlocksContaining(
  html: string,
  needles: readonly string[],
): ReplaceResult {
  let count = 0;
  const updated = html.replace(SCRIPT_BLOCK_RE, (block) => {
    if (needles.some((needle) => block.includes(needle))) {
      count++;
      return "";
    }
    return block;
  });
  return { html: updated, count };
}

/**
 * Apply one removal rule. Content without the target block comes back
 * unchanged with a zero count.
 */
export function applyRemovalRule(html: string, rule: RemovalRule): ReplaceResult {
  if (rule.kind === "script") {
    return removeScriptBlocksContaining(html, rule.needles);
  }

  let current = html;
  let total = 0;
  for (const pattern of rule.patterns) {
    const { html: next, count } = replaceCounting(current, pattern, rule.replacement);
    current = next;
    total += count;
  }
  return { html: current, count: total };
}
