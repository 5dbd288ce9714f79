/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Per-file change counters, one per pipeline category
 */
export interface ChangeStats {
  breadcrumbRemoved: number;
  localNavInserted: number;
  feedbackMarkupRemoved: number;
  feedbackScriptsRemoved: number;
  completedButtonRemoved: number;
  spotlightRemoved: number;
  livewireAssetsRemoved: number;
  easymdeAssetsRemoved: number;
  commentsEditorScriptsRemoved: number;
  uiStringsTranslated: number;
  lessonBodyStringsTranslated: number;
  lessonLinksRewritten: number;
  commentsSectionRemoved: number;
}

export type ChangeStatsKey = keyof ChangeStats;

/**
 * Summary labels
 */
export const CHANGE_STATS_LABELS: Readonly<Record<ChangeStatsKey, string>> = {
  breadcrumbRemoved: "breadcrumb_blocks",
  localNavInserted: "local_nav_inserted",
  feedbackMarkupRemoved: "feedback_markup_blocks",
  feedbackScriptsRemoved: "feedback_script_blocks",
  completedButtonRemoved: "livewire_completed_buttons_removed",
  spotlightRemoved: "spotlight_overlays_removed",
  livewireAssetsRemoved: "livewire_assets_removed",
  easymdeAssetsRemoved: "easymde_assets_removed",
  commentsEditorScriptsRemoved: "comments_editor_scripts_removed",
  uiStringsTranslated: "ui_strings_translated",
  lessonBodyStringsTranslated: "lesson_body_strings_translated",
  lessonLinksRewritten: "lesson_links_rewritten",
  commentsSectionRemoved: "comments_sections_removed",
};

export const CHANGE_STATS_KEYS: readonly ChangeStatsKey[] = [
  "breadcrumbRemoved",
  "localNavInserted",
  "feedbackMarkupRemoved",
  "feedbackScriptsRemoved",
  "completedButtonRemoved",
  "spotlightRemoved",
  "livewireAssetsRemoved",
  "easymdeAssetsRemoved",
  "commentsEditorScriptsRemoved",
  "uiStringsTranslated",
  "lessonBodyStringsTranslated",
  "lessonLinksRewritten",
  "commentsSectionRemoved",
];

export function createChangeStats(): ChangeStats {
  return {
    breadcrumbRemoved: 0,
    localNavInserted: 0,
    feedbackMarkupRemoved: 0,
    feedbackScriptsRemoved: 0,
    completedButtonRemoved: 0,
    spotlightRemoved: 0,
    livewireAssetsRemoved: 0,
    easymdeAssetsRemoved: 0,
    commentsEditorScriptsRemoved: 0,
    uiStringsTranslated: 0,
    lessonBodyStringsTranslated: 0,
    lessonLinksRewritten: 0,
    commentsSectionRemoved: 0,
  };
}

/**
 * Fold one file's counters into a running total
 */
export function addChangeStats(total: ChangeStats, stats: ChangeStats): ChangeStats {
  const sum = { ...total };
  for (const key of CHANGE_STATS_KEYS) {
    sum[key] += stats[key];
  }
  return sum;
}
