/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { resolve } from "node:path";
import {
  REMOVAL_RULES,
  applyRemovalRule,
  type RemovalRuleId,
} from "./blockRemover.ts";
import { translateLessonBody } from "./bodyTranslator.ts";
import {
  addChangeStats,
  createChangeStats,
  type ChangeStats,
  type ChangeStatsKey,
} from "./changeStats.ts";
import type { LessonTidyConfig } from "./config.ts";
import {
  DeepLTranslator,
  type TranslationRequest,
  type Translator,
} from "./deeplTranslator.ts";
import { ConfigError } from "./errors.ts";
import { discoverLessonFiles } from "./fileDiscovery.ts";
import { readLessonFile, resolveOutputPath, writeLessonFile } from "./lessonFiles.ts";
import {
  buildLessonUrlMap,
  createLessonUrlPatterns,
  type LessonFile,
  type LessonUrlMap,
  type LessonUrlPatterns,
} from "./lessonUrl.ts";
import { rewriteLessonLinks } from "./linkRewriter.ts";
import { createLogger, type Logger } from "./logger.ts";
import { ensureLocalNav, loadNavTemplate } from "./navInjector.ts";
import { translateUiStrings } from "./uiTranslator.ts";
import type { ReplaceResult } from "./utils/index.ts";

export type StageId =
  | RemovalRuleId
  | "local-nav"
  | "ui-strings"
  | "lesson-body"
  | "lesson-links";

/**
 * Everything a stage needs besides the page itself
 */
export interface StageContext {
  navBlock: string;
  currentLessonUrl: string;
  urlMap: LessonUrlMap;
  patterns: LessonUrlPatterns;
  /** Present only when lesson-body translation is enabled */
  translator?: Translator;
  translationRequest: TranslationRequest;
}

export interface PipelineStage {
  id: StageId;
  statKey: ChangeStatsKey;
  /** Exactly one match per page is expected */
  expectSingle?: boolean;
  run(html: string, context: StageContext): ReplaceResult | Promise<ReplaceResult>;
}

function removalStage(id: RemovalRuleId, statKey: ChangeStatsKey): PipelineStage {
  const rule = REMOVAL_RULES[id];
  return {
    id,
    statKey,
    expectSingle: rule.expectSingle,
    run: (html) => applyRemovalRule(html, rule),
  };
}

/**
 * Stage order is fixed. The comments section goes last so that nothing
 * after it depends on markup it removes.
 */
export const PIPELINE_STAGES: readonly PipelineStage[] = [
  removalStage("breadcrumb", "breadcrumbRemoved"),
  {
    id: "local-nav",
    statKey: "localNavInserted",
    run: (html, context) => ensureLocalNav(html, context.navBlock),
  },
  removalStage("feedback-markup", "feedbackMarkupRemoved"),
  removalStage("feedback-scripts", "feedbackScriptsRemoved"),
  removalStage("completed-button", "completedButtonRemoved"),
  removalStage("spotlight", "spotlightRemoved"),
  removalStage("livewire-assets", "livewireAssetsRemoved"),
  removalStage("easymde-assets", "easymdeAssetsRemoved"),
  removalStage("comments-editor-scripts", "commentsEditorScriptsRemoved"),
  {
    id: "ui-strings",
    statKey: "uiStringsTranslated",
    run: (html) => translateUiStrings(html),
  },
  {
    id: "lesson-body",
    statKey: "lessonBodyStringsTranslated",
    run: (html, context) =>
      context.translator
        ? translateLessonBody(html, context.translator, context.translationRequest)
        : { html, count: 0 },
  },
  {
    id: "lesson-links",
    statKey: "lessonLinksRewritten",
    run: (html, context) =>
      rewriteLessonLinks(html, {
        currentLessonUrl: context.currentLessonUrl,
        urlMap: context.urlMap,
        patterns: context.patterns,
      }),
  },
  removalStage("comments-section", "commentsSectionRemoved"),
];

export interface CleanResult {
  html: string;
  stats: ChangeStats;
}

/**
 * Run every stage over one page
 */
export async function cleanLessonHtml(
  html: string,
  context: StageContext,
  log?: Logger,
): Promise<CleanResult> {
  const stats = createChangeStats();
  let current = html;

  for (const stage of PIPELINE_STAGES) {
    const result = await stage.run(current, context);
    current = result.html;
    stats[stage.statKey] += result.count;
    if (result.count > 0) {
      log?.processStep(stage.id, `${result.count} change(s)`, { ruleId: stage.id });
    }
  }

  return { html: current, stats };
}

export type AnomalyKind = "missing" | "duplicate";

/**
 * An expected-once section that did not match exactly once
 */
export interface RuleAnomaly {
  file: string;
  ruleId: StageId;
  kind: AnomalyKind;
  count: number;
}

/**
 * More than one match is always reported; no match only in strict mode,
 * since already-cleaned pages legitimately have none
 */
export function findAnomalies(
  file: string,
  stats: ChangeStats,
  strict: boolean,
): RuleAnomaly[] {
  const anomalies: RuleAnomaly[] = [];

  for (const stage of PIPELINE_STAGES) {
    if (!stage.expectSingle) continue;

    const count = stats[stage.statKey];
    if (count > 1) {
      anomalies.push({ file, ruleId: stage.id, kind: "duplicate", count });
    } else if (strict && count === 0) {
      anomalies.push({ file, ruleId: stage.id, kind: "missing", count });
    }
  }

  return anomalies;
}

export interface FileResult {
  path: string;
  filename: string;
  outputPath: string;
  stats: ChangeStats;
  changed: boolean;
  written: boolean;
}

export interface CleanupSummary {
  files: FileResult[];
  totals: ChangeStats;
  anomalies: RuleAnomaly[];
  /** Paths actually written; empty on a dry run */
  written: string[];
  dryRun: boolean;
}

export interface CleanupDependencies {
  /** Base directory for the input glob, output directory and template */
  cwd?: string;
  /** Replaces the DeepL client when lesson-body translation is enabled */
  translator?: Translator;
  logger?: Logger;
}

/**
 * Refuse contradictory translation settings before touching any file
 */
export function assertTranslationSettings(
  config: LessonTidyConfig,
  hasTranslator: boolean,
): void {
  if (!config.translateLessonBody) return;

  if (!config.outputDir && !config.inPlace) {
    throw new ConfigError(
      "Refusing to overwrite originals for full lesson translation. " +
        "Use --output-dir <dir> (recommended) or --in-place.",
      undefined,
      undefined,
      { operation: "assertTranslationSettings" },
    );
  }

  if (!hasTranslator && !config.deeplAuthKey) {
    throw new ConfigError(
      "Lesson-body translation requested but no DeepL auth key provided. " +
        "Set DEEPL_AUTH_KEY or pass --deepl-auth-key.",
      undefined,
      undefined,
      { operation: "assertTranslationSettings" },
    );
  }
}

function createTranslator(
  config: LessonTidyConfig,
  deps: CleanupDependencies,
  log: Logger,
): Translator | undefined {
  if (!config.translateLessonBody) return undefined;
  if (deps.translator) return deps.translator;
  if (!config.deeplAuthKey) return undefined;

  return new DeepLTranslator({
    authKey: config.deeplAuthKey,
    apiUrl: config.deeplApiUrl,
    timeout: config.requestTimeout,
    logger: log.child("DeepL"),
  });
}

/**
 * Clean every lesson page matched by the configuration.
 *
 * All pages are read and the URL map is built before anything is written,
 * so a duplicate lesson URL leaves the corpus untouched.
 */
export async function runCleanup(
  config: LessonTidyConfig,
  deps: CleanupDependencies = {},
): Promise<CleanupSummary> {
  const cwd = deps.cwd ?? process.cwd();
  const log = deps.logger ?? createLogger("Pipeline");

  assertTranslationSettings(config, deps.translator !== undefined);
  const translator = createTranslator(config, deps, log);

  const navBlock = await loadNavTemplate(
    config.navTemplate ? resolve(cwd, config.navTemplate) : undefined,
  );

  const discovery = await discoverLessonFiles({ patterns: config.input, cwd, logger: log });
  const patterns = createLessonUrlPatterns(config.lessonBaseUrl);

  const lessons: LessonFile[] = [];
  for (const filePath of discovery.files) {
    lessons.push(await readLessonFile(filePath, patterns, log));
  }
  const urlMap = buildLessonUrlMap(lessons, log);

  const outputDir =
    config.outputDir && !config.inPlace ? resolve(cwd, config.outputDir) : undefined;
  const translationRequest: TranslationRequest = {
    sourceLang: config.sourceLang,
    targetLang: config.targetLang,
  };

  const files: FileResult[] = [];
  const anomalies: RuleAnomaly[] = [];
  const written: string[] = [];
  let totals = createChangeStats();

  for (const lesson of lessons) {
    const { html, stats } = await cleanLessonHtml(
      lesson.content,
      {
        navBlock,
        currentLessonUrl: lesson.sourceUrl,
        urlMap,
        patterns,
        translator,
        translationRequest,
      },
      log,
    );

    const outputPath = resolveOutputPath(lesson, outputDir);
    const changed = html !== lesson.content;
    const shouldWrite = outputPath !== lesson.path || changed;
    const willWrite = shouldWrite && !config.dryRun;

    if (willWrite) {
      await writeLessonFile(outputPath, html, log);
      written.push(outputPath);
    }

    const fileAnomalies = findAnomalies(lesson.path, stats, config.strict);
    for (const anomaly of fileAnomalies) {
      log.warn(
        `${anomaly.ruleId}: expected 1 match, found ${anomaly.count}`,
        { filePath: anomaly.file, ruleId: anomaly.ruleId, count: anomaly.count },
      );
    }

    anomalies.push(...fileAnomalies);
    totals = addChangeStats(totals, stats);
    files.push({
      path: lesson.path,
      filename: lesson.filename,
      outputPath,
      stats,
      changed,
      written: willWrite,
    });
  }

  log.debug(`Processed ${files.length} files`, {
    operation: "runCleanup",
    count: files.length,
  });

  return { files, totals, anomalies, written, dryRun: config.dryRun };
}
