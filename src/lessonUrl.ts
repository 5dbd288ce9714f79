/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import {
  DuplicateLessonFilenameError,
  DuplicateLessonUrlError,
  LessonUrlError,
} from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import { escapeRegExp } from "./utils/index.ts";

const urlLogger = createLogger("LessonUrl");

export const DEFAULT_LESSON_BASE_URL = "https://laraveldaily.com/lesson/";

/**
 * Normalized canonical lesson URL → local filename
 */
export type LessonUrlMap = ReadonlyMap<string, string>;

/**
 * Patterns derived from the lesson-site base URL
 */
export interface LessonUrlPatterns {
  baseUrl: string;
  /** `<!-- saved from url=(NNNN)https://… -->`; group 1 is the URL */
  savedFrom: RegExp;
  /** `href="https://…"`; group 1 is the base URL, group 2 the suffix */
  href: RegExp;
}

/**
 * A lesson page read from disk, with its canonical URL already resolved
 */
export interface LessonFile {
  path: string;
  filename: string;
  content: string;
  sourceUrl: string;
}

/**
 * Build the marker and hyperlink patterns for a lesson site.
 * Either scheme matches, whatever scheme the base URL is written with.
 */
export function createLessonUrlPatterns(
  baseUrl: string = DEFAULT_LESSON_BASE_URL,
): LessonUrlPatterns {
  const hostAndPath = escapeRegExp(baseUrl.trim().replace(/^https?:\/\//i, ""));

  return {
    baseUrl,
    savedFrom: new RegExp(
      `<!--\\s*saved from url=\\(\\d+\\)(https?://${hostAndPath}[^\\s]+)\\s*-->`,
      "i",
    ),
    href: new RegExp(`href="(https?://${hostAndPath}[^"#?\\s]+)([^"]*)"`, "gi"),
  };
}

/**
 * Trim whitespace, drop any fragment, then strip one trailing slash
 */
export function normalizeLessonUrl(url: string): string {
  let normalized = url.trim();
  const hashIndex = normalized.indexOf("#");
  if (hashIndex !== -1) {
    normalized = normalized.slice(0, hashIndex);
  }
  return normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

/**
 * Find the canonical source URL recorded in a saved lesson page
 */
export function extractLessonUrl(
  html: string,
  filePath: string,
  patterns: LessonUrlPatterns,
): string {
  const match = patterns.savedFrom.exec(html);
  if (!match) {
    throw new LessonUrlError(
      `Could not find saved-from lesson URL in ${filePath}. ` +
        `Expected a comment like: <!-- saved from url=(...)${patterns.baseUrl}... -->`,
      filePath,
    );
  }
  return normalizeLessonUrl(match[1]);
}

/**
 * Map every lesson's canonical URL to its filename.
 *
 * Links and output paths use the bare filename, so a URL claimed by two
 * files, or a filename shared by two directories, aborts the run.
 */
export function buildLessonUrlMap(
  files: readonly LessonFile[],
  log: Logger = urlLogger,
): LessonUrlMap {
  const urlToFilename = new Map<string, string>();
  const urlToPath = new Map<string, string>();
  const filenameToPath = new Map<string, string>();

  for (const file of files) {
    const existingPath = urlToPath.get(file.sourceUrl);
    if (existingPath !== undefined && existingPath !== file.path) {
      throw new DuplicateLessonUrlError(file.sourceUrl, existingPath, file.path);
    }

    const sameName = filenameToPath.get(file.filename);
    if (sameName !== undefined && sameName !== file.path) {
      throw new DuplicateLessonFilenameError(file.filename, sameName, file.path);
    }

    urlToPath.set(file.sourceUrl, file.path);
    filenameToPath.set(file.filename, file.path);
    urlToFilename.set(file.sourceUrl, file.filename);
  }

  log.debug(`Mapped ${urlToFilename.size} lesson URLs`, {
    operation: "buildLessonUrlMap",
    count: files.length,
  });

  return urlToFilename;
}
