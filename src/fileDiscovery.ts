/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { glob } from "glob";
import { extname } from "node:path";
import { FileDiscoveryError, ErrorUtils } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";

const discoveryLogger = createLogger("FileDiscovery");

export const LESSON_FILE_EXTENSIONS: readonly string[] = [".html", ".htm"];

/**
 * File discovery options
 */
export interface FileDiscoveryOptions {
  /** Glob patterns to search for files */
  patterns: string | string[];
  /** Working directory for pattern resolution */
  cwd?: string;
  /** Patterns to exclude from results */
  excludePatterns?: string[];
  logger?: Logger;
}

/**
 * File discovery result
 */
export interface FileDiscoveryResult {
  /** Absolute paths, sorted */
  files: string[];
  count: number;
  /** Patterns that didn't match any files */
  emptyPatterns: string[];
  /** Time taken for discovery in milliseconds */
  duration: number;
}

/**
 * Validates a glob pattern for common issues
 */
export function validateGlobPattern(pattern: string): void {
  if (!pattern.trim()) {
    throw new FileDiscoveryError("Pattern must be a non-empty string", pattern);
  }
  if (pattern.trim() !== pattern) {
    throw new FileDiscoveryError(
      "Pattern cannot have leading or trailing whitespace",
      pattern,
    );
  }
}

/**
 * Split a comma-separated input option into patterns
 */
export function parsePatterns(input: string | string[]): string[] {
  const raw = Array.isArray(input) ? input : input.split(",");
  return raw.map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0);
}

export function isLessonFile(filePath: string): boolean {
  return LESSON_FILE_EXTENSIONS.includes(extname(filePath).toLowerCase());
}

/**
 * Removes duplicate file paths and sorts them
 */
export function deduplicateAndSort(files: string[]): string[] {
  return Array.from(new Set(files)).sort();
}

/**
 * Find the lesson pages matched by the given patterns. Matching nothing is
 * an error.
 */
export async function discoverLessonFiles(
  options: FileDiscoveryOptions,
): Promise<FileDiscoveryResult> {
  const startTime = Date.now();
  const patterns = parsePatterns(options.patterns);

  if (patterns.length === 0) {
    throw new FileDiscoveryError("At least one pattern must be provided", options.patterns);
  }
  patterns.forEach(validateGlobPattern);

  const globOptions = {
    cwd: options.cwd ?? process.cwd(),
    absolute: true,
    nodir: true,
    ignore: options.excludePatterns ?? [],
  };

  const allFiles: string[] = [];
  const emptyPatterns: string[] = [];

  for (const pattern of patterns) {
    let matches: string[];
    try {
      matches = await glob(pattern, globOptions);
    } catch (error) {
      throw new FileDiscoveryError(
        `Failed to process pattern "${pattern}": ${ErrorUtils.getErrorMessage(error)}`,
        pattern,
        ErrorUtils.toError(error),
      );
    }

    const lessonFiles = matches.filter(isLessonFile);
    if (lessonFiles.length === 0) {
      emptyPatterns.push(pattern);
    }
    allFiles.push(...lessonFiles);
  }

  const files = deduplicateAndSort(allFiles);
  if (files.length === 0) {
    throw new FileDiscoveryError(
      `No HTML files matched ${patterns.map((p) => `"${p}"`).join(", ")}`,
      patterns,
      undefined,
      { operation: "discoverLessonFiles", cwd: globOptions.cwd },
    );
  }

  const duration = Date.now() - startTime;
  const log = options.logger ?? discoveryLogger;
  log.debug(`Discovered ${files.length} lesson files`, {
    count: files.length,
    processingTime: duration,
  });

  return { files, count: files.length, emptyPatterns, duration };
}
