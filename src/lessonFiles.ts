/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { mkdir, readFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { ErrorUtils, FileReadError, FileWriteError } from "./errors.ts";
import {
  extractLessonUrl,
  type LessonFile,
  type LessonUrlPatterns,
} from "./lessonUrl.ts";
import { createLogger, type Logger } from "./logger.ts";

const filesLogger = createLogger("LessonFiles");

/**
 * Read a saved lesson page and resolve its canonical URL
 */
export async function readLessonFile(
  filePath: string,
  patterns: LessonUrlPatterns,
  log: Logger = filesLogger,
): Promise<LessonFile> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new FileReadError(
      `Failed to read ${filePath}: ${ErrorUtils.getErrorMessage(error)}`,
      filePath,
      ErrorUtils.toError(error),
      { operation: "readLessonFile" },
    );
  }

  log.fileOperation("read", filePath, { size: Buffer.byteLength(content) });

  return {
    path: filePath,
    filename: basename(filePath),
    content,
    sourceUrl: extractLessonUrl(content, filePath, patterns),
  };
}

/**
 * Where a processed page goes: the output directory under the same
 * filename, or back over the original
 */
export function resolveOutputPath(
  file: Pick<LessonFile, "path" | "filename">,
  outputDir?: string,
): string {
  return outputDir ? join(resolve(outputDir), file.filename) : file.path;
}

export async function writeLessonFile(
  outputPath: string,
  content: string,
  log: Logger = filesLogger,
): Promise<void> {
  try {
    await mkdir(resolve(outputPath, ".."), { recursive: true });
    await writeFileAtomic(outputPath, content, { encoding: "utf8" });
  } catch (error) {
    throw new FileWriteError(
      `Failed to write ${outputPath}: ${ErrorUtils.getErrorMessage(error)}`,
      outputPath,
      ErrorUtils.toError(error),
      { operation: "writeLessonFile" },
    );
  }

  log.fileOperation("write", outputPath, { size: Buffer.byteLength(content) });
}
