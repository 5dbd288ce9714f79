/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { logger, type ErrorContext } from "./logger.ts";

/**
 * Base error class for all lesson-tidy errors
 */
export abstract class LessonTidyError extends Error {
  public readonly timestamp: Date;
  public readonly errorId: string;
  public readonly code: string;
  public readonly context?: ErrorContext;

  constructor(
    message: string,
    code: string,
    context?: ErrorContext,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.errorId = `${code}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // The CLI reports fatal errors itself; keep the trail at debug level.
    logger.debug(`${this.name}: ${message}`, {
      ...context,
      errorId: this.errorId,
      errorCode: code,
    });
  }

  toJSON(): Record<string, unknown> {
    const cause = this.cause instanceof Error ? this.cause : undefined;
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      errorId: this.errorId,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
      cause: cause
        ? { name: cause.name, message: cause.message, stack: cause.stack }
        : undefined,
    };
  }
}

/**
 * Invalid or contradictory run configuration
 */
export class ConfigError extends LessonTidyError {
  public readonly filepath?: string;

  constructor(
    message: string,
    filepath?: string,
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "CONFIG_ERROR",
      { ...context, component: "Config", filePath: filepath },
      cause,
    );
    this.filepath = filepath;
  }
}

export class FileDiscoveryError extends LessonTidyError {
  public readonly patterns?: string | string[];

  constructor(
    message: string,
    patterns?: string | string[],
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "FILE_DISCOVERY_ERROR",
      {
        ...context,
        component: "FileDiscovery",
        patterns: Array.isArray(patterns) ? patterns.join(", ") : patterns,
      },
      cause,
    );
    this.patterns = patterns;
  }
}

export class FileReadError extends LessonTidyError {
  public readonly filePath?: string;

  constructor(
    message: string,
    filePath?: string,
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "FILE_READ_ERROR",
      { ...context, component: "FileSystem", filePath },
      cause,
    );
    this.filePath = filePath;
  }
}

export class FileWriteError extends LessonTidyError {
  public readonly filePath?: string;

  constructor(
    message: string,
    filePath?: string,
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "FILE_WRITE_ERROR",
      { ...context, component: "FileSystem", filePath },
      cause,
    );
    this.filePath = filePath;
  }
}

/**
 * A lesson page without its "saved from url" marker comment
 */
export class LessonUrlError extends LessonTidyError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, context?: ErrorContext) {
    super(message, "LESSON_URL_MISSING", {
      ...context,
      component: "LessonUrl",
      filePath,
    });
    this.filePath = filePath;
  }
}

/**
 * Two lesson files claim the same canonical URL
 */
export class DuplicateLessonUrlError extends LessonTidyError {
  public readonly url: string;
  public readonly existingFile: string;
  public readonly conflictingFile: string;

  constructor(url: string, existingFile: string, conflictingFile: string) {
    super(
      `Duplicate lesson URL mapping for ${url}: ${existingFile} vs ${conflictingFile}`,
      "DUPLICATE_LESSON_URL",
      { component: "LessonUrl", url, existingFile, conflictingFile },
    );
    this.url = url;
    this.existingFile = existingFile;
    this.conflictingFile = conflictingFile;
  }
}

/**
 * Two lesson files in different directories share a filename, so they
 * would be written to, and linked as, the same local file
 */
export class DuplicateLessonFilenameError extends LessonTidyError {
  public readonly filename: string;
  public readonly existingFile: string;
  public readonly conflictingFile: string;

  constructor(filename: string, existingFile: string, conflictingFile: string) {
    super(
      `Duplicate lesson filename ${filename}: ${existingFile} vs ${conflictingFile}`,
      "DUPLICATE_LESSON_FILENAME",
      { component: "LessonUrl", filename, existingFile, conflictingFile },
    );
    this.filename = filename;
    this.existingFile = existingFile;
    this.conflictingFile = conflictingFile;
  }
}

/**
 * Translation backend failure: transport, HTTP status, payload shape or
 * result count
 */
export class TranslationError extends LessonTidyError {
  public readonly status?: number;
  public readonly responseBody?: string;

  constructor(
    message: string,
    options: { status?: number; responseBody?: string; cause?: Error } = {},
    context?: ErrorContext,
  ) {
    super(
      message,
      "TRANSLATION_ERROR",
      { ...context, component: "Translation", status: options.status },
      options.cause,
    );
    this.status = options.status;
    this.responseBody = options.responseBody;
  }
}

/**
 * Utility functions for error handling
 */
export const ErrorUtils = {
  getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  },

  getErrorCode(error: unknown): string | undefined {
    if (error instanceof LessonTidyError) {
      return error.code;
    }
    return undefined;
  },

  /**
   * Narrow an unknown thrown value to an Error for use as a `cause`
   */
  toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  },
};

/**
 * Error exit codes for CLI
 */
export const ErrorExitCodes = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  CONFIG_ERROR: 2,
  FILE_ERROR: 3,
  LESSON_URL_ERROR: 4,
  TRANSLATION_ERROR: 5,
} as const;

/**
 * Map error codes to exit codes
 */
export function getExitCode(errorCode: string | undefined): number {
  switch (errorCode) {
    case "CONFIG_ERROR":
      return ErrorExitCodes.CONFIG_ERROR;
    case "FILE_READ_ERROR":
    case "FILE_WRITE_ERROR":
    case "FILE_DISCOVERY_ERROR":
      return ErrorExitCodes.FILE_ERROR;
    case "LESSON_URL_MISSING":
    case "DUPLICATE_LESSON_URL":
    case "DUPLICATE_LESSON_FILENAME":
      return ErrorExitCodes.LESSON_URL_ERROR;
    case "TRANSLATION_ERROR":
      return ErrorExitCodes.TRANSLATION_ERROR;
    default:
      return ErrorExitCodes.GENERIC_ERROR;
  }
}
