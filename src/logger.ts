/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import chalk from "chalk";

/**
 * Log levels following Log4j standard
 */
export const LogLevel = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelNames: Record<LogLevel, string> = {
  [LogLevel.TRACE]: "TRACE",
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.FATAL]: "FATAL",
};

const LogLevelColors: Record<LogLevel, (text: string) => string> = {
  [LogLevel.TRACE]: chalk.gray,
  [LogLevel.DEBUG]: chalk.cyan,
  [LogLevel.INFO]: chalk.blue,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.FATAL]: chalk.magenta,
};

export type LogOutputFormat = "human" | "json";

/**
 * Configuration options for the logger
 */
export interface LoggerOptions {
  level?: LogLevel;
  verbose?: boolean;
  quiet?: boolean;
  silent?: boolean;
  outputFormat?: LogOutputFormat;
  colorize?: boolean;
  timestamp?: boolean;
  component?: string;
}

/**
 * Structured log entry for JSON output
 */
export interface LogEntry {
  level: string;
  message: string;
  timestamp: string;
  component?: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

/**
 * Context attached to a log line. The well-known keys are the ones the
 * pipeline fills in; anything else is passed through untouched.
 */
export interface ErrorContext {
  component?: string;
  operation?: string;
  filePath?: string;
  ruleId?: string;
  count?: number;
  processingTime?: number;
  [key: string]: unknown;
}

/**
 * Centralized logger for lesson-tidy
 */
export class Logger {
  private level: LogLevel;
  private verbose: boolean;
  private quiet: boolean;
  private silent: boolean;
  private outputFormat: LogOutputFormat;
  private colorize: boolean;
  private timestamp: boolean;
  private component?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.verbose = options.verbose ?? false;
    this.quiet = options.quiet ?? false;
    this.silent = options.silent ?? false;
    this.outputFormat = options.outputFormat ?? "human";
    this.colorize = options.colorize ?? true;
    this.timestamp = options.timestamp ?? true;
    this.component = options.component;

    if (this.verbose && this.level > LogLevel.DEBUG) {
      this.level = LogLevel.DEBUG;
    }

    // Quiet mode overrides verbose
    if (this.quiet) {
      this.verbose = false;
      if (this.level < LogLevel.WARN) {
        this.level = LogLevel.WARN;
      }
    }
  }

  /**
   * Log a file being read or written. Only shown in verbose mode.
   */
  fileOperation(
    operation: string,
    filePath: string,
    details?: { size?: number; result?: string },
  ): void {
    if (!this.verbose) return;

    let message = `${operation}: ${filePath}`;
    const context: ErrorContext = { operation, filePath };

    if (details?.size !== undefined) {
      message += ` (${Math.round(details.size / 1024)}KB)`;
    }

    if (details?.result) {
      message += ` → ${details.result}`;
    }

    this.debug(message, context);
  }

  /**
   * Log a pipeline step. Only shown in verbose mode.
   */
  processStep(step: string, details?: string, context?: ErrorContext): void {
    if (!this.verbose) return;

    this.debug(details ? `${step}: ${details}` : step, context);
  }

  /**
   * Create a child logger sharing this logger's settings
   */
  child(component: string, options: Partial<LoggerOptions> = {}): Logger {
    return new Logger({
      level: this.level,
      verbose: this.verbose,
      quiet: this.quiet,
      silent: this.silent,
      outputFormat: this.outputFormat,
      colorize: this.colorize,
      timestamp: this.timestamp,
      component,
      ...options,
    });
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.silent) return false;
    return level >= this.level;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: ErrorContext,
    error?: Error,
  ): LogEntry {
    const entry: LogEntry = {
      level: LogLevelNames[level],
      message,
      timestamp: new Date().toISOString(),
    };

    if (this.component) {
      entry.component = this.component;
    }

    if (context && Object.keys(context).length > 0) {
      entry.context = { ...context };
    }

    if (error) {
      const code = "code" in error ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: typeof code === "string" ? code : undefined,
      };
    }

    return entry;
  }

  private formatHuman(level: LogLevel, entry: LogEntry): string {
    const levelName = entry.level.padEnd(5);
    let output = "";

    if (this.timestamp) {
      output += chalk.gray(`[${entry.timestamp}] `);
    }

    output += this.colorize
      ? LogLevelColors[level](`${levelName} `)
      : `${levelName} `;

    if (entry.component) {
      output += chalk.gray(`[${entry.component}] `);
    }

    output += entry.message;

    if (entry.context) {
      output += chalk.gray(` ${JSON.stringify(entry.context)}`);
    }

    if (entry.error) {
      output +=
        "\n" +
        (entry.error.stack || `${entry.error.name}: ${entry.error.message}`);
    }

    return output;
  }

  /**
   * Errors go to stderr, everything else to stdout
   */
  private output(level: LogLevel, entry: LogEntry): void {
    const line =
      this.outputFormat === "json"
        ? JSON.stringify(entry)
        : this.formatHuman(level, entry);

    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    context?: ErrorContext,
    error?: Error,
  ): void {
    if (!this.shouldLog(level)) return;

    this.output(level, this.createLogEntry(level, message, context, error));
  }

  debug(message: string, context?: ErrorContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: ErrorContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: ErrorContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(messageOrError: string | Error, context?: ErrorContext): void {
    if (messageOrError instanceof Error) {
      this.log(LogLevel.ERROR, messageOrError.message, context, messageOrError);
    } else {
      this.log(LogLevel.ERROR, messageOrError, context);
    }
  }

  fatal(messageOrError: string | Error, context?: ErrorContext): void {
    if (messageOrError instanceof Error) {
      this.log(LogLevel.FATAL, messageOrError.message, context, messageOrError);
    } else {
      this.log(LogLevel.FATAL, messageOrError, context);
    }
  }

  getState(): {
    level: LogLevel;
    verbose: boolean;
    quiet: boolean;
    silent: boolean;
    outputFormat: LogOutputFormat;
    component?: string;
  } {
    return {
      level: this.level,
      verbose: this.verbose,
      quiet: this.quiet,
      silent: this.silent,
      outputFormat: this.outputFormat,
      component: this.component,
    };
  }
}

/**
 * Parse log level from string, falling back to INFO
 */
export function parseLogLevel(level?: string): LogLevel {
  switch (level?.toUpperCase()) {
    case "TRACE":
      return LogLevel.TRACE;
    case "DEBUG":
      return LogLevel.DEBUG;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "FATAL":
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: parseLogLevel(process.env.LESSON_TIDY_LOG_LEVEL),
  verbose: process.env.LESSON_TIDY_VERBOSE === "true",
  quiet: process.env.LESSON_TIDY_QUIET === "true",
  silent: process.env.LESSON_TIDY_SILENT === "true",
  outputFormat: process.env.LESSON_TIDY_LOG_FORMAT === "json" ? "json" : "human",
  colorize: process.stdout.isTTY,
  timestamp: true,
});

/**
 * Create a logger with specific component context
 */
export function createLogger(
  component: string,
  options?: Partial<LoggerOptions>,
): Logger {
  return logger.child(component, options);
}
