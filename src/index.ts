/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// #region Main Library Exports

// Pipeline
export * from "./pipeline.ts";
export * from "./report.ts";
export * from "./changeStats.ts";

// Stages
export * from "./lessonUrl.ts";
export * from "./blockRemover.ts";
export * from "./navInjector.ts";
export * from "./uiTranslator.ts";
export * from "./bodyTranslator.ts";
export * from "./deeplTranslator.ts";
export * from "./linkRewriter.ts";

// Files and configuration
export * from "./config.ts";
export * from "./fileDiscovery.ts";
export * from "./lessonFiles.ts";

// Core Utilities
export { Logger, LogLevel, createLogger, logger, type LoggerOptions } from "./logger.ts";
export * from "./errors.ts";
export type { ReplaceResult, MatchReplacer } from "./utils/index.ts";

// #endregion
