/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";
import { ConfigError, ErrorUtils } from "./errors.ts";
import { DEFAULT_LESSON_BASE_URL } from "./lessonUrl.ts";
import { createLogger } from "./logger.ts";

const configLogger = createLogger("Config");

export const CONFIG_MODULE_NAME = "lessontidy";

/**
 * Configuration schema using Zod for validation
 */
export const LessonTidyConfigSchema = z.object({
  // File processing
  input: z
    .string()
    .min(1)
    .default("lessons/*.html")
    .describe("Glob matching the saved lesson pages"),
  outputDir: z
    .string()
    .min(1)
    .optional()
    .describe("Write updated pages here instead of over the originals"),
  inPlace: z
    .boolean()
    .default(false)
    .describe("Write changes back into the original files"),
  dryRun: z.boolean().default(false).describe("Report changes without writing"),
  strict: z
    .boolean()
    .default(false)
    .describe("Warn when an expected section is not found (0 matches)"),

  // Lesson site
  lessonBaseUrl: z
    .string()
    .url()
    .default(DEFAULT_LESSON_BASE_URL)
    .describe("URL prefix shared by all lesson pages"),
  navTemplate: z
    .string()
    .optional()
    .describe("Path to the <header> template for the local navigation"),

  // Translation
  translateLessonBody: z
    .boolean()
    .default(false)
    .describe("Translate the lesson article body via DeepL"),
  deeplAuthKey: z.string().min(1).optional().describe("DeepL API key"),
  deeplApiUrl: z.string().url().optional().describe("Override the DeepL endpoint"),
  sourceLang: z.string().min(2).default("EN"),
  targetLang: z.string().min(2).default("NL"),
  requestTimeout: z
    .number()
    .int()
    .positive()
    .default(60_000)
    .describe("Per-request translation timeout in milliseconds"),

  // Debug and logging
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).optional(),
});

export type LessonTidyConfig = z.infer<typeof LessonTidyConfigSchema>;

/**
 * CLI arguments as parsed by yargs
 */
export interface CliArguments {
  config?: string;
  input?: string;
  outputDir?: string;
  inPlace?: boolean;
  dryRun?: boolean;
  strict?: boolean;
  lessonBaseUrl?: string;
  navTemplate?: string;
  translateLessonBody?: boolean;
  deeplAuthKey?: string;
  sourceLang?: string;
  targetLang?: string;
  verbose?: boolean;
  quiet?: boolean;
  logLevel?: string;
}

export interface ConfigResult {
  config: LessonTidyConfig;
  filepath?: string;
}

export interface LoadConfigOptions {
  /** Directory to search for a config file (defaults to cwd) */
  searchFrom?: string;
  /** Explicit config file, skips the search */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Drop undefined values so they never shadow a lower-precedence source
 */
function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined),
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Settings taken from the environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return definedOnly({
    deeplAuthKey: env.DEEPL_AUTH_KEY || undefined,
    deeplApiUrl: env.DEEPL_API_URL || undefined,
  });
}

export function normalizeCliArguments(args: CliArguments): Record<string, unknown> {
  const { config: _configFile, ...rest } = args;
  return definedOnly({ ...rest });
}

/**
 * Validate configuration using Zod schema
 */
export function validateConfig(config: unknown, filepath?: string): LessonTidyConfig {
  const result = LessonTidyConfigSchema.safeParse(config);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
    .join("\n");
  throw new ConfigError(
    `Invalid configuration${filepath ? ` in ${filepath}` : ""}:\n${issues}`,
    filepath,
    result.error,
    { operation: "validateConfig", issueCount: result.error.issues.length },
  );
}

async function loadConfigFromFile(
  searchFrom?: string,
  configFile?: string,
): Promise<{ config: Record<string, unknown>; filepath?: string }> {
  const explorer = cosmiconfig(CONFIG_MODULE_NAME);

  try {
    const result = configFile
      ? await explorer.load(configFile)
      : await explorer.search(searchFrom);

    if (!result || result.isEmpty) {
      configLogger.debug("No configuration file found, using defaults", { searchFrom });
      return { config: {}, filepath: result?.filepath };
    }

    if (!isRecord(result.config)) {
      throw new ConfigError(
        "Configuration file must export an object",
        result.filepath,
      );
    }

    configLogger.debug("Configuration file loaded", { filePath: result.filepath });
    return { config: result.config, filepath: result.filepath };
  } catch (error) {
    if (error instanceof ConfigError) throw error;

    throw new ConfigError(
      `Failed to load configuration${configFile ? ` from ${configFile}` : ""}: ${ErrorUtils.getErrorMessage(error)}`,
      configFile,
      ErrorUtils.toError(error),
      { operation: "loadConfigFromFile", searchFrom },
    );
  }
}

/**
 * Load configuration: environment, then config file, then CLI arguments,
 * each overriding the previous
 */
export async function loadConfig(
  cliArgs: CliArguments = {},
  options: LoadConfigOptions = {},
): Promise<ConfigResult> {
  const { config: fileConfig, filepath } = await loadConfigFromFile(
    options.searchFrom ?? process.cwd(),
    options.configFile ?? cliArgs.config,
  );

  const merged = {
    ...configFromEnv(options.env ?? process.env),
    ...definedOnly(fileConfig),
    ...normalizeCliArguments(cliArgs),
  };

  return { config: validateConfig(merged, filepath), filepath };
}

/**
 * Sample `.lessontidyrc.json` content
 */
export function createSampleConfig(): string {
  const sample = {
    input: "lessons/*.html",
    outputDir: "lessons-nl",
    strict: false,
    lessonBaseUrl: DEFAULT_LESSON_BASE_URL,
    translateLessonBody: false,
    sourceLang: "EN",
    targetLang: "NL",
  };
  return `${JSON.stringify(sample, null, 2)}\n`;
}
