#!/usr/bin/env node
/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import chalk from "chalk";
import { readFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import {
  createSampleConfig,
  loadConfig,
  type CliArguments,
  type LessonTidyConfig,
} from "../src/config.ts";
import {
  ConfigError,
  ErrorExitCodes,
  ErrorUtils,
  getExitCode,
} from "../src/errors.ts";
import { Logger, LogLevel, parseLogLevel } from "../src/logger.ts";
import { runCleanup } from "../src/pipeline.ts";
import { formatSummary } from "../src/report.ts";

const SAMPLE_CONFIG_FILENAME = ".lessontidyrc.json";

// bin/ in development, dist/ once built; package.json sits one level up from both
function readPackageVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

const version = readPackageVersion();

/**
 * Build the CLI logger from the resolved configuration
 */
function createCliLogger(
  config: Pick<LessonTidyConfig, "verbose" | "quiet" | "logLevel">,
): Logger {
  return new Logger({
    level: config.logLevel ? parseLogLevel(config.logLevel) : LogLevel.INFO,
    verbose: config.verbose,
    quiet: config.quiet,
    silent: process.env.LESSON_TIDY_SILENT === "true",
    outputFormat: process.env.LESSON_TIDY_LOG_FORMAT === "json" ? "json" : "human",
    colorize: process.stdout.isTTY,
    timestamp: false,
    component: "CLI",
  });
}

function reportFailure(error: unknown): void {
  const code = ErrorUtils.getErrorCode(error);
  console.error(chalk.red(`✖ ${ErrorUtils.getErrorMessage(error)}`));
  process.exitCode = getExitCode(code);
}

async function runCleanupCommand(cliArgs: CliArguments): Promise<void> {
  const { config, filepath } = await loadConfig(cliArgs);
  const cliLogger = createCliLogger(config);

  if (!config.quiet) {
    console.log(chalk.blue(`lesson-tidy v${version}`));
  }
  if (filepath) {
    cliLogger.debug("Using configuration file", { filePath: filepath });
  }
  if (config.dryRun) {
    cliLogger.info("Dry run: no files will be written");
  }

  const summary = await runCleanup(config, { logger: cliLogger.child("Pipeline") });

  for (const line of formatSummary(summary, { cwd: process.cwd() })) {
    if (line.level === "warn") {
      console.log(chalk.yellow(line.text));
    } else if (!config.quiet) {
      console.log(line.text);
    }
  }

  process.exitCode = ErrorExitCodes.SUCCESS;
}

async function initConfigCommand(force: boolean): Promise<void> {
  const target = resolve(process.cwd(), SAMPLE_CONFIG_FILENAME);

  try {
    await writeFile(target, createSampleConfig(), { flag: force ? "w" : "wx" });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      throw new ConfigError(
        `${target} already exists; pass --force to overwrite it`,
        target,
      );
    }
    throw new ConfigError(
      `Failed to write ${target}: ${ErrorUtils.getErrorMessage(error)}`,
      target,
      ErrorUtils.toError(error),
    );
  }

  console.log(chalk.green(`✔ Wrote ${target}`));
}

// Main CLI function
async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName("lesson-tidy")
    .usage("Usage: $0 [options]")
    .version(version)
    .alias("version", "v")
    .option("config", {
      alias: "c",
      type: "string",
      description: "Path to configuration file",
    })
    .option("input", {
      alias: "i",
      type: "string",
      description: "Glob for the saved lesson pages (default: lessons/*.html)",
    })
    .option("output-dir", {
      alias: "o",
      type: "string",
      description: "Write updated pages into this directory",
    })
    .option("in-place", {
      type: "boolean",
      description: "Overwrite the original files",
    })
    .option("strict", {
      type: "boolean",
      description: "Warn when an expected section is not found (0 matches)",
    })
    .option("dry-run", {
      alias: "d",
      type: "boolean",
      description: "Report changes without writing any file",
    })
    .option("translate-lesson-body", {
      type: "boolean",
      description: "Translate the lesson article text via DeepL",
    })
    .option("deepl-auth-key", {
      type: "string",
      description: "DeepL API key (default: DEEPL_AUTH_KEY)",
    })
    .option("source-lang", {
      type: "string",
      description: "Source language for DeepL (default: EN)",
    })
    .option("target-lang", {
      type: "string",
      description: "Target language for DeepL (default: NL)",
    })
    .option("lesson-base-url", {
      type: "string",
      description: "URL prefix of the lesson site",
    })
    .option("nav-template", {
      type: "string",
      description: "HTML file holding the local navigation <header>",
    })
    .option("verbose", {
      type: "boolean",
      description: "Enable verbose logging (shows debug messages)",
    })
    .option("quiet", {
      alias: "q",
      type: "boolean",
      description: "Quiet mode (only warnings and errors)",
    })
    .option("log-level", {
      type: "string",
      choices: ["trace", "debug", "info", "warn", "error", "fatal"],
      description: "Set the minimum log level",
    })
    .command(
      "$0",
      "Clean up the lesson pages",
      (command) => command,
      async (argv) => {
        try {
          await runCleanupCommand({
            config: argv.config,
            input: argv.input,
            outputDir: argv.outputDir,
            inPlace: argv.inPlace,
            strict: argv.strict,
            dryRun: argv.dryRun,
            translateLessonBody: argv.translateLessonBody,
            deeplAuthKey: argv.deeplAuthKey,
            sourceLang: argv.sourceLang,
            targetLang: argv.targetLang,
            lessonBaseUrl: argv.lessonBaseUrl,
            navTemplate: argv.navTemplate,
            verbose: argv.verbose,
            quiet: argv.quiet,
            logLevel: argv.logLevel,
          });
        } catch (error) {
          reportFailure(error);
        }
      },
    )
    .command(
      "init-config",
      `Write a sample ${SAMPLE_CONFIG_FILENAME} into the current directory`,
      (command) =>
        command.option("force", {
          type: "boolean",
          default: false,
          description: "Overwrite an existing file",
        }),
      async (argv) => {
        try {
          await initConfigCommand(argv.force);
        } catch (error) {
          reportFailure(error);
        }
      },
    )
    .strict()
    .help()
    .alias("help", "h")
    .parseAsync();
}

main().catch((error: unknown) => {
  reportFailure(error);
});
