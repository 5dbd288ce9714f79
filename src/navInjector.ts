/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import * as fs from "fs/promises";
import { fileURLToPath } from "url";
import { ConfigError, ErrorUtils } from "./errors.ts";
import { replaceCounting, type ReplaceResult } from "./utils/index.ts";

export const LOCAL_NAV_MARKER = "<!-- Local Site Navigation -->";

/** Marker written by earlier cleanup runs; refreshed like the current one */
export const PREVIOUS_LOCAL_NAV_MARKER = "<!-- Local Site Navigation (FDC) -->";

export const DEFAULT_NAV_TEMPLATE_PATH = fileURLToPath(
  new URL("../templates/local-nav.html", import.meta.url),
);

const LEGACY_NAV_MARKER_RE = /\n\s*<!-- Navigation removed -->\s*\n/i;

const LOCAL_NAV_MARKER_RE = /<!-- Local Site Navigation(?: \(FDC\))? -->/i;

const LOCAL_NAV_BLOCK_RE =
  /\n\s*<!-- Local Site Navigation(?: \(FDC\))? -->\s*\n\s*<header\b.*?<\/header>\s*\n/is;

/**
 * Wrap a `<header>` template in the marker comment and surrounding
 * newlines, ready to splice into a page
 */
export function renderNavBlock(headerHtml: string): string {
  return `\n${LOCAL_NAV_MARKER}\n${headerHtml.trim()}\n\n`;
}

/**
 * Read the header template. It must be a single `<header>` element so that
 * later runs can find and refresh it.
 */
export async function loadNavTemplate(
  templatePath: string = DEFAULT_NAV_TEMPLATE_PATH,
): Promise<string> {
  let template: string;
  try {
    template = await fs.readFile(templatePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read navigation template: ${ErrorUtils.getErrorMessage(error)}`,
      templatePath,
      ErrorUtils.toError(error),
      { operation: "loadNavTemplate" },
    );
  }

  const trimmed = template.trim();
  if (!/^<header\b/i.test(trimmed) || !/<\/header>$/i.test(trimmed)) {
    throw new ConfigError(
      "Navigation template must be a single <header>…</header> element",
      templatePath,
      undefined,
      { operation: "loadNavTemplate" },
    );
  }

  return renderNavBlock(trimmed);
}

/**
 * Reconcile the page's local navigation with the current template.
 *
 * An existing block, under either marker, is replaced with the current
 * marker and template, so every page tracks template edits; a
 * legacy "Navigation removed" marker gets the block inserted once. Pages
 * with neither marker are left alone.
 */
export function ensureLocalNav(html: string, navBlock: string): ReplaceResult {
  if (LOCAL_NAV_MARKER_RE.test(html)) {
    return replaceCounting(html, LOCAL_NAV_BLOCK_RE, `\n${navBlock}`, 1);
  }
  return replaceCounting(html, LEGACY_NAV_MARKER_RE, `\n${navBlock}`, 1);
}
