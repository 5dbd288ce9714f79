/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import * as cheerio from "cheerio";
import { hasChildren, isTag, isText, type AnyNode, type Text } from "domhandler";
import type { TranslationRequest, Translator } from "./deeplTranslator.ts";
import { TranslationError } from "./errors.ts";
import type { ReplaceResult } from "./utils/index.ts";

/**
 * Main lesson content: the first `<article class="… prose …">`
 */
const ARTICLE_BLOCK_RE =
  /(<article\b[^>]*\bclass="[^"]*\bprose\b[^"]*"[^>]*>)(.*?)(<\/article>)/is;

/**
 * Elements whose text is code or markup rather than prose
 */
export const TECHNICAL_TAGS: ReadonlySet<string> = new Set([
  "script",
  "style",
  "pre",
  "code",
  "kbd",
  "samp",
  "var",
  "svg",
  "math",
]);

/**
 * Collect translatable text nodes in document order, skipping whole
 * technical subtrees
 */
export function collectTranslatableNodes(nodes: readonly AnyNode[], out: Text[] = []): Text[] {
  for (const node of nodes) {
    if (isText(node)) {
      if (node.data.trim()) {
        out.push(node);
      }
      continue;
    }
    if (isTag(node) && TECHNICAL_TAGS.has(node.name.toLowerCase())) {
      continue;
    }
    if (hasChildren(node)) {
      collectTranslatableNodes(node.children, out);
    }
  }
  return out;
}

/**
 * Translate the visible prose of the lesson article in one batch.
 *
 * The backend sees decoded text; results are escaped again on output.
 * A backend that returns the wrong number of strings aborts without
 * changing anything.
 */
export async function translateLessonBody(
  html: string,
  translator: Translator,
  request: TranslationRequest,
): Promise<ReplaceResult> {
  const match = ARTICLE_BLOCK_RE.exec(html);
  if (!match) {
    return { html, count: 0 };
  }

  const [block, articleOpen, articleInner, articleClose] = match;
  const $ = cheerio.load(
    articleInner,
    { xml: { xmlMode: false, decodeEntities: true, encodeEntities: "utf8" } },
    false,
  );

  const nodes = collectTranslatableNodes($.root().contents().toArray());
  if (nodes.length === 0) {
    return { html, count: 0 };
  }

  const texts = nodes.map((node) => node.data);
  const translated = await translator.translateTexts(texts, request);
  if (translated.length !== texts.length) {
    throw new TranslationError(
      `Translation backend returned ${translated.length} results for ${texts.length} text nodes`,
    );
  }

  nodes.forEach((node, index) => {
    node.data = translated[index];
  });

  const start = match.index;
  const updated =
    html.slice(0, start) +
    articleOpen +
    $.html() +
    articleClose +
    html.slice(start + block.length);

  return { html: updated, count: nodes.length };
}
