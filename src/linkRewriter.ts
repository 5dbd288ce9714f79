/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import {
  normalizeLessonUrl,
  type LessonUrlMap,
  type LessonUrlPatterns,
} from "./lessonUrl.ts";
import { replaceCounting, type ReplaceResult } from "./utils/index.ts";

export interface LinkRewriteContext {
  /** Normalized canonical URL of the page being rewritten */
  currentLessonUrl: string;
  urlMap: LessonUrlMap;
  patterns: LessonUrlPatterns;
}

/**
 * Point lesson hyperlinks at the local copies.
 *
 * Links to lessons outside the corpus stay as they are. A fragment link to
 * the page itself collapses to `#fragment`.
 */
export function rewriteLessonLinks(
  html: string,
  context: LinkRewriteContext,
): ReplaceResult {
  let rewritten = 0;

  const result = replaceCounting(html, context.patterns.href, (match) => {
    const baseUrl = normalizeLessonUrl(match[1]);
    const suffix = match[2] ?? "";
    const filename = context.urlMap.get(baseUrl);

    if (filename === undefined) {
      return match[0];
    }

    rewritten++;
    if (baseUrl === context.currentLessonUrl && suffix.startsWith("#")) {
      return `href="${suffix}"`;
    }
    return `href="${filename}${suffix}"`;
  });

  // Unknown targets count as matches but not as rewrites
  return { html: rewritten === 0 ? html : result.html, count: rewritten };
}
