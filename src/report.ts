/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { relative } from "node:path";
import { CHANGE_STATS_KEYS, CHANGE_STATS_LABELS } from "./changeStats.ts";
import type { AnomalyKind, CleanupSummary, RuleAnomaly } from "./pipeline.ts";

export const MAX_LISTED_ANOMALIES = 10;

export interface ReportLine {
  level: "info" | "warn";
  text: string;
}

export interface ReportOptions {
  /** Show file paths relative to this directory */
  cwd?: string;
}

const ANOMALY_HEADINGS: Record<AnomalyKind, (ruleId: string) => string> = {
  duplicate: (ruleId) => `WARNING: ${ruleId} matched more than once in:`,
  missing: (ruleId) => `WARNING: ${ruleId} not found (strict mode) in:`,
};

/**
 * Group anomalies by rule and kind, keeping first-seen order
 */
export function groupAnomalies(
  anomalies: readonly RuleAnomaly[],
): Map<string, RuleAnomaly[]> {
  const groups = new Map<string, RuleAnomaly[]>();
  for (const anomaly of anomalies) {
    const key = `${anomaly.kind}:${anomaly.ruleId}`;
    const group = groups.get(key);
    if (group) {
      group.push(anomaly);
    } else {
      groups.set(key, [anomaly]);
    }
  }
  return groups;
}

/**
 * Render the run summary as console lines
 */
export function formatSummary(
  summary: CleanupSummary,
  options: ReportOptions = {},
): ReportLine[] {
  const displayPath = (path: string): string =>
    options.cwd ? relative(options.cwd, path) : path;

  const lines: ReportLine[] = [
    { level: "info", text: `Processed ${summary.files.length} files` },
    { level: "info", text: "Changes:" },
  ];

  for (const key of CHANGE_STATS_KEYS) {
    lines.push({
      level: "info",
      text: `  ${CHANGE_STATS_LABELS[key]}: ${summary.totals[key]}`,
    });
  }

  lines.push({
    level: "info",
    text: summary.dryRun
      ? "Dry run: no files written"
      : `Wrote ${summary.written.length} files`,
  });

  for (const group of groupAnomalies(summary.anomalies).values()) {
    const [first] = group;
    lines.push({ level: "warn", text: ANOMALY_HEADINGS[first.kind](first.ruleId) });

    for (const anomaly of group.slice(0, MAX_LISTED_ANOMALIES)) {
      lines.push({ level: "warn", text: `  ${displayPath(anomaly.file)}: ${anomaly.count}` });
    }
    if (group.length > MAX_LISTED_ANOMALIES) {
      lines.push({
        level: "warn",
        text: `  … and ${group.length - MAX_LISTED_ANOMALIES} more`,
      });
    }
  }

  return lines;
}
