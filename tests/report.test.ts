import { describe, it, expect } from "vitest";
import { createChangeStats } from "../src/changeStats.ts";
import type { CleanupSummary, RuleAnomaly } from "../src/pipeline.ts";
import { MAX_LISTED_ANOMALIES, formatSummary, groupAnomalies } from "../src/report.ts";

function summary(overrides: Partial<CleanupSummary> = {}): CleanupSummary {
  return {
    files: [],
    totals: createChangeStats(),
    anomalies: [],
    written: [],
    dryRun: false,
    ...overrides,
  };
}

function anomaly(file: string, overrides: Partial<RuleAnomaly> = {}): RuleAnomaly {
  return { file, ruleId: "breadcrumb", kind: "missing", count: 0, ...overrides };
}

describe("report", () => {
  it("should list every total in a fixed order", () => {
    const lines = formatSummary(
      summary({ totals: { ...createChangeStats(), breadcrumbRemoved: 3 }, written: ["/out/a.html"] }),
    );

    expect(lines.slice(0, 4)).toEqual([
      { level: "info", text: "Processed 0 files" },
      { level: "info", text: "Changes:" },
      { level: "info", text: "  breadcrumb_blocks: 3" },
      { level: "info", text: "  local_nav_inserted: 0" },
    ]);
    expect(lines).toHaveLength(16);
    expect(lines[15]).toEqual({ level: "info", text: "Wrote 1 files" });
  });

  it("should say when nothing was written on a dry run", () => {
    const lines = formatSummary(summary({ dryRun: true }));
    expect(lines.at(-1)).toEqual({ level: "info", text: "Dry run: no files written" });
  });

  it("should group warnings by rule and kind", () => {
    const anomalies = [
      anomaly("/corpus/a.html"),
      anomaly("/corpus/b.html", { kind: "duplicate", count: 2 }),
      anomaly("/corpus/c.html"),
    ];

    expect([...groupAnomalies(anomalies).keys()]).toEqual([
      "missing:breadcrumb",
      "duplicate:breadcrumb",
    ]);

    const warnings = formatSummary(summary({ anomalies }), { cwd: "/corpus" }).filter(
      (line) => line.level === "warn",
    );

    expect(warnings.map((line) => line.text)).toEqual([
      "WARNING: breadcrumb not found (strict mode) in:",
      "  a.html: 0",
      "  c.html: 0",
      "WARNING: breadcrumb matched more than once in:",
      "  b.html: 2",
    ]);
  });

  it("should cap each warning list", () => {
    const anomalies = Array.from({ length: MAX_LISTED_ANOMALIES + 3 }, (_, index) =>
      anomaly(`/corpus/${index}.html`, { ruleId: "comments-section" }),
    );

    const warnings = formatSummary(summary({ anomalies })).filter((line) => line.level === "warn");

    expect(warnings).toHaveLength(MAX_LISTED_ANOMALIES + 2);
    expect(warnings.at(-1)).toEqual({ level: "warn", text: "  … and 3 more" });
  });
});
