/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { Artifact, ResumeFailureRecord, RunReport, TaskFailure } from "../../types";
import { formatBytes } from "../../utils/format";

export const TABLE_WIDTHS = {
  service: 20,
  kind: 10,
  target: 24,
  size: 10,
  fileName: 56,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns
    .map((col, i) => col.padEnd(widths[i] ?? 0))
    .join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

export function formatArtifactTable(artifacts: Artifact[]): string {
  const widths = [
    TABLE_WIDTHS.service,
    TABLE_WIDTHS.kind,
    TABLE_WIDTHS.target,
    TABLE_WIDTHS.size,
    TABLE_WIDTHS.fileName,
  ];
  const rows = artifacts.map((a) =>
    formatTableRow([a.service, a.kind, a.target, formatBytes(a.sizeBytes), a.fileName], widths),
  );
  return [
    formatTableRow(["Service", "Kind", "Target", "Size", "File"], widths),
    formatTableSeparator(widths),
    ...rows,
  ].join("\n");
}

/**
 * One line per failure, with enough context to retry the target by hand
 */
export function formatFailure(failure: TaskFailure): string {
  const location = [failure.service, failure.kind, failure.target]
    .filter((part): part is string => part !== undefined)
    .join("/");
  return location
    ? `[${failure.code}] ${location}: ${failure.message}`
    : `[${failure.code}] ${failure.message}`;
}

export function formatResumeFailure(failure: ResumeFailureRecord): string {
  return `${failure.services.join(", ")} may still be stopped: ${failure.message}`;
}

/**
 * 0 on success, 2 when services may have been left stopped, 1 otherwise
 */
export function exitCodeFor(report: RunReport): number {
  if (report.resumeFailures.length > 0) return 2;
  return report.status === "done" ? 0 : 1;
}
