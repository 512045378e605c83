/**
 * Summary formatting
 */

import color from "picocolors";
import type { BatchReport, ObjectResult } from "../../types";
import { formatBytes } from "../../utils";

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

function describeResult(result: ObjectResult): string {
  switch (result.status) {
    case "skipped":
      return color.dim("skipped");
    case "done": {
      const { deleted, failed, wouldDelete } = result.pruned;
      const pruned = deleted.length + wouldDelete.length;
      const suffix = failed.length > 0 ? `, ${failed.length} delete(s) failed` : "";
      const { archiveName, sizeBytes } = result.artifact;
      const size = sizeBytes > 0 ? `${formatBytes(sizeBytes)}, ` : "";
      return `${color.green(archiveName)} (${size}pruned ${pruned}${suffix})`;
    }
    case "failed":
      return color.red(`${result.error.kind} while ${result.stage}`);
  }
}

/**
 * One line per tracked object
 */
export function formatReport(report: BatchReport): string {
  return formatSummary(
    report.results.map((result) => ({
      label: result.object.localPath,
      value: describeResult(result),
    })),
  );
}
