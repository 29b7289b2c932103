import type { BatchSettings } from "../../config/batchSettings";
import type { RecipientPartition, SkippedCandidate } from "../recipients/normalizer";
import type { SendResult } from "./dispatcher";
import { formatUtc } from "./scheduleTime";

export type ScheduledResult = Extract<SendResult, { success: true }>;
export type FailedResult = Extract<SendResult, { success: false }>;

export interface BatchReport {
  skipped: SkippedCandidate[];
  duplicates: number;
  results: SendResult[];
  scheduled: ScheduledResult[];
  failed: FailedResult[];
}

export function buildReport(
  partition: Pick<RecipientPartition, "skipped" | "duplicates">,
  results: SendResult[]
): BatchReport {
  const scheduled: ScheduledResult[] = [];
  const failed: FailedResult[] = [];
  for (const result of results) {
    if (result.success) {
      scheduled.push(result);
    } else {
      failed.push(result);
    }
  }
  return {
    skipped: partition.skipped,
    duplicates: partition.duplicates,
    results,
    scheduled,
    failed,
  };
}

export function formatReport(
  report: BatchReport,
  settings?: Pick<BatchSettings, "sendAt" | "localSendAt" | "timezone">
): string {
  const lines: string[] = [];

  if (settings) {
    lines.push(
      `Send time: ${settings.localSendAt} ${settings.timezone} (${formatUtc(settings.sendAt)})`
    );
  }

  lines.push(`Skipped (invalid format): ${report.skipped.length}`);
  for (const entry of report.skipped) {
    lines.push(`  - line ${entry.line}: ${entry.value}`);
  }

  if (report.duplicates > 0) {
    lines.push(`Duplicates removed: ${report.duplicates}`);
  }

  lines.push(`Scheduled: ${report.scheduled.length}`);
  for (const result of report.scheduled) {
    lines.push(`  ✓ ${result.number} (${result.sid})`);
  }

  lines.push(`Failed: ${report.failed.length}`);
  for (const result of report.failed) {
    lines.push(`  ✗ ${result.number}: ${result.error}`);
  }

  lines.push(
    `Complete: ${report.scheduled.length}/${report.results.length} messages scheduled`
  );
  return lines.join("\n");
}
