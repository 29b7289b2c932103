import logger from "../config/logger";
import type { BatchSettings } from "../config/batchSettings";
import { parseCandidates, readNumberFile } from "../services/recipients/numberSource";
import { partitionCandidates } from "../services/recipients/normalizer";
import { dispatchScheduled, type ResultListener } from "../services/messaging/dispatcher";
import { buildReport, type BatchReport } from "../services/messaging/report";
import type { ScheduledSmsProvider } from "../services/messaging/twilioProvider";
import { formatUtc } from "../services/messaging/scheduleTime";
import { alwaysConfirm, type ConfirmFn } from "./confirm";

export interface RunBatchOptions {
  inputPath: string;
  settings: BatchSettings;
  provider: ScheduledSmsProvider;
  confirm?: ConfirmFn;
  onResult?: ResultListener;
}

/**
 * Reads, validates and deduplicates the numbers in `inputPath`, then
 * schedules one message per recipient. Resolves to `null` when the operator
 * declines at the confirmation prompt.
 */
export async function runBatch(options: RunBatchOptions): Promise<BatchReport | null> {
  const { inputPath, provider, settings } = options;
  const confirm = options.confirm ?? alwaysConfirm;

  const text = await readNumberFile(inputPath);
  const partition = partitionCandidates(parseCandidates(text));

  logger.info(
    {
      inputPath,
      recipients: partition.recipients.length,
      skipped: partition.skipped.length,
      duplicates: partition.duplicates,
    },
    `Loaded ${partition.recipients.length} unique phone numbers`
  );
  for (const entry of partition.skipped) {
    logger.warn({ line: entry.line, value: entry.value }, "Skipping invalid phone number");
  }

  if (partition.recipients.length > 0) {
    const proceed = await confirm("Press Enter to continue, or Ctrl+C to abort.");
    if (!proceed) {
      logger.info("Batch aborted by operator");
      return null;
    }
  }

  logger.info(
    {
      sendAt: formatUtc(settings.sendAt),
      localSendAt: settings.localSendAt,
      timezone: settings.timezone,
    },
    `Scheduling message for ${partition.recipients.length} recipients`
  );

  const results = await dispatchScheduled(
    partition.recipients,
    provider,
    { body: settings.body, sendAt: settings.sendAt },
    options.onResult
  );

  const report = buildReport(partition, results);
  logger.info(
    { scheduled: report.scheduled.length, failed: report.failed.length },
    "Batch complete"
  );
  return report;
}
