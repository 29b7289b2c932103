import type { BatchEnv } from "./env";
import {
  assertSchedulingWindow,
  parseLocalDateTime,
  zonedTimeToUtc,
} from "../services/messaging/scheduleTime";
import { ConfigError } from "../utils/errors";

export interface BatchSettings {
  body: string;
  /** UTC instant handed to the provider. */
  sendAt: Date;
  /** Wall-clock time as configured, in `timezone`. */
  localSendAt: string;
  timezone: string;
}

export function resolveBatchSettings(
  env: Pick<BatchEnv, "SMS_MESSAGE_BODY" | "SMS_SEND_AT" | "SMS_TIMEZONE">,
  now: Date = new Date()
): BatchSettings {
  if (!env.SMS_SEND_AT) {
    throw new ConfigError(
      "SMS_SEND_AT is required (local time such as 2026-11-02T10:00:00)"
    );
  }

  const local = parseLocalDateTime(env.SMS_SEND_AT);
  const sendAt = zonedTimeToUtc(local, env.SMS_TIMEZONE);
  assertSchedulingWindow(sendAt, now);

  return {
    body: env.SMS_MESSAGE_BODY,
    sendAt,
    localSendAt: env.SMS_SEND_AT,
    timezone: env.SMS_TIMEZONE,
  };
}
