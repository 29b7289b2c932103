import logger from "../../config/logger";
import { isValidPhoneNumber } from "../../validation/phoneNumberSchema";
import { errorMessage } from "../../utils/errors";
import type { ScheduledSmsProvider } from "./twilioProvider";

export type SendResult =
  | { number: string; success: true; sid: string; status: string }
  | { number: string; success: false; error: string };

export interface DispatchMessage {
  body: string;
  sendAt: Date;
}

export type ResultListener = (result: SendResult, completed: number, total: number) => void;

/**
 * Submits one scheduled message per recipient, in order. A failure for one
 * number is recorded in its result and the loop moves on.
 */
export async function dispatchScheduled(
  recipients: readonly string[],
  provider: ScheduledSmsProvider,
  message: DispatchMessage,
  onResult?: ResultListener
): Promise<SendResult[]> {
  const results: SendResult[] = [];
  const record = (result: SendResult) => {
    results.push(result);
    onResult?.(result, results.length, recipients.length);
  };

  for (const number of recipients) {
    if (!isValidPhoneNumber(number)) {
      const error = `Invalid phone number format: ${number}. Expected E.164 format.`;
      logger.warn({ number }, error);
      record({ number, success: false, error });
      continue;
    }

    try {
      const outcome = await provider.scheduleMessage({
        to: number,
        body: message.body,
        sendAt: message.sendAt,
      });
      if (outcome.ok) {
        logger.info({ number, sid: outcome.sid, status: outcome.status }, "Message scheduled");
        record({ number, success: true, sid: outcome.sid, status: outcome.status });
      } else {
        logger.warn({ number, error: outcome.error }, "Failed to schedule message");
        record({ number, success: false, error: outcome.error });
      }
    } catch (error) {
      logger.error({ err: error, number }, "Failed to schedule message");
      record({ number, success: false, error: errorMessage(error) });
    }
  }
  return results;
}
