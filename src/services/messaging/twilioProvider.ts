import twilio from "twilio";
import type { MessageListInstanceCreateOptions } from "twilio/lib/rest/api/v2010/account/message";
import type { ProviderConfig } from "../../config/providerConfig";
import { ConfigError, errorCode, errorMessage } from "../../utils/errors";

export interface ScheduledSmsRequest {
  to: string;
  body: string;
  sendAt: Date;
}

export type ProviderOutcome =
  | { ok: true; sid: string; status: string }
  | { ok: false; error: string };

/**
 * Anything that can accept a scheduled message. Failures come back as
 * `{ ok: false }` rather than being thrown.
 */
export interface ScheduledSmsProvider {
  scheduleMessage(request: ScheduledSmsRequest): Promise<ProviderOutcome>;
}

/** The slice of the Twilio client the provider uses. */
export interface ScheduledMessageClient {
  messages: {
    create(
      params: MessageListInstanceCreateOptions
    ): Promise<{ sid: string; status: string }>;
  };
}

function describeFailure(error: unknown): string {
  const code = errorCode(error);
  const suffix = typeof code === "number" ? ` (code ${code})` : "";
  return `Failed to send SMS: ${errorMessage(error)}${suffix}`;
}

function createTwilioClient(config: ProviderConfig): ScheduledMessageClient {
  try {
    return twilio(config.accountSid, config.authToken);
  } catch (error) {
    throw new ConfigError(`Invalid Twilio credentials: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Builds the Twilio client up front, so bad credentials fail at startup as a
 * ConfigError rather than on the first send.
 */
export function createTwilioProvider(
  config: ProviderConfig,
  client: ScheduledMessageClient = createTwilioClient(config)
): ScheduledSmsProvider {
  async function scheduleMessage(request: ScheduledSmsRequest): Promise<ProviderOutcome> {
    try {
      const message = await client.messages.create({
        to: request.to,
        body: request.body,
        messagingServiceSid: config.messagingServiceSid,
        sendAt: request.sendAt,
        scheduleType: "fixed",
      });
      return { ok: true, sid: message.sid, status: message.status };
    } catch (error) {
      return { ok: false, error: describeFailure(error) };
    }
  }

  return { scheduleMessage };
}
