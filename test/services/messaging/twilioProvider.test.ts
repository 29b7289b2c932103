import { describe, expect, it, vi } from "vitest";
import { ConfigError } from "../../../src/utils/errors";
import {
  createTwilioProvider,
  type ScheduledMessageClient,
} from "../../../src/services/messaging/twilioProvider";

const config = {
  accountSid: "ACtest_sid",
  authToken: "test_token",
  messagingServiceSid: "test_msg_sid",
};

class FakeRestException extends Error {
  constructor(
    message: string,
    readonly code: number,
    readonly status: number
  ) {
    super(message);
  }
}

function fakeClient(create: ScheduledMessageClient["messages"]["create"]): ScheduledMessageClient {
  return { messages: { create } };
}

describe("createTwilioProvider", () => {
  const sendAt = new Date("2026-02-01T15:00:00Z");

  it("submits a fixed schedule through the messaging service", async () => {
    const create = vi.fn(async () => ({ sid: "SM123456", status: "scheduled" }));
    const provider = createTwilioProvider(config, fakeClient(create));

    const outcome = await provider.scheduleMessage({
      to: "+11234567890",
      body: "Test message",
      sendAt,
    });

    expect(outcome).toEqual({ ok: true, sid: "SM123456", status: "scheduled" });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith({
      to: "+11234567890",
      body: "Test message",
      messagingServiceSid: "test_msg_sid",
      sendAt,
      scheduleType: "fixed",
    });
  });

  it("turns REST errors into failed outcomes with the error code", async () => {
    const create = vi.fn(async () => {
      throw new FakeRestException("Invalid phone number", 21211, 400);
    });
    const provider = createTwilioProvider(config, fakeClient(create));

    await expect(
      provider.scheduleMessage({ to: "+11234567890", body: "Test message", sendAt })
    ).resolves.toEqual({
      ok: false,
      error: "Failed to send SMS: Invalid phone number (code 21211)",
    });
  });

  it("turns transport errors into failed outcomes", async () => {
    const create = vi.fn(async () => {
      throw new Error("socket hang up");
    });
    const provider = createTwilioProvider(config, fakeClient(create));

    await expect(
      provider.scheduleMessage({ to: "+11234567890", body: "Test message", sendAt })
    ).resolves.toEqual({ ok: false, error: "Failed to send SMS: socket hang up" });
  });

  it("fails at construction when Twilio rejects the credentials", () => {
    expect(() => createTwilioProvider({ ...config, accountSid: "test_sid" })).toThrow(
      ConfigError
    );
    expect(() => createTwilioProvider({ ...config, accountSid: "test_sid" })).toThrow(
      /^Invalid Twilio credentials: /
    );
  });
});
