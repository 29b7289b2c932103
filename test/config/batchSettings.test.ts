import { describe, expect, it } from "vitest";
import { resolveBatchSettings } from "../../src/config/batchSettings";
import { ConfigError } from "../../src/utils/errors";

const now = new Date("2026-10-19T12:00:00Z");
const base = {
  SMS_MESSAGE_BODY: "Hello! This is a scheduled message. Text STOP to unsubscribe",
  SMS_TIMEZONE: "America/New_York",
};

describe("resolveBatchSettings", () => {
  it("converts the local send time to UTC", () => {
    expect(resolveBatchSettings({ ...base, SMS_SEND_AT: "2026-11-02T10:00:00" }, now)).toEqual({
      body: base.SMS_MESSAGE_BODY,
      sendAt: new Date("2026-11-02T15:00:00Z"),
      localSendAt: "2026-11-02T10:00:00",
      timezone: "America/New_York",
    });
  });

  it("requires a send time", () => {
    expect(() => resolveBatchSettings({ ...base, SMS_SEND_AT: undefined }, now)).toThrow(
      ConfigError
    );
  });

  it("rejects a send time in the past", () => {
    expect(() => resolveBatchSettings({ ...base, SMS_SEND_AT: "2026-01-30T10:00:00" }, now)).toThrow(
      "Schedule time 2026-01-30T15:00:00Z must be at least 15 minutes in the future"
    );
  });
});
