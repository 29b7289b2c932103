import { describe, expect, it } from "vitest";
import { buildReport, formatReport } from "../../../src/services/messaging/report";
import type { SendResult } from "../../../src/services/messaging/dispatcher";

describe("buildReport", () => {
  it("separates scheduled and failed results", () => {
    const results: SendResult[] = [
      { number: "+11234567890", success: true, sid: "SM1", status: "scheduled" },
      { number: "+10987654321", success: false, error: "Failed to send SMS: Invalid number" },
    ];

    const report = buildReport({ skipped: [], duplicates: 0 }, results);

    expect(report.scheduled).toEqual([results[0]]);
    expect(report.failed).toEqual([results[1]]);
    expect(report.results).toBe(results);
  });
});

describe("formatReport", () => {
  it("lists skipped, scheduled and failed numbers", () => {
    const report = buildReport(
      { skipped: [{ value: "invalid", line: 3, reason: "invalid" }], duplicates: 1 },
      [
        { number: "+11234567890", success: true, sid: "SM1", status: "scheduled" },
        { number: "+10987654321", success: false, error: "Failed to send SMS: Invalid number" },
      ]
    );

    expect(
      formatReport(report, {
        sendAt: new Date("2026-01-30T15:00:00Z"),
        localSendAt: "2026-01-30T10:00:00",
        timezone: "America/New_York",
      })
    ).toBe(
      [
        "Send time: 2026-01-30T10:00:00 America/New_York (2026-01-30T15:00:00Z)",
        "Skipped (invalid format): 1",
        "  - line 3: invalid",
        "Duplicates removed: 1",
        "Scheduled: 1",
        "  ✓ +11234567890 (SM1)",
        "Failed: 1",
        "  ✗ +10987654321: Failed to send SMS: Invalid number",
        "Complete: 1/2 messages scheduled",
      ].join("\n")
    );
  });

  it("reports an empty batch as zero sends", () => {
    const report = buildReport({ skipped: [], duplicates: 0 }, []);

    expect(formatReport(report)).toBe(
      [
        "Skipped (invalid format): 0",
        "Scheduled: 0",
        "Failed: 0",
        "Complete: 0/0 messages scheduled",
      ].join("\n")
    );
  });
});
