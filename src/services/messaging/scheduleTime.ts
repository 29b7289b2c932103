import { MAX_SCHEDULE_LEAD_MS, MIN_SCHEDULE_LEAD_MS } from "../../constants";
import { ConfigError } from "../../utils/errors";

export interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/;

export function parseLocalDateTime(value: string): LocalDateTime {
  const match = LOCAL_DATE_TIME.exec(value.trim());
  if (!match) {
    throw new ConfigError(
      `Invalid schedule time "${value}". Expected YYYY-MM-DDTHH:mm[:ss] local time`
    );
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => (part === undefined ? 0 : Number(part)));
  const local = { year, month, day, hour, minute, second };

  // Date.UTC rolls over out-of-range fields, so a round trip exposes them
  const candidate = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() !== month - 1 ||
    candidate.getUTCDate() !== day ||
    candidate.getUTCHours() !== hour ||
    candidate.getUTCMinutes() !== minute ||
    candidate.getUTCSeconds() !== second
  ) {
    throw new ConfigError(`Invalid schedule time "${value}"`);
  }

  return local;
}

function createZoneFormatter(timezone: string): Intl.DateTimeFormat {
  try {
    return new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
  } catch (error) {
    throw new ConfigError(`Unknown time zone: ${timezone}`, { cause: error });
  }
}

// Offset of the zone from UTC at the given instant, in milliseconds
function zoneOffsetMs(formatter: Intl.DateTimeFormat, instant: number): number {
  const fields: Record<string, number> = {};
  for (const part of formatter.formatToParts(new Date(instant))) {
    if (part.type !== "literal") {
      fields[part.type] = Number(part.value);
    }
  }
  const wallClock = Date.UTC(
    fields.year,
    fields.month - 1,
    fields.day,
    fields.hour,
    fields.minute,
    fields.second
  );
  return wallClock - Math.floor(instant / 1000) * 1000;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Converts a wall-clock time in an IANA time zone to the UTC instant it
 * names. A time repeated by a fall-back transition resolves to its first
 * occurrence; a time skipped by a spring-forward transition is read with the
 * offset in force before it, so 02:30 on a New York spring-forward day
 * becomes 03:30 daylight time.
 */
export function zonedTimeToUtc(local: LocalDateTime, timezone: string): Date {
  const formatter = createZoneFormatter(timezone);
  const asUtc = Date.UTC(
    local.year,
    local.month - 1,
    local.day,
    local.hour,
    local.minute,
    local.second
  );

  // assumes at most one transition within a day either side
  const offsetBefore = zoneOffsetMs(formatter, asUtc - DAY_MS);
  const offsetAfter = zoneOffsetMs(formatter, asUtc + DAY_MS);

  const withBefore = asUtc - offsetBefore;
  const withAfter = asUtc - offsetAfter;
  const beforeHolds = zoneOffsetMs(formatter, withBefore) === offsetBefore;
  const afterHolds = zoneOffsetMs(formatter, withAfter) === offsetAfter;

  return new Date(!beforeHolds && afterHolds ? withAfter : withBefore);
}

export function assertSchedulingWindow(sendAt: Date, now: Date = new Date()): void {
  const lead = sendAt.getTime() - now.getTime();
  if (lead < MIN_SCHEDULE_LEAD_MS) {
    throw new ConfigError(
      `Schedule time ${formatUtc(sendAt)} must be at least 15 minutes in the future`
    );
  }
  if (lead > MAX_SCHEDULE_LEAD_MS) {
    throw new ConfigError(
      `Schedule time ${formatUtc(sendAt)} cannot be more than 35 days ahead`
    );
  }
}

export function formatUtc(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
