"use strict";

// "+" followed by exactly 11 digits
export const E164_PATTERN = /^\+\d{11}$/;

export const DEFAULT_TIMEZONE = "America/New_York";
export const DEFAULT_MESSAGE_BODY =
  "Hello! This is a scheduled message. Text STOP to unsubscribe";
export const MAX_MESSAGE_LENGTH = 1600;

// Twilio accepts fixed schedules between 15 minutes and 35 days ahead
export const MIN_SCHEDULE_LEAD_MS = 15 * 60 * 1000;
export const MAX_SCHEDULE_LEAD_MS = 35 * 24 * 60 * 60 * 1000;
