"use strict";

import { z } from "zod";
import { E164_PATTERN } from "../constants";

export const phoneNumberSchema = z
  .string()
  .trim()
  .regex(E164_PATTERN, "Expected E.164 format (+ followed by 11 digits)");

/**
 * Shape check only: a leading "+" and exactly 11 digits once surrounding
 * whitespace is trimmed. Country codes and reachability are not checked.
 */
export function isValidPhoneNumber(raw: string): boolean {
  return phoneNumberSchema.safeParse(raw).success;
}
