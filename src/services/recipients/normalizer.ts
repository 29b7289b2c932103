import { isValidPhoneNumber } from "../../validation/phoneNumberSchema";
import type { Candidate } from "./numberSource";

export interface SkippedCandidate extends Candidate {
  reason: "invalid";
}

export interface RecipientPartition {
  /** Unique valid numbers in first-occurrence order. */
  recipients: string[];
  skipped: SkippedCandidate[];
  duplicates: number;
}

export function partitionCandidates(candidates: Candidate[]): RecipientPartition {
  const seen = new Set<string>();
  const recipients: string[] = [];
  const skipped: SkippedCandidate[] = [];
  let duplicates = 0;

  for (const candidate of candidates) {
    const value = candidate.value.trim();
    if (!isValidPhoneNumber(value)) {
      skipped.push({ value, line: candidate.line, reason: "invalid" });
      continue;
    }
    if (seen.has(value)) {
      duplicates += 1;
      continue;
    }
    seen.add(value);
    recipients.push(value);
  }

  return { recipients, skipped, duplicates };
}
