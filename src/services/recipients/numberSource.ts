import { promises as fs } from "fs";
import { InputFileError, errorCode, errorMessage } from "../../utils/errors";

export interface Candidate {
  value: string;
  line: number;
}

export async function readNumberFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new InputFileError(`Phone numbers file not found: ${filePath}`, { cause: error });
    }
    throw new InputFileError(
      `Could not read phone numbers file ${filePath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * One candidate per non-blank line, trimmed, with its 1-based line number.
 */
export function parseCandidates(text: string): Candidate[] {
  const candidates: Candidate[] = [];
  text.split(/\r?\n/).forEach((rawLine, index) => {
    const value = rawLine.trim();
    if (value) {
      candidates.push({ value, line: index + 1 });
    }
  });
  return candidates;
}
