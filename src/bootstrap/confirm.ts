import { createInterface } from "readline/promises";

export type ConfirmFn = (prompt: string) => Promise<boolean>;

/**
 * Waits for Enter on an interactive terminal. Ctrl+C or an answer of
 * "n"/"no" declines.
 */
export function createTerminalConfirm(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): ConfirmFn {
  return async (prompt: string) => {
    const rl = createInterface({ input, output });
    const controller = new AbortController();
    rl.once("SIGINT", () => controller.abort());
    try {
      const answer = await rl.question(`${prompt} `, { signal: controller.signal });
      return !/^no?$/i.test(answer.trim());
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        output.write("\n");
        return false;
      }
      throw error;
    } finally {
      rl.close();
    }
  };
}

export const alwaysConfirm: ConfirmFn = async () => true;
