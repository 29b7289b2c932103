import { afterEach, describe, expect, it, vi } from "vitest";
import {
  CRASHED_EXIT_CODE,
  createShutdownManager,
  INTERRUPTED_EXIT_CODE,
} from "../../src/bootstrap/shutdown";

function stubExit() {
  return vi.spyOn(process, "exit").mockImplementation((code) => {
    throw new Error(`process.exit(${code})`);
  });
}

describe("createShutdownManager", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("exits with the interrupted code once", () => {
    const exit = stubExit();
    const describeProgress = vi.fn(() => "1/3 recipients processed");
    const manager = createShutdownManager({ describeProgress });

    expect(() => manager.shutdown("SIGINT")).toThrow(`process.exit(${INTERRUPTED_EXIT_CODE})`);
    manager.shutdown("SIGTERM");

    expect(exit).toHaveBeenCalledTimes(1);
    expect(describeProgress).toHaveBeenCalledTimes(1);
  });

  it("exits with 1 on an uncaught exception", () => {
    const exit = stubExit();
    const manager = createShutdownManager();

    expect(() => manager.handleUncaughtException(new Error("boom"))).toThrow("process.exit(1)");
    expect(exit).toHaveBeenCalledWith(CRASHED_EXIT_CODE);
  });

  it("stays alive when exitOnComplete is off", () => {
    const exit = stubExit();
    const manager = createShutdownManager({ exitOnComplete: false });

    manager.shutdown("SIGTERM");

    expect(exit).not.toHaveBeenCalled();
  });
});
