import { describe, it, expect, vi } from "vitest";
import { SHUTDOWN_SIGNALS, closeOnSignals } from "../../../src/lib/shutdown.js";
import type { SignalSource } from "../../../src/lib/shutdown.js";
import { createMockLogger } from "../../helpers/mock-logger.js";

/** A real macrotask boundary: every pending promise chain settles first. */
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function fakeProcess() {
  const listeners = new Map<NodeJS.Signals, (signal: NodeJS.Signals) => void>();
  const exit = vi.fn();
  const source: SignalSource = {
    once: (signal, listener) => listeners.set(signal, listener),
    exit,
  };
  return { source, listeners, exit };
}

describe("closeOnSignals", () => {
  it("listens for SIGTERM and SIGINT", () => {
    const { source, listeners } = fakeProcess();
    const app = { close: vi.fn(), log: createMockLogger() };

    closeOnSignals(app as never, source);

    expect([...listeners.keys()]).toEqual([...SHUTDOWN_SIGNALS]);
    expect(app.close).not.toHaveBeenCalled();
  });

  it("closes the app and exits with 0 on SIGTERM", async () => {
    const { source, listeners, exit } = fakeProcess();
    const app = { close: vi.fn().mockResolvedValue(undefined), log: createMockLogger() };
    closeOnSignals(app as never, source);

    listeners.get("SIGTERM")?.("SIGTERM");
    await flush();

    expect(app.close).toHaveBeenCalledTimes(1);
    expect(app.log.info).toHaveBeenCalledWith({ signal: "SIGTERM" }, "Shutdown signal received");
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("exits with 1 when closing fails", async () => {
    const { source, listeners, exit } = fakeProcess();
    const err = new Error("pool end timed out");
    const app = { close: vi.fn().mockRejectedValue(err), log: createMockLogger() };
    closeOnSignals(app as never, source);

    listeners.get("SIGINT")?.("SIGINT");
    await flush();

    expect(app.log.error).toHaveBeenCalledWith({ err }, "Shutdown failed");
    expect(exit).toHaveBeenCalledWith(1);
  });
});
