import { describe, it, expect, vi, beforeEach } from "vitest";
import { createAttackDetector, planTransition, resolveJoin } from "../../../src/services/attack-detector.js";
import type { AttackDetector, JoinObservation } from "../../../src/services/attack-detector.js";
import { JoinWindowCounter } from "../../../src/lib/join-window.js";
import { FakeGateway } from "../../helpers/fake-gateway.js";
import { MemoryConfigStore, MemoryHistoryStore, makeConfig } from "../../helpers/memory-stores.js";
import { createMockLogger } from "../../helpers/mock-logger.js";

const GROUP = "-1001";

// ===========================================================================
// State machine
// ===========================================================================

describe("planTransition", () => {
  const obs = (overrides: Partial<JoinObservation>): JoinObservation => ({
    state: "normal",
    count: 1,
    threshold: 10,
    isProtected: false,
    ...overrides,
  });

  it("enters at the threshold", () => {
    expect(planTransition(obs({ count: 9 }))).toBe("none");
    expect(planTransition(obs({ count: 10 }))).toBe("enter");
  });

  it("exits once the count drops below the threshold", () => {
    expect(planTransition(obs({ state: "mitigating", count: 10 }))).toBe("none");
    expect(planTransition(obs({ state: "mitigating", count: 9 }))).toBe("exit");
  });
});

describe("resolveJoin", () => {
  const normal: JoinObservation = { state: "normal", count: 10, threshold: 10, isProtected: false };
  const mitigating: JoinObservation = { state: "mitigating", count: 3, threshold: 10, isProtected: false };

  it("starts an attack only for the compare-and-set winner", () => {
    expect(resolveJoin(normal, "enter", true)).toEqual({
      state: "mitigating",
      removeCurrent: true,
      startAttack: true,
      endAttack: false,
    });
    expect(resolveJoin(normal, "enter", false)).toEqual({
      state: "mitigating",
      removeCurrent: true,
      startAttack: false,
      endAttack: false,
    });
  });

  it("never removes the joiner that ends an attack", () => {
    expect(resolveJoin(mitigating, "exit", true)).toEqual({
      state: "normal",
      removeCurrent: false,
      startAttack: false,
      endAttack: true,
    });
  });

  it("keeps mitigating when the exit was lost", () => {
    expect(resolveJoin(mitigating, "exit", false)).toEqual({
      state: "mitigating",
      removeCurrent: true,
      startAttack: false,
      endAttack: false,
    });
  });

  it("spares protected accounts during mitigation", () => {
    const decision = resolveJoin({ ...mitigating, count: 12, isProtected: true }, "none", false);
    expect(decision.removeCurrent).toBe(false);
    expect(decision.state).toBe("mitigating");
  });

  it("does nothing in normal state below the threshold", () => {
    expect(resolveJoin({ ...normal, count: 3 }, "none", false)).toEqual({
      state: "normal",
      removeCurrent: false,
      startAttack: false,
      endAttack: false,
    });
  });
});

// ===========================================================================
// Service
// ===========================================================================

describe("createAttackDetector", () => {
  let now: number;
  let configStore: MemoryConfigStore;
  let history: MemoryHistoryStore;
  let gateway: FakeGateway;
  let notifications: {
    attackStarted: ReturnType<typeof vi.fn>;
    attackEnded: ReturnType<typeof vi.fn>;
    weightsAdjusted: ReturnType<typeof vi.fn>;
  };
  let detector: AttackDetector;

  beforeEach(() => {
    now = Date.parse("2026-03-10T12:00:00Z");
    const clock = () => now;
    configStore = new MemoryConfigStore([makeConfig({ id: GROUP, threshold: 10, windowSeconds: 5 })]);
    history = new MemoryHistoryStore(clock);
    gateway = new FakeGateway();
    notifications = {
      attackStarted: vi.fn().mockResolvedValue(undefined),
      attackEnded: vi.fn().mockResolvedValue(undefined),
      weightsAdjusted: vi.fn().mockResolvedValue(undefined),
    };
    detector = createAttackDetector({
      counter: new JoinWindowCounter(clock),
      configStore,
      history,
      gateway,
      notifications,
      logger: createMockLogger() as never,
      removal: { batchSize: 50, pauseMs: 0 },
      now: clock,
    });
  });

  async function join(userId: number, isPremium = false) {
    const config = await configStore.get(GROUP);
    if (!config) throw new Error("missing config");
    return detector.handleJoin(config, { userId, isPremium });
  }

  it("lets joins below the threshold through", async () => {
    for (let id = 1; id <= 9; id++) {
      const verdict = await join(id);
      expect(verdict).toEqual({ state: "normal", transition: null, removed: false, proceed: true });
      now += 100;
    }
    expect(gateway.removed).toHaveLength(0);
    expect(history.sessions).toHaveLength(0);
  });

  it("enters mitigation at the threshold and sweeps the window", async () => {
    for (let id = 1; id <= 9; id++) {
      await join(id);
      now += 100;
    }

    const verdict = await join(10);

    expect(verdict).toEqual({ state: "mitigating", transition: "entered", removed: true, proceed: false });
    expect([...gateway.removedIds()].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(history.sessions).toHaveLength(1);
    expect(history.sessions[0]?.totalRemoved).toBe(10);
    expect(history.sessions[0]?.detectedCount).toBe(10);
    expect(notifications.attackStarted).toHaveBeenCalledWith({ communityId: GROUP, threshold: 10, detectedCount: 10 });
    expect(configStore.configs.get(GROUP)?.mitigationActive).toBe(true);
  });

  it("removes later joiners without opening a second session", async () => {
    for (let id = 1; id <= 10; id++) {
      await join(id);
    }

    const verdict = await join(11);

    expect(verdict).toEqual({ state: "mitigating", transition: null, removed: true, proceed: false });
    expect(history.sessions).toHaveLength(1);
    expect(history.sessions[0]?.totalRemoved).toBe(11);
    expect(notifications.attackStarted).toHaveBeenCalledTimes(1);
  });

  it("opens exactly one session when several joins race past the threshold", async () => {
    for (let id = 1; id <= 9; id++) {
      await join(id);
    }
    const stale = await configStore.get(GROUP);
    if (!stale) throw new Error("missing config");

    const verdicts = await Promise.all(
      [10, 11, 12].map((userId) => detector.handleJoin(stale, { userId, isPremium: false })),
    );

    expect(verdicts.filter((v) => v.transition === "entered")).toHaveLength(1);
    expect(verdicts.every((v) => v.state === "mitigating" && !v.proceed)).toBe(true);
    expect(history.openSessions(GROUP)).toHaveLength(1);
    expect(notifications.attackStarted).toHaveBeenCalledTimes(1);
    expect(configStore.casCalls).toBe(3);
  });

  it("removes each racing joiner once and counts every removal in the session", async () => {
    for (let id = 1; id <= 9; id++) {
      await join(id);
    }
    const stale = await configStore.get(GROUP);
    if (!stale) throw new Error("missing config");

    await Promise.all([10, 11, 12].map((userId) => detector.handleJoin(stale, { userId, isPremium: false })));

    const removed = [...gateway.removedIds()].sort((a, b) => a - b);
    expect(removed).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(history.openSessions(GROUP)).toHaveLength(1);
    expect(history.sessions[0]?.totalRemoved).toBe(12);
  });

  it("exits once, closes the session and reports it", async () => {
    for (let id = 1; id <= 10; id++) {
      await join(id);
    }
    await join(11);
    now += 6000;

    const verdict = await join(12);

    expect(verdict).toEqual({ state: "normal", transition: "exited", removed: false, proceed: true });
    expect(gateway.removedIds()).not.toContain(12);
    expect(history.openSessions(GROUP)).toHaveLength(0);
    expect(history.sessions[0]?.endedAt).toEqual(new Date(now));
    expect(notifications.attackEnded).toHaveBeenCalledTimes(1);
    expect(notifications.attackEnded).toHaveBeenCalledWith({ communityId: GROUP, durationSeconds: 6, totalRemoved: 11 });

    const next = await join(13);
    expect(next.transition).toBeNull();
    expect(notifications.attackEnded).toHaveBeenCalledTimes(1);
  });

  it("does not count removals that failed", async () => {
    gateway.failRemovalFor.add(3);
    gateway.failRemovalFor.add(10);
    for (let id = 1; id <= 9; id++) {
      await join(id);
    }

    const verdict = await join(10);

    expect(verdict.removed).toBe(false);
    expect(verdict.transition).toBe("entered");
    expect(history.sessions[0]?.totalRemoved).toBe(8);
  });

  it("spares protected premium accounts", async () => {
    await join(1, true);
    for (let id = 2; id <= 10; id++) {
      await join(id);
    }
    const verdict = await join(11, true);

    expect(gateway.removedIds()).not.toContain(1);
    expect(gateway.removedIds()).not.toContain(11);
    expect(verdict).toEqual({ state: "mitigating", transition: null, removed: false, proceed: false });
  });

  it("removes premium accounts when the community does not protect them", async () => {
    configStore.configs.set(GROUP, makeConfig({ id: GROUP, threshold: 2, windowSeconds: 5, protectPremium: false }));

    await join(1, true);
    await join(2, true);

    expect([...gateway.removedIds()].sort((a, b) => a - b)).toEqual([1, 2]);
  });

  it("keeps working when the history store fails", async () => {
    vi.spyOn(history, "openSession").mockRejectedValue(new Error("db down"));
    for (let id = 1; id <= 9; id++) {
      await join(id);
    }

    const verdict = await join(10);

    expect(verdict.transition).toBe("entered");
    expect(gateway.removedIds()).toHaveLength(10);
    expect(notifications.attackStarted).toHaveBeenCalledTimes(1);
  });
});
