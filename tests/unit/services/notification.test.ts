import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  createNotificationService,
  formatDuration,
  renderAttackEnded,
  renderAttackStarted,
  renderWeightAdjustment,
} from "../../../src/services/notification.js";
import type { NotificationService } from "../../../src/services/notification.js";
import { createChainableProxy, createFailingChain, createMockDb, resetDbMocks } from "../../helpers/mock-db.js";
import type { MockDb } from "../../helpers/mock-db.js";
import { FakeGateway } from "../../helpers/fake-gateway.js";
import { createMockLogger } from "../../helpers/mock-logger.js";
import type { MockLogger } from "../../helpers/mock-logger.js";

// ---------------------------------------------------------------------------
// Test constants
// ---------------------------------------------------------------------------

const GROUP = "-1001";
const ADMIN_CHATS = ["111", "222"];

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let mockDb: MockDb;
let gateway: FakeGateway;
let logger: MockLogger;
let service: NotificationService;

beforeEach(() => {
  vi.clearAllMocks();
  mockDb = createMockDb();
  resetDbMocks(mockDb);
  gateway = new FakeGateway();
  logger = createMockLogger();
  service = createNotificationService(mockDb as never, gateway, ADMIN_CHATS, logger as never);
});

// ===========================================================================
// Rendering
// ===========================================================================

describe("formatDuration", () => {
  it("formats minutes and seconds", () => {
    expect(formatDuration(125)).toBe("2m 5s");
    expect(formatDuration(42)).toBe("42s");
    expect(formatDuration(59.6)).toBe("1m 0s");
    expect(formatDuration(-3)).toBe("0s");
  });
});

describe("render helpers", () => {
  it("renders attack start", () => {
    expect(renderAttackStarted({ communityId: GROUP, threshold: 10, detectedCount: 12 })).toBe(
      "Attack detected in -1001: 12 joins (threshold 10). Mitigation is on; new joiners are being removed.",
    );
  });

  it("renders attack end", () => {
    expect(renderAttackEnded({ communityId: GROUP, durationSeconds: 95, totalRemoved: 31 })).toBe(
      "Attack in -1001 has ended after 1m 35s. Removed: 31.",
    );
  });

  it("renders one line per weight change", () => {
    expect(
      renderWeightAdjustment({
        communityId: GROUP,
        changes: ["noUsernameRisk: 5 -> 10", "scoringThreshold: 50 -> 45"],
      }),
    ).toBe("Scoring auto-adjusted in -1001:\n- noUsernameRisk: 5 -> 10\n- scoringThreshold: 50 -> 45");
  });
});

// ===========================================================================
// Delivery
// ===========================================================================

describe("createNotificationService", () => {
  it("persists the event and sends it to every admin chat", async () => {
    const insertChain = createChainableProxy();
    mockDb.insert.mockReturnValueOnce(insertChain);

    await service.attackStarted({ communityId: GROUP, threshold: 10, detectedCount: 12 });

    expect(insertChain.values).toHaveBeenCalledWith({
      communityId: GROUP,
      kind: "attack_started",
      payload: { threshold: 10, detectedCount: 12 },
    });
    expect(gateway.sent.map((s) => s.chatId)).toEqual(ADMIN_CHATS);
    expect(gateway.sent[0]?.message.text).toBe(
      "Attack detected in -1001: 12 joins (threshold 10). Mitigation is on; new joiners are being removed.",
    );
  });

  it("records attack end and weight adjustments with their payloads", async () => {
    const endChain = createChainableProxy();
    const tuneChain = createChainableProxy();
    mockDb.insert.mockReturnValueOnce(endChain).mockReturnValueOnce(tuneChain);

    await service.attackEnded({ communityId: GROUP, durationSeconds: 30, totalRemoved: 5 });
    await service.weightsAdjusted({ communityId: GROUP, changes: ["noAvatarRisk: 15 -> 20"] });

    expect(endChain.values).toHaveBeenCalledWith({
      communityId: GROUP,
      kind: "attack_ended",
      payload: { durationSeconds: 30, totalRemoved: 5 },
    });
    expect(tuneChain.values).toHaveBeenCalledWith({
      communityId: GROUP,
      kind: "weight_adjustment",
      payload: { changes: ["noAvatarRisk: 15 -> 20"] },
    });
  });

  it("still sends when persisting fails", async () => {
    mockDb.insert.mockReturnValueOnce(createFailingChain(new Error("db down")));

    await service.attackEnded({ communityId: GROUP, durationSeconds: 30, totalRemoved: 5 });

    expect(gateway.sent).toHaveLength(2);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ communityId: GROUP, kind: "attack_ended" }),
      "Failed to persist admin notification",
    );
  });

  it("does not throw when sending fails", async () => {
    gateway.failSend = true;

    await expect(
      service.weightsAdjusted({ communityId: GROUP, changes: ["noAvatarRisk: 15 -> 20"] }),
    ).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("lists the feed newest first with ISO timestamps", async () => {
    const chain = createChainableProxy([
      {
        id: 3,
        communityId: GROUP,
        kind: "attack_ended",
        payload: { durationSeconds: 30, totalRemoved: 5 },
        createdAt: new Date("2026-03-10T12:05:00Z"),
      },
    ]);
    mockDb.select.mockReturnValueOnce(chain);

    const feed = await service.list(GROUP, 20);

    expect(feed).toEqual([
      {
        id: 3,
        kind: "attack_ended",
        payload: { durationSeconds: 30, totalRemoved: 5 },
        createdAt: "2026-03-10T12:05:00.000Z",
      },
    ]);
    expect(chain.limit).toHaveBeenCalledWith(20);
  });
});
