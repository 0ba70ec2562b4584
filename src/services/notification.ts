import { desc, eq } from "drizzle-orm";
import type { Database } from "../db/index.js";
import type { MessagingGateway } from "../gateway/types.js";
import type { Logger } from "../lib/logger.js";
import { adminNotifications } from "../db/schema/admin-notifications.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type NotificationKind = "attack_started" | "attack_ended" | "weight_adjustment";

export interface AttackStartedParams {
  communityId: string;
  threshold: number;
  detectedCount: number;
}

export interface AttackEndedParams {
  communityId: string;
  durationSeconds: number;
  totalRemoved: number;
}

export interface WeightAdjustmentParams {
  communityId: string;
  /** Human-readable changes, e.g. "noUsernameRisk: 5 -> 10". */
  changes: string[];
}

/** What the protection core emits; delivery is best-effort. */
export interface NotificationSink {
  attackStarted(params: AttackStartedParams): Promise<void>;
  attackEnded(params: AttackEndedParams): Promise<void>;
  weightsAdjusted(params: WeightAdjustmentParams): Promise<void>;
}

export interface AdminNotificationView {
  id: number;
  kind: NotificationKind;
  payload: Record<string, unknown>;
  createdAt: string;
}

export interface NotificationService extends NotificationSink {
  list(communityId: string, limit: number): Promise<AdminNotificationView[]>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.round(totalSeconds));
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return minutes > 0 ? `${String(minutes)}m ${String(rest)}s` : `${String(rest)}s`;
}

export function renderAttackStarted(params: AttackStartedParams): string {
  return (
    `Attack detected in ${params.communityId}: ${String(params.detectedCount)} joins ` +
    `(threshold ${String(params.threshold)}). Mitigation is on; new joiners are being removed.`
  );
}

export function renderAttackEnded(params: AttackEndedParams): string {
  return (
    `Attack in ${params.communityId} has ended after ${formatDuration(params.durationSeconds)}. ` +
    `Removed: ${String(params.totalRemoved)}.`
  );
}

export function renderWeightAdjustment(params: WeightAdjustmentParams): string {
  return [`Scoring auto-adjusted in ${params.communityId}:`, ...params.changes.map((c) => `- ${c}`)].join("\n");
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create the notification service: every event is persisted to the admin
 * feed and sent as text to each administrator chat.
 *
 * Notifications are fire-and-forget: failures are logged but never block
 * the calling flow.
 */
export function createNotificationService(
  db: Database,
  gateway: MessagingGateway,
  adminChatIds: readonly string[],
  logger: Logger,
): NotificationService {
  async function deliver(
    communityId: string,
    kind: NotificationKind,
    payload: Record<string, unknown>,
    text: string,
  ): Promise<void> {
    try {
      await db.insert(adminNotifications).values({ communityId, kind, payload });
    } catch (err: unknown) {
      logger.error({ err, communityId, kind }, "Failed to persist admin notification");
    }

    for (const chatId of adminChatIds) {
      try {
        await gateway.sendMessage(chatId, { text });
      } catch (err: unknown) {
        logger.warn({ err, communityId, kind, chatId }, "Failed to send admin notification");
      }
    }
  }

  return {
    async attackStarted(params: AttackStartedParams): Promise<void> {
      await deliver(
        params.communityId,
        "attack_started",
        { threshold: params.threshold, detectedCount: params.detectedCount },
        renderAttackStarted(params),
      );
    },

    async attackEnded(params: AttackEndedParams): Promise<void> {
      await deliver(
        params.communityId,
        "attack_ended",
        { durationSeconds: params.durationSeconds, totalRemoved: params.totalRemoved },
        renderAttackEnded(params),
      );
    },

    async weightsAdjusted(params: WeightAdjustmentParams): Promise<void> {
      await deliver(params.communityId, "weight_adjustment", { changes: params.changes }, renderWeightAdjustment(params));
    },

    async list(communityId: string, limit: number): Promise<AdminNotificationView[]> {
      const rows = await db
        .select()
        .from(adminNotifications)
        .where(eq(adminNotifications.communityId, communityId))
        .orderBy(desc(adminNotifications.createdAt))
        .limit(limit);

      return rows.map((row) => ({
        id: row.id,
        kind: row.kind,
        payload: row.payload,
        createdAt: row.createdAt.toISOString(),
      }));
    },
  };
}
