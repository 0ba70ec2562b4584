import { setTimeout as sleep } from "node:timers/promises";
import type { MessagingGateway } from "../gateway/types.js";
import type { Logger } from "./logger.js";

export const DEFAULT_REMOVAL_BATCH_SIZE = 50;
export const DEFAULT_REMOVAL_BATCH_PAUSE_MS = 1000;

export interface RemovalBatchOptions {
  batchSize?: number;
  pauseMs?: number;
}

/**
 * Remove one member. Gateway failures are logged and reported as `false`;
 * the account stays in the community.
 */
export async function removeMember(
  gateway: MessagingGateway,
  communityId: string,
  userId: number,
  logger: Logger,
): Promise<boolean> {
  try {
    await gateway.removeMember(communityId, userId);
    return true;
  } catch (err: unknown) {
    logger.warn({ err, communityId, userId }, "Failed to remove member");
    return false;
  }
}

/**
 * Remove many members in parallel batches with a pause between batches.
 * A failed removal never aborts the rest. Returns the number removed.
 */
export async function removeMembers(
  gateway: MessagingGateway,
  communityId: string,
  userIds: readonly number[],
  logger: Logger,
  options: RemovalBatchOptions = {},
): Promise<number> {
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_REMOVAL_BATCH_SIZE);
  const pauseMs = options.pauseMs ?? DEFAULT_REMOVAL_BATCH_PAUSE_MS;

  let removed = 0;
  for (let i = 0; i < userIds.length; i += batchSize) {
    if (i > 0 && pauseMs > 0) {
      await sleep(pauseMs);
    }
    const batch = userIds.slice(i, i + batchSize);
    const results = await Promise.allSettled(
      batch.map((userId) => removeMember(gateway, communityId, userId, logger)),
    );
    removed += results.filter((r) => r.status === "fulfilled" && r.value).length;
  }

  if (userIds.length > 0) {
    logger.info({ communityId, requested: userIds.length, removed }, "Batch removal finished");
  }
  return removed;
}
