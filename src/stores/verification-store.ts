import { and, eq, lte } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { pendingVerifications } from "../db/schema/pending-verifications.js";
import type { PendingVerification } from "./types.js";

export interface VerificationStore {
  /** Insert or replace the live challenge for (community, user). */
  save(record: PendingVerification): Promise<void>;
  get(communityId: string, userId: number): Promise<PendingVerification | null>;
  /**
   * Atomic compare-and-delete. Exactly one concurrent caller receives the
   * record; every other caller gets null.
   */
  take(communityId: string, userId: number): Promise<PendingVerification | null>;
  /** Like `take`, but only a record whose deadline is at or before `now`. */
  takeExpired(communityId: string, userId: number, now: Date): Promise<PendingVerification | null>;
  listAll(): Promise<PendingVerification[]>;
}

export function createVerificationStore(db: Database): VerificationStore {
  const pv = pendingVerifications;
  const key = (communityId: string, userId: number) => and(eq(pv.communityId, communityId), eq(pv.userId, userId));

  return {
    async save(record: PendingVerification): Promise<void> {
      await db
        .insert(pv)
        .values(record)
        .onConflictDoUpdate({
          target: [pv.communityId, pv.userId],
          set: {
            challengeMessageId: record.challengeMessageId,
            correctAnswer: record.correctAnswer,
            riskScore: record.riskScore,
            account: record.account,
            avatarCount: record.avatarCount,
            createdAt: record.createdAt,
            expiresAt: record.expiresAt,
          },
        });
    },

    async get(communityId: string, userId: number): Promise<PendingVerification | null> {
      const rows = await db.select().from(pv).where(key(communityId, userId));
      return rows[0] ?? null;
    },

    async take(communityId: string, userId: number): Promise<PendingVerification | null> {
      const rows = await db.delete(pv).where(key(communityId, userId)).returning();
      return rows[0] ?? null;
    },

    async takeExpired(communityId: string, userId: number, now: Date): Promise<PendingVerification | null> {
      const rows = await db
        .delete(pv)
        .where(and(key(communityId, userId), lte(pv.expiresAt, now)))
        .returning();
      return rows[0] ?? null;
    },

    async listAll(): Promise<PendingVerification[]> {
      return db.select().from(pv);
    },
  };
}
