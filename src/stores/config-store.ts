import { and, asc, eq, ne } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { communityConfigs } from "../db/schema/community-configs.js";
import type { ScoringWeights } from "../lib/scoring-weights.js";
import { toCommunityConfig } from "./types.js";
import type { CommunityConfig, CommunityConfigPatch } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScoringUpdate {
  weights: ScoringWeights;
  threshold: number;
}

export interface ConfigStore {
  get(communityId: string): Promise<CommunityConfig | null>;
  list(): Promise<CommunityConfig[]>;
  /** Create the community on first write; weights in the patch merge into the stored ones. */
  upsert(communityId: string, patch: CommunityConfigPatch): Promise<CommunityConfig>;
  remove(communityId: string): Promise<boolean>;
  /**
   * Compare-and-set on the mitigation flag. Returns true only for the call
   * that actually changed the stored value.
   */
  setMitigationActive(communityId: string, desired: boolean): Promise<boolean>;
  /** Weights and threshold in one statement. */
  updateScoring(communityId: string, update: ScoringUpdate): Promise<void>;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createConfigStore(db: Database): ConfigStore {
  async function get(communityId: string): Promise<CommunityConfig | null> {
    const rows = await db.select().from(communityConfigs).where(eq(communityConfigs.id, communityId));
    const row = rows[0];
    return row ? toCommunityConfig(row) : null;
  }

  return {
    get,

    async list(): Promise<CommunityConfig[]> {
      const rows = await db.select().from(communityConfigs).orderBy(asc(communityConfigs.id));
      return rows.map(toCommunityConfig);
    },

    async upsert(communityId: string, patch: CommunityConfigPatch): Promise<CommunityConfig> {
      const { scoringWeights: weightPatch, ...columns } = patch;
      const current = weightPatch ? await get(communityId) : null;
      const values = {
        ...columns,
        ...(weightPatch ? { scoringWeights: { ...current?.scoringWeights, ...weightPatch } } : {}),
      };

      const rows = await db
        .insert(communityConfigs)
        .values({ id: communityId, ...values })
        .onConflictDoUpdate({
          target: communityConfigs.id,
          set: { ...values, updatedAt: new Date() },
        })
        .returning();

      const row = rows[0];
      if (!row) {
        throw new Error(`Upsert of community ${communityId} returned no row`);
      }
      return toCommunityConfig(row);
    },

    async remove(communityId: string): Promise<boolean> {
      const rows = await db
        .delete(communityConfigs)
        .where(eq(communityConfigs.id, communityId))
        .returning({ id: communityConfigs.id });
      return rows.length > 0;
    },

    async setMitigationActive(communityId: string, desired: boolean): Promise<boolean> {
      const rows = await db
        .update(communityConfigs)
        .set({ mitigationActive: desired, updatedAt: new Date() })
        .where(and(eq(communityConfigs.id, communityId), ne(communityConfigs.mitigationActive, desired)))
        .returning({ id: communityConfigs.id });
      return rows.length > 0;
    },

    async updateScoring(communityId: string, update: ScoringUpdate): Promise<void> {
      await db
        .update(communityConfigs)
        .set({
          scoringWeights: { ...update.weights },
          scoringThreshold: update.threshold,
          updatedAt: new Date(),
        })
        .where(eq(communityConfigs.id, communityId));
    },
  };
}
