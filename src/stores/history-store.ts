import { and, count, desc, eq, gt, gte, isNotNull, isNull, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { attackSessions } from "../db/schema/attack-sessions.js";
import { verificationOutcomes } from "../db/schema/verification-outcomes.js";
import type {
  AttackSession,
  AttackSummary,
  FeatureRates,
  IdBaseline,
  LanguageCount,
  OutcomeRecord,
  ScoringStats,
  VerificationOutcome,
} from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HistoryStore {
  appendOutcome(record: OutcomeRecord): Promise<void>;
  /** Language counts and id percentiles of passed verifications since `since`. */
  scoringStats(communityId: string, since: Date): Promise<ScoringStats>;
  featureRates(
    communityId: string,
    outcome: VerificationOutcome,
    since: Date,
    baseline: IdBaseline,
  ): Promise<FeatureRates>;
  topLanguages(
    communityId: string,
    outcome: VerificationOutcome,
    since: Date,
    limit: number,
  ): Promise<LanguageCount[]>;
  countOutcomes(communityId: string, outcome: VerificationOutcome, since: Date): Promise<number>;
  /** Delete every record of one outcome. Returns how many were removed. */
  clearOutcomes(communityId: string, outcome: VerificationOutcome): Promise<number>;

  /** Null when a session is already open for the community. */
  openSession(communityId: string, threshold: number, detectedCount: number): Promise<AttackSession | null>;
  /** Close the open session, if any. */
  closeSession(communityId: string, endedAt: Date): Promise<AttackSession | null>;
  /** Add to a session's removed count: the given session, or the open one. */
  incrementRemoved(communityId: string, removed: number, sessionId?: number): Promise<void>;
  listSessions(communityId: string, limit: number): Promise<AttackSession[]>;
  attackSummary(communityId: string, since: Date): Promise<AttackSummary>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** postgres-js returns numeric and bigint aggregates as strings. */
function toNumber(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function rateOf(condition: SQL | undefined) {
  return sql<string | null>`avg(case when ${condition ?? sql`false`} then 1.0 else 0.0 end)`;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createHistoryStore(db: Database): HistoryStore {
  const vo = verificationOutcomes;

  function scope(communityId: string, outcome: VerificationOutcome, since: Date): SQL | undefined {
    return and(eq(vo.communityId, communityId), eq(vo.outcome, outcome), gte(vo.createdAt, since));
  }

  async function countOutcomes(communityId: string, outcome: VerificationOutcome, since: Date): Promise<number> {
    const rows = await db.select({ total: count() }).from(vo).where(scope(communityId, outcome, since));
    return rows[0]?.total ?? 0;
  }

  return {
    async appendOutcome(record: OutcomeRecord): Promise<void> {
      await db.insert(vo).values(record);
    },

    async scoringStats(communityId: string, since: Date): Promise<ScoringStats> {
      const passed = scope(communityId, "passed", since);

      const totals = await db
        .select({
          total: count(),
          p95: sql<string | null>`percentile_disc(0.95) within group (order by ${vo.userId})`,
          p99: sql<string | null>`percentile_disc(0.99) within group (order by ${vo.userId})`,
        })
        .from(vo)
        .where(passed);

      const languages = await db
        .select({ language: vo.languageCode, total: count() })
        .from(vo)
        .where(and(passed, isNotNull(vo.languageCode)))
        .groupBy(vo.languageCode);

      const languageCounts: Record<string, number> = {};
      for (const row of languages) {
        if (row.language) {
          languageCounts[row.language] = row.total;
        }
      }

      const first = totals[0];
      return {
        languageCounts,
        totalSuccessful: first?.total ?? 0,
        p95Id: toNumber(first?.p95),
        p99Id: toNumber(first?.p99),
      };
    },

    async featureRates(
      communityId: string,
      outcome: VerificationOutcome,
      since: Date,
      baseline: IdBaseline,
    ): Promise<FeatureRates> {
      const rows = await db
        .select({
          sampleSize: count(),
          noUsername: rateOf(eq(vo.usernamePresent, false)),
          exoticScript: rateOf(eq(vo.hasExoticScript, true)),
          weirdName: rateOf(eq(vo.hasWeirdName, true)),
          noAvatar: rateOf(eq(vo.avatarCount, 0)),
          oneAvatar: rateOf(eq(vo.avatarCount, 1)),
          noLanguage: rateOf(isNull(vo.languageCode)),
          idAboveP95: rateOf(baseline.p95Id === null ? undefined : gt(vo.userId, baseline.p95Id)),
          idAboveP99: rateOf(baseline.p99Id === null ? undefined : gt(vo.userId, baseline.p99Id)),
          premium: rateOf(eq(vo.isPremium, true)),
          averageRiskScore: sql<string | null>`avg(${vo.riskScore})`,
        })
        .from(vo)
        .where(scope(communityId, outcome, since));

      const row = rows[0];
      return {
        sampleSize: row?.sampleSize ?? 0,
        noUsername: toNumber(row?.noUsername) ?? 0,
        exoticScript: toNumber(row?.exoticScript) ?? 0,
        weirdName: toNumber(row?.weirdName) ?? 0,
        noAvatar: toNumber(row?.noAvatar) ?? 0,
        oneAvatar: toNumber(row?.oneAvatar) ?? 0,
        noLanguage: toNumber(row?.noLanguage) ?? 0,
        idAboveP95: toNumber(row?.idAboveP95) ?? 0,
        idAboveP99: toNumber(row?.idAboveP99) ?? 0,
        premium: toNumber(row?.premium) ?? 0,
        averageRiskScore: toNumber(row?.averageRiskScore) ?? 0,
      };
    },

    async topLanguages(
      communityId: string,
      outcome: VerificationOutcome,
      since: Date,
      limit: number,
    ): Promise<LanguageCount[]> {
      const rows = await db
        .select({ language: vo.languageCode, total: count() })
        .from(vo)
        .where(and(scope(communityId, outcome, since), isNotNull(vo.languageCode)))
        .groupBy(vo.languageCode)
        .orderBy(desc(count()))
        .limit(limit);

      return rows.flatMap((row) => (row.language ? [{ language: row.language, count: row.total }] : []));
    },

    countOutcomes,

    async clearOutcomes(communityId: string, outcome: VerificationOutcome): Promise<number> {
      const rows = await db
        .delete(vo)
        .where(and(eq(vo.communityId, communityId), eq(vo.outcome, outcome)))
        .returning({ id: vo.id });
      return rows.length;
    },

    async openSession(communityId: string, threshold: number, detectedCount: number): Promise<AttackSession | null> {
      // The partial unique index rejects a second open session
      const rows = await db
        .insert(attackSessions)
        .values({ communityId, threshold, detectedCount })
        .onConflictDoNothing()
        .returning();
      return rows[0] ?? null;
    },

    async closeSession(communityId: string, endedAt: Date): Promise<AttackSession | null> {
      const rows = await db
        .update(attackSessions)
        .set({ endedAt })
        .where(and(eq(attackSessions.communityId, communityId), isNull(attackSessions.endedAt)))
        .returning();
      return rows[0] ?? null;
    },

    async incrementRemoved(communityId: string, removed: number, sessionId?: number): Promise<void> {
      if (removed <= 0) return;
      const target =
        sessionId === undefined
          ? and(eq(attackSessions.communityId, communityId), isNull(attackSessions.endedAt))
          : and(eq(attackSessions.communityId, communityId), eq(attackSessions.id, sessionId));
      await db
        .update(attackSessions)
        .set({ totalRemoved: sql`${attackSessions.totalRemoved} + ${removed}` })
        .where(target);
    },

    async listSessions(communityId: string, limit: number): Promise<AttackSession[]> {
      return db
        .select()
        .from(attackSessions)
        .where(eq(attackSessions.communityId, communityId))
        .orderBy(desc(attackSessions.startedAt))
        .limit(limit);
    },

    async attackSummary(communityId: string, since: Date): Promise<AttackSummary> {
      const rows = await db
        .select({
          attacks: count(),
          removed: sql<string | null>`coalesce(sum(${attackSessions.totalRemoved}), 0)`,
        })
        .from(attackSessions)
        .where(and(eq(attackSessions.communityId, communityId), gte(attackSessions.startedAt, since)));

      const row = rows[0];
      return { attacks: row?.attacks ?? 0, removed: toNumber(row?.removed) ?? 0 };
    },
  };
}
