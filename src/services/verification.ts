import type { AccountProfile, MessagingGateway } from "../gateway/types.js";
import { generateChallenge, normalizeAnswer } from "../lib/challenge.js";
import type { RandomSource } from "../lib/challenge.js";
import type { Logger } from "../lib/logger.js";
import { checkName, fullDisplayName } from "../lib/name-checks.js";
import { removeMember } from "../lib/removal.js";
import type { ConfigStore } from "../stores/config-store.js";
import type { HistoryStore } from "../stores/history-store.js";
import type { PendingVerification, ResolutionReason, VerificationOutcome } from "../stores/types.js";
import type { VerificationStore } from "../stores/verification-store.js";
import { normalizeLanguage } from "./risk-scorer.js";
import type { WeightTuner } from "./weight-tuner.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AnswerResult = "ignored" | "no_challenge" | "passed" | "failed";

export interface IssueParams {
  communityId: string;
  account: AccountProfile;
  /** Computed once at join time and stored with the challenge. */
  riskScore: number;
  avatarCount: number | null;
}

export interface VerificationWorkflow {
  /** Send a challenge and start its deadline. False when it could not be sent. */
  issue(params: IssueParams): Promise<boolean>;
  /** Free-form or button answer. Text without digits is not an attempt. */
  submitAnswer(communityId: string, userId: number, text: string): Promise<AnswerResult>;
  /** The deadline path. False when the challenge was already resolved. */
  expire(communityId: string, userId: number): Promise<boolean>;
  /** Reschedule challenges that survived a restart; resolve overdue ones now. */
  recover(): Promise<number>;
  isPending(communityId: string, userId: number): Promise<boolean>;
  /** Cancel every scheduled task. Nothing is resolved or removed. */
  shutdown(): void;
}

export interface VerificationDeps {
  store: VerificationStore;
  history: HistoryStore;
  configStore: ConfigStore;
  gateway: MessagingGateway;
  tuner: WeightTuner;
  logger: Logger;
  timeoutSeconds: number;
  welcomeTtlSeconds: number;
  now?: () => number;
  random?: RandomSource;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** "@handle" when the account has one, otherwise its display name. */
export function mentionOf(account: AccountProfile): string {
  return account.username ? `@${account.username}` : fullDisplayName(account.firstName, account.lastName);
}

export function renderWelcome(template: string, account: AccountProfile): string {
  return template.replaceAll("{username}", mentionOf(account));
}

export function renderChallenge(account: AccountProfile, question: string, timeoutSeconds: number): string {
  return (
    `${mentionOf(account)}, please confirm you are human. ` +
    `Answer within ${String(timeoutSeconds)} seconds: ${question}`
  );
}

const keyOf = (communityId: string, userId: number) => `${communityId}:${String(userId)}`;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Exactly one of {correct answer, wrong answer, timeout} acts on a challenge:
 * whichever takes the stored record first. Timers are only a trigger; a
 * timer that fires after an answer finds no record and does nothing.
 */
export function createVerificationWorkflow(deps: VerificationDeps): VerificationWorkflow {
  const { store, history, configStore, gateway, tuner, logger } = deps;
  const now = deps.now ?? Date.now;
  const random = deps.random ?? Math.random;

  const deadlines = new Map<string, ReturnType<typeof setTimeout>>();
  const cleanups = new Set<ReturnType<typeof setTimeout>>();

  function cancelDeadline(communityId: string, userId: number): void {
    const key = keyOf(communityId, userId);
    const timer = deadlines.get(key);
    if (timer !== undefined) {
      clearTimeout(timer);
      deadlines.delete(key);
    }
  }

  function scheduleDeadline(communityId: string, userId: number, delayMs: number): void {
    cancelDeadline(communityId, userId);
    const key = keyOf(communityId, userId);
    const timer = setTimeout(() => {
      deadlines.delete(key);
      onDeadline(communityId, userId).catch((err: unknown) => {
        logger.error({ err, communityId, userId }, "Verification timeout failed");
      });
    }, Math.max(0, delayMs));
    deadlines.set(key, timer);
  }

  function scheduleCleanup(chatId: string, messageId: number, delayMs: number): void {
    const timer = setTimeout(() => {
      cleanups.delete(timer);
      deleteQuietly(chatId, messageId).catch((err: unknown) => {
        logger.error({ err, chatId, messageId }, "Welcome cleanup failed");
      });
    }, delayMs);
    cleanups.add(timer);
  }

  async function deleteQuietly(chatId: string, messageId: number | null): Promise<void> {
    if (messageId === null) return;
    try {
      await gateway.deleteMessage(chatId, messageId);
    } catch (err: unknown) {
      // Already gone, or the bot lost its rights
      logger.debug({ err, chatId, messageId }, "Could not delete message");
    }
  }

  async function recordOutcome(
    record: PendingVerification,
    outcome: VerificationOutcome,
    reason: ResolutionReason,
  ): Promise<void> {
    const account = record.account;
    const name = checkName(fullDisplayName(account.firstName, account.lastName));
    try {
      await history.appendOutcome({
        communityId: record.communityId,
        userId: record.userId,
        outcome,
        reason,
        usernamePresent: Boolean(account.username),
        languageCode: normalizeLanguage(account.languageCode),
        isPremium: account.isPremium,
        avatarCount: record.avatarCount,
        hasExoticScript: name.exoticScript,
        hasWeirdName: name.weirdName,
        riskScore: record.riskScore,
      });
    } catch (err: unknown) {
      logger.error({ err, communityId: record.communityId, userId: record.userId }, "Failed to record verification outcome");
    }
  }

  async function sendWelcome(record: PendingVerification): Promise<void> {
    try {
      const config = await configStore.get(record.communityId);
      if (!config?.welcomeMessage) return;
      const messageId = await gateway.sendMessage(record.communityId, {
        text: renderWelcome(config.welcomeMessage, record.account),
      });
      scheduleCleanup(record.communityId, messageId, deps.welcomeTtlSeconds * 1000);
    } catch (err: unknown) {
      logger.warn({ err, communityId: record.communityId, userId: record.userId }, "Failed to send welcome message");
    }
  }

  async function accept(record: PendingVerification): Promise<void> {
    await deleteQuietly(record.communityId, record.challengeMessageId);
    await recordOutcome(record, "passed", "correct_answer");
    logger.info({ communityId: record.communityId, userId: record.userId }, "Verification passed");
    await sendWelcome(record);
  }

  async function reject(record: PendingVerification, reason: "wrong_answer" | "timeout"): Promise<void> {
    const { communityId, userId } = record;
    await deleteQuietly(communityId, record.challengeMessageId);
    const removed = await removeMember(gateway, communityId, userId, logger);
    await recordOutcome(record, "failed", reason);
    logger.info({ communityId, userId, reason, removed }, "Verification failed");

    try {
      await tuner.onVerificationFailed(communityId);
    } catch (err: unknown) {
      logger.error({ err, communityId }, "Weight tuning after failed verification failed");
    }
  }

  async function onDeadline(communityId: string, userId: number): Promise<void> {
    if (await expire(communityId, userId)) return;
    // The stored challenge is not due yet: wait for its own deadline
    const record = await store.get(communityId, userId);
    if (record && !deadlines.has(keyOf(communityId, userId))) {
      scheduleDeadline(communityId, userId, record.expiresAt.getTime() - now());
    }
  }

  async function expire(communityId: string, userId: number): Promise<boolean> {
    // A stale timer must not resolve a challenge re-issued since it was set
    const record = await store.takeExpired(communityId, userId, new Date(now()));
    if (!record) return false;
    cancelDeadline(communityId, userId);
    await reject(record, "timeout");
    return true;
  }

  return {
    async issue(params: IssueParams): Promise<boolean> {
      const { communityId, account } = params;
      const challenge = generateChallenge(random);

      let messageId: number;
      try {
        messageId = await gateway.sendMessage(communityId, {
          text: renderChallenge(account, challenge.question, deps.timeoutSeconds),
          choices: challenge.choices,
        });
      } catch (err: unknown) {
        logger.warn({ err, communityId, userId: account.id }, "Failed to send verification challenge");
        return false;
      }

      const issuedAt = now();
      await store.save({
        communityId,
        userId: account.id,
        challengeMessageId: messageId,
        correctAnswer: challenge.answer,
        riskScore: params.riskScore,
        account,
        avatarCount: params.avatarCount,
        createdAt: new Date(issuedAt),
        expiresAt: new Date(issuedAt + deps.timeoutSeconds * 1000),
      });
      scheduleDeadline(communityId, account.id, deps.timeoutSeconds * 1000);

      logger.info({ communityId, userId: account.id, riskScore: params.riskScore }, "Verification challenge issued");
      return true;
    },

    async submitAnswer(communityId: string, userId: number, text: string): Promise<AnswerResult> {
      const answer = normalizeAnswer(text);
      if (answer.length === 0) return "ignored";

      const record = await store.take(communityId, userId);
      if (!record) return "no_challenge";
      cancelDeadline(communityId, userId);

      if (answer === record.correctAnswer) {
        await accept(record);
        return "passed";
      }
      await reject(record, "wrong_answer");
      return "failed";
    },

    expire,

    async recover(): Promise<number> {
      const records = await store.listAll();
      const current = now();
      for (const record of records) {
        const remaining = record.expiresAt.getTime() - current;
        if (remaining <= 0) {
          await expire(record.communityId, record.userId);
        } else {
          scheduleDeadline(record.communityId, record.userId, remaining);
        }
      }
      if (records.length > 0) {
        logger.info({ count: records.length }, "Recovered pending verifications");
      }
      return records.length;
    },

    async isPending(communityId: string, userId: number): Promise<boolean> {
      if (deadlines.has(keyOf(communityId, userId))) return true;
      return (await store.get(communityId, userId)) !== null;
    },

    shutdown(): void {
      for (const timer of deadlines.values()) clearTimeout(timer);
      for (const timer of cleanups) clearTimeout(timer);
      deadlines.clear();
      cleanups.clear();
    },
  };
}
