import type { MessagingGateway } from "../gateway/types.js";
import type { JoinWindowCounter, WindowMember } from "../lib/join-window.js";
import type { Logger } from "../lib/logger.js";
import { removeMember, removeMembers } from "../lib/removal.js";
import type { RemovalBatchOptions } from "../lib/removal.js";
import type { ConfigStore } from "../stores/config-store.js";
import type { HistoryStore } from "../stores/history-store.js";
import type { AttackSession, CommunityConfig } from "../stores/types.js";
import type { NotificationSink } from "./notification.js";

// ---------------------------------------------------------------------------
// State machine (pure)
// ---------------------------------------------------------------------------

export type DetectorState = "normal" | "mitigating";
export type Transition = "enter" | "exit" | "none";

export interface JoinObservation {
  state: DetectorState;
  /** Joins in the window, including this one. */
  count: number;
  threshold: number;
  /** Premium account in a community that protects premium accounts. */
  isProtected: boolean;
}

export interface JoinDecision {
  /** State after this event. */
  state: DetectorState;
  removeCurrent: boolean;
  /** Remove everyone else in the window and open an attack session. */
  startAttack: boolean;
  /** Close the open attack session and report it. */
  endAttack: boolean;
}

/** Which compare-and-set, if any, this observation should attempt. */
export function planTransition(obs: JoinObservation): Transition {
  if (obs.state === "normal") {
    return obs.count >= obs.threshold ? "enter" : "none";
  }
  return obs.count < obs.threshold ? "exit" : "none";
}

/**
 * Decide the side effects of one join, given whether the planned
 * compare-and-set changed the stored flag. Only the event whose CAS wins
 * starts or ends an attack; an event that ends an attack never removes its
 * own user.
 */
export function resolveJoin(obs: JoinObservation, transition: Transition, changed: boolean): JoinDecision {
  const removeUnlessProtected = !obs.isProtected;

  switch (transition) {
    case "enter":
      // Lost the race: someone else already flipped it, mitigation rules apply
      return { state: "mitigating", removeCurrent: removeUnlessProtected, startAttack: changed, endAttack: false };
    case "exit":
      if (changed) {
        return { state: "normal", removeCurrent: false, startAttack: false, endAttack: true };
      }
      return { state: "mitigating", removeCurrent: removeUnlessProtected, startAttack: false, endAttack: false };
    case "none":
      return obs.state === "mitigating"
        ? { state: "mitigating", removeCurrent: removeUnlessProtected, startAttack: false, endAttack: false }
        : { state: "normal", removeCurrent: false, startAttack: false, endAttack: false };
  }
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export interface JoinVerdict {
  state: DetectorState;
  transition: "entered" | "exited" | null;
  removed: boolean;
  /** The join was not handled by mitigation; it goes on to scoring. */
  proceed: boolean;
}

export interface JoiningMember {
  userId: number;
  isPremium: boolean;
}

export interface AttackDetector {
  handleJoin(config: CommunityConfig, member: JoiningMember): Promise<JoinVerdict>;
}

export interface AttackDetectorDeps {
  counter: JoinWindowCounter;
  configStore: ConfigStore;
  history: HistoryStore;
  gateway: MessagingGateway;
  notifications: NotificationSink;
  logger: Logger;
  removal?: RemovalBatchOptions;
  now?: () => number;
}

export function createAttackDetector(deps: AttackDetectorDeps): AttackDetector {
  const { counter, configStore, history, gateway, notifications, logger } = deps;
  const now = deps.now ?? Date.now;

  async function openSession(config: CommunityConfig, count: number): Promise<AttackSession | null> {
    try {
      return await history.openSession(config.id, config.threshold, count);
    } catch (err: unknown) {
      logger.error({ err, communityId: config.id }, "Failed to open attack session");
      return null;
    }
  }

  async function countRemoved(communityId: string, removed: number, sessionId?: number): Promise<void> {
    try {
      await history.incrementRemoved(communityId, removed, sessionId);
    } catch (err: unknown) {
      logger.error({ err, communityId, removed }, "Failed to update attack session removals");
    }
  }

  /**
   * Remove everyone who joined before the triggering event. `window` is the
   * snapshot taken when that event was recorded, so later joins are left to
   * their own events.
   */
  async function sweepWindow(
    config: CommunityConfig,
    member: JoiningMember,
    window: WindowMember[],
    count: number,
    sessionId: number | undefined,
  ): Promise<void> {
    logger.warn({ communityId: config.id, count, threshold: config.threshold }, "Join flood detected, mitigation on");
    await notifications.attackStarted({ communityId: config.id, threshold: config.threshold, detectedCount: count });

    const targets = window
      .filter((m) => m.userId !== member.userId && !(m.isPremium && config.protectPremium))
      .map((m) => m.userId);
    const uniqueTargets = [...new Set(targets)];

    const removed = await removeMembers(gateway, config.id, uniqueTargets, logger, deps.removal);
    await countRemoved(config.id, removed, sessionId);
  }

  async function endAttack(config: CommunityConfig): Promise<void> {
    let closed: AttackSession | null = null;
    try {
      closed = await history.closeSession(config.id, new Date(now()));
    } catch (err: unknown) {
      logger.error({ err, communityId: config.id }, "Failed to close attack session");
    }

    const durationSeconds = closed?.endedAt ? (closed.endedAt.getTime() - closed.startedAt.getTime()) / 1000 : 0;
    const totalRemoved = closed?.totalRemoved ?? 0;
    logger.info({ communityId: config.id, durationSeconds, totalRemoved }, "Join flood subsided, mitigation off");
    await notifications.attackEnded({ communityId: config.id, durationSeconds, totalRemoved });
  }

  return {
    async handleJoin(config: CommunityConfig, member: JoiningMember): Promise<JoinVerdict> {
      counter.recordJoin(config.id, member.userId, member.isPremium);

      const obs: JoinObservation = {
        state: config.mitigationActive ? "mitigating" : "normal",
        count: counter.countInWindow(config.id, config.windowSeconds),
        threshold: config.threshold,
        isProtected: member.isPremium && config.protectPremium,
      };

      const transition = planTransition(obs);
      // Taken before the first await: only users who joined before this event
      const window = transition === "enter" ? counter.usersInWindow(config.id, config.windowSeconds) : [];
      const changed =
        transition === "none" ? false : await configStore.setMitigationActive(config.id, transition === "enter");
      const decision = resolveJoin(obs, transition, changed);

      // The session exists before any removal of this event is counted
      const sessionId = decision.startAttack ? (await openSession(config, obs.count))?.id : undefined;

      let removed = false;
      if (decision.removeCurrent) {
        removed = await removeMember(gateway, config.id, member.userId, logger);
      }
      if (decision.startAttack) {
        await sweepWindow(config, member, window, obs.count, sessionId);
      }
      if (removed) {
        await countRemoved(config.id, 1, sessionId);
      }
      if (decision.endAttack) {
        await endAttack(config);
      }

      return {
        state: decision.state,
        transition: decision.startAttack ? "entered" : decision.endAttack ? "exited" : null,
        removed,
        proceed: decision.state === "normal",
      };
    },
  };
}
