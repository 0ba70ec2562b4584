// ---------------------------------------------------------------------------
// Join Window Counter
// ---------------------------------------------------------------------------
// Per-community queue of recent joins, oldest first. Queries evict from the
// front before reporting, so each entry is pushed and shifted once: O(1)
// amortized per call. Nothing here is persisted; a restart forgets recent
// joins.
// ---------------------------------------------------------------------------

export interface WindowMember {
  userId: number;
  isPremium: boolean;
}

interface JoinRecord extends WindowMember {
  timestamp: number;
}

interface CommunityQueue {
  entries: JoinRecord[];
  /** Index of the oldest live entry; everything before it is evicted. */
  head: number;
}

/** Compact the backing array once this many evicted slots pile up. */
const COMPACT_AFTER = 1024;

export type Clock = () => number;

export class JoinWindowCounter {
  private readonly queues = new Map<string, CommunityQueue>();

  constructor(private readonly now: Clock = Date.now) {}

  recordJoin(communityId: string, userId: number, isPremium: boolean): void {
    let queue = this.queues.get(communityId);
    if (!queue) {
      queue = { entries: [], head: 0 };
      this.queues.set(communityId, queue);
    }
    queue.entries.push({ timestamp: this.now(), userId, isPremium });
  }

  countInWindow(communityId: string, windowSeconds: number): number {
    const queue = this.evict(communityId, windowSeconds);
    return queue ? queue.entries.length - queue.head : 0;
  }

  usersInWindow(communityId: string, windowSeconds: number): WindowMember[] {
    const queue = this.evict(communityId, windowSeconds);
    if (!queue) return [];
    return queue.entries.slice(queue.head).map(({ userId, isPremium }) => ({ userId, isPremium }));
  }

  clear(communityId: string): void {
    this.queues.delete(communityId);
  }

  /** Live entries per community, for health reporting. */
  memoryUsage(): { communities: number; entries: number } {
    let entries = 0;
    for (const queue of this.queues.values()) {
      entries += queue.entries.length - queue.head;
    }
    return { communities: this.queues.size, entries };
  }

  private evict(communityId: string, windowSeconds: number): CommunityQueue | undefined {
    const queue = this.queues.get(communityId);
    if (!queue) return undefined;

    const cutoff = this.now() - windowSeconds * 1000;
    while (queue.head < queue.entries.length) {
      const oldest = queue.entries[queue.head];
      if (!oldest || oldest.timestamp >= cutoff) break;
      queue.head++;
    }

    if (queue.head === queue.entries.length) {
      queue.entries = [];
      queue.head = 0;
    } else if (queue.head >= COMPACT_AFTER) {
      queue.entries = queue.entries.slice(queue.head);
      queue.head = 0;
    }
    return queue;
  }
}
