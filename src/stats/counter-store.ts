import type { LoggerLike } from '../logging/logger-like.js';
import type { BackupGuild, SourceMessage } from '../swarm/types.js';
import type { StatTopic } from './topics.js';

export type CounterThreadPort = Pick<
  BackupGuild,
  'listThreads' | 'createThread' | 'deleteThreadAnnouncement' | 'fetchThreadName' | 'renameThread'
>;

export type CounterErrorKind = 'missing-thread' | 'unparseable-title' | 'invalid-value';

export class CounterError extends Error {
  readonly kind: CounterErrorKind;

  constructor(kind: CounterErrorKind, message: string) {
    super(message);
    this.name = 'CounterError';
    this.kind = kind;
  }
}

/** channel ID → topic title → thread ID */
export type CounterThreadSnapshot = ReadonlyMap<string, ReadonlyMap<string, string>>;

export type FlushSummary = {
  updated: number;
  failed: number;
};

export function encodeCounterTitle(topic: string, value: number): string {
  return `${topic} - ${value}`;
}

/** Read the value back out of `"<topic> - <value>"`; anything else is a corrupted counter. */
export function parseCounterTitle(topic: string, title: string): number {
  const prefix = `${topic} - `;
  if (!title.startsWith(prefix)) {
    throw new CounterError('unparseable-title', `Counter thread "${title}" does not start with "${prefix}"`);
  }
  const suffix = title.slice(prefix.length);
  if (!/^\d+$/.test(suffix)) {
    throw new CounterError('unparseable-title', `Counter thread "${title}" has a non-numeric value "${suffix}"`);
  }
  return Number(suffix);
}

export type ThreadCounterStoreOpts = {
  port: CounterThreadPort;
  topics: readonly StatTopic[];
  log?: LoggerLike;
};

/**
 * Durable per-channel counters stored in thread names. Increments accumulate
 * in memory and are written by `flush()`; nothing guards the read-then-rename,
 * so overlapping flushes for the same thread can lose an update.
 */
export class ThreadCounterStore {
  private readonly port: CounterThreadPort;
  private readonly topics: readonly StatTopic[];
  private readonly log?: LoggerLike;
  private threads: CounterThreadSnapshot = new Map();
  private deltas = new Map<string, Map<string, number>>();

  constructor(opts: ThreadCounterStoreOpts) {
    this.port = opts.port;
    this.topics = opts.topics;
    this.log = opts.log;
  }

  /**
   * Scan the channels' threads and provision a `"<topic> - 0"` thread for every
   * (channel, topic) pair that has none. Replaces the thread snapshot.
   */
  async reconcile(channelIds: readonly string[]): Promise<CounterThreadSnapshot> {
    const wanted = new Set(channelIds);
    const found = new Map<string, Map<string, string>>();
    for (const id of channelIds) found.set(id, new Map());

    for (const thread of await this.port.listThreads(channelIds)) {
      if (!thread.parentId || !wanted.has(thread.parentId)) continue;
      const topic = this.topics.find((t) => thread.name.startsWith(`${t.title} - `));
      if (!topic) continue;
      const byTopic = found.get(thread.parentId);
      if (byTopic && !byTopic.has(topic.title)) byTopic.set(topic.title, thread.id);
    }

    for (const [channelId, byTopic] of found) {
      for (const topic of this.topics) {
        if (byTopic.has(topic.title)) continue;
        const threadId = await this.port.createThread(channelId, encodeCounterTitle(topic.title, 0));
        byTopic.set(topic.title, threadId);
        this.log?.info({ channelId, threadId, topic: topic.title }, 'stats:counter thread created');
        try {
          await this.port.deleteThreadAnnouncement(channelId, threadId);
        } catch (err) {
          this.log?.warn({ err, channelId, threadId }, 'stats:failed to delete thread announcement');
        }
      }
    }

    this.threads = found;
    return found;
  }

  threadFor(channelId: string, topic: string): string | undefined {
    return this.threads.get(channelId)?.get(topic);
  }

  /** Tally a replicated message against every topic. */
  check(message: SourceMessage, channelId: string): void {
    for (const topic of this.topics) {
      const increment = topic.classify(message);
      if (increment == null) continue;
      let byTopic = this.deltas.get(channelId);
      if (!byTopic) {
        byTopic = new Map();
        this.deltas.set(channelId, byTopic);
      }
      byTopic.set(topic.title, (byTopic.get(topic.title) ?? 0) + increment);
    }
  }

  pendingDelta(channelId: string, topic: string): number {
    return this.deltas.get(channelId)?.get(topic) ?? 0;
  }

  /**
   * Write every non-zero delta. The cache is reset up front, so a failed
   * rename drops that delta for good.
   */
  async flush(): Promise<FlushSummary> {
    const pending = this.deltas;
    this.deltas = new Map();
    const summary: FlushSummary = { updated: 0, failed: 0 };

    for (const [channelId, byTopic] of pending) {
      for (const [topic, delta] of byTopic) {
        if (delta === 0) continue;
        try {
          const value = await this.update(channelId, topic, delta);
          summary.updated += 1;
          this.log?.info({ channelId, topic, delta, value }, 'stats:counter flushed');
        } catch (err) {
          summary.failed += 1;
          this.log?.error({ err, channelId, topic, delta }, 'stats:counter flush failed; delta dropped');
        }
      }
    }
    return summary;
  }

  /**
   * Rename the counter thread. With `increment` the value is added to the
   * current one; otherwise it replaces it.
   */
  async update(channelId: string, topic: string, value: number, increment = true): Promise<number> {
    const threadId = this.threadFor(channelId, topic);
    if (!threadId) {
      throw new CounterError('missing-thread', `No "${topic}" counter thread for channel ${channelId}`);
    }
    if (!Number.isInteger(value)) {
      throw new CounterError('invalid-value', `Counter value must be an integer, got ${value}`);
    }

    let next = value;
    if (increment) {
      next += parseCounterTitle(topic, await this.port.fetchThreadName(threadId));
    }
    if (next < 0) {
      throw new CounterError('invalid-value', `Counter "${topic}" would become negative (${next})`);
    }

    await this.port.renameThread(threadId, encodeCounterTitle(topic, next));
    return next;
  }
}
