import type { LoggerLike } from '../logging/logger-like.js';
import type { KeyedQueue } from '../group-queue.js';
import type { SourceMessage } from '../swarm/types.js';
import type { Replicator } from './replicator.js';

type QueueLike = Pick<KeyedQueue, 'run'>;

/**
 * Live replication entry point. Work is serialized per source channel so the
 * backup channel receives messages in arrival order.
 */
export class LiveMirror {
  private readonly replicator: Pick<Replicator, 'replicate'>;
  private readonly queue: QueueLike;
  private readonly log?: LoggerLike;

  constructor(replicator: Pick<Replicator, 'replicate'>, queue: QueueLike, log?: LoggerLike) {
    this.replicator = replicator;
    this.queue = queue;
    this.log = log;
  }

  /** `load` runs inside the channel's slot, so snapshotting cannot reorder messages. */
  handle(channelId: string, load: () => Promise<SourceMessage>): Promise<void> {
    return this.queue.run(channelId, async () => {
      let messageId: string | undefined;
      try {
        const message = await load();
        messageId = message.id;
        await this.replicator.replicate(message, { batch: false });
      } catch (err) {
        this.log?.error({ err, channelId, messageId }, 'mirror:live replication failed');
      }
    });
  }
}
