import type { LoggerLike } from '../logging/logger-like.js';
import type { SourceGuild, SourceMessage } from '../swarm/types.js';
import type { Replicator } from './replicator.js';

const PROGRESS_LOG_EVERY = 100;

export type BatchImporterOpts = {
  source: Pick<SourceGuild, 'historyAfter'>;
  replicator: Pick<Replicator, 'replicate'>;
  log?: LoggerLike;
};

/**
 * Replays channel history after a starting message through the live
 * replication path, oldest first. The first failure aborts the import.
 */
export class BatchImporter {
  private readonly opts: BatchImporterOpts;

  constructor(opts: BatchImporterOpts) {
    this.opts = opts;
  }

  /** Returns the number of messages replicated. `start` itself is not imported. */
  async import(start: SourceMessage): Promise<number> {
    const { source, replicator, log } = this.opts;
    let count = 0;
    let seen = 0;
    log?.info({ channelId: start.channelId, afterId: start.id }, 'import:started');

    for await (const message of source.historyAfter(start.channelId, start.id)) {
      seen += 1;
      const result = await replicator.replicate(message, { batch: true });
      if (result) count += 1;
      if (seen % PROGRESS_LOG_EVERY === 0) {
        log?.info({ channelId: start.channelId, seen, count, lastId: message.id }, 'import:progress');
      }
    }

    log?.info({ channelId: start.channelId, afterId: start.id, seen, count }, 'import:finished');
    return count;
  }
}
