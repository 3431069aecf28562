import { Cron } from 'croner';
import type { LoggerLike } from '../logging/logger-like.js';

export type FlushHandler = () => Promise<unknown>;

const FLUSH_TIME_RE = /^([01]?\d|2[0-3]):([0-5]\d)$/;

/** `HH:MM` → 5-field cron pattern firing once a day at that time. */
export function flushTimeToCron(time: string): string {
  const match = FLUSH_TIME_RE.exec(time.trim());
  if (!match) throw new Error(`Flush time must be HH:MM (24h), got "${time}"`);
  return `${Number(match[2])} ${Number(match[1])} * * *`;
}

/** Fires the counter flush once per day at a wall-clock time. */
export class DailyFlushSchedule {
  private cron: Cron | null = null;
  private running = false;
  private readonly handler: FlushHandler;
  private readonly log?: LoggerLike;

  constructor(handler: FlushHandler, log?: LoggerLike) {
    this.handler = handler;
    this.log = log;
  }

  start(time: string, timezone: string): void {
    const pattern = flushTimeToCron(time);
    // Construct first so an invalid timezone leaves the previous timer running.
    const cron = new Cron(pattern, { timezone }, () => {
      // Fire-and-forget: runNow logs its own failures.
      void this.runNow();
    });
    this.cron?.stop();
    this.cron = cron;
    this.log?.info({ pattern, timezone, nextRun: cron.nextRun() }, 'stats:flush scheduled');
  }

  /** Run the handler unless a previous run is still in flight. */
  async runNow(): Promise<boolean> {
    if (this.running) {
      this.log?.warn({}, 'stats:flush skipped, previous run still in flight');
      return false;
    }
    this.running = true;
    try {
      await this.handler();
      return true;
    } catch (err) {
      this.log?.error({ err }, 'stats:flush failed');
      return false;
    } finally {
      this.running = false;
    }
  }

  nextRun(): Date | null {
    return this.cron?.nextRun() ?? null;
  }

  stop(): void {
    this.cron?.stop();
    this.cron = null;
  }
}
