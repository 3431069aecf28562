import 'dotenv/config';
import pino from 'pino';

import { parseConfig } from './config.js';
import { DailyFlushSchedule } from './stats/flush-schedule.js';
import { startSwarm } from './swarm/swarm.js';
import type { Swarm } from './swarm/swarm.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

let parsedConfig;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  log.error({ err }, 'Invalid configuration');
  process.exit(1);
}
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
const cfg = parsedConfig.config;

let swarm: Swarm;
try {
  swarm = await startSwarm(cfg, parsedConfig.credentials, log);
} catch (err) {
  log.error({ err }, 'startup:swarm failed to start');
  process.exit(1);
}

let flushSchedule: DailyFlushSchedule | null = null;
const counters = swarm.counters;
if (counters) {
  flushSchedule = new DailyFlushSchedule(async () => {
    const summary = await counters.flush();
    log.info(summary, 'stats:daily flush complete');
  }, log);
  flushSchedule.start(cfg.statsFlushTime, cfg.statsTimezone);
}

let shuttingDown = false;
const shutdown = async (signal: NodeJS.Signals) => {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, 'shutdown:requested');

  flushSchedule?.stop();
  if (counters) {
    try {
      const summary = await counters.flush();
      log.info(summary, 'shutdown:counters flushed');
    } catch (err) {
      log.warn({ err }, 'shutdown:counter flush failed');
    }
  }
  await swarm.destroy();
  process.exit(0);
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
