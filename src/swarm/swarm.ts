import { Client, GatewayIntentBits } from 'discord.js';
import type { Guild, GuildMember, PartialGuildMember } from 'discord.js';
import type { BackupSwarmConfig, SwarmCredentials } from '../config.js';
import { createConsoleChannel } from '../discord/console-channel.js';
import { DiscordBackupGuild } from '../discord/backup-guild.js';
import { DiscordProxyIdentity } from '../discord/proxy-identity.js';
import { DiscordSourceGuild, toSourceMessage } from '../discord/source-guild.js';
import { messageContentIntentHint } from '../discord/user-errors.js';
import { ConsoleInterpreter } from '../console/interpreter.js';
import { syncIdentityProfile } from '../console/profile-sync.js';
import { KeyedQueue } from '../group-queue.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { BatchImporter } from '../mirror/batch-import.js';
import { LiveMirror } from '../mirror/live-mirror.js';
import { Replicator } from '../mirror/replicator.js';
import { ThreadCounterStore } from '../stats/counter-store.js';
import { DEFAULT_STAT_TOPICS } from '../stats/topics.js';
import { classifyIncoming } from './dispatch.js';
import { RoleMapping } from './role-mapping.js';
import type { RoleMappingRef } from './role-mapping.js';
import { IdentityRouter } from './router.js';
import { admitDedicated } from './roster.js';
import { DEFAULT_IDENTITY_KEY } from './types.js';
import type { ProxyIdentity } from './types.js';

export type Swarm = {
  router: IdentityRouter;
  /** Null when stats are disabled. */
  counters: ThreadCounterStore | null;
  destroy(): Promise<void>;
};

async function loginClient(token: string, intents: GatewayIntentBits[]): Promise<Client<true>> {
  const client = new Client({ intents });
  try {
    await client.login(token);
    await new Promise<void>((resolve) => {
      if (client.isReady()) resolve();
      else client.once('ready', () => resolve());
    });
  } catch (err) {
    await client.destroy();
    throw err;
  }
  if (!client.isReady()) {
    await client.destroy();
    throw new Error('Discord client logged in but never became ready');
  }
  return client;
}

async function resolveGuild(client: Client<true>, guildId: string, label: string): Promise<Guild> {
  const guild = client.guilds.cache.get(guildId) ?? await client.guilds.fetch(guildId).catch(() => null);
  if (!guild) throw new Error(`The default identity is not a member of the ${label} guild ${guildId}`);
  return guild;
}

/**
 * Log in the dedicated identities. One that fails to come online is left out
 * of the roster, so its user routes to the default identity.
 */
async function loginDedicated(
  credentials: SwarmCredentials,
  backupGuildId: string,
  log: LoggerLike,
): Promise<{ identities: DiscordProxyIdentity[]; clients: Client<true>[] }> {
  const entries = [...credentials.dedicated];
  const results = await Promise.allSettled(
    entries.map(([, token]) => loginClient(token, [GatewayIntentBits.Guilds])),
  );

  const admitted = await admitDedicated(entries.map(([sourceUserId]) => sourceUserId), results, backupGuildId, log);
  const identities = admitted.map(({ sourceUserId, client }) =>
    new DiscordProxyIdentity({ key: sourceUserId, isDefault: false, client, backupGuildId, log }));
  const clients = admitted.map(({ client }) => client);
  return { identities, clients };
}

function profileChanged(before: GuildMember | PartialGuildMember, after: GuildMember): boolean {
  if (before.partial) return true;
  return before.nickname !== after.nickname
    || before.user.username !== after.user.username
    || before.user.avatar !== after.user.avatar;
}

/**
 * Bring the swarm online: log in every identity, scaffold the backup guild,
 * load the role mapping and counter threads, then start listening.
 */
export async function startSwarm(
  config: BackupSwarmConfig,
  credentials: SwarmCredentials,
  log: LoggerLike,
): Promise<Swarm> {
  const defaultClient = await loginClient(credentials.defaultToken, [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.GuildMessageReactions,
    GatewayIntentBits.GuildEmojisAndStickers,
    ...(config.profileAutoSync ? [GatewayIntentBits.GuildMembers] : []),
  ]);
  log.info({ botUserId: defaultClient.user.id, tag: defaultClient.user.tag }, 'swarm:default identity ready');

  const clients: Client<true>[] = [defaultClient];
  const destroy = async () => {
    await Promise.allSettled(clients.map((c) => c.destroy()));
  };

  try {
    const sourceGuild = await resolveGuild(defaultClient, config.sourceGuildId, 'source');
    const backupGuild = await resolveGuild(defaultClient, config.backupGuildId, 'backup');

    const dedicated = await loginDedicated(credentials, config.backupGuildId, log);
    clients.push(...dedicated.clients);

    const defaultIdentity: ProxyIdentity = new DiscordProxyIdentity({
      key: DEFAULT_IDENTITY_KEY,
      isDefault: true,
      client: defaultClient,
      backupGuildId: config.backupGuildId,
      log,
    });
    const router = new IdentityRouter(defaultIdentity, dedicated.identities);

    const source = await DiscordSourceGuild.open(sourceGuild, config.sourceChannelIds, log);
    const backup = new DiscordBackupGuild(backupGuild, log);

    const backupChannelIds: string[] = [];
    for (const channel of source.channels) {
      backupChannelIds.push(await backup.ensureTextChannel(channel.name));
    }
    const placeholder = await backup.ensurePlaceholderEmoji(config.placeholderEmojiName, config.placeholderEmojiImage);

    await backupGuild.roles.fetch();
    const roles: RoleMappingRef = { current: RoleMapping.build(source.listRoles(), backup.listRoles()) };

    let counters: ThreadCounterStore | null = null;
    if (config.statsEnabled) {
      counters = new ThreadCounterStore({ port: backup, topics: DEFAULT_STAT_TOPICS, log });
      await counters.reconcile(backupChannelIds);
    }

    const replicator = new Replicator({
      router,
      channels: backup,
      placeholder,
      roles,
      timezoneOffsetHours: config.importTimezoneOffsetHours,
      counters: counters ?? undefined,
      log,
    });
    const queue = new KeyedQueue();
    const mirror = new LiveMirror(replicator, queue, log);
    const importer = new BatchImporter({ source, replicator, log });

    let interpreter: ConsoleInterpreter | null = null;
    if (config.consoleChannelId) {
      const channel = await defaultClient.channels.fetch(config.consoleChannelId).catch(() => null);
      if (channel?.isTextBased() && !channel.isDMBased()) {
        interpreter = new ConsoleInterpreter({
          channel: createConsoleChannel(channel),
          operatorIds: config.operatorIds,
          confirmTimeoutMs: config.confirmTimeoutMs,
          source,
          backup,
          router,
          roles,
          importer,
          log,
        });
      } else {
        log.error({ consoleChannelId: config.consoleChannelId }, 'console:channel not found, console disabled');
      }
    }

    const dispatchCtx = {
      sourceGuildId: config.sourceGuildId,
      consoleChannelId: interpreter ? config.consoleChannelId : undefined,
      isMonitored: (id: string) => source.isMonitored(id),
      swarmUserIds: router.swarmUserIds(),
    };
    let warnedEmptyContent = false;

    defaultClient.on('messageCreate', (msg) => {
      const target = classifyIncoming(
        { guildId: msg.guildId, channelId: msg.channelId, authorId: msg.author.id, system: msg.system },
        dispatchCtx,
      );
      if (target === 'ignore' || !msg.inGuild()) return;
      const message = msg;

      if (target === 'console') {
        interpreter?.handle({ authorId: msg.author.id, content: msg.content })
          .catch((err: unknown) => log.error({ err }, 'console:handler failed'));
        return;
      }

      if (!msg.content && msg.attachments.size === 0 && msg.embeds.length === 0 && msg.stickers.size === 0 && !warnedEmptyContent) {
        warnedEmptyContent = true;
        log.warn({ channelId: msg.channelId }, messageContentIntentHint());
      }
      mirror.handle(message.channelId, () => toSourceMessage(message))
        .catch((err: unknown) => log.error({ err, channelId: msg.channelId }, 'mirror:handler failed'));
    });

    if (config.profileAutoSync) {
      defaultClient.on('guildMemberUpdate', (before, after) => {
        if (after.guild.id !== config.sourceGuildId || !router.hasDedicated(after.id)) return;
        if (!profileChanged(before, after)) return;
        const identity = router.route(after.id);
        queue.run(`profile:${after.id}`, () => syncIdentityProfile(identity, source, log))
          .catch((err: unknown) => log.warn({ err, identity: identity.key }, 'swarm:profile auto-sync failed'));
      });
    }

    log.info(
      {
        sourceChannels: source.channels.length,
        dedicatedIdentities: router.listDedicated().length,
        roleMappings: roles.current.size,
        stats: config.statsEnabled,
        console: Boolean(interpreter),
      },
      'swarm:online',
    );

    return { router, counters, destroy };
  } catch (err) {
    await destroy();
    throw err;
  }
}
