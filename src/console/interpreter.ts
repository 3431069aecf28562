import { EmbedType } from 'discord.js';
import type { APIEmbed } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { isAllowlisted } from '../discord/allowlist.js';
import { mapDiscordErrorToOperatorMessage } from '../discord/user-errors.js';
import type { BatchImporter } from '../mirror/batch-import.js';
import type { RoleMappingRef } from '../swarm/role-mapping.js';
import type { IdentityRouter } from '../swarm/router.js';
import type { BackupGuild, SourceGuild, SourceMessage } from '../swarm/types.js';
import { CommandError, isCommandError } from './command-error.js';
import type { CommandErrorKind } from './command-error.js';
import { parseConsoleCommand } from './commands.js';
import type { ConsoleCommand } from './commands.js';
import { syncProfiles, syncRoles } from './profile-sync.js';

const CONFIRM_WORD = 'yes';

/** Where the interpreter writes. The adapter splits long text and disables mentions. */
export interface ConsoleChannel {
  post(content: string, embeds?: APIEmbed[]): Promise<void>;
}

export type ConsoleInput = {
  authorId: string;
  content: string;
};

export type ConsoleInterpreterDeps = {
  channel: ConsoleChannel;
  operatorIds: ReadonlySet<string>;
  confirmTimeoutMs: number;
  source: Pick<SourceGuild, 'channels' | 'fetchMessage' | 'listRoles' | 'fetchProfile'>;
  backup: Pick<BackupGuild, 'listRoles' | 'createRole' | 'addMemberRole'>;
  router: Pick<IdentityRouter, 'listDedicated'>;
  roles: RoleMappingRef;
  importer: Pick<BatchImporter, 'import'>;
  log?: LoggerLike;
};

function describeAuthor(message: SourceMessage): string {
  const { displayName, username } = message.author;
  return displayName && displayName !== username ? `${displayName} (${username})` : username;
}

function describeOrigin(message: SourceMessage): string {
  return `#${message.channelName} | ${describeAuthor(message)} | ${message.createdAt.toISOString()}`;
}

/**
 * Operator console. Each message from an operator is one turn; the only
 * state carried between turns is a pending `manual import` confirmation.
 * Replies to a confirmation prompt are consumed here and never parsed as
 * commands.
 */
export class ConsoleInterpreter {
  private readonly deps: ConsoleInterpreterDeps;
  private pendingConfirmation: ((answer: string) => void) | null = null;
  private running: ConsoleCommand['type'] | null = null;

  constructor(deps: ConsoleInterpreterDeps) {
    this.deps = deps;
  }

  awaitingConfirmation(): boolean {
    return this.pendingConfirmation !== null;
  }

  /**
   * Handle one console message. Never rejects: command failures are posted
   * to the console and logged.
   */
  async handle(input: ConsoleInput): Promise<void> {
    const { operatorIds, log } = this.deps;
    if (!isAllowlisted(operatorIds, input.authorId)) return;

    if (this.pendingConfirmation) {
      const settle = this.pendingConfirmation;
      this.pendingConfirmation = null;
      settle(input.content);
      return;
    }

    const command = parseConsoleCommand(input.content);
    if (!command) return;

    if (this.running) {
      await this.postSafe(`\`${this.running}\` is still running; try again when it has finished.`);
      return;
    }

    this.running = command.type;
    log?.info({ command: command.type, operator: input.authorId }, 'console:command received');
    try {
      await this.dispatch(command);
    } catch (err) {
      if (isCommandError(err)) {
        log?.info({ command: command.type, kind: err.kind }, 'console:command aborted');
      } else {
        log?.error({ err, command: command.type }, 'console:command failed');
        await this.postSafe(mapDiscordErrorToOperatorMessage(err));
      }
    } finally {
      this.running = null;
    }
  }

  private async dispatch(command: ConsoleCommand): Promise<void> {
    switch (command.type) {
      case 'syncProfiles':
        return this.syncProfiles();
      case 'syncRoles':
        return this.syncRoles();
      case 'getMessage':
        return this.getMessage(command.messageId);
      case 'manualImport':
        return this.manualImport(command.messageId);
    }
  }

  private async syncProfiles(): Promise<void> {
    const { router, source, channel, log } = this.deps;
    const summary = await syncProfiles(router, source, log);
    await channel.post(
      `Profiles synced: ${summary.synced} updated, ${summary.failed} failed, ${summary.missing} not found.`,
    );
  }

  private async syncRoles(): Promise<void> {
    const { channel } = this.deps;
    const summary = await syncRoles(this.deps);
    const created = summary.created.length > 0 ? summary.created.join(', ') : 'none';
    const lines = [
      `Roles synced. Created: ${created}.`,
      `Colours applied to ${summary.colored} identities${summary.failed > 0 ? ` (${summary.failed} failed)` : ''}.`,
    ];
    await channel.post(lines.join('\n'));
  }

  private async getMessage(rawId: string): Promise<void> {
    const message = await this.resolveMessage(rawId);
    const lines = [`**${describeOrigin(message)}**`, message.content || '_(no text)_'];
    if (message.attachments.length > 0) {
      lines.push('**Attachments**');
      for (const file of message.attachments) lines.push(`${file.name}: ${file.url}`);
    }
    const embeds: APIEmbed[] = [];
    const previews: string[] = [];
    for (const embed of message.embeds) {
      if (embed.type === undefined || embed.type === EmbedType.Rich) embeds.push(embed);
      else previews.push(`${embed.type}: ${embed.url ?? embed.title ?? '(no url)'}`);
    }
    // Platform-generated previews cannot be re-posted as embeds.
    if (previews.length > 0) lines.push('**Link previews**', ...previews);
    await this.deps.channel.post(lines.join('\n'), embeds);
  }

  private async manualImport(rawId: string): Promise<void> {
    const { channel, importer, confirmTimeoutMs, log } = this.deps;
    const start = await this.resolveMessage(rawId);
    const seconds = Math.round(confirmTimeoutMs / 1000);

    await channel.post(
      `Found message ${start.id}: ${describeOrigin(start)}\n` +
      `Import every later message in #${start.channelName}? Reply \`${CONFIRM_WORD}\` within ${seconds} seconds to confirm.`,
    );

    const answer = await this.awaitConfirmation(confirmTimeoutMs);
    if (answer === null) {
      await this.fail('cancelled', `Import cancelled: no confirmation within ${seconds} seconds.`);
    }
    if (answer !== CONFIRM_WORD) {
      await this.fail('cancelled', 'Import cancelled.');
    }

    await channel.post(`Importing #${start.channelName} after ${start.id}...`);
    const count = await importer.import(start);
    log?.info({ channelId: start.channelId, afterId: start.id, count }, 'import:console import complete');
    await channel.post(`Import complete: ${count} messages replicated from #${start.channelName}.`);
  }

  /** Look the ID up in every monitored channel, in configuration order. */
  private async resolveMessage(rawId: string): Promise<SourceMessage> {
    const { source } = this.deps;
    if (!/^\d+$/.test(rawId)) {
      return this.fail('format', `Invalid message ID "${rawId}": expected digits only.`);
    }
    for (const ch of source.channels) {
      const message = await source.fetchMessage(ch.id, rawId);
      if (message) return message;
    }
    return this.fail('not-found', `Message ${rawId} was not found in any monitored channel.`);
  }

  /** Resolves with the next operator message, or null once the timeout passes. */
  private awaitConfirmation(timeoutMs: number): Promise<string | null> {
    return new Promise((resolve) => {
      const settle = (answer: string) => {
        clearTimeout(timer);
        resolve(answer);
      };
      const timer = setTimeout(() => {
        if (this.pendingConfirmation === settle) this.pendingConfirmation = null;
        resolve(null);
      }, timeoutMs);
      this.pendingConfirmation = settle;
    });
  }

  /** Post the failure to the console and log it, then throw it. */
  private async fail(kind: CommandErrorKind, message: string): Promise<never> {
    this.deps.log?.warn({ kind, reason: message }, 'console:command rejected');
    await this.postSafe(message);
    throw new CommandError(kind, message);
  }

  private async postSafe(content: string): Promise<void> {
    try {
      await this.deps.channel.post(content);
    } catch (err) {
      this.deps.log?.error({ err }, 'console:failed to post to console channel');
    }
  }
}
