import type { APIEmbed, MessageCreateOptions } from 'discord.js';
import type { ConsoleChannel } from '../console/interpreter.js';
import { NO_MENTIONS } from './allowed-mentions.js';
import { splitDiscord } from './output-utils.js';

type Sendable = { send(options: MessageCreateOptions): Promise<unknown> };

/** Console replies: long text is split, embeds ride on the last chunk, nobody is pinged. */
export function createConsoleChannel(channel: Sendable): ConsoleChannel {
  return {
    async post(content: string, embeds: APIEmbed[] = []): Promise<void> {
      const chunks = splitDiscord(content);
      for (let i = 0; i < chunks.length; i++) {
        const last = i === chunks.length - 1;
        await channel.send({
          content: chunks[i],
          embeds: last ? embeds : [],
          allowedMentions: NO_MENTIONS,
        });
      }
    },
  };
}
