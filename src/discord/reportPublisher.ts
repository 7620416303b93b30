import { ChannelType, ThreadAutoArchiveDuration, type Client } from "discord.js";
import type { ReportPublisher } from "../analysis/analysisPipeline.ts";

const THREAD_NAME_MAX_CHARS = 100;

export function clipThreadName(title: string) {
  const normalized = title.replace(/\s+/g, " ").trim() || "Discussion report";
  return normalized.slice(0, THREAD_NAME_MAX_CHARS);
}

export function buildMessagePayload(text: string) {
  return {
    content: text,
    allowedMentions: { parse: [] }
  };
}

export class DiscordReportPublisher implements ReportPublisher {
  client: Pick<Client, "channels">;

  constructor({ client }: { client: Pick<Client, "channels"> }) {
    this.client = client;
  }

  async fetchTextChannel(channelId: string) {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || (channel.type !== ChannelType.GuildText && channel.type !== ChannelType.GuildAnnouncement)) {
      throw new Error(`Channel ${channelId} is not a text channel.`);
    }
    return channel;
  }

  async postMessage(channelId: string, text: string) {
    const channel = await this.fetchTextChannel(channelId);
    const message = await channel.send(buildMessagePayload(text));
    return message.id;
  }

  async createThread(channelId: string, messageId: string, title: string) {
    const channel = await this.fetchTextChannel(channelId);
    const message = await channel.messages.fetch(messageId);
    const thread = await message.startThread({
      name: clipThreadName(title),
      autoArchiveDuration: ThreadAutoArchiveDuration.OneHour
    });
    return thread.id;
  }

  async sendToThread(threadId: string, text: string) {
    const channel = await this.client.channels.fetch(threadId);
    if (!channel || !channel.isThread()) {
      throw new Error(`Channel ${threadId} is not a thread.`);
    }
    await channel.send(buildMessagePayload(text));
  }
}
