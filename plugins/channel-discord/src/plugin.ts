import { EventEmitter } from "node:events";
import { Client, Events, GatewayIntentBits, type Guild, type Message } from "discord.js";
import type {
  ChannelPlugin,
  ChannelInstanceConfig,
  ChannelStatus,
  CommunityEvent,
  IncomingMessage,
  MemberInfo,
  OutgoingMessage,
} from "@herald/core";
import { createLogger, errorMessage, initialStatus } from "@herald/core";

const log = createLogger("Discord");

// ─────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────

/** Discord rejects messages longer than this */
export const DISCORD_MESSAGE_LIMIT = 2000;

/**
 * Bot token from the channel entry, falling back to HERALD_DISCORD_TOKEN.
 */
export function resolveToken(
  config: ChannelInstanceConfig,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  if (typeof config.token === "string" && config.token.length > 0) {
    return config.token;
  }
  return env.HERALD_DISCORD_TOKEN || null;
}

/** Clip content to the Discord message limit */
export function fitToDiscord(content: string): string {
  if (content.length <= DISCORD_MESSAGE_LIMIT) return content;
  return content.slice(0, DISCORD_MESSAGE_LIMIT - 1) + "…";
}

/** The parts of a discord.js GuildMember the community tables keep */
export interface MemberLike {
  id: string;
  displayName: string;
  guild: { id: string };
  user: { bot: boolean };
}

export function toMemberInfo(member: MemberLike): MemberInfo {
  return {
    guildId: member.guild.id,
    userId: member.id,
    displayName: member.displayName,
    bot: member.user.bot,
  };
}

// ─────────────────────────────────────────────────────────────────
// Plugin class
// ─────────────────────────────────────────────────────────────────

export class DiscordPlugin implements ChannelPlugin {
  name = "discord";

  private config: ChannelInstanceConfig;
  private client: Client | null = null;
  private _status: ChannelStatus;
  private events = new EventEmitter();

  constructor(config: ChannelInstanceConfig) {
    this.config = config;
    this._status = initialStatus();
  }

  // ── Lifecycle ──────────────────────────────────────────────────

  async init(config: ChannelInstanceConfig): Promise<void> {
    this.config = config;
  }

  async connect(): Promise<void> {
    const token = resolveToken(this.config);
    if (!token) {
      throw new Error(
        `[channel-discord] No token for ${this.config.id}: set HERALD_DISCORD_TOKEN or channels.${this.config.id}.token`,
      );
    }

    // A destroyed client cannot log in again; always start from a fresh one
    if (this.client) {
      await this.client.destroy();
    }

    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        // Privileged: enable "Server Members Intent" for the application
        GatewayIntentBits.GuildMembers,
      ],
    });
    this.client = client;

    client.once(Events.ClientReady, (ready) => {
      this.updateStatus({
        running: true,
        connected: true,
        lastConnectedAt: new Date(),
        reconnectAttempts: 0,
        lastError: null,
        lastDisconnect: null,
      });
      log.info(`[Discord] Logged in as ${ready.user.tag}`);

      for (const guild of ready.guilds.cache.values()) {
        void this.syncGuild(guild);
      }
    });

    // Fired only when discord.js gives up on the shard; the manager reconnects
    client.on(Events.ShardDisconnect, (event) => {
      const error = `Gateway closed (${event.code})`;
      this.updateStatus({
        running: true,
        connected: false,
        lastError: error,
        lastDisconnect: { at: new Date(), error },
      });
    });

    // discord.js resumes on its own here; record it without asking for a reconnect
    client.on(Events.ShardReconnecting, () => {
      this._status = { ...this._status, connected: false };
    });

    client.on(Events.ShardResume, () => {
      this.updateStatus({ running: true, connected: true, lastError: null });
    });

    client.on(Events.Error, (err) => {
      this.emitError(err);
    });

    client.on(Events.MessageCreate, (message) => {
      this.handleMessage(message);
    });

    // ── Membership ──
    client.on(Events.GuildCreate, (guild) => {
      log.info(`[Discord] Joined ${guild.name} (${guild.id})`);
      void this.syncGuild(guild);
    });

    client.on(Events.GuildDelete, (guild) => {
      log.info(`[Discord] Left ${guild.id}`);
      this.emitCommunity({ type: "guild-left", guildId: guild.id });
    });

    client.on(Events.GuildMemberAdd, (member) => {
      this.emitCommunity({ type: "member-joined", member: toMemberInfo(member) });
    });

    client.on(Events.GuildMemberRemove, (member) => {
      this.emitCommunity({ type: "member-left", guildId: member.guild.id, userId: member.id });
    });

    this._status = { ...this._status, running: true, connected: false };
    await client.login(token);
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.destroy();
      this.client = null;
    }

    this.updateStatus({ running: false, connected: false });
  }

  // ── Messaging ──────────────────────────────────────────────────

  async send(to: string, message: OutgoingMessage): Promise<void> {
    if (!this.client || !this.client.isReady()) {
      throw new Error("[channel-discord] send() called while disconnected");
    }

    const channel = await this.client.channels.fetch(to);
    if (!channel || !channel.isSendable()) {
      throw new Error(`[channel-discord] Channel ${to} not found or not writable`);
    }

    await channel.send({
      content: fitToDiscord(message.content),
      ...(message.replyTo ? { reply: { messageReference: message.replyTo } } : {}),
    });
  }

  // ── Event emitter ──────────────────────────────────────────────

  on(event: "message", handler: (msg: IncomingMessage) => void): void;
  on(event: "error", handler: (err: Error) => void): void;
  on(event: "status", handler: (status: ChannelStatus) => void): void;
  on(event: "community", handler: (event: CommunityEvent) => void): void;
  on(
    event: "message" | "error" | "status" | "community",
    handler:
      | ((msg: IncomingMessage) => void)
      | ((err: Error) => void)
      | ((status: ChannelStatus) => void)
      | ((event: CommunityEvent) => void),
  ): void {
    this.events.on(event, handler);
  }

  // ── Status ─────────────────────────────────────────────────────

  status(): ChannelStatus {
    return { ...this._status };
  }

  async healthCheck(): Promise<boolean> {
    return this.client?.isReady() ?? false;
  }

  // ── Private helpers ────────────────────────────────────────────

  private handleMessage(message: Message): void {
    if (message.author.bot || !message.content) return;

    const incoming: IncomingMessage = {
      id: message.id,
      from: message.author.id,
      content: message.content,
      timestamp: message.createdAt,
      channelId: this.config.id,
      conversationId: message.channelId,
      ...(message.guildId ? { guildId: message.guildId } : {}),
      senderName: message.member?.displayName ?? message.author.username,
    };

    this._status = { ...this._status, lastMessageAt: new Date() };
    this.events.emit("message", incoming);
  }

  /** Report a server with its full member list */
  private async syncGuild(guild: Guild): Promise<void> {
    try {
      const members = await guild.members.fetch();
      this.emitCommunity({
        type: "guild-joined",
        guild: { id: guild.id, name: guild.name },
        members: members.map((member) => toMemberInfo(member)),
      });
    } catch (err) {
      this.emitError(new Error(`Could not list members of ${guild.id}: ${errorMessage(err)}`));
    }
  }

  private emitCommunity(event: CommunityEvent): void {
    this.events.emit("community", event);
  }

  private updateStatus(patch: Partial<ChannelStatus>): void {
    this._status = { ...this._status, ...patch };
    this.events.emit("status", { ...this._status });
  }

  private emitError(err: Error): void {
    this._status = { ...this._status, lastError: err.message };
    // EventEmitter throws on an unhandled "error" event
    if (this.events.listenerCount("error") > 0) {
      this.events.emit("error", err);
    }
  }
}

// ─────────────────────────────────────────────────────────────────
// Factory function
// ─────────────────────────────────────────────────────────────────

export function createDiscordPlugin(config: ChannelInstanceConfig): DiscordPlugin {
  return new DiscordPlugin(config);
}
