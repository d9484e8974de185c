/**
 * Channel Manager
 *
 * Registry for chat-surface plugins: lifecycle, reconnection with
 * backoff, inbound message routing and outbound sends.
 */

import type {
  ChannelPlugin,
  PluginFactory,
  ChannelInstanceConfig,
  ChannelStatus,
  ChannelInfo,
  CommunityEvent,
  IncomingMessage,
  OutgoingMessage,
  ReconnectPolicy,
} from "@herald/core";
import {
  toDisplayStatus,
  initialStatus,
  computeBackoff,
  createLogger,
  errorMessage,
  DEFAULT_BACKOFF,
} from "@herald/core";

const log = createLogger("ChannelManager");

/** Internal channel entry */
interface ChannelEntry {
  config: ChannelInstanceConfig;
  plugin: ChannelPlugin;
  status: ChannelStatus;
  reconnectTimer: ReturnType<typeof setTimeout> | null;
}

/** Message handler signature */
type MessageHandler = (channelId: string, message: IncomingMessage) => void;

/** Status change handler signature */
type StatusChangeHandler = (channelId: string, status: ChannelStatus) => void;

/** Membership change handler signature */
type CommunityHandler = (channelId: string, event: CommunityEvent) => void;

export class ChannelManager {
  private channels = new Map<string, ChannelEntry>();
  private pluginFactories = new Map<string, PluginFactory>();
  private messageHandler: MessageHandler | null = null;
  private statusChangeHandlers: StatusChangeHandler[] = [];
  private communityHandlers: CommunityHandler[] = [];
  private stopping = false;

  /**
   * Register a plugin factory by name.
   */
  registerPlugin(name: string, factory: PluginFactory): void {
    this.pluginFactories.set(name, factory);
  }

  onMessage(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  onStatusChange(handler: StatusChangeHandler): void {
    this.statusChangeHandlers.push(handler);
  }

  onCommunity(handler: CommunityHandler): void {
    this.communityHandlers.push(handler);
  }

  /**
   * Initialize all channels from config. A channel whose plugin is
   * unknown is logged and skipped.
   */
  async initAll(configs: Record<string, ChannelInstanceConfig>): Promise<void> {
    for (const [id, config] of Object.entries(configs)) {
      try {
        await this.initChannel(id, config);
      } catch (err) {
        log.error({ err }, `[ChannelManager] Could not set up channel ${id}`);
      }
    }
  }

  /**
   * Create the plugin, wire its events and connect if processing is immediate.
   */
  private async initChannel(id: string, config: ChannelInstanceConfig): Promise<void> {
    const factory = this.pluginFactories.get(config.plugin);
    if (!factory) {
      throw new Error(`Plugin factory not found: ${config.plugin}`);
    }

    const plugin = factory(config);
    const entry: ChannelEntry = {
      config,
      plugin,
      status: initialStatus(),
      reconnectTimer: null,
    };

    plugin.on("message", (msg) => this.handlePluginMessage(id, msg));
    plugin.on("error", (err) => {
      log.error({ err }, `[ChannelManager] Error from ${id}`);
      entry.status.lastError = err.message;
    });
    plugin.on("status", (status) => this.handlePluginStatus(id, status));
    plugin.on("community", (event) => this.handlePluginCommunity(id, event));

    this.channels.set(id, entry);

    try {
      await plugin.init(config);
      log.info(`[ChannelManager] Initialized channel: ${id}`);
    } catch (err) {
      log.error({ err }, `[ChannelManager] Failed to initialize ${id}`);
      entry.status.lastError = errorMessage(err);
      return;
    }

    if (config.processing === "immediate") {
      await this.connectEntry(id, entry);
    }
  }

  /**
   * Send a message through a channel. Rejects when the channel is
   * unknown, disconnected, or the plugin did not accept the message.
   */
  async send(channelId: string, to: string, message: OutgoingMessage): Promise<void> {
    const entry = this.channels.get(channelId);
    if (!entry) {
      throw new Error(`Channel not found: ${channelId}`);
    }

    if (!entry.status.connected) {
      throw new Error(`Channel not connected: ${channelId}`);
    }

    await entry.plugin.send(to, message);
  }

  getChannelInfos(): ChannelInfo[] {
    return Array.from(this.channels.keys()).flatMap((id) => {
      const info = this.getChannelInfo(id);
      return info ? [info] : [];
    });
  }

  getChannelInfo(id: string): ChannelInfo | null {
    const entry = this.channels.get(id);
    if (!entry) return null;

    return {
      id,
      plugin: entry.config.plugin,
      status: toDisplayStatus(entry.status),
      statusDetail: { ...entry.status },
    };
  }

  /**
   * Disconnect all channels and clear reconnect timers.
   */
  async disconnectAll(): Promise<void> {
    this.stopping = true;

    for (const [id, entry] of this.channels.entries()) {
      if (entry.reconnectTimer) {
        clearTimeout(entry.reconnectTimer);
        entry.reconnectTimer = null;
      }

      try {
        await entry.plugin.disconnect();
        log.info(`[ChannelManager] Disconnected channel: ${id}`);
      } catch (err) {
        log.error({ err }, `[ChannelManager] Error disconnecting ${id}`);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Private helpers
  // ─────────────────────────────────────────────────────────────────

  private async connectEntry(id: string, entry: ChannelEntry): Promise<void> {
    try {
      await entry.plugin.connect();
      log.info(`[ChannelManager] Connecting channel: ${id}`);
    } catch (err) {
      log.error({ err }, `[ChannelManager] Failed to connect ${id}`);
      entry.status = { ...entry.status, running: true, connected: false, lastError: errorMessage(err) };
      this.startReconnect(id);
    }
  }

  private handlePluginMessage(channelId: string, msg: IncomingMessage): void {
    const entry = this.channels.get(channelId);
    if (!entry) {
      log.warn(`[ChannelManager] Received message for unknown channel: ${channelId}`);
      return;
    }

    entry.status.lastMessageAt = new Date();
    if (this.messageHandler) {
      this.messageHandler(channelId, msg);
    }
  }

  private handlePluginCommunity(channelId: string, event: CommunityEvent): void {
    for (const handler of this.communityHandlers) {
      try {
        handler(channelId, event);
      } catch (err) {
        log.error({ err }, `[ChannelManager] Error handling ${event.type} from ${channelId}`);
      }
    }
  }

  private handlePluginStatus(channelId: string, newStatus: ChannelStatus): void {
    const entry = this.channels.get(channelId);
    if (!entry) {
      log.warn(`[ChannelManager] Status update for unknown channel: ${channelId}`);
      return;
    }

    // The manager owns the attempt counter
    entry.status = { ...newStatus, reconnectAttempts: entry.status.reconnectAttempts };

    for (const handler of this.statusChangeHandlers) {
      try {
        handler(channelId, { ...entry.status });
      } catch (err) {
        log.error({ err }, "[ChannelManager] Error in status change handler");
      }
    }

    if (newStatus.connected) {
      if (entry.reconnectTimer) {
        clearTimeout(entry.reconnectTimer);
        entry.reconnectTimer = null;
      }
      entry.status.reconnectAttempts = 0;
      log.info(`[ChannelManager] Channel ${channelId} connected`);
    } else if (newStatus.running) {
      // Dropped while it should be up
      this.startReconnect(channelId);
    }
  }

  /**
   * Schedule the next connect attempt with exponential backoff.
   */
  private startReconnect(channelId: string): void {
    const entry = this.channels.get(channelId);
    if (!entry || this.stopping) return;

    if (entry.reconnectTimer) {
      clearTimeout(entry.reconnectTimer);
      entry.reconnectTimer = null;
    }

    const policy = this.getReconnectPolicy(entry.config);
    const delay = computeBackoff(policy, entry.status.reconnectAttempts);

    if (delay === null) {
      log.error(`[ChannelManager] Max reconnect attempts reached for ${channelId}`);
      return;
    }

    entry.status.reconnectAttempts++;
    log.info(
      `[ChannelManager] Reconnecting ${channelId} in ${delay}ms (attempt ${entry.status.reconnectAttempts})`,
    );

    entry.reconnectTimer = setTimeout(() => {
      entry.reconnectTimer = null;
      void this.connectEntry(channelId, entry);
    }, delay);
  }

  private getReconnectPolicy(config: ChannelInstanceConfig): ReconnectPolicy {
    return { ...DEFAULT_BACKOFF, ...(config.reconnect ?? {}) };
  }
}
