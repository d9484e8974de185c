import { EventEmitter } from "node:events";
import type {
  ChannelPlugin,
  ChannelInstanceConfig,
  ChannelStatus,
  CommunityEvent,
  IncomingMessage,
  OutgoingMessage,
} from "@herald/core";
import { initialStatus } from "@herald/core";

/**
 * In-process chat surface. Records what it is asked to send; used for
 * local runs without a Discord token and by the tests.
 */
export class MockChannelPlugin implements ChannelPlugin {
  name = "mock";

  private config: ChannelInstanceConfig | null = null;
  private _status: ChannelStatus;
  private events = new EventEmitter();

  /** Sent messages are captured here for testing */
  sentMessages: Array<{ to: string; message: OutgoingMessage }> = [];

  /** Number of upcoming send() calls that reject */
  failNextSends = 0;

  constructor() {
    this._status = initialStatus();
  }

  async init(config: ChannelInstanceConfig): Promise<void> {
    this.config = config;
  }

  async connect(): Promise<void> {
    this._status = {
      ...this._status,
      running: true,
      connected: true,
      lastConnectedAt: new Date(),
      lastError: null,
    };
    this.emitStatus();
  }

  async disconnect(): Promise<void> {
    this._status = {
      ...this._status,
      running: false,
      connected: false,
    };
    this.emitStatus();
  }

  async send(to: string, message: OutgoingMessage): Promise<void> {
    if (this.failNextSends > 0) {
      this.failNextSends--;
      throw new Error("Mock delivery failure");
    }
    this.sentMessages.push({ to, message });
  }

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

  status(): ChannelStatus {
    return { ...this._status };
  }

  async healthCheck(): Promise<boolean> {
    return this._status.connected;
  }

  // ── Test Methods ───────────────────────────────────────────────

  /** Simulate an incoming message, in a server when guildId is given */
  simulateIncoming(content: string, from = "user-1", guildId?: string): void {
    const msg: IncomingMessage = {
      id: `mock-${this.sentMessages.length}-${Date.now()}`,
      from,
      content,
      timestamp: new Date(),
      channelId: this.config?.id ?? "mock",
      conversationId: "mock-conversation",
      ...(guildId ? { guildId, senderName: `Mock ${from}` } : {}),
    };
    this._status.lastMessageAt = new Date();
    this.events.emit("message", msg);
  }

  /** Simulate a membership change */
  simulateCommunity(event: CommunityEvent): void {
    this.events.emit("community", event);
  }

  /** Simulate a dropped connection (the manager should reconnect) */
  simulateDisconnect(): void {
    this._status = {
      ...this._status,
      connected: false,
      lastDisconnect: { at: new Date(), error: "Simulated disconnect" },
    };
    this.emitStatus();
  }

  private emitStatus(): void {
    this.events.emit("status", { ...this._status });
  }
}
