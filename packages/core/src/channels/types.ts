/**
 * Channel System — Type Definitions
 *
 * Core types for the chat-surface plugin interface, message routing,
 * and resilience configuration.
 */

import type { CommunityEvent } from '../community/types.js'

// ─────────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────────

/** Simple display status for the status API */
export type ChannelDisplayStatus = 'disconnected' | 'connecting' | 'connected' | 'error'

/** Rich status object emitted by plugins and tracked by manager */
export interface ChannelStatus {
  running: boolean
  connected: boolean
  reconnectAttempts: number
  lastConnectedAt: Date | null
  lastDisconnect: {
    at: Date
    error?: string
  } | null
  lastMessageAt: Date | null
  lastError: string | null
}

/** Convert rich status to display status */
export function toDisplayStatus(status: ChannelStatus): ChannelDisplayStatus {
  if (status.lastError && !status.connected) return 'error'
  if (status.connected) return 'connected'
  if (status.running && !status.connected) return 'connecting'
  return 'disconnected'
}

/** Create a fresh initial status */
export function initialStatus(): ChannelStatus {
  return {
    running: false,
    connected: false,
    reconnectAttempts: 0,
    lastConnectedAt: null,
    lastDisconnect: null,
    lastMessageAt: null,
    lastError: null,
  }
}

// ─────────────────────────────────────────────────────────────────
// Resilience Configuration
// ─────────────────────────────────────────────────────────────────

/** Exponential backoff reconnect policy */
export interface ReconnectPolicy {
  initialMs: number
  maxMs: number
  factor: number
  jitter: number
  maxAttempts: number
}

// ─────────────────────────────────────────────────────────────────
// Messages
// ─────────────────────────────────────────────────────────────────

/** Incoming message from the chat surface */
export interface IncomingMessage {
  /** Unique message ID (from the platform) */
  id: string
  /** Sender identity (platform user id) */
  from: string
  /** Message text content */
  content: string
  /** When the message was sent */
  timestamp: Date
  /** Channel instance ID */
  channelId: string
  /** Platform conversation the message was posted in (e.g. a Discord text channel) */
  conversationId: string
  /** Server the message belongs to, when any */
  guildId?: string
  /** Display name of the sender */
  senderName?: string
}

/** Outgoing message to the chat surface */
export interface OutgoingMessage {
  /** Message text content */
  content: string
  /** Message ID to reply to */
  replyTo?: string
}

// ─────────────────────────────────────────────────────────────────
// Plugin Interface
// ─────────────────────────────────────────────────────────────────

/** Configuration for a channel instance */
export interface ChannelInstanceConfig {
  /** Instance ID (e.g., "discord_main") */
  id: string
  /** Plugin name (e.g., "discord") */
  plugin: string
  /** Connect on startup, or only when asked */
  processing: 'immediate' | 'on_demand'
  /** Reconnect policy overrides */
  reconnect?: Partial<ReconnectPolicy>
  /** Plugin-specific config */
  [key: string]: unknown
}

/** Channel plugin interface — implemented by each chat surface */
export interface ChannelPlugin {
  /** Plugin name (e.g., "discord") */
  name: string
  /** Initialize plugin with instance config */
  init(config: ChannelInstanceConfig): Promise<void>
  /** Connect to the external service */
  connect(): Promise<void>
  /** Disconnect from the external service */
  disconnect(): Promise<void>
  /** Deliver a message; rejects when the surface did not accept it */
  send(to: string, message: OutgoingMessage): Promise<void>
  /** Register event handlers */
  on(event: 'message', handler: (msg: IncomingMessage) => void): void
  on(event: 'error', handler: (err: Error) => void): void
  on(event: 'status', handler: (status: ChannelStatus) => void): void
  /** Servers joined or left, members joining or leaving */
  on(event: 'community', handler: (event: CommunityEvent) => void): void
  /** Get current status */
  status(): ChannelStatus
  /** Optional active liveness check: true if the channel is healthy */
  healthCheck?(): Promise<boolean>
}

/** Factory function to create a plugin instance */
export type PluginFactory = (config: ChannelInstanceConfig) => ChannelPlugin

/** Channel info for the status API */
export interface ChannelInfo {
  id: string
  plugin: string
  status: ChannelDisplayStatus
  statusDetail: ChannelStatus
}
