/**
 * Community Types
 *
 * Servers and members as the chat surface reports them, and what the
 * community store keeps about them.
 */

/** A server the bot is a member of */
export interface GuildInfo {
  id: string
  name: string
}

/** A member of a server, as reported by the chat surface */
export interface MemberInfo {
  guildId: string
  userId: string
  /** Server nickname, else the account's display name */
  displayName: string
  bot: boolean
}

export interface StoredMember extends MemberInfo {
  /** False once the member left the server; the count is kept */
  present: boolean
  messageCount: number
  joinedAt: Date
  lastMessageAt: Date | null
}

export interface LeaderboardEntry {
  /** 1-based */
  rank: number
  userId: string
  displayName: string
  messageCount: number
}

/** Membership changes reported by the chat surface */
export type CommunityEvent =
  | { type: 'guild-joined'; guild: GuildInfo; members: MemberInfo[] }
  | { type: 'guild-left'; guildId: string }
  | { type: 'member-joined'; member: MemberInfo }
  | { type: 'member-left'; guildId: string; userId: string }
