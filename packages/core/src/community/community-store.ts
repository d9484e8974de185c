/**
 * Community Store — Database Layer
 *
 * Servers the bot sits in, their members and per-member message counts.
 * Same SQLite file as the event store, own connection. Leaving a server
 * drops its members with it; a member who leaves keeps their count and
 * is hidden from the leaderboard until they rejoin.
 */

import Database from 'better-sqlite3'
import path from 'node:path'
import fs from 'node:fs'
import { StoreTransactionError, isHeraldError, errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import type { CommunityEvent, GuildInfo, LeaderboardEntry, MemberInfo, StoredMember } from './types.js'

const log = createLogger('CommunityStore')

interface MemberRow {
  guild_id: string
  user_id: string
  display_name: string
  bot: number
  present: number
  message_count: number
  joined_at: string
  last_message_at: string | null
}

/** Leaderboard order: most messages first, then by name, then by id */
const RANKED_BEFORE = `
  (message_count > @count
    OR (message_count = @count AND display_name COLLATE NOCASE < @name)
    OR (message_count = @count AND display_name COLLATE NOCASE = @name AND user_id < @user))`

export class CommunityStore {
  private db: Database.Database

  /**
   * @param dbPath - SQLite file path, or ":memory:"
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true })
    }

    this.db = new Database(dbPath)
    this.initialize()
  }

  private initialize(): void {
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('busy_timeout = 5000')
    this.db.pragma('foreign_keys = ON')

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS guilds (
        guild_id TEXT PRIMARY KEY,
        name TEXT NOT NULL DEFAULT '',
        joined_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS members (
        guild_id TEXT NOT NULL REFERENCES guilds(guild_id) ON DELETE CASCADE,
        user_id TEXT NOT NULL,
        display_name TEXT NOT NULL DEFAULT '',
        bot INTEGER NOT NULL DEFAULT 0,
        present INTEGER NOT NULL DEFAULT 1,
        message_count INTEGER NOT NULL DEFAULT 0,
        joined_at TEXT NOT NULL,
        last_message_at TEXT,
        PRIMARY KEY (guild_id, user_id)
      );
    `)

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_members_ranking
      ON members(guild_id, present, bot, message_count);
    `)
  }

  // ─────────────────────────────────────────────────────────────
  // Membership
  // ─────────────────────────────────────────────────────────────

  /**
   * Record a server. Returns true when it was not known; a known server
   * only has its name refreshed.
   */
  registerGuild(guild: GuildInfo, now: Date = new Date()): boolean {
    const info = this.db
      .prepare('INSERT OR IGNORE INTO guilds (guild_id, name, joined_at) VALUES (?, ?, ?)')
      .run(guild.id, guild.name, now.toISOString())
    if (info.changes === 0) {
      this.db.prepare('UPDATE guilds SET name = ? WHERE guild_id = ?').run(guild.name, guild.id)
      return false
    }
    return true
  }

  /** Forget a server and all of its members. Returns false when it was not known. */
  removeGuild(guildId: string): boolean {
    return this.db.prepare('DELETE FROM guilds WHERE guild_id = ?').run(guildId).changes > 0
  }

  /**
   * Record a member as present, keeping any count they already have.
   * Returns true when the member was not known. Registers the server
   * when needed.
   */
  registerMember(member: MemberInfo, now: Date = new Date()): boolean {
    this.ensureGuild(member.guildId, now)
    const existing = this.getMember(member.guildId, member.userId)

    if (existing) {
      this.db
        .prepare('UPDATE members SET display_name = ?, bot = ?, present = 1 WHERE guild_id = ? AND user_id = ?')
        .run(member.displayName, member.bot ? 1 : 0, member.guildId, member.userId)
      return false
    }

    this.db
      .prepare(
        `INSERT INTO members (guild_id, user_id, display_name, bot, present, message_count, joined_at)
        VALUES (?, ?, ?, ?, 1, 0, ?)`,
      )
      .run(member.guildId, member.userId, member.displayName, member.bot ? 1 : 0, now.toISOString())
    return true
  }

  /** Mark a member as gone. Returns false when they were not present. */
  markDeparted(guildId: string, userId: string): boolean {
    return (
      this.db
        .prepare('UPDATE members SET present = 0 WHERE guild_id = ? AND user_id = ? AND present = 1')
        .run(guildId, userId).changes > 0
    )
  }

  /**
   * Count one message for a member and return their new total. Unknown
   * members and servers are registered on the way.
   */
  recordMessage(guildId: string, userId: string, displayName: string, at: Date = new Date()): number {
    return this.transaction(() => {
      this.ensureGuild(guildId, at)
      const row = this.db
        .prepare<[string, string, string, string, string], { message_count: number }>(
          `INSERT INTO members (guild_id, user_id, display_name, bot, present, message_count, joined_at, last_message_at)
          VALUES (?, ?, ?, 0, 1, 1, ?, ?)
          ON CONFLICT (guild_id, user_id) DO UPDATE SET
            message_count = message_count + 1,
            display_name = excluded.display_name,
            present = 1,
            last_message_at = excluded.last_message_at
          RETURNING message_count`,
        )
        .get(guildId, userId, displayName, at.toISOString(), at.toISOString())
      if (!row) {
        throw new StoreTransactionError(`Message count for ${userId} in ${guildId} was not written`)
      }
      return row.message_count
    })
  }

  /**
   * Apply a membership change from the chat surface. Joining a server
   * is also how a server is resynced after a restart: members missing
   * from the list are marked departed.
   */
  apply(event: CommunityEvent, now: Date = new Date()): void {
    switch (event.type) {
      case 'guild-joined': {
        const { guild, members } = event
        const departed = this.transaction(() => {
          this.registerGuild(guild, now)
          const current = new Set<string>()
          for (const member of members) {
            current.add(member.userId)
            this.registerMember(member, now)
          }
          let gone = 0
          for (const userId of this.listPresentIds(guild.id)) {
            if (!current.has(userId) && this.markDeparted(guild.id, userId)) gone++
          }
          return gone
        })
        log.info(`[CommunityStore] Synced ${guild.name} (${guild.id}): ${members.length} members, ${departed} departed`)
        return
      }
      case 'guild-left':
        if (this.removeGuild(event.guildId)) {
          log.info(`[CommunityStore] Left ${event.guildId}, members removed`)
        }
        return
      case 'member-joined':
        this.registerMember(event.member, now)
        return
      case 'member-left':
        this.markDeparted(event.guildId, event.userId)
        return
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────

  getMember(guildId: string, userId: string): StoredMember | null {
    const row = this.db
      .prepare<[string, string], MemberRow>('SELECT * FROM members WHERE guild_id = ? AND user_id = ?')
      .get(guildId, userId)
    return row ? this.rowToMember(row) : null
  }

  /** Present, non-bot members of a server, most messages first */
  leaderboard(guildId: string, limit: number): LeaderboardEntry[] {
    const rows = this.db
      .prepare<[string, number], MemberRow>(
        `SELECT * FROM members WHERE guild_id = ? AND present = 1 AND bot = 0
        ORDER BY message_count DESC, display_name COLLATE NOCASE ASC, user_id ASC
        LIMIT ?`,
      )
      .all(guildId, limit)
    return rows.map((row, index) => ({
      rank: index + 1,
      userId: row.user_id,
      displayName: row.display_name,
      messageCount: row.message_count,
    }))
  }

  /** A member's place on the leaderboard, or null when they are not on it */
  rankOf(guildId: string, userId: string): LeaderboardEntry | null {
    const member = this.getMember(guildId, userId)
    if (!member || !member.present || member.bot) return null

    const row = this.db
      .prepare<[{ guild: string; count: number; name: string; user: string }], { n: number }>(
        `SELECT COUNT(*) AS n FROM members
        WHERE guild_id = @guild AND present = 1 AND bot = 0 AND ${RANKED_BEFORE}`,
      )
      .get({ guild: guildId, count: member.messageCount, name: member.displayName, user: userId })

    return {
      rank: (row?.n ?? 0) + 1,
      userId,
      displayName: member.displayName,
      messageCount: member.messageCount,
    }
  }

  guildCount(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM guilds').get()
    return row?.n ?? 0
  }

  /** Present members of a server, bots included */
  memberCount(guildId: string): number {
    const row = this.db
      .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM members WHERE guild_id = ? AND present = 1')
      .get(guildId)
    return row?.n ?? 0
  }

  close(): void {
    this.db.close()
  }

  // ─────────────────────────────────────────────────────────────

  private transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)()
    } catch (err) {
      if (err instanceof StoreTransactionError) throw err
      const message = isHeraldError(err) ? err.message : `Community store write failed: ${errorMessage(err)}`
      throw new StoreTransactionError(message, { cause: err })
    }
  }

  private ensureGuild(guildId: string, now: Date): void {
    this.db
      .prepare('INSERT OR IGNORE INTO guilds (guild_id, joined_at) VALUES (?, ?)')
      .run(guildId, now.toISOString())
  }

  private listPresentIds(guildId: string): string[] {
    return this.db
      .prepare<[string], { user_id: string }>('SELECT user_id FROM members WHERE guild_id = ? AND present = 1')
      .all(guildId)
      .map((row) => row.user_id)
  }

  private rowToMember(row: MemberRow): StoredMember {
    return {
      guildId: row.guild_id,
      userId: row.user_id,
      displayName: row.display_name,
      bot: row.bot === 1,
      present: row.present === 1,
      messageCount: row.message_count,
      joinedAt: new Date(row.joined_at),
      lastMessageAt: row.last_message_at ? new Date(row.last_message_at) : null,
    }
  }
}
