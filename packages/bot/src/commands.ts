/**
 * Chat Commands
 *
 * Text commands the bot answers in any channel it can read:
 *   !upcoming [n]      next n stored events (default 5, at most 20)
 *   !leaderboard [n]   top n members by message count (default 10, at most 25), servers only
 */

import type { CommunityStore, EventStore, IncomingMessage } from "@herald/core";
import { formatAbsolute, renderLeaderboard } from "@herald/core";

const DEFAULT_UPCOMING = 5;
const MAX_UPCOMING = 20;
const DEFAULT_LEADERBOARD = 10;
const MAX_LEADERBOARD = 25;

export interface CommandContext {
  store: EventStore;
  community: CommunityStore;
  timezone: string;
  locale: string;
  now?: () => Date;
}

/** Count argument clamped to [1, max]; missing or unparseable gives the default */
function parseCount(arg: string | undefined, fallback: number, max: number): number {
  const requested = arg ? Number.parseInt(arg, 10) : fallback;
  return Number.isNaN(requested) ? fallback : Math.min(Math.max(requested, 1), max);
}

/**
 * Reply text for a command message, or null when the message is not a command.
 */
export function handleCommand(msg: IncomingMessage, ctx: CommandContext): string | null {
  const [command, arg] = msg.content.trim().split(/\s+/);

  switch (command?.toLowerCase()) {
    case "!upcoming":
      return upcoming(parseCount(arg, DEFAULT_UPCOMING, MAX_UPCOMING), ctx);
    case "!leaderboard":
      return leaderboard(msg, parseCount(arg, DEFAULT_LEADERBOARD, MAX_LEADERBOARD), ctx);
    default:
      return null;
  }
}

function upcoming(limit: number, ctx: CommandContext): string {
  const now = ctx.now?.() ?? new Date();
  const events = ctx.store.listUpcoming(now, limit);
  if (events.length === 0) {
    return "📅 No upcoming events.";
  }

  const lines = events.map(
    (event) => `• **${event.title}** · ${formatAbsolute(event.startsAt, event.allDay, ctx.timezone, ctx.locale)}`,
  );
  return ["📅 Upcoming events:", ...lines].join("\n");
}

function leaderboard(msg: IncomingMessage, limit: number, ctx: CommandContext): string {
  if (!msg.guildId) {
    return "🏆 The leaderboard is only available in a server.";
  }

  const entries = ctx.community.leaderboard(msg.guildId, limit);
  const caller = ctx.community.rankOf(msg.guildId, msg.from);
  return renderLeaderboard(entries, caller);
}
