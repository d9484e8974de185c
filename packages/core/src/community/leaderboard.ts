import type { LeaderboardEntry } from './types.js'

/** "Name | School", "Name @ Place", "Name#1234": the part before the tag */
const NAME_PATTERN = /^([^|@]+)(@|\||#):?[^@#|]*/

/** Display name without the tag members append to it */
export function cleanDisplayName(name: string): string {
  const match = NAME_PATTERN.exec(name)
  const cleaned = match?.[1]?.trim() ?? ''
  return cleaned.length > 0 ? cleaned : name.trim()
}

function messages(count: number): string {
  return `${count} message${count === 1 ? '' : 's'}`
}

/**
 * Leaderboard text: the caller's own place first when they are on the
 * board, then one line per entry.
 */
export function renderLeaderboard(entries: LeaderboardEntry[], caller: LeaderboardEntry | null): string {
  if (entries.length === 0) {
    return '🏆 No messages counted yet.'
  }

  const lines = ['🏆 Top members by messages']
  if (caller) {
    lines.push(`→ ${caller.rank}. **${cleanDisplayName(caller.displayName)}** : ${messages(caller.messageCount)}`, '')
  }
  for (const entry of entries) {
    lines.push(`${entry.rank}. **${cleanDisplayName(entry.displayName)}** : ${messages(entry.messageCount)}`)
  }
  return lines.join('\n')
}
