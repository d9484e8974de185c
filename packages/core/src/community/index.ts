/**
 * Community — Module Exports
 */

export { CommunityStore } from './community-store.js'
export { cleanDisplayName, renderLeaderboard } from './leaderboard.js'

export type { GuildInfo, MemberInfo, StoredMember, LeaderboardEntry, CommunityEvent } from './types.js'
