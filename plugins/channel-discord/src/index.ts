export {
  DiscordPlugin,
  createDiscordPlugin,
  resolveToken,
  fitToDiscord,
  toMemberInfo,
  DISCORD_MESSAGE_LIMIT,
} from "./plugin.js";
export type { MemberLike } from "./plugin.js";
