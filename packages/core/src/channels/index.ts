export { toDisplayStatus, initialStatus } from './types.js'

export type {
  ChannelDisplayStatus,
  ChannelStatus,
  ReconnectPolicy,
  IncomingMessage,
  OutgoingMessage,
  ChannelInstanceConfig,
  ChannelPlugin,
  PluginFactory,
  ChannelInfo,
} from './types.js'
