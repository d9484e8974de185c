// Public API for consumption by other packages (bot, plugins)

export {
  loadConfig,
  parseConfig,
  findAgentDir,
  loadSourceCredentials,
} from './config.js'
export type {
  HeraldConfig,
  RemindersConfig,
  SourceConfig,
  BackoffConfig,
  Destination,
  SourceCredentials,
} from './config.js'

export { createLogger, rootLogger, loggerOptions } from './logger.js'
export type { Logger } from './logger.js'

export {
  HeraldError,
  SourceUnavailableError,
  SourceAuthError,
  SourceRateLimitedError,
  DeliveryFailedError,
  StoreTransactionError,
  ConfigError,
  isHeraldError,
  errorMessage,
} from './errors.js'
export type { HeraldErrorCode } from './errors.js'

// Reminder engine
export * from './reminders/index.js'

// Community
export * from './community/index.js'

// Alerts
export { AlertService } from './alerts/index.js'
export type { Alert, AlertSeverity, AlertStatus, AlertEvent, RaiseAlertInput } from './alerts/index.js'

// Channel types
export type {
  ChannelPlugin,
  PluginFactory,
  ChannelInstanceConfig,
  ChannelStatus,
  ChannelDisplayStatus,
  ChannelInfo,
  ReconnectPolicy,
  IncomingMessage,
  OutgoingMessage,
} from './channels/index.js'
export { initialStatus, toDisplayStatus } from './channels/index.js'

// Utilities
export { computeBackoff, DEFAULT_BACKOFF, Mutex, RateGate } from './utils/index.js'
export type { BackoffPolicy } from './utils/index.js'
