export { SourceAdapter } from './adapter.js'
export type { SourceAdapterOptions } from './adapter.js'
export { IcsFeedProvider, parseRetryAfter } from './ics-provider.js'
export type { IcsProviderOptions } from './ics-provider.js'
export { CalDavProvider } from './caldav-provider.js'
export type { CalDavProviderOptions } from './caldav-provider.js'
export { normalizeIcs } from './normalize.js'
export type { NormalizeOptions } from './normalize.js'
export { classifySourceError } from './classify.js'
