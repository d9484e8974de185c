export { computeBackoff, DEFAULT_BACKOFF } from './backoff.js'
export type { BackoffPolicy } from './backoff.js'
export { Mutex } from './mutex.js'
export { RateGate } from './rate-gate.js'
