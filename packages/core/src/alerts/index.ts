export { AlertService } from './service.js'
export type { AlertServiceConfig } from './service.js'
export type { Alert, AlertSeverity, AlertStatus, AlertEvent, RaiseAlertInput } from './types.js'
