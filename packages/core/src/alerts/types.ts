/**
 * Alert Types
 *
 * Operational alerts for problems that need a human, such as a calendar
 * credential the source no longer accepts.
 */

export type AlertSeverity = 'warning' | 'critical'

export type AlertStatus = 'active' | 'acknowledged' | 'resolved'

export interface Alert {
  id: string
  /** Groups repeats of the same problem, e.g. "source-auth" */
  kind: string
  message: string
  severity: AlertSeverity
  status: AlertStatus
  raisedAt: Date
  acknowledgedAt?: Date
  resolvedAt?: Date
}

export interface RaiseAlertInput {
  kind: string
  message: string
  severity?: AlertSeverity
}

export interface AlertEvent {
  type: 'alert:raised' | 'alert:acknowledged' | 'alert:resolved'
  alert: Alert
}
