/**
 * Alert Service
 *
 * In-process alert registry. Keeps at most one open alert per kind,
 * emits events for the bot to forward to its alert channel.
 */

import { EventEmitter } from 'node:events'
import { randomUUID } from 'node:crypto'
import type { Alert, AlertEvent, RaiseAlertInput } from './types.js'

export interface AlertServiceConfig {
  /** Max alerts to keep in memory */
  maxAlerts?: number
}

export class AlertService extends EventEmitter {
  private alerts: Map<string, Alert> = new Map()
  private maxAlerts: number

  constructor(config: AlertServiceConfig = {}) {
    super()
    this.maxAlerts = config.maxAlerts ?? 200
  }

  /**
   * Raise an alert. While one of the same kind is still open, that one
   * is returned and nothing is emitted.
   */
  raise(input: RaiseAlertInput): Alert {
    const open = this.findOpen(input.kind)
    if (open) {
      return open
    }

    const alert: Alert = {
      id: randomUUID(),
      kind: input.kind,
      message: input.message,
      severity: input.severity ?? 'critical',
      status: 'active',
      raisedAt: new Date(),
    }

    this.addAlert(alert)
    this.emitEvent('alert:raised', alert)
    return alert
  }

  acknowledge(id: string): boolean {
    const alert = this.alerts.get(id)
    if (!alert || alert.status !== 'active') {
      return false
    }

    alert.status = 'acknowledged'
    alert.acknowledgedAt = new Date()
    this.emitEvent('alert:acknowledged', alert)
    return true
  }

  /**
   * Resolve the open alert of a kind. Returns it, or null when none was open.
   */
  resolve(kind: string): Alert | null {
    const alert = this.findOpen(kind)
    if (!alert) {
      return null
    }

    alert.status = 'resolved'
    alert.resolvedAt = new Date()
    this.emitEvent('alert:resolved', alert)
    return alert
  }

  get(id: string): Alert | undefined {
    return this.alerts.get(id)
  }

  /** Newest first; open alerts only unless `all` */
  list(all = false): Alert[] {
    return Array.from(this.alerts.values())
      .filter((a) => all || a.status !== 'resolved')
      .sort((a, b) => b.raisedAt.getTime() - a.raisedAt.getTime())
  }

  private findOpen(kind: string): Alert | undefined {
    for (const alert of this.alerts.values()) {
      if (alert.kind === kind && alert.status !== 'resolved') return alert
    }
    return undefined
  }

  private addAlert(alert: Alert): void {
    if (this.alerts.size >= this.maxAlerts) {
      const oldest = Array.from(this.alerts.values())
        .filter((a) => a.status === 'resolved')
        .sort((a, b) => a.raisedAt.getTime() - b.raisedAt.getTime())[0]

      if (oldest) {
        this.alerts.delete(oldest.id)
      }
    }

    this.alerts.set(alert.id, alert)
  }

  private emitEvent(type: AlertEvent['type'], alert: Alert): void {
    const event: AlertEvent = { type, alert }
    this.emit(type, event)
    this.emit('alert', event)
  }
}
