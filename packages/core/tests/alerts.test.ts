import { describe, it, expect, vi } from 'vitest'

import { AlertService } from '../src/alerts/service.js'
import type { AlertEvent } from '../src/alerts/types.js'

describe('AlertService', () => {
  it('raises an alert and emits it', () => {
    const service = new AlertService()
    const onRaised = vi.fn<(event: AlertEvent) => void>()
    service.on('alert:raised', onRaised)

    const alert = service.raise({ kind: 'source-auth', message: 'Credentials rejected' })

    expect(alert).toMatchObject({ kind: 'source-auth', severity: 'critical', status: 'active' })
    expect(onRaised).toHaveBeenCalledWith({ type: 'alert:raised', alert })
    expect(service.list()).toEqual([alert])
  })

  it('keeps one open alert per kind', () => {
    const service = new AlertService()
    const onAlert = vi.fn<(event: AlertEvent) => void>()
    service.on('alert', onAlert)

    const first = service.raise({ kind: 'source-auth', message: 'first' })
    const second = service.raise({ kind: 'source-auth', message: 'second' })

    expect(second).toBe(first)
    expect(onAlert).toHaveBeenCalledTimes(1)
  })

  it('acknowledges active alerts only', () => {
    const service = new AlertService()
    const alert = service.raise({ kind: 'source-auth', message: 'Credentials rejected' })

    expect(service.acknowledge(alert.id)).toBe(true)
    expect(service.get(alert.id)?.status).toBe('acknowledged')
    expect(service.acknowledge(alert.id)).toBe(false)
    expect(service.acknowledge('missing')).toBe(false)
  })

  it('resolves by kind and allows a new alert afterwards', () => {
    const service = new AlertService()
    const alert = service.raise({ kind: 'source-auth', message: 'Credentials rejected' })

    expect(service.resolve('source-auth')).toBe(alert)
    expect(alert.status).toBe('resolved')
    expect(service.resolve('source-auth')).toBeNull()
    expect(service.list()).toEqual([])
    expect(service.list(true)).toEqual([alert])

    const next = service.raise({ kind: 'source-auth', message: 'Rejected again' })
    expect(next.id).not.toBe(alert.id)
  })

  it('evicts the oldest resolved alert when full', () => {
    const service = new AlertService({ maxAlerts: 2 })
    const old = service.raise({ kind: 'a', message: 'a' })
    service.resolve('a')
    service.raise({ kind: 'b', message: 'b' })

    service.raise({ kind: 'c', message: 'c' })

    expect(service.get(old.id)).toBeUndefined()
    expect(service.list(true).map((a) => a.kind).sort()).toEqual(['b', 'c'])
  })
})
