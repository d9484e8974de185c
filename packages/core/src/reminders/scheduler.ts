/**
 * Reminder Scheduler
 *
 * Drives the two periodic tasks of the reminder engine: reconciliation
 * against the source (coarse) and the due-notification scan (fine).
 * Each task re-arms a single-shot timer after it finishes, so a slow run
 * never overlaps with its successor.
 *
 * Per task: idle → running → idle on success, running → backoff on
 * failure. Every error is caught here and turned into a state change.
 */

import { SourceAuthError, SourceRateLimitedError, errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import { computeBackoff, type BackoffPolicy } from '../utils/backoff.js'
import type {
  ReconcileResult,
  ScanResult,
  SchedulerStatus,
  TaskName,
  TaskStatus,
} from './types.js'

const log = createLogger('Scheduler')

export interface SchedulerAlert {
  kind: 'source-auth'
  /** 'raised' once per sustained outage, 'cleared' on the next successful pass */
  state: 'raised' | 'cleared'
  message: string
  at: Date
}

export interface ReminderSchedulerOptions {
  reconciler: { reconcile(): Promise<ReconcileResult> }
  notifier: { scan(): Promise<ScanResult>; readonly deliveredCount: number }
  reconcileIntervalMs: number
  scanIntervalMs: number
  backoff: BackoffPolicy
  onAlert?: (alert: SchedulerAlert) => void
  now?: () => Date
}

interface TaskRuntime {
  status: TaskStatus
  timer: NodeJS.Timeout | null
  inFlight: Promise<unknown> | null
  nextDelayMs: number
}

export class ReminderScheduler {
  private reconciler: ReminderSchedulerOptions['reconciler']
  private notifier: ReminderSchedulerOptions['notifier']
  private backoff: BackoffPolicy
  private onAlert: (alert: SchedulerAlert) => void
  private now: () => Date
  private tasks: Record<TaskName, TaskRuntime>
  private running = false
  private authAlertActive = false
  private lastReconcile: SchedulerStatus['lastReconcile'] = null

  constructor(options: ReminderSchedulerOptions) {
    this.reconciler = options.reconciler
    this.notifier = options.notifier
    this.backoff = options.backoff
    this.onAlert = options.onAlert ?? (() => {})
    this.now = options.now ?? (() => new Date())
    this.tasks = {
      reconcile: createTask('reconcile', options.reconcileIntervalMs),
      scan: createTask('scan', options.scanIntervalMs),
    }
  }

  /**
   * Run both tasks once, reconciliation first, then keep them on their timers.
   */
  async start(): Promise<void> {
    if (this.running) {
      log.warn('[Scheduler] Already running')
      return
    }

    this.running = true
    log.info(
      `[Scheduler] Starting: reconcile every ${this.tasks.reconcile.status.intervalMs}ms, ` +
        `scan every ${this.tasks.scan.status.intervalMs}ms`,
    )

    await this.runReconciliation()
    if (!this.running) return
    await this.runNotificationScan()
  }

  /**
   * Clear both timers and wait for any in-flight run to finish or roll back.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return
    }

    this.running = false
    for (const task of Object.values(this.tasks)) {
      clearTaskTimer(task)
      task.status.nextRunAt = null
    }

    const inFlight = Object.values(this.tasks).flatMap((task) => (task.inFlight ? [task.inFlight] : []))
    await Promise.allSettled(inFlight)
    log.info('[Scheduler] Stopped')
  }

  /** Run a reconciliation pass now. Resolves null when it failed or one was already running. */
  runReconciliation(): Promise<ReconcileResult | null> {
    return this.runTask('reconcile', async () => {
      const result = await this.reconciler.reconcile()
      this.lastReconcile = {
        inserted: result.inserted,
        updated: result.updated,
        unchanged: result.unchanged,
        missing: result.missing,
        purged: result.purged.length,
        finishedAt: result.finishedAt.toISOString(),
      }
      return result
    })
  }

  /** Run a notification scan now. Resolves null when it failed or one was already running. */
  runNotificationScan(): Promise<ScanResult | null> {
    return this.runTask('scan', () => this.notifier.scan())
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.running,
      tasks: {
        reconcile: { ...this.tasks.reconcile.status },
        scan: { ...this.tasks.scan.status },
      },
      lastReconcile: this.lastReconcile ? { ...this.lastReconcile } : null,
      deliveredCount: this.notifier.deliveredCount,
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Task lifecycle
  // ─────────────────────────────────────────────────────────────────

  private async runTask<T>(name: TaskName, fn: () => Promise<T>): Promise<T | null> {
    const task = this.tasks[name]
    if (task.inFlight) {
      log.debug(`[Scheduler] ${name} already running, skipping`)
      return null
    }

    clearTaskTimer(task)
    const run = this.execute(name, fn)
    task.inFlight = run

    try {
      return await run
    } finally {
      task.inFlight = null
      this.scheduleNext(name)
    }
  }

  private async execute<T>(name: TaskName, fn: () => Promise<T>): Promise<T | null> {
    const status = this.tasks[name].status
    status.state = 'running'
    status.lastRunAt = this.now().toISOString()

    try {
      const result = await fn()
      this.handleSuccess(name)
      return result
    } catch (err) {
      this.handleFailure(name, err)
      return null
    }
  }

  private handleSuccess(name: TaskName): void {
    const task = this.tasks[name]
    const previousFailures = task.status.consecutiveFailures

    task.status.state = 'idle'
    task.status.consecutiveFailures = 0
    task.status.lastError = null
    task.status.lastSuccessAt = this.now().toISOString()
    task.nextDelayMs = task.status.intervalMs

    if (previousFailures > 0) {
      log.info(`[Scheduler] ${name} recovered after ${previousFailures} failed run(s)`)
    }

    if (name === 'reconcile' && this.authAlertActive) {
      this.authAlertActive = false
      this.emitAlert({
        kind: 'source-auth',
        state: 'cleared',
        message: 'Calendar source accepted credentials again',
        at: this.now(),
      })
    }
  }

  private handleFailure(name: TaskName, err: unknown): void {
    const task = this.tasks[name]
    const message = errorMessage(err)

    task.status.state = 'backoff'
    task.status.consecutiveFailures++
    task.status.lastError = message

    if (err instanceof SourceAuthError) {
      task.nextDelayMs = Math.max(task.status.intervalMs, this.backoff.maxMs)
      log.error(`[Scheduler] ${name} paused for ${task.nextDelayMs}ms: ${message}`)

      if (!this.authAlertActive) {
        this.authAlertActive = true
        this.emitAlert({
          kind: 'source-auth',
          state: 'raised',
          message: `Calendar source rejected credentials: ${message}`,
          at: this.now(),
        })
      }
      return
    }

    const backoffMs =
      computeBackoff(this.backoff, task.status.consecutiveFailures - 1) ?? this.backoff.maxMs
    const retryAfterMs = err instanceof SourceRateLimitedError ? (err.retryAfterMs ?? 0) : 0
    task.nextDelayMs = Math.max(task.status.intervalMs, backoffMs, retryAfterMs)

    log.warn(
      { err },
      `[Scheduler] ${name} failed (${task.status.consecutiveFailures} in a row), retrying in ${task.nextDelayMs}ms`,
    )
  }

  private scheduleNext(name: TaskName): void {
    const task = this.tasks[name]
    if (!this.running) {
      task.status.nextRunAt = null
      return
    }

    clearTaskTimer(task)
    task.status.nextRunAt = new Date(this.now().getTime() + task.nextDelayMs).toISOString()
    task.timer = setTimeout(() => {
      task.timer = null
      void (name === 'reconcile' ? this.runReconciliation() : this.runNotificationScan())
    }, task.nextDelayMs)
  }

  private emitAlert(alert: SchedulerAlert): void {
    try {
      this.onAlert(alert)
    } catch (err) {
      log.error({ err }, '[Scheduler] Alert handler threw')
    }
  }
}

function createTask(name: TaskName, intervalMs: number): TaskRuntime {
  return {
    status: {
      name,
      state: 'idle',
      intervalMs,
      consecutiveFailures: 0,
      lastRunAt: null,
      lastSuccessAt: null,
      nextRunAt: null,
      lastError: null,
    },
    timer: null,
    inFlight: null,
    nextDelayMs: intervalMs,
  }
}

function clearTaskTimer(task: TaskRuntime): void {
  if (task.timer) {
    clearTimeout(task.timer)
    task.timer = null
  }
}
