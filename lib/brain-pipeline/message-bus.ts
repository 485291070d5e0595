/**
 * Message Bus - pub/sub and correlated request/response between agents
 *
 * Delivery is synchronous fan-out in publish order. Request/response is built
 * on the same one-way publish: a pending entry keyed by correlationId waits
 * for the first message carrying that id, a timer, a cancellation or a
 * disconnect of its target, whichever comes first.
 *
 * Every pending entry is settled exactly once. Settlement removes the entry
 * and clears its timer in one synchronous step, so a late response and a
 * timeout that race each other cannot both win.
 */

import { v4 as uuidv4 } from 'uuid'
import {
  BrainPipelineError,
  cancelledError,
  describeError,
  timeoutError,
  unreachableError,
} from './errors'
import { MESSAGE_TYPES, createMessage, matchesPattern } from './protocol'
import type { BusMessage, JsonObject, MessageHandler, Subscription } from './types'

const DEFAULT_TIMEOUT_MS = 30_000
const MIN_SWEEP_INTERVAL_MS = 10
const MAX_SWEEP_INTERVAL_MS = 1_000

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MessageBusOptions {
  busId?: string
  defaultTimeoutMs?: number
  sweepIntervalMs?: number            // fixed sweep interval; computed from timeouts when omitted
}

export interface RequestOptions {
  timeoutMs?: number
  type?: string
  source?: string
  correlationId?: string
  signal?: AbortSignal
}

export interface AwaitOptions {
  target?: string | null
  timeoutMs?: number
  signal?: AbortSignal
}

export interface BusStats {
  running: boolean
  subscriptions: number
  pendingRequests: number
  published: number
  delivered: number
  handlerErrors: number
  resolved: number
  expired: number
  cancelled: number
}

interface PendingRequest {
  correlationId: string
  requestId: string | null            // id of the request message itself, never resolves its own entry
  target: string | null
  createdAt: number
  timeoutMs: number
  deadline: number
  timer: ReturnType<typeof setTimeout>
  resolve: (message: BusMessage) => void
  reject: (err: Error) => void
  detachSignal: (() => void) | null
}

type Outcome = { message: BusMessage } | { error: Error }

// ---------------------------------------------------------------------------
// MessageBus
// ---------------------------------------------------------------------------

export class MessageBus {
  readonly busId: string
  private defaultTimeoutMs: number
  private fixedSweepIntervalMs: number | null
  private subscriptions = new Map<string, Subscription>()
  private pending = new Map<string, PendingRequest>()
  private sweepTimer: ReturnType<typeof setInterval> | null = null
  private sweepIntervalMs = MAX_SWEEP_INTERVAL_MS
  private closed = false
  private stats = {
    published: 0,
    delivered: 0,
    handlerErrors: 0,
    resolved: 0,
    expired: 0,
    cancelled: 0,
  }

  constructor(options: MessageBusOptions = {}) {
    this.busId = options.busId ?? 'bus'
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fixedSweepIntervalMs = options.sweepIntervalMs ?? null
  }

  get isRunning(): boolean {
    return !this.closed
  }

  get pendingCount(): number {
    return this.pending.size
  }

  hasPending(correlationId: string): boolean {
    return this.pending.has(correlationId)
  }

  // -- Pub/sub ---------------------------------------------------------------

  subscribe(pattern: string, handler: MessageHandler, subscriberId = 'anonymous'): string {
    this.assertOpen('subscribe')
    const id = uuidv4()
    this.subscriptions.set(id, { id, pattern, handler, subscriberId })
    return id
  }

  unsubscribe(subscriptionId: string): boolean {
    return this.subscriptions.delete(subscriptionId)
  }

  publish(message: BusMessage): void {
    this.assertOpen('publish')
    this.stats.published++

    if (message.correlationId) {
      const entry = this.pending.get(message.correlationId)
      if (entry && entry.requestId !== message.id) {
        if (this.settle(message.correlationId, { message })) {
          this.stats.resolved++
        }
      }
    }

    if (message.type === MESSAGE_TYPES.AGENT_DISCONNECTED) {
      const agentId = message.payload.agentId
      if (typeof agentId === 'string') {
        this.failPendingForTarget(agentId, () => unreachableError(agentId))
      }
    }

    // Snapshot: handlers may subscribe or unsubscribe while we iterate
    const snapshot = Array.from(this.subscriptions.values())
    for (const subscription of snapshot) {
      if (!matchesPattern(subscription.pattern, message.type)) continue
      if (!this.subscriptions.has(subscription.id)) continue
      this.deliver(subscription, message)
    }
  }

  // -- Request/response ------------------------------------------------------

  async request(target: string, payload: JsonObject, options: RequestOptions = {}): Promise<BusMessage> {
    this.assertOpen('request')

    const correlationId = options.correlationId ?? uuidv4()
    const message = createMessage({
      type: options.type ?? MESSAGE_TYPES.AGENT_REQUEST,
      source: options.source ?? this.busId,
      target,
      payload,
      correlationId,
    })

    const response = this.register(correlationId, message.id, {
      target,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    })
    this.publish(message)
    return response
  }

  /**
   * Wait for the next message carrying `correlationId` without publishing
   * anything. The bridge uses this to wait for a command's terminal result.
   */
  async awaitResponse(correlationId: string, options: AwaitOptions = {}): Promise<BusMessage> {
    this.assertOpen('awaitResponse')
    return this.register(correlationId, null, options)
  }

  respond(original: BusMessage, payload: JsonObject, source?: string): BusMessage {
    const response = createMessage({
      type: MESSAGE_TYPES.AGENT_RESPONSE,
      source: source ?? original.target ?? this.busId,
      target: original.source,
      payload,
      correlationId: original.correlationId ?? original.id,
    })
    this.publish(response)
    return response
  }

  /** Cancel a pending request. No-op (false) when it already settled. */
  cancel(correlationId: string, reason = 'cancelled'): boolean {
    const cancelled = this.settle(correlationId, { error: cancelledError(correlationId, reason) })
    if (cancelled) this.stats.cancelled++
    return cancelled
  }

  /** Settle a pending request with a specific error. No-op (false) when it already settled. */
  failPending(correlationId: string, error: Error): boolean {
    return this.settle(correlationId, { error })
  }

  failPendingForTarget(target: string, makeError: () => Error = () => unreachableError(target)): number {
    let failed = 0
    for (const entry of Array.from(this.pending.values())) {
      if (entry.target !== target) continue
      if (this.settle(entry.correlationId, { error: makeError() })) failed++
    }
    if (failed > 0) {
      console.warn(`[MessageBus] Failed ${failed} pending request(s) for ${target}`)
    }
    return failed
  }

  failAllPending(makeError: (correlationId: string) => Error): number {
    let failed = 0
    for (const correlationId of Array.from(this.pending.keys())) {
      if (this.settle(correlationId, { error: makeError(correlationId) })) failed++
    }
    return failed
  }

  /** Expire every entry whose deadline has passed. Returns how many expired. */
  sweepExpired(now: number = Date.now()): number {
    let expired = 0
    for (const entry of Array.from(this.pending.values())) {
      if (entry.deadline > now) continue
      if (this.settle(entry.correlationId, { error: timeoutError(entry.correlationId, entry.timeoutMs) })) {
        expired++
      }
    }
    if (expired > 0) {
      this.stats.expired += expired
      console.warn(`[MessageBus] Sweep expired ${expired} pending request(s)`)
    }
    return expired
  }

  // -- Lifecycle -------------------------------------------------------------

  shutdown(): void {
    if (this.closed) return
    this.closed = true

    const cancelled = this.failAllPending(id => cancelledError(id, 'cancelled by bus shutdown'))
    this.stats.cancelled += cancelled
    this.subscriptions.clear()
    this.stopSweep()

    console.log(`[MessageBus:${this.busId}] Shut down (${cancelled} pending request(s) cancelled)`)
  }

  getStats(): BusStats {
    return {
      running: !this.closed,
      subscriptions: this.subscriptions.size,
      pendingRequests: this.pending.size,
      ...this.stats,
    }
  }

  // -- Internals -------------------------------------------------------------

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new BrainPipelineError('SHUTDOWN', `Message bus is shut down, refusing ${operation}`)
    }
  }

  private deliver(subscription: Subscription, message: BusMessage): void {
    try {
      const result = subscription.handler(message)
      if (result instanceof Promise) {
        result.catch(err => this.reportHandlerError(subscription, message, err))
      }
      this.stats.delivered++
    } catch (err) {
      this.reportHandlerError(subscription, message, err)
    }
  }

  private reportHandlerError(subscription: Subscription, message: BusMessage, err: unknown): void {
    this.stats.handlerErrors++
    console.error(
      `[MessageBus] Handler error in ${subscription.subscriberId} for ${message.type} (${message.id}): ${describeError(err)}`
    )
  }

  private register(
    correlationId: string,
    requestId: string | null,
    options: AwaitOptions
  ): Promise<BusMessage> {
    if (this.pending.has(correlationId)) {
      return Promise.reject(new BrainPipelineError(
        'DUPLICATE_CORRELATION',
        `Correlation id ${correlationId} already has a pending request`,
        { correlationId }
      ))
    }
    if (options.signal?.aborted) {
      this.stats.cancelled++
      return Promise.reject(cancelledError(correlationId, 'aborted before dispatch'))
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs
    const createdAt = Date.now()

    const promise = new Promise<BusMessage>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.settle(correlationId, { error: timeoutError(correlationId, timeoutMs) })) {
          this.stats.expired++
          console.warn(`[MessageBus] Request ${correlationId} to ${options.target ?? 'any'} timed out after ${timeoutMs}ms`)
        }
      }, timeoutMs)
      timer.unref?.()

      this.pending.set(correlationId, {
        correlationId,
        requestId,
        target: options.target ?? null,
        createdAt,
        timeoutMs,
        deadline: createdAt + timeoutMs,
        timer,
        resolve,
        reject,
        detachSignal: null,
      })
    })

    const signal = options.signal
    if (signal) {
      const onAbort = () => { this.cancel(correlationId, 'aborted') }
      signal.addEventListener('abort', onAbort, { once: true })
      const entry = this.pending.get(correlationId)
      if (entry) {
        entry.detachSignal = () => signal.removeEventListener('abort', onAbort)
      }
    }

    this.ensureSweep(timeoutMs)
    return promise
  }

  private settle(correlationId: string, outcome: Outcome): boolean {
    const entry = this.pending.get(correlationId)
    if (!entry) return false

    this.pending.delete(correlationId)
    clearTimeout(entry.timer)
    entry.detachSignal?.()

    if ('message' in outcome) {
      entry.resolve(outcome.message)
    } else {
      entry.reject(outcome.error)
    }

    if (this.pending.size === 0) {
      this.stopSweep()
    }
    return true
  }

  private ensureSweep(timeoutMs: number): void {
    const interval = this.fixedSweepIntervalMs ?? Math.min(
      MAX_SWEEP_INTERVAL_MS,
      Math.max(MIN_SWEEP_INTERVAL_MS, Math.floor(timeoutMs / 4))
    )

    if (this.sweepTimer && interval >= this.sweepIntervalMs) return

    this.stopSweep()
    this.sweepIntervalMs = interval
    this.sweepTimer = setInterval(() => this.sweepExpired(), interval)
    this.sweepTimer.unref?.()
  }

  private stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
    this.sweepIntervalMs = MAX_SWEEP_INTERVAL_MS
  }
}
