/**
 * Command Broadcaster
 *
 * WebSocket fan-out from the bridge to downstream consumers: monitors that
 * only watch, and executors that run commands and acknowledge every frame.
 *
 * Each target has one active executor, the earliest registered executor that
 * serves it; when it goes away the next one in registration order takes over.
 * Only the active executor gets a command with `execute: true`. Everyone else
 * gets a copy with `execute: false` that is never acknowledged.
 *
 * Each consumer gets its own bounded outbound queue and at most one frame in
 * flight. A frame to an acknowledging consumer stays in flight until its
 * `ack` arrives, and is re-sent every retry window until the retry budget is
 * spent. An urgent frame goes ahead of the queue and takes the place of a
 * frame still waiting for its ack. Feedback is handed to feedback listeners
 * (the bridge) only when it comes from the executor the command went to.
 */

import { v4 as uuidv4 } from 'uuid'
import type WebSocket from 'ws'
import type { WebSocketServer } from 'ws'
import { z } from 'zod'
import { describeError } from './errors'
import { bindWebSocketServer, closeWebSocketServer, listenWithFallback } from './listen'
import { OutboundQueue } from './outbound-queue'
import { FeedbackStatusSchema } from './protocol'
import { wrapWebSocket } from './socket'
import type {
  CommandDispatcher,
  ConsumerFeedback,
  DispatchFrame,
  DispatchOptions,
  FeedbackListener,
  JsonObject,
  TransportSocket,
} from './types'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConsumerRole = 'monitor' | 'executor'

export interface BroadcasterOptions {
  host?: string
  port?: number
  portFallbacks?: number
  retryWindowMs?: number
  maxRetries?: number
  queueLimit?: number
}

export interface ConsumerInfo {
  connectionId: string
  consumerId: string
  role: ConsumerRole
  acknowledges: boolean
  targets: string[] | null            // null serves every target
  connectedAt: string
  queued: number
  inFlight: number | null             // seq of the frame awaiting ack
}

export interface OverflowInfo {
  consumerId: string
  droppedSeq: number
}

export interface BroadcasterEventMap {
  feedback: ConsumerFeedback
  'consumer.connected': ConsumerInfo
  'consumer.disconnected': ConsumerInfo
  overflow: OverflowInfo
}

type Listener<T> = (payload: T) => void
type ListenerMap = { [K in keyof BroadcasterEventMap]: Set<Listener<BroadcasterEventMap[K]>> }

export interface BroadcasterStats {
  running: boolean
  host: string
  port: number | null
  consumers: ConsumerInfo[]
  dispatched: number
  framesSent: number
  acked: number
  retried: number
  droppedOverflow: number
  droppedUnacked: number
  withdrawn: number
  feedbackReceived: number
  feedbackRejected: number
}

interface OutboundFrame {
  seq: number
  kind: 'command' | 'status' | 'control'
  body: string
  commandId: string | null
  requiresAck: boolean
  urgent: boolean
}

interface InFlight {
  frame: OutboundFrame
  retries: number
  timer: ReturnType<typeof setTimeout> | null
}

interface ConsumerConnection {
  connectionId: string
  consumerId: string
  role: ConsumerRole
  acknowledges: boolean
  targets: string[] | null
  registration: number | null         // executor registration order
  socket: TransportSocket
  connectedAt: string
  outbound: OutboundQueue<OutboundFrame>
  inFlight: InFlight | null
}

// ---------------------------------------------------------------------------
// Inbound frames
// ---------------------------------------------------------------------------

const ConsumerFrameSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('connect'),
    consumerId: z.string().min(1).optional(),
    role: z.enum(['monitor', 'executor']).optional(),
    acknowledges: z.boolean().optional(),
    targets: z.array(z.string().min(1)).min(1).optional(),
  }),
  z.object({
    type: z.literal('ack'),
    seq: z.number().int(),
  }),
  z.object({
    type: z.literal('feedback'),
    commandId: z.string().min(1),
    status: FeedbackStatusSchema,
    actionId: z.string().optional(),
    detail: z.record(z.unknown()).optional(),
  }),
])

type ConsumerFrame = z.infer<typeof ConsumerFrameSchema>

const TERMINAL_FEEDBACK = new Set(['DONE', 'FAILED', 'CANCELLED'])
const MAX_ASSIGNMENTS = 1024

// ---------------------------------------------------------------------------
// Broadcaster
// ---------------------------------------------------------------------------

export class CommandBroadcaster implements CommandDispatcher {
  private host: string
  private port: number
  private portFallbacks: number
  private retryWindowMs: number
  private maxRetries: number
  private queueLimit: number

  private consumers = new Map<string, ConsumerConnection>()   // connectionId -> consumer
  private assignments = new Map<string, string>()             // commandId -> executor connectionId
  private registrations = 0
  private listeners: ListenerMap = {
    feedback: new Set(),
    'consumer.connected': new Set(),
    'consumer.disconnected': new Set(),
    overflow: new Set(),
  }
  private server: WebSocketServer | null = null
  private boundPort: number | null = null
  private running = false
  private seq = 0
  private stats = {
    dispatched: 0,
    framesSent: 0,
    acked: 0,
    retried: 0,
    droppedOverflow: 0,
    droppedUnacked: 0,
    withdrawn: 0,
    feedbackReceived: 0,
    feedbackRejected: 0,
  }

  constructor(options: BroadcasterOptions = {}) {
    this.host = options.host ?? '0.0.0.0'
    this.port = options.port ?? 8766
    this.portFallbacks = options.portFallbacks ?? 3
    this.retryWindowMs = options.retryWindowMs ?? 2_000
    this.maxRetries = options.maxRetries ?? 3
    this.queueLimit = options.queueLimit ?? 256
  }

  get isRunning(): boolean {
    return this.running
  }

  get consumerCount(): number {
    return this.consumers.size
  }

  async start(): Promise<number> {
    if (this.server && this.boundPort !== null) return this.boundPort

    const bound = await listenWithFallback('Broadcaster', this.host, this.port, this.portFallbacks, bindWebSocketServer)
    this.server = bound.server
    this.boundPort = bound.port
    this.server.on('connection', (ws: WebSocket) => this.accept(wrapWebSocket(ws)))
    this.running = true

    console.log(`[Broadcaster] Listening on ws://${this.host}:${bound.port}`)
    return bound.port
  }

  async stop(): Promise<void> {
    this.running = false

    for (const consumer of Array.from(this.consumers.values())) {
      this.removeConsumer(consumer, 'broadcaster stopping')
      consumer.socket.close(1001, 'Broadcaster shutting down')
    }

    if (this.server) {
      const server = this.server
      this.server = null
      this.boundPort = null
      await closeWebSocketServer(server)
    }
    console.log('[Broadcaster] Stopped')
  }

  // -- Consumers -------------------------------------------------------------

  /** Register a consumer connection; everyone starts as a monitor */
  accept(socket: TransportSocket): string {
    const connectionId = uuidv4()
    const consumer: ConsumerConnection = {
      connectionId,
      consumerId: `consumer-${connectionId.substring(0, 8)}`,
      role: 'monitor',
      acknowledges: false,
      targets: null,
      registration: null,
      socket,
      connectedAt: new Date().toISOString(),
      outbound: new OutboundQueue<OutboundFrame>(this.queueLimit, dropped => this.reportOverflow(consumer, dropped)),
      inFlight: null,
    }
    this.consumers.set(connectionId, consumer)

    socket.onMessage(raw => this.handleFrame(consumer, raw))
    socket.onClose(code => this.removeConsumer(consumer, `closed (${code})`))

    this.enqueue(consumer, controlFrame({
      type: 'welcome',
      consumerId: consumer.consumerId,
      role: consumer.role,
      timestamp: new Date().toISOString(),
    }))

    console.log(`[Broadcaster] Consumer connected: ${consumer.consumerId}`)
    this.emit('consumer.connected', this.describe(consumer))
    return connectionId
  }

  private removeConsumer(consumer: ConsumerConnection, reason: string): void {
    if (this.consumers.get(consumer.connectionId) !== consumer) return
    this.consumers.delete(consumer.connectionId)

    if (consumer.inFlight?.timer) clearTimeout(consumer.inFlight.timer)
    const pending = consumer.outbound.clear().length + (consumer.inFlight ? 1 : 0)
    consumer.inFlight = null

    const orphaned = this.releaseAssignments(consumer)
    console.log(`[Broadcaster] Consumer disconnected: ${consumer.consumerId} (${reason}, ${pending} frame(s) discarded)`)
    if (orphaned > 0) {
      console.warn(`[Broadcaster] Executor ${consumer.consumerId} left with ${orphaned} command(s) assigned`)
    }
    this.emit('consumer.disconnected', this.describe(consumer))
  }

  private handleFrame(consumer: ConsumerConnection, raw: string): void {
    let frame: ConsumerFrame
    try {
      const result = ConsumerFrameSchema.safeParse(JSON.parse(raw))
      if (!result.success) {
        console.warn(`[Broadcaster] Ignoring invalid frame from ${consumer.consumerId}: ${result.error.issues[0]?.message ?? 'unknown'}`)
        return
      }
      frame = result.data
    } catch (err) {
      console.warn(`[Broadcaster] Ignoring non-JSON frame from ${consumer.consumerId}: ${describeError(err)}`)
      return
    }

    switch (frame.type) {
      case 'connect': {
        consumer.consumerId = frame.consumerId ?? consumer.consumerId
        consumer.role = frame.role ?? consumer.role
        consumer.acknowledges = frame.acknowledges ?? consumer.role === 'executor'
        consumer.targets = frame.targets ?? consumer.targets
        if (consumer.role !== 'executor') {
          this.releaseAssignments(consumer)
          consumer.registration = null
        } else if (consumer.registration === null) {
          consumer.registration = ++this.registrations
        }
        console.log(`[Broadcaster] Consumer ${consumer.consumerId} registered as ${consumer.role}${consumer.acknowledges ? ' (acknowledging)' : ''}`)
        this.enqueue(consumer, controlFrame({
          type: 'registered',
          consumerId: consumer.consumerId,
          role: consumer.role,
          acknowledges: consumer.acknowledges,
          targets: consumer.targets,
        }))
        return
      }
      case 'ack': {
        const inFlight = consumer.inFlight
        if (inFlight && inFlight.frame.seq === frame.seq) {
          if (inFlight.timer) clearTimeout(inFlight.timer)
          consumer.inFlight = null
          this.stats.acked++
          this.flush(consumer)
          return
        }
        // A frame set back in the queue by an urgent one may still be acked late
        const early = consumer.outbound.removeWhere(queued => queued.requiresAck && queued.seq === frame.seq)
        this.stats.acked += early.length
        return
      }
      case 'feedback': {
        this.stats.feedbackReceived++
        const assigned = this.assignments.get(frame.commandId)
        if (assigned !== consumer.connectionId) {
          this.stats.feedbackRejected++
          console.warn(`[Broadcaster] Ignoring ${frame.status} for ${frame.commandId} from ${consumer.consumerId}: not the executor it was sent to`)
          return
        }
        if (frame.actionId === undefined && TERMINAL_FEEDBACK.has(frame.status)) {
          this.assignments.delete(frame.commandId)
        }
        this.emit('feedback', {
          commandId: frame.commandId,
          status: frame.status,
          actionId: frame.actionId,
          detail: frame.detail,
          consumerId: consumer.consumerId,
        })
        return
      }
    }
  }

  // -- Dispatch --------------------------------------------------------------

  dispatch(frame: DispatchFrame, options: DispatchOptions = {}): number {
    const seq = ++this.seq
    const urgent = options.urgent ?? false
    const { commandId, target } = frame.command
    const executor = this.activeExecutor(target)
    const timestamp = new Date().toISOString()
    const bodyFor = (execute: boolean): string => JSON.stringify({
      type: 'brain_command',
      seq,
      urgent,
      execute,
      command: frame.command,
      actions: frame.actions,
      timestamp,
    })
    const executeBody = bodyFor(true)
    const copyBody = bodyFor(false)
    if (executor) this.assign(commandId, executor)

    let queued = 0
    for (const consumer of this.consumers.values()) {
      const executes = consumer === executor
      this.enqueue(consumer, {
        seq,
        kind: 'command',
        body: executes ? executeBody : copyBody,
        commandId,
        requiresAck: executes && consumer.acknowledges,
        urgent,
      })
      queued++
    }

    this.stats.dispatched++
    if (queued === 0) {
      console.warn(`[Broadcaster] No consumers connected for command ${commandId} (${frame.command.commandType})`)
    } else if (!executor) {
      console.warn(`[Broadcaster] No executor serves ${target}, command ${commandId} sent to monitors only`)
    }
    return queued
  }

  /**
   * Drop queued frames of these commands and stop waiting on any that are in
   * flight. Frames already handed to a socket cannot be called back.
   */
  withdraw(commandIds: readonly string[]): number {
    const ids = new Set(commandIds)
    if (ids.size === 0) return 0
    const matches = (frame: OutboundFrame): boolean => frame.commandId !== null && ids.has(frame.commandId)

    let withdrawn = 0
    for (const consumer of this.consumers.values()) {
      withdrawn += consumer.outbound.removeWhere(matches).length

      const inFlight = consumer.inFlight
      if (inFlight && inFlight.frame.requiresAck && matches(inFlight.frame)) {
        if (inFlight.timer) clearTimeout(inFlight.timer)
        consumer.inFlight = null
        withdrawn++
        this.flush(consumer)
      }
    }
    for (const id of ids) this.assignments.delete(id)

    this.stats.withdrawn += withdrawn
    if (withdrawn > 0) {
      console.log(`[Broadcaster] Withdrew ${withdrawn} frame(s) for ${ids.size} command(s)`)
    }
    return withdrawn
  }

  /** Push a status frame to every consumer; never acknowledged */
  broadcastStatus(status: JsonObject): number {
    const body = JSON.stringify({ type: 'status', status, timestamp: new Date().toISOString() })
    let queued = 0
    for (const consumer of this.consumers.values()) {
      this.enqueue(consumer, { seq: 0, kind: 'status', body, commandId: null, requiresAck: false, urgent: false })
      queued++
    }
    return queued
  }

  private enqueue(consumer: ConsumerConnection, frame: OutboundFrame): void {
    if (frame.urgent) {
      this.preempt(consumer)
      consumer.outbound.unshift(frame)
    } else {
      consumer.outbound.push(frame)
    }
    this.flush(consumer)
  }

  /** Put a frame still waiting for its ack back at the head of the queue */
  private preempt(consumer: ConsumerConnection): void {
    const inFlight = consumer.inFlight
    if (!inFlight || inFlight.frame.urgent || !inFlight.frame.requiresAck) return

    if (inFlight.timer) clearTimeout(inFlight.timer)
    consumer.inFlight = null
    consumer.outbound.unshift(inFlight.frame)
    console.log(`[Broadcaster] Urgent frame goes ahead of frame ${inFlight.frame.seq} for ${consumer.consumerId}`)
  }

  private flush(consumer: ConsumerConnection): void {
    if (consumer.inFlight || !this.consumers.has(consumer.connectionId)) return

    const frame = consumer.outbound.shift()
    if (!frame) return

    const awaitsAck = frame.requiresAck
    const inFlight: InFlight = { frame, retries: 0, timer: null }
    consumer.inFlight = inFlight

    if (awaitsAck) {
      this.transmit(consumer, frame)
      this.armRetry(consumer, inFlight)
      return
    }

    // Unacknowledged frames leave the in-flight slot once the socket takes them
    this.transmit(consumer, frame, () => {
      if (consumer.inFlight === inFlight) {
        consumer.inFlight = null
        this.flush(consumer)
      }
    })
  }

  private armRetry(consumer: ConsumerConnection, inFlight: InFlight): void {
    inFlight.timer = setTimeout(() => {
      if (consumer.inFlight !== inFlight) return

      if (inFlight.retries >= this.maxRetries) {
        console.warn(
          `[Broadcaster] Dropping frame ${inFlight.frame.seq} for ${consumer.consumerId}: no ack after ${inFlight.retries + 1} attempt(s)`
        )
        this.stats.droppedUnacked++
        consumer.inFlight = null
        this.flush(consumer)
        return
      }

      inFlight.retries++
      this.stats.retried++
      this.transmit(consumer, inFlight.frame)
      this.armRetry(consumer, inFlight)
    }, this.retryWindowMs)
    inFlight.timer.unref?.()
  }

  private transmit(consumer: ConsumerConnection, frame: OutboundFrame, onSettled?: () => void): void {
    if (!consumer.socket.isOpen) {
      console.warn(`[Broadcaster] Socket for ${consumer.consumerId} is not open, frame ${frame.seq} not sent`)
      onSettled?.()
      return
    }
    consumer.socket.send(frame.body)
      .then(() => { this.stats.framesSent++ })
      .catch(err => {
        console.error(`[Broadcaster] Failed to send frame ${frame.seq} to ${consumer.consumerId}: ${describeError(err)}`)
      })
      .finally(() => onSettled?.())
  }

  private reportOverflow(consumer: ConsumerConnection, dropped: OutboundFrame): void {
    this.stats.droppedOverflow++
    console.warn(
      `[Broadcaster] Outbound queue for ${consumer.consumerId} full (${this.queueLimit}), dropped oldest frame ${dropped.seq} (${dropped.kind})`
    )
    this.emit('overflow', { consumerId: consumer.consumerId, droppedSeq: dropped.seq })
  }

  // -- Executors -------------------------------------------------------------

  private activeExecutor(target: string): ConsumerConnection | null {
    let active: ConsumerConnection | null = null
    for (const consumer of this.consumers.values()) {
      if (consumer.role !== 'executor' || consumer.registration === null) continue
      if (consumer.targets && !consumer.targets.includes(target)) continue
      if (!active || active.registration === null || consumer.registration < active.registration) {
        active = consumer
      }
    }
    return active
  }

  private assign(commandId: string, executor: ConsumerConnection): void {
    this.assignments.delete(commandId)
    this.assignments.set(commandId, executor.connectionId)
    if (this.assignments.size > MAX_ASSIGNMENTS) {
      const oldest = this.assignments.keys().next()
      if (!oldest.done) this.assignments.delete(oldest.value)
    }
  }

  private releaseAssignments(consumer: ConsumerConnection): number {
    let released = 0
    for (const [commandId, connectionId] of this.assignments) {
      if (connectionId !== consumer.connectionId) continue
      this.assignments.delete(commandId)
      released++
    }
    return released
  }

  // -- Events ----------------------------------------------------------------

  on<K extends keyof BroadcasterEventMap>(event: K, listener: Listener<BroadcasterEventMap[K]>): void {
    this.listeners[event].add(listener)
  }

  off<K extends keyof BroadcasterEventMap>(event: K, listener: Listener<BroadcasterEventMap[K]>): void {
    this.listeners[event].delete(listener)
  }

  onFeedback(listener: FeedbackListener): void {
    this.on('feedback', listener)
  }

  offFeedback(listener: FeedbackListener): void {
    this.off('feedback', listener)
  }

  private emit<K extends keyof BroadcasterEventMap>(event: K, payload: BroadcasterEventMap[K]): void {
    for (const listener of this.listeners[event]) {
      try {
        listener(payload)
      } catch (err) {
        console.error(`[Broadcaster] Error in ${event} listener:`, err)
      }
    }
  }

  // -- Introspection ---------------------------------------------------------

  private describe(consumer: ConsumerConnection): ConsumerInfo {
    return {
      connectionId: consumer.connectionId,
      consumerId: consumer.consumerId,
      role: consumer.role,
      acknowledges: consumer.acknowledges,
      targets: consumer.targets,
      connectedAt: consumer.connectedAt,
      queued: consumer.outbound.length,
      inFlight: consumer.inFlight && consumer.inFlight.frame.kind === 'command' ? consumer.inFlight.frame.seq : null,
    }
  }

  /** consumerId of the executor that runs commands for this target */
  getActiveExecutor(target: string): string | null {
    return this.activeExecutor(target)?.consumerId ?? null
  }

  getConsumers(): ConsumerInfo[] {
    return Array.from(this.consumers.values()).map(consumer => this.describe(consumer))
  }

  getStats(): BroadcasterStats {
    return {
      running: this.running,
      host: this.host,
      port: this.boundPort,
      consumers: this.getConsumers(),
      ...this.stats,
    }
  }
}

function controlFrame(body: JsonObject): OutboundFrame {
  return { seq: 0, kind: 'control', body: JSON.stringify(body), commandId: null, requiresAck: false, urgent: false }
}
