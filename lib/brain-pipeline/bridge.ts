/**
 * Brain-Cerebellum Bridge
 *
 * Receives BrainCommands from the bus, translates them into action sequences
 * and hands them to a CommandDispatcher one command per target at a time.
 * Progress reported back by consumers drives each command through
 *
 *   EXEC -> QUEUE -> NEXT -> DONE   (FAILED / CANCELLED from any live state)
 *
 * Every lifecycle read-modify-write runs under one mutex, and completion is
 * decided from a single snapshot of the command's action statuses.
 */

import { v4 as uuidv4 } from 'uuid'
import { CommandLifecycleTable, evaluateCompletion, isLifecycleState, isTerminal } from './command-lifecycle'
import type { TransitionExtra } from './command-lifecycle'
import { CommandQueue } from './command-queue'
import type { TargetQueueSnapshot } from './command-queue'
import { createCommandTranslator } from './command-translator'
import type { CommandTranslator } from './command-translator'
import { describeError, isBrainPipelineError } from './errors'
import type { MessageBus } from './message-bus'
import { AsyncMutex } from './mutex'
import {
  BrainCommandPayloadSchema,
  FeedbackPayloadSchema,
  MESSAGE_TYPES,
  StateSyncPayloadSchema,
  createMessage,
} from './protocol'
import type {
  ActionStatus,
  BrainCommand,
  BridgeState,
  BusMessage,
  CerebellumAction,
  CommandDispatcher,
  CommandFeedback,
  CommandInput,
  CommandLifecycleState,
  ConsumerFeedback,
  JsonObject,
} from './types'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BridgeOptions {
  bus: MessageBus
  dispatcher: CommandDispatcher
  bridgeId?: string
  defaultTarget?: string
  commandTimeoutMs?: number
  translator?: CommandTranslator
  lifecycle?: CommandLifecycleTable
}

export interface SendCommandOptions {
  waitForCompletion?: boolean
  timeoutMs?: number
}

export interface BridgeStats {
  running: boolean
  bridgeId: string
  commands: Record<CommandLifecycleState, number>
  queues: TargetQueueSnapshot[]
  received: number
  dispatched: number
  rejected: number
  emergencyStops: number
  syncCount: number
  lastSync: string | null
}

const EMERGENCY_STOP = 'emergency_stop'

type Admission =
  | { admitted: true; completion: Promise<BusMessage> | null }
  | { admitted: false; feedback: CommandFeedback }

// ---------------------------------------------------------------------------
// Bridge
// ---------------------------------------------------------------------------

export class BrainCerebellumBridge {
  readonly bridgeId: string
  private bus: MessageBus
  private dispatcher: CommandDispatcher
  private defaultTarget: string
  private commandTimeoutMs: number
  private translator: CommandTranslator
  private lifecycle: CommandLifecycleTable
  private queue = new CommandQueue()
  private mutex = new AsyncMutex()
  private state: BridgeState = Object.freeze({ brain_state: {}, cerebellum_state: {}, sync_timestamp: null })
  private subscriptions: string[] = []
  private running = false
  private stats = { received: 0, dispatched: 0, rejected: 0, emergencyStops: 0, syncCount: 0 }

  private readonly feedbackListener = (feedback: ConsumerFeedback): void => {
    this.onFeedback(feedback.commandId, feedback.status, feedback.detail, feedback.actionId)
      .catch(err => {
        console.error(`[Bridge] Failed to apply feedback for ${feedback.commandId}: ${describeError(err)}`)
      })
  }

  constructor(options: BridgeOptions) {
    this.bus = options.bus
    this.dispatcher = options.dispatcher
    this.bridgeId = options.bridgeId ?? 'bridge'
    this.defaultTarget = options.defaultTarget ?? 'cerebellum'
    this.commandTimeoutMs = options.commandTimeoutMs ?? 30_000
    this.translator = options.translator ?? createCommandTranslator()
    this.lifecycle = options.lifecycle ?? new CommandLifecycleTable()
  }

  get isRunning(): boolean {
    return this.running
  }

  start(): void {
    if (this.running) return
    this.running = true

    this.subscriptions = [
      this.bus.subscribe(MESSAGE_TYPES.SYNC_COMMAND, message => this.handleCommandMessage(message), this.bridgeId),
      this.bus.subscribe(MESSAGE_TYPES.SYNC_FEEDBACK, message => this.handleFeedbackMessage(message), this.bridgeId),
      this.bus.subscribe(MESSAGE_TYPES.SYNC_STATE, message => this.handleStateMessage(message), this.bridgeId),
    ]
    this.dispatcher.onFeedback(this.feedbackListener)

    console.log(`[Bridge:${this.bridgeId}] Started (default target: ${this.defaultTarget})`)
  }

  /** Cancel every live command and detach from the bus and dispatcher */
  async shutdown(): Promise<void> {
    if (!this.running) return
    this.running = false

    const cancelled = await this.mutex.withLock(() => {
      const live = this.lifecycle.active()
      for (const record of live) {
        this.queue.remove(record.command.commandId)
        this.transition(record.command.commandId, 'CANCELLED', { detail: { reason: 'bridge shutdown' } })
      }
      this.dispatcher.withdraw(live.map(record => record.command.commandId))
      return live.length
    })

    for (const id of this.subscriptions) this.bus.unsubscribe(id)
    this.subscriptions = []
    this.dispatcher.offFeedback(this.feedbackListener)

    console.log(`[Bridge:${this.bridgeId}] Stopped (${cancelled} live command(s) cancelled)`)
  }

  // -- Commands --------------------------------------------------------------

  async sendCommand(input: CommandInput, options: SendCommandOptions = {}): Promise<CommandFeedback> {
    const command = this.buildCommand(input)
    this.stats.received++

    if (command.commandType === EMERGENCY_STOP) {
      const reason = command.parameters.reason
      return this.emergencyStop(command.target, typeof reason === 'string' ? reason : undefined, command)
    }

    let actions: CerebellumAction[]
    try {
      actions = this.translator.translate(command)
    } catch (err) {
      const code = isBrainPipelineError(err) ? err.code : 'HANDLER_ERROR'
      return this.mutex.withLock(() => {
        if (this.lifecycle.has(command.commandId)) return this.rejectDuplicate(command)
        this.stats.rejected++
        console.warn(`[Bridge:${this.bridgeId}] Rejected ${command.commandType} command ${command.commandId}: ${describeError(err)}`)
        this.lifecycle.create(command, [])
        this.transition(command.commandId, 'FAILED', { error: { code, message: describeError(err) } })
        return this.feedbackFor(command.commandId)
      })
    }

    const timeoutMs = options.timeoutMs ?? command.timeoutMs
    const admission = await this.mutex.withLock((): Admission => {
      if (this.lifecycle.has(command.commandId)) {
        return { admitted: false, feedback: this.rejectDuplicate(command) }
      }
      // Registered before the command can possibly finish
      const completion = options.waitForCompletion
        ? this.bus.awaitResponse(command.commandId, { target: command.target, timeoutMs })
        : null
      this.lifecycle.create(command, actions)
      this.queue.enqueue(command)
      this.transition(command.commandId, 'QUEUE')
      this.pump(command.target)
      return { admitted: true, completion }
    })

    if (!admission.admitted) return admission.feedback
    if (!admission.completion) return this.feedbackFor(command.commandId)

    try {
      await admission.completion
    } catch (err) {
      if (isBrainPipelineError(err, 'TIMEOUT') || isBrainPipelineError(err, 'UNREACHABLE')) {
        const error = { code: err.code, message: err.message }
        console.warn(`[Bridge:${this.bridgeId}] Command ${command.commandId} failed: ${err.message}`)
        await this.mutex.withLock(() => {
          if (this.transition(command.commandId, 'FAILED', { error }) === 'FAILED') {
            this.dispatcher.withdraw([command.commandId])
          }
        })
      } else if (!isBrainPipelineError(err, 'CANCELLED')) {
        throw err
      }
    }
    return this.feedbackFor(command.commandId)
  }

  /**
   * Apply progress reported by a consumer. Command-level statuses move the
   * lifecycle directly; action-level statuses update the action map and the
   * command finishes once the map says so.
   */
  onFeedback(
    commandId: string,
    status: CommandLifecycleState | ActionStatus,
    detail?: JsonObject,
    actionId?: string
  ): Promise<CommandLifecycleState | null> {
    return this.mutex.withLock(() => {
      const record = this.lifecycle.get(commandId)
      if (!record) {
        console.warn(`[Bridge:${this.bridgeId}] Feedback for unknown command ${commandId} (${status})`)
        return null
      }
      if (isTerminal(record.state)) return record.state

      // Only the dispatched command can make progress; failure is accepted from any live state
      const isActive = this.queue.active(record.command.target)?.commandId === commandId
      if (!isActive && status !== 'FAILED' && status !== 'CANCELLED') {
        console.warn(`[Bridge:${this.bridgeId}] Ignoring ${status} for ${commandId}: not the active command for ${record.command.target}`)
        return record.state
      }

      if (isLifecycleState(status)) {
        const extra: TransitionExtra = { detail }
        if (status === 'FAILED') {
          const message = detail?.error
          extra.error = { code: 'EXECUTION_FAILED', message: typeof message === 'string' ? message : 'Reported failed by consumer' }
        }
        return this.transition(commandId, status, extra)
      }

      const actionIds = actionId ? [actionId] : record.actions.map(action => action.actionId)
      if (actionId && !record.actions.some(action => action.actionId === actionId)) {
        console.warn(`[Bridge:${this.bridgeId}] Feedback for unknown action ${actionId} of ${commandId}`)
        return record.state
      }

      const updated = this.lifecycle.setActionStatus(commandId, actionIds, status)
      if (!updated) return record.state

      const verdict = evaluateCompletion(updated.actions, updated.actionStatuses)
      if (verdict === 'DONE') {
        return this.transition(commandId, 'DONE', { detail })
      }
      if (verdict === 'FAILED') {
        const failedAction = updated.actions.find(action => {
          const actionStatus = updated.actionStatuses.get(action.actionId)
          return actionStatus === 'failed' || actionStatus === 'cancelled' || actionStatus === 'timeout'
        })
        const failedStatus = failedAction ? updated.actionStatuses.get(failedAction.actionId) : status
        return this.transition(commandId, 'FAILED', {
          detail,
          error: {
            code: `ACTION_${String(failedStatus).toUpperCase()}`,
            message: `Action ${failedAction?.actionId ?? actionIds.join(', ')} ${String(failedStatus)}`,
          },
        })
      }
      return updated.state
    })
  }

  /**
   * Stop a target now: queued and active commands are cancelled and an
   * urgent stop frame goes out ahead of anything still waiting to be sent.
   */
  emergencyStop(target: string = this.defaultTarget, reason = 'emergency stop', existing?: BrainCommand): Promise<CommandFeedback> {
    const command = existing ?? this.buildCommand({
      commandType: EMERGENCY_STOP,
      priority: 'URGENT',
      target,
      sourceAgent: this.bridgeId,
    })
    const stopCommand: BrainCommand = Object.freeze({
      ...command,
      target,
      priority: 'URGENT',
      parameters: Object.freeze({ reason }),
    })

    return this.mutex.withLock(() => {
      if (existing && this.lifecycle.has(existing.commandId)) return this.rejectDuplicate(existing)

      const cancelled: string[] = []
      for (const queued of this.queue.drain(target)) {
        this.transition(queued.commandId, 'CANCELLED', { detail: { reason } })
        cancelled.push(queued.commandId)
      }
      const active = this.queue.active(target)
      if (active) {
        this.transition(active.commandId, 'CANCELLED', { detail: { reason } })
        cancelled.push(active.commandId)
      }

      // Frames of cancelled commands must not reach an executor after the stop
      this.dispatcher.withdraw(cancelled)

      const actions = this.translator.translate(stopCommand)
      this.lifecycle.create(stopCommand, actions)
      const delivered = this.dispatcher.dispatch({ command: stopCommand, actions }, { urgent: true })
      this.stats.emergencyStops++

      console.warn(
        `[Bridge:${this.bridgeId}] EMERGENCY STOP for ${target}: ${reason} (${cancelled.length} command(s) cancelled, delivered to ${delivered})`
      )
      this.transition(stopCommand.commandId, 'DONE', { detail: { cancelled, delivered, reason } })
      this.publish(createMessage({
        type: MESSAGE_TYPES.EVENT_LIFECYCLE,
        source: this.bridgeId,
        payload: { event: 'emergency_stop', target, reason, commandId: stopCommand.commandId, cancelled },
      }))

      return this.feedbackFor(stopCommand.commandId)
    })
  }

  // -- State sync ------------------------------------------------------------

  /** Replace the shared state; a side left undefined keeps its previous value */
  syncState(brainState?: JsonObject, cerebellumState?: JsonObject): BridgeState {
    const next: BridgeState = Object.freeze({
      brain_state: brainState ? Object.freeze({ ...brainState }) : this.state.brain_state,
      cerebellum_state: cerebellumState ? Object.freeze({ ...cerebellumState }) : this.state.cerebellum_state,
      sync_timestamp: new Date().toISOString(),
    })
    this.state = next
    this.stats.syncCount++

    this.publish(createMessage({
      type: MESSAGE_TYPES.EVENT_STATE,
      source: this.bridgeId,
      payload: { ...next },
    }))
    return next
  }

  getSyncState(): BridgeState {
    return this.state
  }

  // -- Queries ---------------------------------------------------------------

  getCommand(commandId: string): CommandFeedback | null {
    return this.lifecycle.has(commandId) ? this.feedbackFor(commandId) : null
  }

  getState(commandId: string): CommandLifecycleState | null {
    return this.lifecycle.get(commandId)?.state ?? null
  }

  getActionStatuses(commandId: string): ReadonlyMap<string, ActionStatus> | null {
    return this.lifecycle.get(commandId)?.actionStatuses ?? null
  }

  getStats(): BridgeStats {
    return {
      running: this.running,
      bridgeId: this.bridgeId,
      commands: this.lifecycle.counts(),
      queues: this.queue.snapshot(),
      ...this.stats,
      lastSync: this.state.sync_timestamp,
    }
  }

  // -- Bus handlers ----------------------------------------------------------

  private async handleCommandMessage(message: BusMessage): Promise<void> {
    const parsed = BrainCommandPayloadSchema.safeParse(message.payload)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      console.warn(`[Bridge:${this.bridgeId}] Invalid command from ${message.source}: ${issue?.message ?? 'unknown'}`)
      if (message.correlationId) {
        this.bus.respond(message, {
          commandId: typeof message.payload.commandId === 'string' ? message.payload.commandId : message.id,
          status: 'FAILED',
          success: false,
          error: { code: 'INVALID_PARAMETERS', message: `Invalid command payload at ${issue?.path.join('.') || 'payload'}: ${issue?.message ?? 'unknown'}` },
          timestamp: new Date().toISOString(),
        }, this.bridgeId)
      }
      return
    }

    const { sourceAgent, ...rest } = parsed.data
    const result = await this.sendCommand(
      { ...rest, sourceAgent: sourceAgent ?? message.source },
      { waitForCompletion: message.payload.waitForCompletion === true, timeoutMs: parsed.data.timeoutMs }
    )

    if (message.correlationId) {
      this.bus.respond(message, { ...result }, this.bridgeId)
    }
  }

  private async handleFeedbackMessage(message: BusMessage): Promise<void> {
    const parsed = FeedbackPayloadSchema.safeParse(message.payload)
    if (!parsed.success) {
      console.warn(`[Bridge:${this.bridgeId}] Invalid feedback from ${message.source}: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
      return
    }
    const { commandId, status, detail, actionId } = parsed.data
    await this.onFeedback(commandId, status, detail, actionId)
  }

  private handleStateMessage(message: BusMessage): void {
    const parsed = StateSyncPayloadSchema.safeParse(message.payload)
    if (!parsed.success) {
      console.warn(`[Bridge:${this.bridgeId}] Invalid state sync from ${message.source}: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
      return
    }
    this.syncState(parsed.data.brain_state, parsed.data.cerebellum_state)
  }

  // -- Internals (callers hold the mutex) ------------------------------------

  private buildCommand(input: CommandInput): BrainCommand {
    return Object.freeze({
      commandId: input.commandId ?? uuidv4(),
      commandType: input.commandType,
      parameters: Object.freeze({ ...(input.parameters ?? {}) }),
      priority: input.priority ?? 'NORMAL',
      sourceAgent: input.sourceAgent ?? this.bridgeId,
      target: input.target ?? this.defaultTarget,
      timeoutMs: input.timeoutMs ?? this.commandTimeoutMs,
      createdAt: new Date().toISOString(),
      metadata: Object.freeze({ ...(input.metadata ?? {}) }),
    })
  }

  /** Promote the next waiting command for a target, if its slot is free, and dispatch it */
  private pump(target: string): void {
    const next = this.queue.promote(target)
    if (!next) return

    const record = this.lifecycle.get(next.commandId)
    if (!record) {
      this.queue.release(target, next.commandId)
      return
    }
    this.transition(next.commandId, 'NEXT')

    try {
      const delivered = this.dispatcher.dispatch({ command: next, actions: record.actions })
      this.stats.dispatched++
      console.log(`[Bridge:${this.bridgeId}] Dispatched ${next.commandType} ${next.commandId} to ${target} (${delivered} consumer(s))`)
    } catch (err) {
      console.error(`[Bridge:${this.bridgeId}] Dispatch of ${next.commandId} failed: ${describeError(err)}`)
      this.transition(next.commandId, 'FAILED', { error: { code: 'HANDLER_ERROR', message: describeError(err) } })
    }
  }

  /**
   * Apply a lifecycle transition and its side effects. Returns the resulting
   * state (unchanged when the transition was rejected).
   */
  private transition(commandId: string, to: CommandLifecycleState, extra: TransitionExtra = {}): CommandLifecycleState | null {
    const result = this.lifecycle.transition(commandId, to, extra)
    if (!result.ok) {
      if (result.reason === 'regression') {
        console.warn(`[Bridge:${this.bridgeId}] Ignoring ${result.record?.state ?? '?'} -> ${to} for ${commandId}`)
      }
      return result.record?.state ?? null
    }

    const { record, previous } = result
    this.publish(createMessage({
      type: MESSAGE_TYPES.EVENT_COMMAND,
      source: this.bridgeId,
      payload: {
        commandId,
        commandType: record.command.commandType,
        target: record.command.target,
        previous,
        state: to,
      },
    }))

    if (isTerminal(to)) {
      const target = record.command.target
      const wasActive = this.queue.release(target, commandId)
      if (!wasActive) this.queue.remove(commandId)

      this.publish(createMessage({
        type: MESSAGE_TYPES.SYNC_RESULT,
        source: this.bridgeId,
        target: record.command.sourceAgent,
        correlationId: commandId,
        payload: { ...this.feedbackFor(commandId) },
      }))

      if (wasActive) this.pump(target)
    }

    return to
  }

  private rejectDuplicate(command: BrainCommand): CommandFeedback {
    this.stats.rejected++
    console.warn(`[Bridge:${this.bridgeId}] Rejected ${command.commandType} command ${command.commandId}: id already in use`)
    return {
      commandId: command.commandId,
      status: 'FAILED',
      success: false,
      error: { code: 'INVALID_PARAMETERS', message: `Command id ${command.commandId} is already in use` },
      timestamp: new Date().toISOString(),
    }
  }

  private feedbackFor(commandId: string): CommandFeedback {
    const record = this.lifecycle.get(commandId)
    if (!record) {
      return {
        commandId,
        status: 'FAILED',
        success: false,
        error: { code: 'UNKNOWN_COMMAND', message: `No record of command ${commandId}` },
        timestamp: new Date().toISOString(),
      }
    }

    const feedback: CommandFeedback = {
      commandId,
      status: record.state,
      success: record.state !== 'FAILED' && record.state !== 'CANCELLED',
      timestamp: record.updatedAt,
    }
    if (record.detail) feedback.detail = { ...record.detail }
    if (record.error) feedback.error = record.error
    return feedback
  }

  private publish(message: BusMessage): void {
    try {
      this.bus.publish(message)
    } catch (err) {
      console.warn(`[Bridge:${this.bridgeId}] Could not publish ${message.type}: ${describeError(err)}`)
    }
  }
}
