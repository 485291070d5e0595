/**
 * Mock Cerebellum
 *
 * Stands in for the motion side when no executor is attached. Each dispatched
 * command runs its actions in order: an action reports `executing`, then
 * `completed` one step later. Emergency stops abort whatever is running and
 * are answered straight away.
 */

import type {
  ActionStatus,
  CommandDispatcher,
  ConsumerFeedback,
  DispatchFrame,
  DispatchOptions,
  FeedbackListener,
  JsonObject,
} from './types'

export interface MockCerebellumOptions {
  stepDelayMs?: number
  /** Action types that report `failed` instead of `completed` */
  failActionTypes?: string[]
  /** Also hand every frame to this dispatcher (e.g. the broadcaster, for monitors) */
  mirror?: CommandDispatcher
}

export class MockCerebellum implements CommandDispatcher {
  private stepDelayMs: number
  private failActionTypes: Set<string>
  private mirror: CommandDispatcher | null
  private listeners = new Set<FeedbackListener>()
  private running = new Map<string, ReturnType<typeof setTimeout>>()   // commandId -> step timer
  private executed: string[] = []

  constructor(options: MockCerebellumOptions = {}) {
    this.stepDelayMs = options.stepDelayMs ?? 100
    this.failActionTypes = new Set(options.failActionTypes ?? [])
    this.mirror = options.mirror ?? null
  }

  get activeCount(): number {
    return this.running.size
  }

  /** Command ids in the order they were dispatched */
  getExecuted(): string[] {
    return [...this.executed]
  }

  dispatch(frame: DispatchFrame, options: DispatchOptions = {}): number {
    const mirrored = this.mirror?.dispatch(frame, options) ?? 0
    const { command, actions } = frame
    this.executed.push(command.commandId)

    if (command.commandType === 'emergency_stop') {
      const aborted = this.abortAll()
      console.log(`[MockCerebellum] Emergency stop (${aborted} running command(s) aborted)`)
      this.emit({ commandId: command.commandId, status: 'DONE', detail: { aborted } })
      return mirrored + 1
    }

    if (actions.length === 0) {
      this.emit({ commandId: command.commandId, status: 'DONE' })
      return mirrored + 1
    }

    this.runAction(frame, 0)
    return mirrored + 1
  }

  withdraw(commandIds: readonly string[]): number {
    let withdrawn = this.mirror?.withdraw(commandIds) ?? 0
    for (const commandId of commandIds) {
      const timer = this.running.get(commandId)
      if (!timer) continue
      clearTimeout(timer)
      this.running.delete(commandId)
      withdrawn++
    }
    return withdrawn
  }

  stop(): void {
    this.abortAll()
  }

  onFeedback(listener: FeedbackListener): void {
    this.listeners.add(listener)
  }

  offFeedback(listener: FeedbackListener): void {
    this.listeners.delete(listener)
  }

  private runAction(frame: DispatchFrame, index: number): void {
    const action = frame.actions[index]
    const commandId = frame.command.commandId
    this.reportAction(commandId, action.actionId, 'executing')

    const timer = setTimeout(() => {
      this.running.delete(commandId)

      if (this.failActionTypes.has(action.actionType)) {
        this.reportAction(commandId, action.actionId, 'failed', { error: `Simulated failure in ${action.actionType}` })
        return
      }
      this.reportAction(commandId, action.actionId, 'completed')

      if (index + 1 < frame.actions.length) {
        this.runAction(frame, index + 1)
      }
    }, this.stepDelayMs)
    timer.unref?.()
    this.running.set(commandId, timer)
  }

  private abortAll(): number {
    const aborted = this.running.size
    for (const timer of this.running.values()) {
      clearTimeout(timer)
    }
    this.running.clear()
    return aborted
  }

  private reportAction(commandId: string, actionId: string, status: ActionStatus, detail?: JsonObject): void {
    this.emit({ commandId, actionId, status, detail, consumerId: 'mock-cerebellum' })
  }

  private emit(feedback: ConsumerFeedback): void {
    for (const listener of this.listeners) {
      try {
        listener(feedback)
      } catch (err) {
        console.error('[MockCerebellum] Error in feedback listener:', err)
      }
    }
  }
}
