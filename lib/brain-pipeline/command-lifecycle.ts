/**
 * Command lifecycle: EXEC -> QUEUE -> NEXT -> DONE, with FAILED and
 * CANCELLED reachable from any non-terminal state.
 *
 * Records are immutable; every update replaces the record in the table, so a
 * record read before an update stays a consistent snapshot.
 */

import type {
  ActionStatus,
  BrainCommand,
  CerebellumAction,
  CommandLifecycleState,
  JsonObject,
} from './types'

export type TerminalState = 'DONE' | 'FAILED' | 'CANCELLED'

const FORWARD_RANK: Record<Exclude<CommandLifecycleState, 'FAILED' | 'CANCELLED'>, number> = {
  EXEC: 0,
  QUEUE: 1,
  NEXT: 2,
  DONE: 3,
}

export const LIFECYCLE_STATES: readonly CommandLifecycleState[] = ['EXEC', 'QUEUE', 'NEXT', 'DONE', 'FAILED', 'CANCELLED']

export function isTerminal(state: CommandLifecycleState): state is TerminalState {
  return state === 'DONE' || state === 'FAILED' || state === 'CANCELLED'
}

export function isLifecycleState(value: string): value is CommandLifecycleState {
  return LIFECYCLE_STATES.some(state => state === value)
}

/** Forward moves may skip states (QUEUE -> DONE); nothing moves backward or out of a terminal state */
export function canTransition(from: CommandLifecycleState, to: CommandLifecycleState): boolean {
  if (isTerminal(from)) return false
  if (to === 'FAILED' || to === 'CANCELLED') return true
  return FORWARD_RANK[to] > FORWARD_RANK[from]
}

/**
 * Decide a command's outcome from one snapshot of its action statuses.
 * Any failed, cancelled or timed-out action fails the command, even when
 * every other action completed.
 */
export function evaluateCompletion(
  actions: readonly CerebellumAction[],
  statuses: ReadonlyMap<string, ActionStatus>
): 'DONE' | 'FAILED' | null {
  if (actions.length === 0) return null

  let completed = 0
  for (const action of actions) {
    const status = statuses.get(action.actionId) ?? 'pending'
    if (status === 'failed' || status === 'cancelled' || status === 'timeout') return 'FAILED'
    if (status === 'completed') completed++
  }
  return completed === actions.length ? 'DONE' : null
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface LifecycleEntry {
  state: CommandLifecycleState
  at: string
}

export interface CommandRecord {
  readonly command: BrainCommand
  readonly actions: readonly CerebellumAction[]
  readonly state: CommandLifecycleState
  readonly actionStatuses: ReadonlyMap<string, ActionStatus>
  readonly history: readonly LifecycleEntry[]
  readonly updatedAt: string
  readonly detail?: Readonly<JsonObject>
  readonly error?: { code: string; message: string }
}

export interface TransitionExtra {
  detail?: JsonObject
  error?: { code: string; message: string }
}

export type TransitionResult =
  | { ok: true; previous: CommandLifecycleState; record: CommandRecord }
  | { ok: false; reason: 'unknown' | 'unchanged' | 'regression' | 'terminal'; record: CommandRecord | null }

export class CommandLifecycleTable {
  private records = new Map<string, CommandRecord>()
  private retainTerminal: number

  /** @param retainTerminal finished records kept for lookup before the oldest are pruned */
  constructor(retainTerminal = 500) {
    this.retainTerminal = retainTerminal
  }

  get size(): number {
    return this.records.size
  }

  has(commandId: string): boolean {
    return this.records.has(commandId)
  }

  get(commandId: string): CommandRecord | undefined {
    return this.records.get(commandId)
  }

  create(command: BrainCommand, actions: readonly CerebellumAction[]): CommandRecord {
    const now = new Date().toISOString()
    const record: CommandRecord = {
      command,
      actions,
      state: 'EXEC',
      actionStatuses: new Map<string, ActionStatus>(actions.map(action => [action.actionId, 'pending'])),
      history: [{ state: 'EXEC', at: now }],
      updatedAt: now,
    }
    this.records.set(command.commandId, Object.freeze(record))
    return record
  }

  transition(commandId: string, to: CommandLifecycleState, extra: TransitionExtra = {}): TransitionResult {
    const record = this.records.get(commandId)
    if (!record) return { ok: false, reason: 'unknown', record: null }
    if (record.state === to) return { ok: false, reason: 'unchanged', record }
    if (isTerminal(record.state)) return { ok: false, reason: 'terminal', record }
    if (!canTransition(record.state, to)) return { ok: false, reason: 'regression', record }

    const now = new Date().toISOString()
    const next: CommandRecord = {
      ...record,
      state: to,
      history: [...record.history, { state: to, at: now }],
      updatedAt: now,
      detail: extra.detail ? Object.freeze({ ...extra.detail }) : record.detail,
      error: extra.error ?? record.error,
    }
    this.records.set(commandId, Object.freeze(next))
    if (isTerminal(to)) this.prune()
    return { ok: true, previous: record.state, record: next }
  }

  /** Record action statuses; returns the updated record, or null for an unknown command */
  setActionStatus(commandId: string, actionIds: readonly string[], status: ActionStatus): CommandRecord | null {
    const record = this.records.get(commandId)
    if (!record) return null

    const statuses = new Map(record.actionStatuses)
    for (const actionId of actionIds) {
      statuses.set(actionId, status)
    }
    const next: CommandRecord = {
      ...record,
      actionStatuses: statuses,
      updatedAt: new Date().toISOString(),
    }
    this.records.set(commandId, Object.freeze(next))
    return next
  }

  list(filter?: (record: CommandRecord) => boolean): CommandRecord[] {
    const all = Array.from(this.records.values())
    return filter ? all.filter(filter) : all
  }

  active(): CommandRecord[] {
    return this.list(record => !isTerminal(record.state))
  }

  counts(): Record<CommandLifecycleState, number> {
    const counts: Record<CommandLifecycleState, number> = {
      EXEC: 0, QUEUE: 0, NEXT: 0, DONE: 0, FAILED: 0, CANCELLED: 0,
    }
    for (const record of this.records.values()) {
      counts[record.state]++
    }
    return counts
  }

  private prune(): void {
    const finished = this.list(record => isTerminal(record.state))
    const excess = finished.length - this.retainTerminal
    for (let i = 0; i < excess; i++) {
      this.records.delete(finished[i].command.commandId)
    }
  }
}
