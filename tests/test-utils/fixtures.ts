/**
 * Factory functions for test data used across brain pipeline tests.
 *
 * Each factory provides sensible defaults that can be overridden.
 * Counters keep IDs unique within a test run (reset in beforeEach if needed).
 */

import { vi } from 'vitest'
import { createMessage, encodeMessage } from '@/lib/brain-pipeline/protocol'
import type { MessageInit } from '@/lib/brain-pipeline/protocol'
import type {
  BrainCommand,
  BusMessage,
  CommandDispatcher,
  ConsumerFeedback,
  DispatchFrame,
  DispatchOptions,
  FeedbackListener,
} from '@/lib/brain-pipeline/types'

let counter = 0

/** Reset the internal counter (call in beforeEach) */
export function resetFixtureCounter() {
  counter = 0
}

/** Increment and return a unique counter value */
function nextId(): number {
  return ++counter
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export function makeCommand(overrides: Partial<BrainCommand> = {}): BrainCommand {
  const n = nextId()
  return {
    commandId: `cmd-${n}`,
    commandType: 'move_to',
    parameters: { target_position: { x: 1, y: 2, z: 0 } },
    priority: 'NORMAL',
    sourceAgent: 'planner',
    target: 'cerebellum',
    timeoutMs: 5_000,
    createdAt: '2026-01-01T00:00:00.000Z',
    metadata: {},
    ...overrides,
  }
}

export const MOVE_PARAMS = { target_position: { x: 1, y: 2, z: 0 } }

export const GRASP_PARAMS = {
  grasp_pose: { position: { x: 0.4, y: 0, z: 0.2 } },
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export function makeMessage(overrides: Partial<MessageInit> = {}): BusMessage {
  const n = nextId()
  return createMessage({
    id: `msg-${n}`,
    type: 'agent.message',
    source: 'tester',
    payload: { n },
    ...overrides,
  })
}

export function frameOf(init: MessageInit): string {
  return encodeMessage(createMessage(init))
}

export function connectFrame(agentId: string): string {
  return frameOf({ type: 'connect', source: agentId, payload: { agentId } })
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

/** CommandDispatcher that records frames and lets the test emit feedback */
export class RecordingDispatcher implements CommandDispatcher {
  frames: DispatchFrame[] = []
  options: DispatchOptions[] = []
  consumers = 1
  dispatch = vi.fn((frame: DispatchFrame, options: DispatchOptions = {}): number => {
    this.frames.push(frame)
    this.options.push(options)
    return this.consumers
  })
  withdraw = vi.fn((commandIds: readonly string[]): number => commandIds.length)
  private listeners = new Set<FeedbackListener>()

  onFeedback(listener: FeedbackListener): void {
    this.listeners.add(listener)
  }

  offFeedback(listener: FeedbackListener): void {
    this.listeners.delete(listener)
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  dispatchedIds(): string[] {
    return this.frames.map(frame => frame.command.commandId)
  }

  emit(feedback: ConsumerFeedback): void {
    for (const listener of this.listeners) listener(feedback)
  }
}
