import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { BrainCerebellumBridge } from '@/lib/brain-pipeline/bridge'
import { CommandBroadcaster } from '@/lib/brain-pipeline/command-broadcaster'
import { MessageBus } from '@/lib/brain-pipeline/message-bus'
import { MESSAGE_TYPES, createMessage } from '@/lib/brain-pipeline/protocol'
import type { BusMessage } from '@/lib/brain-pipeline/types'
import { FakeSocket, flushMicrotasks } from './test-utils/fake-socket'
import { GRASP_PARAMS, MOVE_PARAMS, RecordingDispatcher } from './test-utils/fixtures'

// ============================================================================
// Setup
// ============================================================================

let bus: MessageBus
let dispatcher: RecordingDispatcher
let bridge: BrainCerebellumBridge

function collect(type: string): BusMessage[] {
  const messages: BusMessage[] = []
  bus.subscribe(type, message => { messages.push(message) })
  return messages
}

function statesOf(events: BusMessage[], commandId: string): unknown[] {
  return events.filter(event => event.payload.commandId === commandId).map(event => event.payload.state)
}

beforeEach(() => {
  vi.useFakeTimers()
  vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'))
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
  bus = new MessageBus({ busId: 'brain' })
  dispatcher = new RecordingDispatcher()
  bridge = new BrainCerebellumBridge({ bus, dispatcher, commandTimeoutMs: 5_000 })
  bridge.start()
})

afterEach(async () => {
  await bridge.shutdown()
  bus.shutdown()
  vi.useRealTimers()
})

// ============================================================================
// Lifecycle
// ============================================================================

describe('command lifecycle', () => {
  it('takes move_to through EXEC, QUEUE, NEXT to DONE', async () => {
    const events = collect(MESSAGE_TYPES.EVENT_COMMAND)

    const pending = bridge.sendCommand(
      { commandId: 'move-1', commandType: 'move_to', parameters: MOVE_PARAMS },
      { waitForCompletion: true }
    )
    await flushMicrotasks()

    expect(dispatcher.dispatchedIds()).toEqual(['move-1'])
    expect(dispatcher.frames[0]?.actions.map(action => action.actionType)).toEqual(['nav2_navigate_to_pose'])
    expect(bridge.getState('move-1')).toBe('NEXT')

    dispatcher.emit({ commandId: 'move-1', status: 'EXEC' })
    dispatcher.emit({ commandId: 'move-1', status: 'QUEUE' })
    dispatcher.emit({ commandId: 'move-1', status: 'NEXT' })
    dispatcher.emit({ commandId: 'move-1', status: 'DONE', detail: { distance: 2.2 } })

    const result = await pending
    expect(result).toMatchObject({ commandId: 'move-1', status: 'DONE', success: true, detail: { distance: 2.2 } })
    expect(statesOf(events, 'move-1')).toEqual(['QUEUE', 'NEXT', 'DONE'])
  })

  it('reports where a command sits when not waiting', async () => {
    const result = await bridge.sendCommand({ commandId: 'g', commandType: 'grasp', parameters: GRASP_PARAMS })

    expect(result).toMatchObject({ commandId: 'g', status: 'NEXT', success: true })
  })

  it('finishes once every action completed', async () => {
    await bridge.sendCommand({ commandId: 'g', commandType: 'grasp', parameters: GRASP_PARAMS })

    for (const index of [0, 1, 2]) {
      dispatcher.emit({ commandId: 'g', actionId: `g:${index}`, status: 'completed' })
    }
    await flushMicrotasks()
    expect(bridge.getState('g')).toBe('NEXT')

    dispatcher.emit({ commandId: 'g', actionId: 'g:3', status: 'completed' })
    await flushMicrotasks()

    expect(bridge.getState('g')).toBe('DONE')
    expect(Array.from(bridge.getActionStatuses('g')?.values() ?? [])).toEqual([
      'completed', 'completed', 'completed', 'completed',
    ])
  })

  it('fails the command when any action fails, even after the others completed', async () => {
    await bridge.sendCommand({ commandId: 'g', commandType: 'grasp', parameters: GRASP_PARAMS })

    for (const index of [0, 1, 2]) {
      dispatcher.emit({ commandId: 'g', actionId: `g:${index}`, status: 'completed' })
    }
    dispatcher.emit({ commandId: 'g', actionId: 'g:3', status: 'failed', detail: { error: 'gripper jammed' } })
    dispatcher.emit({ commandId: 'g', actionId: 'g:3', status: 'completed' })
    await flushMicrotasks()

    expect(bridge.getCommand('g')).toMatchObject({
      status: 'FAILED',
      success: false,
      error: { code: 'ACTION_FAILED', message: 'Action g:3 failed' },
    })
  })

  it('names a timed-out action in the failure', async () => {
    await bridge.sendCommand({ commandId: 'g', commandType: 'grasp', parameters: GRASP_PARAMS })

    dispatcher.emit({ commandId: 'g', actionId: 'g:1', status: 'timeout' })
    await flushMicrotasks()

    expect(bridge.getCommand('g')?.error).toEqual({ code: 'ACTION_TIMEOUT', message: 'Action g:1 timeout' })
  })

  it('applies an action status without an action id to every action', async () => {
    await bridge.sendCommand({ commandId: 'g', commandType: 'grasp', parameters: GRASP_PARAMS })

    dispatcher.emit({ commandId: 'g', status: 'completed' })
    await flushMicrotasks()

    expect(bridge.getState('g')).toBe('DONE')
  })

  it('ignores feedback for an action the command does not have', async () => {
    await bridge.sendCommand({ commandId: 'g', commandType: 'grasp', parameters: GRASP_PARAMS })

    await expect(bridge.onFeedback('g', 'completed', undefined, 'g:9')).resolves.toBe('NEXT')
    expect(console.warn).toHaveBeenCalledWith('[Bridge:bridge] Feedback for unknown action g:9 of g')
  })

  it('ignores feedback for an unknown command', async () => {
    await expect(bridge.onFeedback('ghost', 'DONE')).resolves.toBeNull()
  })

  it('records a failure reported by the consumer', async () => {
    await bridge.sendCommand({ commandId: 's', commandType: 'stop' })

    dispatcher.emit({ commandId: 's', status: 'FAILED', detail: { error: 'motor fault' } })
    await flushMicrotasks()

    expect(bridge.getCommand('s')?.error).toEqual({ code: 'EXECUTION_FAILED', message: 'motor fault' })
  })

  it('fails a command whose dispatch throws', async () => {
    dispatcher.dispatch.mockImplementationOnce(() => { throw new Error('socket gone') })

    const result = await bridge.sendCommand({ commandId: 's', commandType: 'stop' })

    expect(result).toMatchObject({ status: 'FAILED', error: { code: 'HANDLER_ERROR', message: 'socket gone' } })
  })
})

// ============================================================================
// Rejection
// ============================================================================

describe('rejected commands', () => {
  it('fails an unknown command type without dispatching it', async () => {
    const events = collect(MESSAGE_TYPES.EVENT_COMMAND)

    const result = await bridge.sendCommand({ commandId: 'd', commandType: 'dance' })

    expect(result).toMatchObject({
      commandId: 'd',
      status: 'FAILED',
      success: false,
      error: { code: 'UNKNOWN_COMMAND_TYPE', message: 'Unknown command type: dance' },
    })
    expect(dispatcher.dispatch).not.toHaveBeenCalled()
    expect(events.map(event => [event.payload.previous, event.payload.state])).toEqual([['EXEC', 'FAILED']])
    expect(bridge.getStats().rejected).toBe(1)
  })

  it('fails invalid parameters', async () => {
    const result = await bridge.sendCommand({ commandId: 'm', commandType: 'move_to', parameters: {} })

    expect(result.error).toEqual({
      code: 'INVALID_PARAMETERS',
      message: 'Invalid parameters for move_to at target_position: Required',
    })
  })

  it('refuses a command id that is already in use', async () => {
    await bridge.sendCommand({ commandId: 'dup', commandType: 'stop' })

    const result = await bridge.sendCommand({ commandId: 'dup', commandType: 'stop' })

    expect(result).toMatchObject({
      status: 'FAILED',
      error: { code: 'INVALID_PARAMETERS', message: 'Command id dup is already in use' },
    })
    expect(dispatcher.dispatchedIds()).toEqual(['dup'])
  })

  it('admits only one of two commands sent at once with the same id', async () => {
    const [first, second] = await Promise.all([
      bridge.sendCommand({ commandId: 'dup', commandType: 'stop' }),
      bridge.sendCommand({ commandId: 'dup', commandType: 'stop', target: 'arm' }),
    ])

    expect(first).toMatchObject({ commandId: 'dup', status: 'NEXT', success: true })
    expect(second).toMatchObject({
      status: 'FAILED',
      error: { code: 'INVALID_PARAMETERS', message: 'Command id dup is already in use' },
    })
    expect(dispatcher.dispatchedIds()).toEqual(['dup'])
    expect(dispatcher.frames[0]?.command.target).toBe('cerebellum')
    expect(bridge.getStats().rejected).toBe(1)
  })
})

// ============================================================================
// Queueing
// ============================================================================

describe('queueing', () => {
  it('dispatches HIGH before LOW once the target frees up', async () => {
    await bridge.sendCommand({ commandId: 'first', commandType: 'stop' })
    await bridge.sendCommand({ commandId: 'low', commandType: 'stop', priority: 'LOW' })
    await bridge.sendCommand({ commandId: 'high', commandType: 'stop', priority: 'HIGH' })

    expect(bridge.getState('low')).toBe('QUEUE')
    expect(bridge.getState('high')).toBe('QUEUE')

    dispatcher.emit({ commandId: 'first', status: 'DONE' })
    await flushMicrotasks()
    expect(dispatcher.dispatchedIds()).toEqual(['first', 'high'])

    dispatcher.emit({ commandId: 'high', status: 'DONE' })
    await flushMicrotasks()
    expect(dispatcher.dispatchedIds()).toEqual(['first', 'high', 'low'])
  })

  it('runs one command per target at a time', async () => {
    await bridge.sendCommand({ commandId: 'c1', commandType: 'stop' })
    await bridge.sendCommand({ commandId: 'c2', commandType: 'stop' })
    await bridge.sendCommand({ commandId: 'arm-1', commandType: 'stop', target: 'arm' })

    expect(bridge.getState('c1')).toBe('NEXT')
    expect(bridge.getState('c2')).toBe('QUEUE')
    expect(bridge.getState('arm-1')).toBe('NEXT')
  })

  it('ignores NEXT for a command that is not active', async () => {
    await bridge.sendCommand({ commandId: 'c1', commandType: 'stop' })
    await bridge.sendCommand({ commandId: 'c2', commandType: 'stop' })

    await expect(bridge.onFeedback('c2', 'NEXT')).resolves.toBe('QUEUE')
  })

  it('ignores DONE for a command that was never dispatched', async () => {
    await bridge.sendCommand({ commandId: 'c1', commandType: 'stop' })
    await bridge.sendCommand({ commandId: 'c2', commandType: 'stop' })

    await expect(bridge.onFeedback('c2', 'DONE')).resolves.toBe('QUEUE')
    expect(console.warn).toHaveBeenCalledWith('[Bridge:bridge] Ignoring DONE for c2: not the active command for cerebellum')

    dispatcher.emit({ commandId: 'c1', status: 'DONE' })
    await flushMicrotasks()
    expect(dispatcher.dispatchedIds()).toEqual(['c1', 'c2'])
    expect(bridge.getState('c2')).toBe('NEXT')
  })

  it('accepts a failure for a command still waiting its turn', async () => {
    await bridge.sendCommand({ commandId: 'c1', commandType: 'stop' })
    await bridge.sendCommand({ commandId: 'c2', commandType: 'stop' })

    await expect(bridge.onFeedback('c2', 'FAILED')).resolves.toBe('FAILED')

    dispatcher.emit({ commandId: 'c1', status: 'DONE' })
    await flushMicrotasks()
    expect(dispatcher.dispatchedIds()).toEqual(['c1'])
  })

  it('fails a command that does not finish in time and moves on', async () => {
    const pending = bridge.sendCommand({ commandId: 'slow', commandType: 'stop' }, { waitForCompletion: true, timeoutMs: 1_000 })
    await bridge.sendCommand({ commandId: 'after', commandType: 'stop' })
    expect(bridge.getState('after')).toBe('QUEUE')

    await vi.advanceTimersByTimeAsync(1_000)

    await expect(pending).resolves.toMatchObject({
      commandId: 'slow',
      status: 'FAILED',
      success: false,
      error: { code: 'TIMEOUT', message: 'Request slow timed out after 1000ms' },
    })
    expect(bridge.getState('after')).toBe('NEXT')
    expect(dispatcher.dispatchedIds()).toEqual(['slow', 'after'])
    expect(dispatcher.withdraw).toHaveBeenCalledWith(['slow'])
    expect(bus.pendingCount).toBe(0)
  })

  it('fails a waiting command when its target disconnects', async () => {
    const pending = bridge.sendCommand({ commandId: 'u', commandType: 'stop' }, { waitForCompletion: true })
    await flushMicrotasks()

    bus.publish(createMessage({
      type: MESSAGE_TYPES.AGENT_DISCONNECTED,
      source: 'server',
      payload: { agentId: 'cerebellum' },
    }))

    await expect(pending).resolves.toMatchObject({
      status: 'FAILED',
      error: { code: 'UNREACHABLE', message: 'Agent cerebellum disconnected' },
    })
  })

  it('publishes the terminal result to the issuing agent', async () => {
    const results = collect(MESSAGE_TYPES.SYNC_RESULT)
    await bridge.sendCommand({ commandId: 'r1', commandType: 'stop', sourceAgent: 'planner' })

    dispatcher.emit({ commandId: 'r1', status: 'DONE' })
    await flushMicrotasks()

    expect(results).toHaveLength(1)
    expect(results[0]).toMatchObject({
      source: 'bridge',
      target: 'planner',
      correlationId: 'r1',
      payload: { commandId: 'r1', status: 'DONE', success: true },
    })
  })
})

// ============================================================================
// Emergency stop
// ============================================================================

describe('emergency stop', () => {
  it('cancels queued and active commands and dispatches nothing after the stop', async () => {
    const lifecycle = collect(MESSAGE_TYPES.EVENT_LIFECYCLE)
    const active = bridge.sendCommand(
      { commandId: 'a', commandType: 'move_to', parameters: MOVE_PARAMS },
      { waitForCompletion: true }
    )
    await bridge.sendCommand({ commandId: 'b', commandType: 'stop' })
    expect(bridge.getState('a')).toBe('NEXT')
    expect(bridge.getState('b')).toBe('QUEUE')

    const result = await bridge.emergencyStop('cerebellum', 'collision')

    expect(result).toMatchObject({
      status: 'DONE',
      success: true,
      detail: { cancelled: ['b', 'a'], delivered: 1, reason: 'collision' },
    })
    expect(bridge.getState('a')).toBe('CANCELLED')
    expect(bridge.getState('b')).toBe('CANCELLED')
    await expect(active).resolves.toMatchObject({ commandId: 'a', status: 'CANCELLED', success: false })

    expect(dispatcher.frames.map(frame => frame.command.commandType)).toEqual(['move_to', 'emergency_stop'])
    expect(dispatcher.options[1]).toEqual({ urgent: true })
    expect(dispatcher.withdraw).toHaveBeenCalledWith(['b', 'a'])
    expect(dispatcher.frames[1]?.command).toMatchObject({ priority: 'URGENT', parameters: { reason: 'collision' } })
    expect(lifecycle.map(message => message.payload)).toEqual([{
      event: 'emergency_stop',
      target: 'cerebellum',
      reason: 'collision',
      commandId: result.commandId,
      cancelled: ['b', 'a'],
    }])

    dispatcher.emit({ commandId: 'a', status: 'DONE' })
    await flushMicrotasks()
    expect(bridge.getState('a')).toBe('CANCELLED')
    expect(dispatcher.frames).toHaveLength(2)
  })

  it('runs when sent as an emergency_stop command', async () => {
    const result = await bridge.sendCommand({ commandId: 'halt', commandType: 'emergency_stop', parameters: { reason: 'operator' } })

    expect(result).toMatchObject({ commandId: 'halt', status: 'DONE', detail: { cancelled: [], reason: 'operator' } })
    expect(bridge.getStats().emergencyStops).toBe(1)
  })

  it('leaves other targets alone', async () => {
    await bridge.sendCommand({ commandId: 'arm-1', commandType: 'stop', target: 'arm' })

    await bridge.emergencyStop('cerebellum')

    expect(bridge.getState('arm-1')).toBe('NEXT')
  })
})

describe('emergency stop through the broadcaster', () => {
  let liveBus: MessageBus
  let broadcaster: CommandBroadcaster
  let liveBridge: BrainCerebellumBridge
  let executor: FakeSocket

  function sentCommandIds(): unknown[] {
    return executor.sentOfType('brain_command').map(frame => {
      const command = frame.command
      return typeof command === 'object' && command !== null && 'commandId' in command ? command.commandId : null
    })
  }

  beforeEach(async () => {
    liveBus = new MessageBus({ busId: 'live' })
    broadcaster = new CommandBroadcaster({ retryWindowMs: 2_000, maxRetries: 3 })
    liveBridge = new BrainCerebellumBridge({ bus: liveBus, dispatcher: broadcaster, bridgeId: 'live-bridge' })
    liveBridge.start()

    executor = new FakeSocket()
    broadcaster.accept(executor)
    executor.receive(JSON.stringify({ type: 'connect', consumerId: 'exec-1', role: 'executor' }))
    await flushMicrotasks()
  })

  afterEach(async () => {
    await liveBridge.shutdown()
    await broadcaster.stop()
    liveBus.shutdown()
  })

  it('never sends a cancelled command after the stop', async () => {
    await liveBridge.sendCommand({ commandId: 'arm-1', commandType: 'stop', target: 'arm' })
    await liveBridge.sendCommand({ commandId: 'cb-1', commandType: 'stop' })
    expect(sentCommandIds()).toEqual(['arm-1'])

    const result = await liveBridge.emergencyStop('cerebellum', 'bumper hit')

    expect(result.detail).toEqual({ cancelled: ['cb-1'], delivered: 1, reason: 'bumper hit' })
    expect(sentCommandIds()).toEqual(['arm-1', result.commandId])

    executor.receive(JSON.stringify({ type: 'ack', seq: 3 }))
    expect(sentCommandIds()).toEqual(['arm-1', result.commandId, 'arm-1'])
    expect(broadcaster.getStats().withdrawn).toBe(1)
  })

  it('stops re-sending a cancelled command that was waiting for its ack', async () => {
    await liveBridge.sendCommand({ commandId: 'cb-1', commandType: 'stop' })

    const result = await liveBridge.emergencyStop('cerebellum')
    executor.receive(JSON.stringify({ type: 'ack', seq: 2 }))
    vi.advanceTimersByTime(2_000)

    expect(sentCommandIds()).toEqual(['cb-1', result.commandId])
    expect(broadcaster.getStats().retried).toBe(0)
  })
})

// ============================================================================
// Bus integration
// ============================================================================

describe('bus messages', () => {
  it('answers sync.command requests', async () => {
    const response = await bus.request('bridge', { commandType: 'stop', commandId: 'bus-1' }, { type: MESSAGE_TYPES.SYNC_COMMAND })

    expect(response.payload).toMatchObject({ commandId: 'bus-1', status: 'NEXT', success: true })
    expect(dispatcher.frames[0]?.command.sourceAgent).toBe('brain')
  })

  it('waits for completion when the request asks for it', async () => {
    const response = bus.request(
      'bridge',
      { commandType: 'stop', commandId: 'bus-2', waitForCompletion: true },
      { type: MESSAGE_TYPES.SYNC_COMMAND }
    )
    await flushMicrotasks()
    expect(bus.hasPending('bus-2')).toBe(true)

    dispatcher.emit({ commandId: 'bus-2', status: 'DONE' })

    await expect(response).resolves.toMatchObject({ payload: { commandId: 'bus-2', status: 'DONE' } })
  })

  it('answers an invalid sync.command with a failure', async () => {
    const response = await bus.request('bridge', { parameters: {} }, { type: MESSAGE_TYPES.SYNC_COMMAND })

    expect(response.payload).toMatchObject({
      status: 'FAILED',
      success: false,
      error: { code: 'INVALID_PARAMETERS', message: 'Invalid command payload at commandType: Required' },
    })
  })

  it('applies sync.feedback messages', async () => {
    await bridge.sendCommand({ commandId: 'f1', commandType: 'stop' })

    bus.publish(createMessage({
      type: MESSAGE_TYPES.SYNC_FEEDBACK,
      source: 'cerebellum',
      payload: { commandId: 'f1', status: 'completed' },
    }))
    await flushMicrotasks()

    expect(bridge.getState('f1')).toBe('DONE')
  })

  it('merges sync.state messages and announces the new state', () => {
    const announced = collect(MESSAGE_TYPES.EVENT_STATE)

    bridge.syncState({ mode: 'explore' })
    bus.publish(createMessage({
      type: MESSAGE_TYPES.SYNC_STATE,
      source: 'cerebellum',
      payload: { cerebellum_state: { battery: 80 } },
    }))

    const state = bridge.getSyncState()
    expect(state).toEqual({
      brain_state: { mode: 'explore' },
      cerebellum_state: { battery: 80 },
      sync_timestamp: '2026-01-01T00:00:00.000Z',
    })
    expect(Object.isFrozen(state)).toBe(true)
    expect(announced).toHaveLength(2)
    expect(bridge.getStats()).toMatchObject({ syncCount: 2, lastSync: '2026-01-01T00:00:00.000Z' })
  })
})

// ============================================================================
// Shutdown
// ============================================================================

describe('shutdown', () => {
  it('cancels every live command and detaches from the dispatcher', async () => {
    await bridge.sendCommand({ commandId: 'a', commandType: 'stop' })
    await bridge.sendCommand({ commandId: 'b', commandType: 'stop' })

    await bridge.shutdown()

    expect(bridge.getCommand('a')).toMatchObject({ status: 'CANCELLED', detail: { reason: 'bridge shutdown' } })
    expect(bridge.getState('b')).toBe('CANCELLED')
    expect(dispatcher.dispatchedIds()).toEqual(['a'])
    expect(dispatcher.withdraw).toHaveBeenCalledWith(['a', 'b'])
    expect(dispatcher.listenerCount).toBe(0)
    expect(bridge.isRunning).toBe(false)
  })
})
