/**
 * Brain Service
 *
 * Assembles the brain pipeline (bus, transport server with its message router,
 * bridge, broadcaster or mock cerebellum) from configuration and exposes it as plain functions
 * returning ServiceResult, the same way the other services do.
 *
 * Covers:
 *   createBrainPipeline   -> wire components from BrainConfig
 *   startBrainPipeline    -> bind ports, attach the bridge
 *   stopBrainPipeline     -> cancel live commands, close sockets
 *   issueCommand          -> send one command through the bridge
 *   syncPipelineState     -> merge brain/cerebellum state
 *   triggerEmergencyStop  -> stop a target immediately
 *   getPipelineStatus     -> stats from every component
 */

import { loadBrainConfig } from '@/lib/brain-config'
import type { BrainConfig } from '@/lib/brain-config'
import { BrainCerebellumBridge } from '@/lib/brain-pipeline/bridge'
import type { BridgeStats } from '@/lib/brain-pipeline/bridge'
import { CommandBroadcaster } from '@/lib/brain-pipeline/command-broadcaster'
import type { BroadcasterStats } from '@/lib/brain-pipeline/command-broadcaster'
import { describeError } from '@/lib/brain-pipeline/errors'
import { MessageBus } from '@/lib/brain-pipeline/message-bus'
import type { BusStats } from '@/lib/brain-pipeline/message-bus'
import { MockCerebellum } from '@/lib/brain-pipeline/mock-cerebellum'
import { PrioritySchema, StateSyncPayloadSchema } from '@/lib/brain-pipeline/protocol'
import { MessageRouter } from '@/lib/brain-pipeline/routing'
import type { RouterInfo } from '@/lib/brain-pipeline/routing'
import { BrainWebSocketServer } from '@/lib/brain-pipeline/transport-server'
import type { BrainServerStats } from '@/lib/brain-pipeline/transport-server'
import type {
  BridgeState,
  CommandDispatcher,
  CommandFeedback,
  CommandPriority,
  JsonObject,
} from '@/lib/brain-pipeline/types'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServiceResult<T> {
  data?: T
  error?: string
  status: number  // HTTP-like status code for the caller to use
}

export interface BrainPipeline {
  config: BrainConfig
  bus: MessageBus
  router: MessageRouter
  server: BrainWebSocketServer
  broadcaster: CommandBroadcaster
  mock: MockCerebellum | null
  dispatcher: CommandDispatcher
  bridge: BrainCerebellumBridge
  started: boolean
}

export interface StartOptions {
  /** Bind network ports. Without it the pipeline runs in-process only. */
  listen?: boolean
}

export interface IssueCommandParams {
  commandType: string
  parameters?: JsonObject
  priority?: string
  target?: string
  sourceAgent?: string
  timeoutMs?: number
  waitForCompletion?: boolean
}

export interface PipelineStatus {
  running: boolean
  mockMode: boolean
  bus: BusStats
  server: BrainServerStats
  routing: RouterInfo
  broadcaster: BroadcasterStats
  bridge: BridgeStats
  state: BridgeState
}

// Error code on a failed command -> status for the caller
const FAILURE_STATUS: Record<string, number> = {
  UNKNOWN_COMMAND_TYPE: 400,
  INVALID_PARAMETERS: 400,
  TIMEOUT: 504,
  UNREACHABLE: 503,
}

// ===========================================================================
// PUBLIC API
// ===========================================================================

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

/**
 * Wire up a pipeline. Nothing listens and nothing is subscribed until
 * startBrainPipeline() is called.
 */
export function createBrainPipeline(config: BrainConfig = loadBrainConfig()): BrainPipeline {
  const bus = new MessageBus({
    busId: 'brain',
    defaultTimeoutMs: config.bus.requestTimeoutMs,
    sweepIntervalMs: config.bus.sweepIntervalMs ?? undefined,
  })

  const router = new MessageRouter({
    defaultAgentId: config.routing.defaultAgent,
    bindings: config.routing.bindings,
  })

  const server = new BrainWebSocketServer({
    bus,
    router,
    host: config.server.host,
    port: config.server.port,
    heartbeatIntervalMs: config.server.heartbeatIntervalMs,
    heartbeatGraceMs: config.server.heartbeatGraceMs,
    handshakeTimeoutMs: config.server.handshakeTimeoutMs,
  })

  const broadcaster = new CommandBroadcaster({
    host: config.broadcaster.host,
    port: config.broadcaster.port,
    portFallbacks: config.broadcaster.portFallbacks,
    retryWindowMs: config.broadcaster.retryWindowMs,
    maxRetries: config.broadcaster.maxRetries,
    queueLimit: config.broadcaster.queueLimit,
  })

  // In mock mode the simulated executor drives feedback; monitors still see every frame
  const mock = config.bridge.mockMode
    ? new MockCerebellum({ stepDelayMs: config.bridge.mockStepDelayMs, mirror: broadcaster })
    : null
  const dispatcher: CommandDispatcher = mock ?? broadcaster

  const bridge = new BrainCerebellumBridge({
    bus,
    dispatcher,
    defaultTarget: config.bridge.defaultTarget,
    commandTimeoutMs: config.bridge.commandTimeoutMs,
  })

  return { config, bus, router, server, broadcaster, mock, dispatcher, bridge, started: false }
}

export async function startBrainPipeline(
  pipeline: BrainPipeline,
  options: StartOptions = {}
): Promise<ServiceResult<{ serverPort: number | null; broadcasterPort: number | null }>> {
  if (pipeline.started) {
    return { error: 'Brain pipeline is already running', status: 409 }
  }

  const listen = options.listen ?? true
  try {
    let serverPort: number | null = null
    let broadcasterPort: number | null = null
    if (listen) {
      serverPort = await pipeline.server.start()
      broadcasterPort = await pipeline.broadcaster.start()
    } else {
      pipeline.server.attach()
    }

    pipeline.bridge.start()
    pipeline.started = true
    console.log(`[BrainService] Pipeline started (${pipeline.mock ? 'mock cerebellum' : 'broadcaster'} dispatch)`)
    return { data: { serverPort, broadcasterPort }, status: 200 }
  } catch (error) {
    console.error('[BrainService] Failed to start pipeline:', error)
    await pipeline.server.stop()
    return { error: describeError(error), status: 500 }
  }
}

export async function stopBrainPipeline(pipeline: BrainPipeline): Promise<ServiceResult<{ stopped: boolean }>> {
  if (!pipeline.started) {
    return { data: { stopped: false }, status: 200 }
  }

  try {
    await pipeline.bridge.shutdown()
    pipeline.mock?.stop()
    await pipeline.server.stop()
    await pipeline.broadcaster.stop()
    pipeline.bus.shutdown()
    pipeline.started = false
    return { data: { stopped: true }, status: 200 }
  } catch (error) {
    console.error('[BrainService] Failed to stop pipeline:', error)
    return { error: describeError(error), status: 500 }
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

/**
 * Send a command through the bridge. With waitForCompletion the result is
 * the command's terminal state; otherwise it reports where the command sits
 * in the lifecycle right after dispatch.
 */
export async function issueCommand(
  pipeline: BrainPipeline,
  params: IssueCommandParams
): Promise<ServiceResult<{ result: CommandFeedback }>> {
  if (!pipeline.started) {
    return { error: 'Brain pipeline is not running', status: 503 }
  }
  if (!params.commandType || typeof params.commandType !== 'string') {
    return { error: 'commandType is required', status: 400 }
  }

  let priority: CommandPriority | undefined
  if (params.priority !== undefined) {
    const parsed = PrioritySchema.safeParse(params.priority)
    if (!parsed.success) {
      return { error: `Invalid priority: ${params.priority}`, status: 400 }
    }
    priority = parsed.data
  }

  try {
    const result = await pipeline.bridge.sendCommand({
      commandType: params.commandType,
      parameters: params.parameters,
      priority,
      target: params.target,
      sourceAgent: params.sourceAgent,
      timeoutMs: params.timeoutMs,
    }, {
      waitForCompletion: params.waitForCompletion,
      timeoutMs: params.timeoutMs,
    })

    if (result.status === 'CANCELLED') {
      return { data: { result }, error: 'Command was cancelled', status: 409 }
    }
    if (result.status === 'FAILED') {
      const code = result.error?.code ?? 'UNKNOWN'
      return { data: { result }, error: result.error?.message ?? 'Command failed', status: FAILURE_STATUS[code] ?? 500 }
    }
    return { data: { result }, status: 200 }
  } catch (error) {
    console.error('[BrainService] Failed to issue command:', error)
    return { error: describeError(error), status: 500 }
  }
}

export async function triggerEmergencyStop(
  pipeline: BrainPipeline,
  params: { target?: string; reason?: string } = {}
): Promise<ServiceResult<{ result: CommandFeedback }>> {
  if (!pipeline.started) {
    return { error: 'Brain pipeline is not running', status: 503 }
  }
  try {
    const result = await pipeline.bridge.emergencyStop(params.target, params.reason)
    return { data: { result }, status: 200 }
  } catch (error) {
    console.error('[BrainService] Emergency stop failed:', error)
    return { error: describeError(error), status: 500 }
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export function syncPipelineState(pipeline: BrainPipeline, payload: unknown): ServiceResult<{ state: BridgeState }> {
  const parsed = StateSyncPayloadSchema.safeParse(payload)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return { error: `Invalid state payload at ${issue?.path.join('.') || 'payload'}: ${issue?.message ?? 'unknown'}`, status: 400 }
  }
  if (!parsed.data.brain_state && !parsed.data.cerebellum_state) {
    return { error: 'brain_state or cerebellum_state is required', status: 400 }
  }

  const state = pipeline.bridge.syncState(parsed.data.brain_state, parsed.data.cerebellum_state)
  return { data: { state }, status: 200 }
}

export function getPipelineStatus(pipeline: BrainPipeline): ServiceResult<PipelineStatus> {
  return {
    data: {
      running: pipeline.started,
      mockMode: pipeline.mock !== null,
      bus: pipeline.bus.getStats(),
      server: pipeline.server.getStats(),
      routing: pipeline.router.getInfo(),
      broadcaster: pipeline.broadcaster.getStats(),
      bridge: pipeline.bridge.getStats(),
      state: pipeline.bridge.getSyncState(),
    },
    status: 200,
  }
}
