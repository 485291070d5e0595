/**
 * Brain Pipeline - Shared Types
 *
 * Messages, commands and lifecycle states exchanged between the message bus,
 * the WebSocket transport, the bridge and the command broadcaster.
 */

export type JsonObject = Record<string, unknown>

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export interface BusMessage<P extends JsonObject = JsonObject> {
  readonly id: string
  readonly type: string
  readonly source: string
  readonly target: string | null
  readonly payload: P
  readonly timestamp: string          // ISO-8601
  readonly correlationId: string | null
}

export type MessageHandler = (message: BusMessage) => void | Promise<void>

export interface Subscription {
  id: string
  pattern: string                     // exact type, "prefix.*" or "*"
  handler: MessageHandler
  subscriberId: string
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export type CommandPriority = 'LOW' | 'NORMAL' | 'HIGH' | 'URGENT'

export type CommandLifecycleState = 'EXEC' | 'QUEUE' | 'NEXT' | 'DONE' | 'FAILED' | 'CANCELLED'

export type ActionStatus = 'pending' | 'executing' | 'completed' | 'failed' | 'cancelled' | 'timeout'

export interface BrainCommand {
  readonly commandId: string
  readonly commandType: string
  readonly parameters: Readonly<JsonObject>
  readonly priority: CommandPriority
  readonly sourceAgent: string
  readonly target: string             // execution target, e.g. "cerebellum"
  readonly timeoutMs: number
  readonly createdAt: string
  readonly metadata: Readonly<JsonObject>
}

export interface CommandInput {
  commandType: string
  parameters?: JsonObject
  priority?: CommandPriority
  sourceAgent?: string
  target?: string
  timeoutMs?: number
  commandId?: string
  metadata?: JsonObject
}

export interface CerebellumAction {
  readonly actionId: string
  readonly commandId: string
  readonly actionType: string
  readonly topic: string
  readonly payload: Readonly<JsonObject>
  readonly sequenceIndex: number
  readonly timeoutMs: number
}

export interface CommandFeedback {
  commandId: string
  status: CommandLifecycleState
  success: boolean
  detail?: JsonObject
  error?: { code: string; message: string }
  timestamp: string
}

/** Status report coming back from a downstream consumer */
export interface ConsumerFeedback {
  commandId: string
  status: CommandLifecycleState | ActionStatus
  actionId?: string
  detail?: JsonObject
  consumerId?: string
}

// ---------------------------------------------------------------------------
// Dispatch (bridge -> downstream consumers)
// ---------------------------------------------------------------------------

export interface DispatchFrame {
  command: BrainCommand
  actions: readonly CerebellumAction[]
}

export interface DispatchOptions {
  urgent?: boolean
}

export type FeedbackListener = (feedback: ConsumerFeedback) => void

/**
 * Anything the bridge can hand a dispatched command to.
 * Implemented by CommandBroadcaster and MockCerebellum.
 */
export interface CommandDispatcher {
  /** Returns how many consumers the frame was queued for */
  dispatch(frame: DispatchFrame, options?: DispatchOptions): number
  /** Drop anything still pending for these commands. Returns how many frames or runs were dropped. */
  withdraw(commandIds: readonly string[]): number
  onFeedback(listener: FeedbackListener): void
  offFeedback(listener: FeedbackListener): void
}

// ---------------------------------------------------------------------------
// State sync
// ---------------------------------------------------------------------------

export interface BridgeState {
  readonly brain_state: Readonly<JsonObject>
  readonly cerebellum_state: Readonly<JsonObject>
  readonly sync_timestamp: string | null
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/**
 * Minimal duplex socket the transports work against. Real connections are
 * `ws` sockets wrapped by wrapWebSocket(); tests use in-memory pairs.
 */
export interface TransportSocket {
  readonly isOpen: boolean
  send(frame: string): Promise<void>
  close(code?: number, reason?: string): void
  onMessage(listener: (raw: string) => void): void
  onClose(listener: (code: number, reason: string) => void): void
}

export interface AgentConnection {
  agentId: string
  clientId: string
  socket: TransportSocket
  connectedAt: string
  lastHeartbeat: string | number      // timestamp as last reported by the client
  lastFrameAt: number                 // server clock, last inbound frame
  subscriptions: Set<string>
}
