/**
 * Brain WebSocket Client
 *
 * Agent-side end of the brain transport. Inbound frames are published on a
 * local MessageBus so request/response correlation works the same way it
 * does on the server.
 */

import { v4 as uuidv4 } from 'uuid'
import { BrainPipelineError, describeError } from './errors'
import { MessageBus } from './message-bus'
import {
  CommandFeedbackSchema,
  MESSAGE_TYPES,
  createMessage,
  decodeMessage,
  encodeMessage,
} from './protocol'
import { openWebSocket } from './socket'
import type {
  BusMessage,
  CommandFeedback,
  CommandInput,
  JsonObject,
  MessageHandler,
  TransportSocket,
} from './types'

/** Close code the server uses for a connection it will never accept again */
export const PERMANENT_FAILURE_CODE = 4000

export type ClientStatus = 'disconnected' | 'connecting' | 'connected' | 'error'

export interface BrainClientOptions {
  agentId: string
  url?: string
  autoReconnect?: boolean
  reconnectDelayMs?: number
  maxReconnectAttempts?: number
  heartbeatIntervalMs?: number
  handshakeTimeoutMs?: number
  requestTimeoutMs?: number
  openSocket?: (url: string) => Promise<TransportSocket>
}

export interface ClientSendOptions {
  target?: string | null
  correlationId?: string | null
}

export interface ClientRequestOptions {
  type?: string
  timeoutMs?: number
}

export interface ClientCommandOptions {
  waitForCompletion?: boolean
  timeoutMs?: number
}

interface PendingHandshake {
  resolve: () => void
  reject: (err: Error) => void
  timer: ReturnType<typeof setTimeout>
}

export class BrainWebSocketClient {
  readonly agentId: string
  readonly bus: MessageBus
  private url: string
  private autoReconnect: boolean
  private reconnectDelayMs: number
  private maxReconnectAttempts: number
  private heartbeatIntervalMs: number
  private handshakeTimeoutMs: number
  private openSocket: (url: string) => Promise<TransportSocket>

  private socket: TransportSocket | null = null
  private status: ClientStatus = 'disconnected'
  private clientId: string | null = null
  private pendingHandshake: PendingHandshake | null = null
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null
  private reconnectAttempts = 0
  private manualDisconnect = false
  private lastServerHeartbeat: number | null = null
  private patterns: string[] = []
  private statusListeners = new Set<(status: ClientStatus) => void>()

  constructor(options: BrainClientOptions) {
    this.agentId = options.agentId
    this.url = options.url ?? 'ws://localhost:8765'
    this.autoReconnect = options.autoReconnect ?? true
    this.reconnectDelayMs = options.reconnectDelayMs ?? 3_000
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 5
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30_000
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 10_000
    this.openSocket = options.openSocket ?? openWebSocket
    this.bus = new MessageBus({ busId: options.agentId, defaultTimeoutMs: options.requestTimeoutMs })
  }

  get isConnected(): boolean {
    return this.status === 'connected'
  }

  getStatus(): ClientStatus {
    return this.status
  }

  getClientId(): string | null {
    return this.clientId
  }

  getLastServerHeartbeat(): number | null {
    return this.lastServerHeartbeat
  }

  onStatusChange(listener: (status: ClientStatus) => void): () => void {
    this.statusListeners.add(listener)
    return () => { this.statusListeners.delete(listener) }
  }

  // -- Connection ------------------------------------------------------------

  async connect(): Promise<void> {
    if (this.status === 'connected' || this.status === 'connecting') return
    this.manualDisconnect = false
    this.setStatus('connecting')

    let socket: TransportSocket
    try {
      socket = await this.openSocket(this.url)
    } catch (err) {
      this.setStatus('error')
      throw new BrainPipelineError('CONNECTION_LOST', `Could not connect to ${this.url}: ${describeError(err)}`)
    }

    this.socket = socket
    socket.onMessage(raw => {
      if (this.socket === socket) this.handleFrame(raw)
    })
    socket.onClose((code, reason) => {
      if (this.socket === socket) this.handleClose(code, reason)
    })

    const handshake = new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingHandshake = null
        reject(new BrainPipelineError('TIMEOUT', `Handshake with ${this.url} timed out after ${this.handshakeTimeoutMs}ms`))
      }, this.handshakeTimeoutMs)
      timer.unref?.()
      this.pendingHandshake = { resolve, reject, timer }
    })

    try {
      await Promise.all([
        this.transmit(createMessage({
          type: MESSAGE_TYPES.CONNECT,
          source: this.agentId,
          payload: { agentId: this.agentId },
        })),
        handshake,
      ])
    } catch (err) {
      if (this.pendingHandshake) {
        clearTimeout(this.pendingHandshake.timer)
        this.pendingHandshake = null
      }
      if (this.socket === socket) {
        this.socket = null
        socket.close(1000, 'Handshake failed')
      }
      this.setStatus('error')
      throw err
    }

    this.reconnectAttempts = 0
    this.setStatus('connected')
    this.startHeartbeat()
    if (this.patterns.length > 0) {
      this.sendControl(MESSAGE_TYPES.SUBSCRIBE, { patterns: this.patterns })
    }
    console.log(`[BrainClient:${this.agentId}] Connected to ${this.url} (client: ${this.clientId ?? 'unknown'})`)
  }

  disconnect(): void {
    this.manualDisconnect = true
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = null
    }
    this.stopHeartbeat()

    const socket = this.socket
    this.socket = null
    this.failPending('client disconnected')
    socket?.close(1000, 'Client disconnect')
    this.setStatus('disconnected')
  }

  // -- Messaging -------------------------------------------------------------

  async send(type: string, payload: JsonObject, options: ClientSendOptions = {}): Promise<BusMessage> {
    const message = createMessage({
      type,
      source: this.agentId,
      target: options.target ?? null,
      payload,
      correlationId: options.correlationId ?? null,
    })
    await this.transmit(message)
    return message
  }

  sendToAgent(agentId: string, payload: JsonObject): Promise<BusMessage> {
    return this.send(MESSAGE_TYPES.AGENT_MESSAGE, payload, { target: agentId })
  }

  broadcast(payload: JsonObject): Promise<BusMessage> {
    return this.send(MESSAGE_TYPES.AGENT_BROADCAST, payload)
  }

  async request(target: string, payload: JsonObject, options: ClientRequestOptions = {}): Promise<BusMessage> {
    const correlationId = uuidv4()
    // Register before transmitting so a fast response cannot be missed
    const response = this.bus.awaitResponse(correlationId, { target, timeoutMs: options.timeoutMs })

    const message = createMessage({
      type: options.type ?? MESSAGE_TYPES.AGENT_REQUEST,
      source: this.agentId,
      target,
      payload,
      correlationId,
    })

    try {
      await this.transmit(message)
    } catch (err) {
      this.bus.failPending(correlationId, err instanceof Error ? err : new Error(String(err)))
    }
    return response
  }

  respond(original: BusMessage, payload: JsonObject): Promise<BusMessage> {
    return this.send(MESSAGE_TYPES.AGENT_RESPONSE, payload, {
      target: original.source,
      correlationId: original.correlationId ?? original.id,
    })
  }

  /** Ask the server to forward messages matching these patterns */
  subscribe(patterns: string[]): void {
    this.patterns = Array.from(new Set(patterns))
    if (this.isConnected) {
      this.sendControl(MESSAGE_TYPES.SUBSCRIBE, { patterns: this.patterns })
    }
  }

  /** Handle inbound messages matching `pattern` */
  on(pattern: string, handler: MessageHandler): string {
    return this.bus.subscribe(pattern, handler, this.agentId)
  }

  off(subscriptionId: string): boolean {
    return this.bus.unsubscribe(subscriptionId)
  }

  async sendCommand(input: CommandInput, options: ClientCommandOptions = {}): Promise<CommandFeedback> {
    const response = await this.request('bridge', {
      ...input,
      sourceAgent: input.sourceAgent ?? this.agentId,
      waitForCompletion: options.waitForCompletion ?? false,
    }, {
      type: MESSAGE_TYPES.SYNC_COMMAND,
      timeoutMs: options.timeoutMs,
    })

    const parsed = CommandFeedbackSchema.safeParse(response.payload)
    if (!parsed.success) {
      throw new BrainPipelineError('MALFORMED_MESSAGE', `Bridge returned an invalid command result: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
    }
    return parsed.data
  }

  // -- Internals -------------------------------------------------------------

  private handleFrame(raw: string): void {
    let message: BusMessage
    try {
      message = decodeMessage(raw)
    } catch (err) {
      console.warn(`[BrainClient:${this.agentId}] Dropping malformed frame: ${describeError(err)}`)
      return
    }

    const handshake = this.pendingHandshake
    if (handshake) {
      if (message.type === MESSAGE_TYPES.CONNECT && message.payload.status === 'connected') {
        const clientId = message.payload.clientId
        this.clientId = typeof clientId === 'string' ? clientId : null
        clearTimeout(handshake.timer)
        this.pendingHandshake = null
        handshake.resolve()
      } else if (message.type === MESSAGE_TYPES.ERROR) {
        console.warn(`[BrainClient:${this.agentId}] Server error during handshake:`, message.payload.message)
      }
      return
    }

    switch (message.type) {
      case MESSAGE_TYPES.HEARTBEAT:
        this.lastServerHeartbeat = Date.now()
        return
      case MESSAGE_TYPES.ERROR:
        console.warn(`[BrainClient:${this.agentId}] Server error:`, message.payload.message)
        return
      case MESSAGE_TYPES.CONNECT:
        return
      default:
        try {
          this.bus.publish(message)
        } catch (err) {
          console.warn(`[BrainClient:${this.agentId}] Could not deliver ${message.type}: ${describeError(err)}`)
        }
    }
  }

  private handleClose(code: number, reason: string): void {
    this.socket = null
    this.stopHeartbeat()

    const handshake = this.pendingHandshake
    if (handshake) {
      clearTimeout(handshake.timer)
      this.pendingHandshake = null
      handshake.reject(new BrainPipelineError('CONNECTION_LOST', `Connection closed during handshake (${code})`))
    }

    const label = reason ? `${code}: ${reason}` : String(code)
    this.failPending(`connection closed (${label})`)
    try {
      this.bus.publish(createMessage({
        type: MESSAGE_TYPES.AGENT_DISCONNECTED,
        source: this.agentId,
        payload: { agentId: this.agentId, reason: label },
      }))
    } catch (err) {
      console.warn(`[BrainClient:${this.agentId}] Could not publish disconnect: ${describeError(err)}`)
    }

    if (this.manualDisconnect) {
      this.setStatus('disconnected')
      return
    }

    if (code === PERMANENT_FAILURE_CODE) {
      console.error(`[BrainClient:${this.agentId}] Server rejected connection permanently (${label})`)
      this.setStatus('error')
      return
    }

    console.warn(`[BrainClient:${this.agentId}] Connection lost (${label})`)
    this.setStatus('disconnected')
    if (this.autoReconnect) this.scheduleReconnect()
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.manualDisconnect) return

    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      console.error(`[BrainClient:${this.agentId}] Giving up after ${this.reconnectAttempts} reconnect attempt(s)`)
      this.setStatus('error')
      return
    }

    this.reconnectAttempts++
    const attempt = this.reconnectAttempts
    console.log(`[BrainClient:${this.agentId}] Reconnecting in ${this.reconnectDelayMs}ms (attempt ${attempt}/${this.maxReconnectAttempts})`)

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null
      this.connect().catch(err => {
        console.warn(`[BrainClient:${this.agentId}] Reconnect attempt ${attempt} failed: ${describeError(err)}`)
        this.scheduleReconnect()
      })
    }, this.reconnectDelayMs)
    this.reconnectTimer.unref?.()
  }

  private startHeartbeat(): void {
    this.stopHeartbeat()
    this.heartbeatTimer = setInterval(() => {
      this.sendControl(MESSAGE_TYPES.HEARTBEAT, { timestamp: new Date().toISOString() })
    }, this.heartbeatIntervalMs)
    this.heartbeatTimer.unref?.()
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer)
      this.heartbeatTimer = null
    }
  }

  private sendControl(type: string, payload: JsonObject): void {
    this.transmit(createMessage({ type, source: this.agentId, payload }))
      .catch(err => {
        console.warn(`[BrainClient:${this.agentId}] Failed to send ${type}: ${describeError(err)}`)
      })
  }

  private async transmit(message: BusMessage): Promise<void> {
    const socket = this.socket
    if (!socket || !socket.isOpen) {
      throw new BrainPipelineError('CONNECTION_LOST', `Not connected to ${this.url}`)
    }
    await socket.send(encodeMessage(message))
  }

  private failPending(reason: string): void {
    const failed = this.bus.failAllPending(correlationId =>
      new BrainPipelineError('CONNECTION_LOST', `Request ${correlationId} failed: ${reason}`, { correlationId })
    )
    if (failed > 0) {
      console.warn(`[BrainClient:${this.agentId}] Failed ${failed} pending request(s): ${reason}`)
    }
  }

  private setStatus(status: ClientStatus): void {
    if (this.status === status) return
    this.status = status
    for (const listener of this.statusListeners) {
      try {
        listener(status)
      } catch (err) {
        console.error(`[BrainClient:${this.agentId}] Error in status listener:`, err)
      }
    }
  }
}
