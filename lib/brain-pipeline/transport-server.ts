/**
 * Brain WebSocket Server
 *
 * Connects remote agents to the in-process MessageBus over framed JSON.
 *
 *   agent socket --frame--> decode --> re-source --> bus.publish
 *   bus "*" subscription --> route --> target agent / broadcast / router / subscribers
 *
 * Each connection starts with a `connect` handshake naming its agentId and
 * is kept alive by heartbeats. Connection loss of any kind is published as a
 * synthetic `agent.disconnected` message, which fails pending requests that
 * target the agent instead of leaving them to time out.
 *
 * An untargeted agent.message or agent.request goes to the agent a
 * MessageRouter picks for it, when one is configured and that agent is
 * online. Otherwise it falls back to subscription patterns.
 */

import { v4 as uuidv4 } from 'uuid'
import type WebSocket from 'ws'
import type { WebSocketServer } from 'ws'
import { describeError } from './errors'
import { evaluateHeartbeat } from './heartbeat'
import { bindWebSocketServer, closeWebSocketServer, listenWithFallback } from './listen'
import type { MessageBus } from './message-bus'
import {
  CONTROL_TYPES,
  MESSAGE_TYPES,
  createMessage,
  decodeMessage,
  encodeMessage,
  matchesPattern,
  withSource,
} from './protocol'
import type { MessageRouter } from './routing'
import { wrapWebSocket } from './socket'
import type { AgentConnection, BusMessage, TransportSocket } from './types'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BrainServerOptions {
  bus: MessageBus
  host?: string
  port?: number
  portFallbacks?: number
  heartbeatIntervalMs?: number
  heartbeatGraceMs?: number           // defaults to 3x the interval
  handshakeTimeoutMs?: number
  serverId?: string
  router?: MessageRouter
}

export interface HeartbeatCheckResult {
  evicted: string[]
  skipped: string[]
}

export interface BrainServerStats {
  running: boolean
  host: string
  port: number | null
  clientCount: number
  onlineAgents: string[]
  pendingRequests: number
  framesIn: number
  framesOut: number
  malformedFrames: number
  evictions: number
  routed: number
}

const ROUTABLE_TYPES = new Set<string>([MESSAGE_TYPES.AGENT_MESSAGE, MESSAGE_TYPES.AGENT_REQUEST])

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

export class BrainWebSocketServer {
  private bus: MessageBus
  private host: string
  private port: number
  private portFallbacks: number
  private heartbeatIntervalMs: number
  private heartbeatGraceMs: number
  private handshakeTimeoutMs: number
  private serverId: string
  private router: MessageRouter | null

  private connections = new Map<string, AgentConnection>()   // agentId -> connection
  private server: WebSocketServer | null = null
  private boundPort: number | null = null
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null
  private busSubscription: string | null = null
  private running = false
  private stats = { framesIn: 0, framesOut: 0, malformedFrames: 0, evictions: 0, routed: 0 }

  constructor(options: BrainServerOptions) {
    this.bus = options.bus
    this.host = options.host ?? '0.0.0.0'
    this.port = options.port ?? 8765
    this.portFallbacks = options.portFallbacks ?? 0
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30_000
    this.heartbeatGraceMs = options.heartbeatGraceMs ?? this.heartbeatIntervalMs * 3
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 10_000
    this.serverId = options.serverId ?? 'server'
    this.router = options.router ?? null
  }

  get isRunning(): boolean {
    return this.running
  }

  get clientCount(): number {
    return this.connections.size
  }

  async start(): Promise<number> {
    if (this.server && this.boundPort !== null) return this.boundPort

    const bound = await listenWithFallback('BrainServer', this.host, this.port, this.portFallbacks, bindWebSocketServer)
    this.server = bound.server
    this.boundPort = bound.port
    this.server.on('connection', (ws: WebSocket) => this.accept(wrapWebSocket(ws)))

    this.attach()
    console.log(`[BrainServer] Listening on ws://${this.host}:${bound.port}`)
    return bound.port
  }

  /** Begin routing bus traffic and checking heartbeats without binding a port */
  attach(): void {
    if (this.running) return
    this.running = true
    this.busSubscription = this.bus.subscribe('*', message => this.route(message), 'brain-server')
    this.heartbeatTimer = setInterval(() => this.checkHeartbeats(), this.heartbeatIntervalMs)
    this.heartbeatTimer.unref?.()
  }

  async stop(): Promise<void> {
    if (!this.running && !this.server) return
    this.running = false

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer)
      this.heartbeatTimer = null
    }
    if (this.busSubscription) {
      this.bus.unsubscribe(this.busSubscription)
      this.busSubscription = null
    }

    for (const connection of Array.from(this.connections.values())) {
      this.drop(connection, 'server stopping')
      connection.socket.close(1001, 'Server shutting down')
    }

    if (this.server) {
      const server = this.server
      this.server = null
      this.boundPort = null
      await closeWebSocketServer(server)
    }

    console.log('[BrainServer] Stopped')
  }

  // -- Connections -----------------------------------------------------------

  accept(socket: TransportSocket): void {
    const clientId = uuidv4()
    let connection: AgentConnection | null = null

    const handshakeTimer = setTimeout(() => {
      if (!connection) {
        console.warn(`[BrainServer] Handshake timeout for client ${clientId}`)
        socket.close(1008, 'Handshake timeout')
      }
    }, this.handshakeTimeoutMs)
    handshakeTimer.unref?.()

    socket.onMessage(raw => {
      let message: BusMessage
      try {
        message = decodeMessage(raw)
      } catch (err) {
        this.stats.malformedFrames++
        console.warn(`[BrainServer] Dropping malformed frame from ${connection?.agentId ?? clientId}: ${describeError(err)}`)
        this.sendRaw(socket, createMessage({
          type: MESSAGE_TYPES.ERROR,
          source: this.serverId,
          target: connection?.agentId ?? null,
          payload: { message: describeError(err) },
        }))
        return
      }

      const current = connection
      if (!current) {
        clearTimeout(handshakeTimer)
        connection = this.register(socket, clientId, message)
        return
      }
      this.handleFrame(current, message)
    })

    socket.onClose((code, reason) => {
      clearTimeout(handshakeTimer)
      if (connection) {
        this.drop(connection, reason ? `closed (${code}: ${reason})` : `closed (${code})`)
      }
    })
  }

  private register(socket: TransportSocket, clientId: string, message: BusMessage): AgentConnection | null {
    if (message.type !== MESSAGE_TYPES.CONNECT) {
      console.warn(`[BrainServer] Expected connect frame from ${clientId}, got ${message.type}`)
      socket.close(1008, 'Expected connect message')
      return null
    }

    const requested = message.payload.agentId
    const agentId = typeof requested === 'string' && requested ? requested : message.source
    if (!agentId) {
      socket.close(1008, 'Missing agentId')
      return null
    }

    const existing = this.connections.get(agentId)
    if (existing) {
      console.warn(`[BrainServer] Agent ${agentId} reconnected, replacing client ${existing.clientId}`)
      this.connections.delete(agentId)
      existing.socket.close(4001, 'Replaced by new connection')
    }

    const now = Date.now()
    const connection: AgentConnection = {
      agentId,
      clientId,
      socket,
      connectedAt: new Date(now).toISOString(),
      lastHeartbeat: new Date(now).toISOString(),
      lastFrameAt: now,
      subscriptions: new Set(),
    }
    this.connections.set(agentId, connection)
    console.log(`[BrainServer] Agent connected: ${agentId} (client: ${clientId})`)

    this.send(connection, createMessage({
      type: MESSAGE_TYPES.CONNECT,
      source: this.serverId,
      target: agentId,
      payload: { status: 'connected', clientId },
    }))

    this.publish(createMessage({
      type: MESSAGE_TYPES.EVENT_LIFECYCLE,
      source: this.serverId,
      payload: { event: 'agent.connected', agentId, clientId },
    }))

    return connection
  }

  private handleFrame(connection: AgentConnection, message: BusMessage): void {
    this.stats.framesIn++
    connection.lastFrameAt = Date.now()

    switch (message.type) {
      case MESSAGE_TYPES.HEARTBEAT: {
        const reported = message.payload.timestamp
        connection.lastHeartbeat = typeof reported === 'string' || typeof reported === 'number'
          ? reported
          : message.timestamp
        this.send(connection, createMessage({
          type: MESSAGE_TYPES.HEARTBEAT,
          source: this.serverId,
          target: connection.agentId,
          payload: { timestamp: new Date().toISOString() },
        }))
        return
      }
      case MESSAGE_TYPES.SUBSCRIBE: {
        const patterns = message.payload.patterns
        connection.subscriptions = new Set(
          Array.isArray(patterns) ? patterns.filter((p): p is string => typeof p === 'string' && p.length > 0) : []
        )
        return
      }
      case MESSAGE_TYPES.CONNECT:
        console.warn(`[BrainServer] Ignoring repeated connect from ${connection.agentId}`)
        return
      case MESSAGE_TYPES.ERROR:
        console.warn(`[BrainServer] Error reported by ${connection.agentId}:`, message.payload.message)
        return
      default:
        connection.lastHeartbeat = new Date(connection.lastFrameAt).toISOString()
        this.publish(withSource(message, connection.agentId))
    }
  }

  private drop(connection: AgentConnection, reason: string): void {
    if (this.connections.get(connection.agentId) !== connection) return
    this.connections.delete(connection.agentId)
    console.log(`[BrainServer] Agent disconnected: ${connection.agentId} (${reason})`)

    this.publish(createMessage({
      type: MESSAGE_TYPES.AGENT_DISCONNECTED,
      source: this.serverId,
      payload: { agentId: connection.agentId, clientId: connection.clientId, reason },
    }))
  }

  // -- Heartbeat -------------------------------------------------------------

  checkHeartbeats(now: number = Date.now()): HeartbeatCheckResult {
    const result: HeartbeatCheckResult = { evicted: [], skipped: [] }

    for (const connection of Array.from(this.connections.values())) {
      const verdict = evaluateHeartbeat(connection.lastHeartbeat, connection.lastFrameAt, now, this.heartbeatGraceMs)

      if (verdict === 'unparseable') {
        console.warn(
          `[BrainServer] Unparseable heartbeat timestamp from ${connection.agentId} (${String(connection.lastHeartbeat)}), skipping check this cycle`
        )
        connection.lastHeartbeat = new Date(connection.lastFrameAt).toISOString()
        result.skipped.push(connection.agentId)
        continue
      }

      if (verdict === 'expired') {
        console.warn(`[BrainServer] Heartbeat timeout: ${connection.agentId}`)
        this.stats.evictions++
        result.evicted.push(connection.agentId)
        this.drop(connection, 'heartbeat timeout')
        connection.socket.close(4002, 'Heartbeat timeout')
      }
    }

    return result
  }

  // -- Outbound --------------------------------------------------------------

  private route(message: BusMessage): void {
    if (CONTROL_TYPES.has(message.type)) return

    if (message.type === MESSAGE_TYPES.AGENT_BROADCAST) {
      this.broadcast(message, message.source)
      return
    }

    if (message.target) {
      const connection = this.connections.get(message.target)
      if (connection && connection.agentId !== message.source) {
        this.send(connection, message)
      }
      return
    }

    if (this.router && ROUTABLE_TYPES.has(message.type) && this.routeByBinding(this.router, message)) return

    for (const connection of this.connections.values()) {
      if (connection.agentId === message.source) continue
      for (const pattern of connection.subscriptions) {
        if (matchesPattern(pattern, message.type)) {
          this.send(connection, message)
          break
        }
      }
    }
  }

  /** True when the router settled where the message goes */
  private routeByBinding(router: MessageRouter, message: BusMessage): boolean {
    const routed = router.route(message)
    if (routed.agentId === null) return false

    const connection = this.connections.get(routed.agentId)
    if (!connection) {
      console.warn(`[BrainServer] ${message.type} from ${message.source} routed to ${routed.agentId} (${routed.reason}), which is not online`)
      return false
    }
    if (connection.agentId !== message.source) {
      this.send(connection, message)
      this.stats.routed++
    }
    return true
  }

  sendToAgent(agentId: string, message: BusMessage): boolean {
    const connection = this.connections.get(agentId)
    if (!connection) {
      console.warn(`[BrainServer] Agent not online: ${agentId}`)
      return false
    }
    return this.send(connection, message)
  }

  broadcast(message: BusMessage, excludeAgentId?: string): number {
    let count = 0
    for (const connection of this.connections.values()) {
      if (connection.agentId === excludeAgentId) continue
      if (this.send(connection, message)) count++
    }
    return count
  }

  private send(connection: AgentConnection, message: BusMessage): boolean {
    return this.sendRaw(connection.socket, message)
  }

  private sendRaw(socket: TransportSocket, message: BusMessage): boolean {
    if (!socket.isOpen) return false
    socket.send(encodeMessage(message))
      .then(() => { this.stats.framesOut++ })
      .catch(err => {
        console.error(`[BrainServer] Failed to send ${message.type} to ${message.target ?? 'client'}: ${describeError(err)}`)
      })
    return true
  }

  private publish(message: BusMessage): void {
    try {
      this.bus.publish(message)
    } catch (err) {
      console.warn(`[BrainServer] Could not publish ${message.type}: ${describeError(err)}`)
    }
  }

  // -- Introspection ---------------------------------------------------------

  getOnlineAgents(): string[] {
    return Array.from(this.connections.keys())
  }

  isAgentOnline(agentId: string): boolean {
    return this.connections.has(agentId)
  }

  getConnection(agentId: string): Readonly<AgentConnection> | undefined {
    return this.connections.get(agentId)
  }

  getStats(): BrainServerStats {
    return {
      running: this.running,
      host: this.host,
      port: this.boundPort,
      clientCount: this.connections.size,
      onlineAgents: this.getOnlineAgents(),
      pendingRequests: this.bus.pendingCount,
      ...this.stats,
    }
  }
}
