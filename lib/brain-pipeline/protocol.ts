/**
 * Brain Pipeline Protocol
 *
 * JSON framing for the brain WebSocket bus and the payload schemas the
 * bridge accepts. Every inbound frame is validated here; anything that does
 * not parse becomes a MALFORMED_MESSAGE error for the caller to log and drop.
 */

import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { BrainPipelineError } from './errors'
import type { BusMessage, JsonObject } from './types'

export const MESSAGE_TYPES = {
  CONNECT: 'connect',
  HEARTBEAT: 'heartbeat',
  SUBSCRIBE: 'subscribe',
  ERROR: 'error',
  AGENT_MESSAGE: 'agent.message',
  AGENT_REQUEST: 'agent.request',
  AGENT_RESPONSE: 'agent.response',
  AGENT_BROADCAST: 'agent.broadcast',
  AGENT_DISCONNECTED: 'agent.disconnected',
  EVENT_LIFECYCLE: 'event.lifecycle',
  EVENT_COMMAND: 'event.command',
  EVENT_STATE: 'event.state',
  SYNC_STATE: 'sync.state',
  SYNC_COMMAND: 'sync.command',
  SYNC_FEEDBACK: 'sync.feedback',
  SYNC_RESULT: 'sync.result',
} as const

/** Control frames handled by the transport itself, never published to the bus */
export const CONTROL_TYPES: ReadonlySet<string> = new Set([
  MESSAGE_TYPES.CONNECT,
  MESSAGE_TYPES.HEARTBEAT,
  MESSAGE_TYPES.SUBSCRIBE,
  MESSAGE_TYPES.ERROR,
])

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const JsonObjectSchema = z.record(z.unknown())

export const WireMessageSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  source: z.string().default(''),
  target: z.string().nullable().optional(),
  payload: JsonObjectSchema.default({}),
  timestamp: z.string().optional(),
  correlationId: z.string().nullable().optional(),
})

export const PrioritySchema = z.enum(['LOW', 'NORMAL', 'HIGH', 'URGENT'])

export const BrainCommandPayloadSchema = z.object({
  commandType: z.string().min(1),
  parameters: JsonObjectSchema.default({}),
  priority: PrioritySchema.default('NORMAL'),
  sourceAgent: z.string().optional(),
  commandId: z.string().min(1).optional(),
  target: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  metadata: JsonObjectSchema.optional(),
})

export type BrainCommandPayload = z.infer<typeof BrainCommandPayloadSchema>

export const StateSyncPayloadSchema = z.object({
  brain_state: JsonObjectSchema.optional(),
  cerebellum_state: JsonObjectSchema.optional(),
  sync_timestamp: z.string().optional(),
})

export type StateSyncPayload = z.infer<typeof StateSyncPayloadSchema>

export const FeedbackStatusSchema = z.enum([
  'EXEC', 'QUEUE', 'NEXT', 'DONE', 'FAILED', 'CANCELLED',
  'pending', 'executing', 'completed', 'failed', 'cancelled', 'timeout',
])

export const FeedbackPayloadSchema = z.object({
  commandId: z.string().min(1),
  status: FeedbackStatusSchema,
  actionId: z.string().optional(),
  detail: JsonObjectSchema.optional(),
})

export type FeedbackPayload = z.infer<typeof FeedbackPayloadSchema>

export const LifecycleStateSchema = z.enum(['EXEC', 'QUEUE', 'NEXT', 'DONE', 'FAILED', 'CANCELLED'])

export const CommandFeedbackSchema = z.object({
  commandId: z.string(),
  status: LifecycleStateSchema,
  success: z.boolean(),
  detail: JsonObjectSchema.optional(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
  timestamp: z.string(),
})

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export interface MessageInit {
  type: string
  source: string
  target?: string | null
  payload?: JsonObject
  correlationId?: string | null
  id?: string
  timestamp?: string
}

export function createMessage(init: MessageInit): BusMessage {
  return Object.freeze({
    id: init.id ?? uuidv4(),
    type: init.type,
    source: init.source,
    target: init.target ?? null,
    payload: Object.freeze({ ...(init.payload ?? {}) }),
    timestamp: init.timestamp ?? new Date().toISOString(),
    correlationId: init.correlationId ?? null,
  })
}

export function encodeMessage(message: BusMessage): string {
  return JSON.stringify({
    id: message.id,
    type: message.type,
    source: message.source,
    target: message.target,
    payload: message.payload,
    timestamp: message.timestamp,
    correlationId: message.correlationId,
  })
}

export function decodeMessage(raw: string): BusMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new BrainPipelineError('MALFORMED_MESSAGE', `Invalid JSON frame: ${err instanceof Error ? err.message : String(err)}`)
  }

  const result = WireMessageSchema.safeParse(parsed)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue?.path.join('.') || 'frame'
    throw new BrainPipelineError('MALFORMED_MESSAGE', `Invalid frame at ${where}: ${issue?.message ?? 'unknown'}`)
  }

  return createMessage(result.data)
}

/** Copy of a message with a different source (used when re-sourcing inbound frames) */
export function withSource(message: BusMessage, source: string): BusMessage {
  return createMessage({ ...message, source })
}

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

/**
 * Subscription pattern matching:
 *   "*"          every type
 *   "event.*"    every type beginning with "event."
 *   "sync.state" exact match
 */
export function matchesPattern(pattern: string, type: string): boolean {
  if (pattern === '*') return true
  if (pattern.endsWith('.*')) {
    return type.startsWith(pattern.slice(0, -1))
  }
  return pattern === type
}
