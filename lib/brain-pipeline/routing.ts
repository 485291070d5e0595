/**
 * Message Router
 *
 * Picks the agent for a message that names no target. Each binding pairs a
 * match rule with an agent; bindings are tried from the highest effective
 * priority down, where effective priority is `priority * 1000` plus the
 * rule's specificity, so an explicit priority always outranks a more specific
 * rule. Ties keep the order the bindings were added in.
 *
 *   explicit target > first matching binding > default agent > unrouted
 */

import { isDeepStrictEqual } from 'node:util'
import { z } from 'zod'
import { BrainPipelineError } from './errors'
import { MESSAGE_TYPES, createMessage, matchesPattern } from './protocol'
import type { BusMessage, JsonObject } from './types'

// ---------------------------------------------------------------------------
// Bindings
// ---------------------------------------------------------------------------

const PeerMatchSchema = z.object({
  kind: z.enum(['dm', 'group', 'any']).default('any'),
  id: z.string().min(1).optional(),
})

const MatchRuleSchema = z.object({
  peer: PeerMatchSchema.optional(),
  capability: z.string().min(1).optional(),
  channel: z.string().min(1).optional(),
  source: z.string().min(1).optional(),
  messageType: z.string().min(1).optional(),     // exact type, "prefix.*" or "*"
  conditions: z.record(z.unknown()).default({}),
})

export const BindingSchema = z.object({
  agentId: z.string().min(1),
  match: MatchRuleSchema.default({}),
  priority: z.number().int().default(0),
  enabled: z.boolean().default(true),
  metadata: z.record(z.unknown()).default({}),
})

export type PeerKind = z.infer<typeof PeerMatchSchema>['kind']
export type MatchRule = z.infer<typeof MatchRuleSchema>
export type Binding = z.infer<typeof BindingSchema>
export type BindingInput = z.input<typeof BindingSchema>

/** Values a caller knows about a message that the payload may not carry */
export interface RoutingContext {
  peerId?: string
  peerKind?: string
  capability?: string
  channel?: string
}

export type RouteReason = 'explicit_target' | 'binding_match' | 'default_fallback' | 'unrouted'

export interface RoutingResult {
  agentId: string | null
  binding: Binding | null
  reason: RouteReason
}

export interface RouterInfo {
  defaultAgentId: string | null
  totalBindings: number
  agents: string[]
  bindings: Binding[]
}

export function parseBinding(input: BindingInput): Binding {
  const parsed = BindingSchema.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue?.path.join('.') || 'binding'
    throw new BrainPipelineError('INVALID_PARAMETERS', `Invalid routing binding at ${where}: ${issue?.message ?? 'unknown'}`)
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

/** Higher is more specific */
export function ruleSpecificity(rule: MatchRule): number {
  let score = 0
  if (rule.peer?.id) {
    score += 100
  } else if (rule.peer && rule.peer.kind !== 'any') {
    score += 50
  }
  if (rule.capability && rule.capability !== '*') score += 40
  if (rule.channel && rule.channel !== '*') score += 30
  if (rule.source) score += 10
  if (rule.messageType) score += 5
  score += Object.keys(rule.conditions).length * 2
  return score
}

export function effectivePriority(binding: Binding): number {
  return binding.priority * 1000 + ruleSpecificity(binding.match)
}

function readString(payload: JsonObject, key: string): string | undefined {
  const value = payload[key]
  return typeof value === 'string' ? value : undefined
}

export function ruleMatches(rule: MatchRule, message: BusMessage, context: RoutingContext = {}): boolean {
  const payload = message.payload

  if (rule.peer) {
    const peerKind = context.peerKind ?? readString(payload, 'peerKind')
    if (rule.peer.kind !== 'any' && peerKind !== undefined && peerKind !== rule.peer.kind) return false
    if (rule.peer.id && rule.peer.id !== (context.peerId ?? readString(payload, 'peerId'))) return false
  }

  if (rule.capability && rule.capability !== '*') {
    if ((context.capability ?? readString(payload, 'capability')) !== rule.capability) return false
  }
  if (rule.channel && rule.channel !== '*') {
    if ((context.channel ?? readString(payload, 'channel')) !== rule.channel) return false
  }
  if (rule.source && message.source !== rule.source) return false
  if (rule.messageType && !matchesPattern(rule.messageType, message.type)) return false

  for (const [key, expected] of Object.entries(rule.conditions)) {
    if (!isDeepStrictEqual(payload[key], expected)) return false
  }
  return true
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export interface MessageRouterOptions {
  defaultAgentId?: string | null
  bindings?: BindingInput[]
}

export class MessageRouter {
  defaultAgentId: string | null
  private bindings: Binding[] = []

  constructor(options: MessageRouterOptions = {}) {
    this.defaultAgentId = options.defaultAgentId ?? null
    for (const binding of options.bindings ?? []) {
      this.addBinding(binding)
    }
  }

  /** True once there is anything to route by */
  get isConfigured(): boolean {
    return this.defaultAgentId !== null || this.bindings.some(binding => binding.enabled)
  }

  addBinding(input: BindingInput): Binding {
    const binding = parseBinding(input)
    this.bindings.push(binding)
    // Array sort is stable, so equal priorities keep insertion order
    this.bindings.sort((a, b) => effectivePriority(b) - effectivePriority(a))
    console.log(`[Router] Binding added: ${binding.agentId} (priority ${effectivePriority(binding)})`)
    return binding
  }

  removeBinding(binding: Binding): boolean {
    const index = this.bindings.indexOf(binding)
    if (index === -1) return false
    this.bindings.splice(index, 1)
    return true
  }

  /** Remove every binding, or only those of one agent. Returns how many were removed. */
  clearBindings(agentId?: string): number {
    const before = this.bindings.length
    this.bindings = agentId === undefined ? [] : this.bindings.filter(binding => binding.agentId !== agentId)
    return before - this.bindings.length
  }

  getBindings(): Binding[] {
    return [...this.bindings]
  }

  getAgentBindings(agentId: string): Binding[] {
    return this.bindings.filter(binding => binding.agentId === agentId)
  }

  route(message: BusMessage, context: RoutingContext = {}): RoutingResult {
    if (message.target) {
      return { agentId: message.target, binding: null, reason: 'explicit_target' }
    }

    for (const binding of this.bindings) {
      if (!binding.enabled) continue
      if (ruleMatches(binding.match, message, context)) {
        return { agentId: binding.agentId, binding, reason: 'binding_match' }
      }
    }

    if (this.defaultAgentId !== null) {
      return { agentId: this.defaultAgentId, binding: null, reason: 'default_fallback' }
    }
    return { agentId: null, binding: null, reason: 'unrouted' }
  }

  routeByCapability(capability: string, context: RoutingContext = {}): RoutingResult {
    const lookup = createMessage({
      type: MESSAGE_TYPES.AGENT_REQUEST,
      source: 'router',
      payload: { capability },
    })
    return this.route(lookup, { ...context, capability })
  }

  /** Agents bound to exactly this capability, best binding first */
  getAgentsForCapability(capability: string): string[] {
    const agents: string[] = []
    for (const binding of this.bindings) {
      if (binding.enabled && binding.match.capability === capability && !agents.includes(binding.agentId)) {
        agents.push(binding.agentId)
      }
    }
    return agents
  }

  getInfo(): RouterInfo {
    return {
      defaultAgentId: this.defaultAgentId,
      totalBindings: this.bindings.length,
      agents: Array.from(new Set(this.bindings.map(binding => binding.agentId))),
      bindings: this.getBindings(),
    }
  }
}
