import { describe, it, expect, vi, beforeEach } from 'vitest'
import { MESSAGE_TYPES, createMessage } from '@/lib/brain-pipeline/protocol'
import { MessageRouter, effectivePriority, parseBinding, ruleSpecificity } from '@/lib/brain-pipeline/routing'
import type { BusMessage, JsonObject } from '@/lib/brain-pipeline/types'

// ============================================================================
// Setup
// ============================================================================

function message(payload: JsonObject = {}, target: string | null = null): BusMessage {
  return createMessage({ type: MESSAGE_TYPES.AGENT_MESSAGE, source: 'planner', target, payload })
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
})

// ============================================================================
// Matching order
// ============================================================================

describe('MessageRouter.route', () => {
  it('keeps a target the message already names', () => {
    const router = new MessageRouter({ bindings: [{ agentId: 'arm', match: { capability: 'grasp' } }] })

    expect(router.route(message({ capability: 'grasp' }, 'leg'))).toEqual({
      agentId: 'leg',
      binding: null,
      reason: 'explicit_target',
    })
  })

  it('picks the most specific matching binding', () => {
    const router = new MessageRouter({
      bindings: [
        { agentId: 'generalist', match: { messageType: 'agent.*' } },
        { agentId: 'grasper', match: { capability: 'grasp' } },
        { agentId: 'operator-desk', match: { peer: { id: 'op-1' } } },
      ],
    })

    expect(router.route(message({ capability: 'grasp' })).agentId).toBe('grasper')
    expect(router.route(message({ capability: 'grasp', peerId: 'op-1' })).agentId).toBe('operator-desk')
    expect(router.route(message({})).agentId).toBe('generalist')
    expect(router.getBindings().map(binding => binding.agentId)).toEqual(['operator-desk', 'grasper', 'generalist'])
  })

  it('lets an explicit priority outrank a more specific rule', () => {
    const router = new MessageRouter({
      bindings: [
        { agentId: 'grasper', match: { capability: 'grasp' } },
        { agentId: 'planner-inbox', match: { source: 'planner' }, priority: 1 },
      ],
    })

    const routed = router.route(message({ capability: 'grasp' }))

    expect(routed).toMatchObject({ agentId: 'planner-inbox', reason: 'binding_match' })
    expect(routed.binding && effectivePriority(routed.binding)).toBe(1010)
  })

  it('keeps insertion order between bindings of equal priority', () => {
    const router = new MessageRouter({
      bindings: [
        { agentId: 'arm-a', match: { capability: 'grasp' } },
        { agentId: 'arm-b', match: { capability: 'grasp' } },
      ],
    })

    expect(router.route(message({ capability: 'grasp' })).agentId).toBe('arm-a')
    expect(router.getAgentsForCapability('grasp')).toEqual(['arm-a', 'arm-b'])
  })

  it('matches peer kind, channel and payload conditions', () => {
    const router = new MessageRouter({
      bindings: [{ agentId: 'voice-dm', match: { peer: { kind: 'dm' }, channel: 'voice', conditions: { urgent: true } } }],
    })

    expect(router.route(message({ peerKind: 'dm', channel: 'voice', urgent: true })).agentId).toBe('voice-dm')
    expect(router.route(message({ peerKind: 'group', channel: 'voice', urgent: true })).agentId).toBeNull()
    expect(router.route(message({ peerKind: 'dm', channel: 'voice', urgent: false })).agentId).toBeNull()
    expect(router.route(message({ urgent: true }), { peerKind: 'dm', channel: 'voice' }).agentId).toBe('voice-dm')
  })

  it('falls back to the default agent, then to nothing', () => {
    const router = new MessageRouter()
    expect(router.isConfigured).toBe(false)
    expect(router.route(message())).toEqual({ agentId: null, binding: null, reason: 'unrouted' })

    router.defaultAgentId = 'main'

    expect(router.route(message())).toEqual({ agentId: 'main', binding: null, reason: 'default_fallback' })
  })

  it('skips disabled bindings', () => {
    const router = new MessageRouter({ bindings: [{ agentId: 'off', match: { capability: 'grasp' }, enabled: false }] })

    expect(router.isConfigured).toBe(false)
    expect(router.route(message({ capability: 'grasp' })).reason).toBe('unrouted')
    expect(router.getAgentsForCapability('grasp')).toEqual([])
  })

  it('routes by capability alone', () => {
    const router = new MessageRouter({
      defaultAgentId: 'main',
      bindings: [{ agentId: 'navigator', match: { capability: 'navigate' } }],
    })

    expect(router.routeByCapability('navigate').agentId).toBe('navigator')
    expect(router.routeByCapability('juggle')).toMatchObject({ agentId: 'main', reason: 'default_fallback' })
  })
})

// ============================================================================
// Bindings
// ============================================================================

describe('bindings', () => {
  it('scores rule specificity', () => {
    expect(ruleSpecificity(parseBinding({ agentId: 'a' }).match)).toBe(0)
    expect(ruleSpecificity(parseBinding({ agentId: 'a', match: { peer: { id: 'op-1', kind: 'dm' } } }).match)).toBe(100)
    expect(ruleSpecificity(parseBinding({
      agentId: 'a',
      match: { peer: { kind: 'group' }, capability: '*', channel: 'voice', source: 'planner', messageType: 'agent.*', conditions: { a: 1, b: 2 } },
    }).match)).toBe(99)
  })

  it('rejects a binding without an agent', () => {
    expect(() => parseBinding({ agentId: '' })).toThrow('Invalid routing binding at agentId: String must contain at least 1 character(s)')
  })

  it('removes bindings one at a time or per agent', () => {
    const router = new MessageRouter()
    router.addBinding({ agentId: 'arm', match: { capability: 'grasp' } })
    const leg = router.addBinding({ agentId: 'leg', match: { capability: 'walk' } })
    router.addBinding({ agentId: 'arm', match: { capability: 'wave' } })

    expect(router.getAgentBindings('arm')).toHaveLength(2)
    expect(router.clearBindings('arm')).toBe(2)
    expect(router.getInfo()).toEqual({ defaultAgentId: null, totalBindings: 1, agents: ['leg'], bindings: [leg] })

    expect(router.removeBinding(leg)).toBe(true)
    expect(router.removeBinding(leg)).toBe(false)
    expect(router.clearBindings()).toBe(0)
  })
})
