import { describe, it, expect } from 'vitest'
import { evaluateHeartbeat, parseHeartbeatTimestamp } from '@/lib/brain-pipeline/heartbeat'

const JAN_1 = Date.UTC(2026, 0, 1)

describe('parseHeartbeatTimestamp', () => {
  it('parses ISO-8601 strings', () => {
    expect(parseHeartbeatTimestamp('2026-01-01T00:00:00.000Z')).toBe(JAN_1)
    expect(parseHeartbeatTimestamp('  2026-01-01T00:00:00Z  ')).toBe(JAN_1)
  })

  it('accepts positive finite epoch milliseconds', () => {
    expect(parseHeartbeatTimestamp(JAN_1)).toBe(JAN_1)
  })

  it.each([
    ['garbage'],
    [''],
    ['17:00'],
    ['tomorrow at noon'],
    [0],
    [-5],
    [Number.NaN],
    [Number.POSITIVE_INFINITY],
    [null],
    [undefined],
    [{}],
  ])('returns null for %s', value => {
    expect(parseHeartbeatTimestamp(value)).toBeNull()
  })
})

describe('evaluateHeartbeat', () => {
  const REPORTED = '2026-01-01T00:00:00.000Z'

  it('is alive within the grace period', () => {
    expect(evaluateHeartbeat(REPORTED, JAN_1, JAN_1 + 1000, 3000)).toBe('alive')
  })

  it('is alive exactly at the grace boundary', () => {
    expect(evaluateHeartbeat(JAN_1, JAN_1, JAN_1 + 3000, 3000)).toBe('alive')
  })

  it('expires past the grace period', () => {
    expect(evaluateHeartbeat(JAN_1, JAN_1, JAN_1 + 3001, 3000)).toBe('expired')
  })

  it('judges by receive time, not by the reported clock', () => {
    const behind = '2025-12-31T23:00:00.000Z'
    const ahead = '2026-01-01T01:00:00.000Z'

    expect(evaluateHeartbeat(behind, JAN_1, JAN_1 + 1000, 3000)).toBe('alive')
    expect(evaluateHeartbeat(ahead, JAN_1, JAN_1 + 1_800_000, 3000)).toBe('expired')
  })

  it('reports a malformed timestamp as unparseable, never expired', () => {
    expect(evaluateHeartbeat('not-a-date', JAN_1, JAN_1 + 1_000_000, 3000)).toBe('unparseable')
  })
})
