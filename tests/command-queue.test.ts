import { describe, it, expect, beforeEach } from 'vitest'
import { CommandQueue } from '@/lib/brain-pipeline/command-queue'
import { makeCommand, resetFixtureCounter } from './test-utils/fixtures'

let queue: CommandQueue

beforeEach(() => {
  resetFixtureCounter()
  queue = new CommandQueue()
})

describe('CommandQueue ordering', () => {
  it('promotes HIGH before LOW regardless of arrival order', () => {
    queue.enqueue(makeCommand({ commandId: 'low', priority: 'LOW' }))
    queue.enqueue(makeCommand({ commandId: 'high', priority: 'HIGH' }))

    expect(queue.promote('cerebellum')?.commandId).toBe('high')
  })

  it('keeps arrival order within a priority', () => {
    queue.enqueue(makeCommand({ commandId: 'first' }))
    queue.enqueue(makeCommand({ commandId: 'second' }))
    queue.enqueue(makeCommand({ commandId: 'third' }))

    expect(queue.drain('cerebellum').map(command => command.commandId)).toEqual(['first', 'second', 'third'])
  })

  it('reports the waiting position of each enqueued command', () => {
    expect(queue.enqueue(makeCommand({ commandId: 'low', priority: 'LOW' }))).toBe(0)
    expect(queue.enqueue(makeCommand({ commandId: 'n1', priority: 'NORMAL' }))).toBe(0)
    expect(queue.enqueue(makeCommand({ commandId: 'n2', priority: 'NORMAL' }))).toBe(1)
    expect(queue.enqueue(makeCommand({ commandId: 'urgent', priority: 'URGENT' }))).toBe(0)

    expect(queue.snapshot()).toEqual([
      { target: 'cerebellum', active: null, waiting: ['urgent', 'n1', 'n2', 'low'] },
    ])
  })
})

describe('CommandQueue active slot', () => {
  it('holds one active command per target', () => {
    queue.enqueue(makeCommand({ commandId: 'a' }))
    queue.enqueue(makeCommand({ commandId: 'b' }))

    expect(queue.promote('cerebellum')?.commandId).toBe('a')
    expect(queue.promote('cerebellum')).toBeNull()
    expect(queue.active('cerebellum')?.commandId).toBe('a')

    expect(queue.release('cerebellum', 'b')).toBe(false)
    expect(queue.release('cerebellum', 'a')).toBe(true)
    expect(queue.promote('cerebellum')?.commandId).toBe('b')
  })

  it('keeps targets independent', () => {
    queue.enqueue(makeCommand({ commandId: 'arm-1', target: 'arm' }))
    queue.enqueue(makeCommand({ commandId: 'base-1', target: 'base' }))

    expect(queue.promote('arm')?.commandId).toBe('arm-1')
    expect(queue.promote('base')?.commandId).toBe('base-1')
    expect(queue.promote('unknown')).toBeNull()
  })

  it('removes a command whether waiting or active', () => {
    queue.enqueue(makeCommand({ commandId: 'a' }))
    queue.enqueue(makeCommand({ commandId: 'b' }))
    queue.promote('cerebellum')

    expect(queue.remove('b')).toBe(true)
    expect(queue.remove('a')).toBe(true)
    expect(queue.remove('a')).toBe(false)
    expect(queue.targetsWithWork()).toEqual([])
  })

  it('drains waiting commands and leaves the active one', () => {
    queue.enqueue(makeCommand({ commandId: 'a' }))
    queue.enqueue(makeCommand({ commandId: 'b' }))
    queue.enqueue(makeCommand({ commandId: 'c' }))
    queue.promote('cerebellum')

    expect(queue.drain('cerebellum').map(command => command.commandId)).toEqual(['b', 'c'])
    expect(queue.active('cerebellum')?.commandId).toBe('a')
    expect(queue.size('cerebellum')).toBe(0)
    expect(queue.targetsWithWork()).toEqual(['cerebellum'])
  })

  it('counts waiting commands across targets', () => {
    queue.enqueue(makeCommand({ target: 'arm' }))
    queue.enqueue(makeCommand({ target: 'arm' }))
    queue.enqueue(makeCommand({ target: 'base' }))

    expect(queue.size()).toBe(3)
    expect(queue.size('arm')).toBe(2)
  })
})
