/**
 * Per-target command queue.
 *
 * Waiting commands are ordered by priority (URGENT > HIGH > NORMAL > LOW) and
 * FIFO within a priority. Each target has a single active slot holding the
 * command currently in NEXT; nothing is promoted while it is occupied.
 */

import type { BrainCommand, CommandPriority } from './types'

export const PRIORITY_RANK: Record<CommandPriority, number> = {
  URGENT: 0,
  HIGH: 1,
  NORMAL: 2,
  LOW: 3,
}

interface TargetQueue {
  waiting: BrainCommand[]
  active: BrainCommand | null
}

export interface TargetQueueSnapshot {
  target: string
  active: string | null
  waiting: string[]
}

export class CommandQueue {
  private targets = new Map<string, TargetQueue>()

  /** Returns the command's zero-based position among waiting commands */
  enqueue(command: BrainCommand): number {
    const queue = this.queueFor(command.target)
    const rank = PRIORITY_RANK[command.priority]

    let index = queue.waiting.findIndex(other => PRIORITY_RANK[other.priority] > rank)
    if (index === -1) index = queue.waiting.length
    queue.waiting.splice(index, 0, command)
    return index
  }

  /** Move the head of the queue into the active slot. Null while the slot is taken or nothing waits. */
  promote(target: string): BrainCommand | null {
    const queue = this.targets.get(target)
    if (!queue || queue.active) return null

    const next = queue.waiting.shift()
    if (!next) return null
    queue.active = next
    return next
  }

  release(target: string, commandId: string): boolean {
    const queue = this.targets.get(target)
    if (!queue || queue.active?.commandId !== commandId) return false
    queue.active = null
    return true
  }

  /** Remove a command wherever it is, waiting or active */
  remove(commandId: string): boolean {
    for (const queue of this.targets.values()) {
      if (queue.active?.commandId === commandId) {
        queue.active = null
        return true
      }
      const index = queue.waiting.findIndex(waiting => waiting.commandId === commandId)
      if (index !== -1) {
        queue.waiting.splice(index, 1)
        return true
      }
    }
    return false
  }

  /** Take every waiting command for a target, in queue order. The active slot is left alone. */
  drain(target: string): BrainCommand[] {
    const queue = this.targets.get(target)
    if (!queue) return []
    const drained = [...queue.waiting]
    queue.waiting = []
    return drained
  }

  active(target: string): BrainCommand | null {
    return this.targets.get(target)?.active ?? null
  }

  size(target?: string): number {
    if (target !== undefined) {
      return this.targets.get(target)?.waiting.length ?? 0
    }
    let total = 0
    for (const queue of this.targets.values()) total += queue.waiting.length
    return total
  }

  targetsWithWork(): string[] {
    return Array.from(this.targets.entries())
      .filter(([, queue]) => queue.active || queue.waiting.length > 0)
      .map(([target]) => target)
  }

  snapshot(): TargetQueueSnapshot[] {
    return Array.from(this.targets.entries()).map(([target, queue]) => ({
      target,
      active: queue.active?.commandId ?? null,
      waiting: queue.waiting.map(command => command.commandId),
    }))
  }

  private queueFor(target: string): TargetQueue {
    let queue = this.targets.get(target)
    if (!queue) {
      queue = { waiting: [], active: null }
      this.targets.set(target, queue)
    }
    return queue
  }
}
