/**
 * Bounded FIFO for frames waiting to go out to one consumer.
 * When full, the oldest frame is dropped to make room.
 */

export class OutboundQueue<T> {
  private items: T[] = []
  private limit: number
  private onDrop: ((item: T) => void) | null

  constructor(limit: number, onDrop?: (item: T) => void) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Outbound queue limit must be a positive integer, got ${limit}`)
    }
    this.limit = limit
    this.onDrop = onDrop ?? null
  }

  get length(): number {
    return this.items.length
  }

  get isEmpty(): boolean {
    return this.items.length === 0
  }

  get capacity(): number {
    return this.limit
  }

  /** Append at the back. Returns the frame dropped to make room, if any. */
  push(item: T): T | null {
    const dropped = this.makeRoom()
    this.items.push(item)
    return dropped
  }

  /** Put at the front (urgent frames). Returns the frame dropped to make room, if any. */
  unshift(item: T): T | null {
    const dropped = this.makeRoom()
    this.items.unshift(item)
    return dropped
  }

  shift(): T | undefined {
    return this.items.shift()
  }

  /** Remove every queued item the predicate matches, keeping the rest in order */
  removeWhere(predicate: (item: T) => boolean): T[] {
    const removed: T[] = []
    const kept: T[] = []
    for (const item of this.items) {
      if (predicate(item)) {
        removed.push(item)
      } else {
        kept.push(item)
      }
    }
    this.items = kept
    return removed
  }

  clear(): T[] {
    const items = this.items
    this.items = []
    return items
  }

  toArray(): T[] {
    return [...this.items]
  }

  private makeRoom(): T | null {
    if (this.items.length < this.limit) return null
    const dropped = this.items.shift()
    if (dropped === undefined) return null
    this.onDrop?.(dropped)
    return dropped
  }
}
