/**
 * Heartbeat evaluation for brain transport connections.
 *
 * Liveness is judged by when the server last received a frame from the
 * client, on the server's own clock. The timestamp a client reports with its
 * heartbeat is only checked for shape: one we cannot parse is never read as a
 * missed heartbeat, the check is skipped for that cycle instead.
 */

export type HeartbeatVerdict = 'alive' | 'expired' | 'unparseable'

const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}/

/**
 * Parse a heartbeat timestamp into epoch milliseconds.
 * Accepts ISO-8601 strings and finite epoch-millisecond numbers.
 */
export function parseHeartbeatTimestamp(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? value : null
  }
  if (typeof value !== 'string') return null

  const trimmed = value.trim()
  if (!ISO_PREFIX.test(trimmed)) return null

  const ms = Date.parse(trimmed)
  return Number.isNaN(ms) ? null : ms
}

/**
 * @param reported - timestamp carried by the client's last heartbeat
 * @param lastFrameAt - server receive time of the client's last frame
 */
export function evaluateHeartbeat(reported: unknown, lastFrameAt: number, now: number, graceMs: number): HeartbeatVerdict {
  if (parseHeartbeatTimestamp(reported) === null) return 'unparseable'
  return now - lastFrameAt > graceMs ? 'expired' : 'alive'
}
