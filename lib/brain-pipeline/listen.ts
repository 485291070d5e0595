/**
 * Port binding with fallback
 *
 * Tries the configured port, then `fallbacks` successive ports, then lets the
 * OS assign one. Only "port taken" style errors move on to the next
 * candidate; anything else is raised immediately.
 */

import { WebSocketServer } from 'ws'
import { BrainPipelineError, describeError } from './errors'

const RETRYABLE_CODES = new Set(['EADDRINUSE', 'EACCES'])

export interface BoundServer<S> {
  server: S
  port: number
}

export type BindFn<S> = (host: string, port: number) => Promise<BoundServer<S>>

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

export function candidatePorts(port: number, fallbacks: number): number[] {
  const ports: number[] = []
  for (let i = 0; i <= fallbacks; i++) {
    ports.push(port + i)
  }
  ports.push(0)
  return ports
}

export async function listenWithFallback<S>(
  label: string,
  host: string,
  port: number,
  fallbacks: number,
  bind: BindFn<S>
): Promise<BoundServer<S>> {
  const tried: number[] = []

  for (const candidate of candidatePorts(port, fallbacks)) {
    try {
      const bound = await bind(host, candidate)
      if (candidate !== port) {
        console.warn(`[${label}] Port ${port} unavailable, bound to ${bound.port} instead`)
      }
      return bound
    } catch (err) {
      const code = errorCode(err)
      if (!code || !RETRYABLE_CODES.has(code)) {
        throw new BrainPipelineError('BIND_FAILED', `[${label}] Failed to bind ${host}:${candidate}: ${describeError(err)}`)
      }
      tried.push(candidate)
      console.warn(`[${label}] ${host}:${candidate} unavailable (${code})`)
    }
  }

  throw new BrainPipelineError('BIND_FAILED', `[${label}] No port available on ${host} (tried ${tried.join(', ')})`, { tried })
}

export function bindWebSocketServer(host: string, port: number): Promise<BoundServer<WebSocketServer>> {
  return new Promise((resolve, reject) => {
    const server = new WebSocketServer({ host, port })

    const onError = (err: Error) => {
      server.close()
      reject(err)
    }

    server.once('error', onError)
    server.once('listening', () => {
      server.removeListener('error', onError)
      server.on('error', (err: Error) => {
        console.error(`[WebSocketServer] ${host}:${port}: ${err.message}`)
      })
      const address = server.address()
      resolve({ server, port: typeof address === 'object' && address !== null ? address.port : port })
    })
  })
}

export function closeWebSocketServer(server: WebSocketServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err?: Error) => {
      if (err) reject(err)
      else resolve()
    })
  })
}
