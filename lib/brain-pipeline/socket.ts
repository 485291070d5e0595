/**
 * ws adapters
 *
 * Wraps a `ws` WebSocket in the TransportSocket shape the server, client and
 * broadcaster work against.
 */

import WebSocket from 'ws'
import type { TransportSocket } from './types'

export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  return Buffer.from(data).toString('utf8')
}

export function wrapWebSocket(ws: WebSocket): TransportSocket {
  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN
    },
    send(frame: string): Promise<void> {
      return new Promise((resolve, reject) => {
        ws.send(frame, (err?: Error) => {
          if (err) reject(err)
          else resolve()
        })
      })
    },
    close(code?: number, reason?: string): void {
      ws.close(code, reason)
    },
    onMessage(listener: (raw: string) => void): void {
      ws.on('message', (data: WebSocket.RawData) => listener(rawDataToString(data)))
    },
    onClose(listener: (code: number, reason: string) => void): void {
      ws.on('close', (code: number, reason: Buffer) => listener(code, reason.toString('utf8')))
    },
  }
}

/** Open a client connection and resolve once it is established */
export function openWebSocket(url: string): Promise<TransportSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url)

    const onError = (err: Error) => {
      ws.removeListener('open', onOpen)
      reject(err)
    }
    const onOpen = () => {
      ws.removeListener('error', onError)
      // Errors after open surface as a close; just log them here
      ws.on('error', (err: Error) => {
        console.error(`[BrainSocket] ${url}: ${err.message}`)
      })
      resolve(wrapWebSocket(ws))
    }

    ws.once('open', onOpen)
    ws.once('error', onError)
  })
}
