/**
 * Brain pipeline configuration
 *
 * Defaults, overridden by environment variables, overridden by explicit
 * values passed by the caller. Unusable environment values are reported and
 * ignored.
 */

import type { BindingInput } from './brain-pipeline/routing'

export interface BrainConfig {
  server: {
    host: string
    port: number
    heartbeatIntervalMs: number
    heartbeatGraceMs: number
    handshakeTimeoutMs: number
  }
  bus: {
    requestTimeoutMs: number
    sweepIntervalMs: number | null    // null: derived from request timeouts
  }
  broadcaster: {
    host: string
    port: number
    portFallbacks: number
    retryWindowMs: number
    maxRetries: number
    queueLimit: number
  }
  bridge: {
    defaultTarget: string
    commandTimeoutMs: number
    mockMode: boolean
    mockStepDelayMs: number
  }
  routing: {
    defaultAgent: string | null       // null: untargeted messages go by subscription only
    bindings: BindingInput[]
  }
}

export type BrainConfigOverrides = {
  [K in keyof BrainConfig]?: Partial<BrainConfig[K]>
}

type Env = Record<string, string | undefined>

export const DEFAULT_BRAIN_CONFIG: BrainConfig = {
  server: {
    host: '0.0.0.0',
    port: 8765,
    heartbeatIntervalMs: 30_000,
    heartbeatGraceMs: 90_000,
    handshakeTimeoutMs: 10_000,
  },
  bus: {
    requestTimeoutMs: 30_000,
    sweepIntervalMs: null,
  },
  broadcaster: {
    host: '0.0.0.0',
    port: 8766,
    portFallbacks: 3,
    retryWindowMs: 2_000,
    maxRetries: 3,
    queueLimit: 256,
  },
  bridge: {
    defaultTarget: 'cerebellum',
    commandTimeoutMs: 30_000,
    mockMode: true,
    mockStepDelayMs: 100,
  },
  routing: {
    defaultAgent: null,
    bindings: [],
  },
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

interface IntRange {
  min?: number
  max?: number
}

function readInt(env: Env, name: string, fallback: number, range: IntRange = {}): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback

  const value = Number(raw.trim())
  const min = range.min ?? 0
  const max = range.max ?? Number.MAX_SAFE_INTEGER
  if (!Number.isInteger(value) || value < min || value > max) {
    console.warn(`[BrainConfig] Ignoring ${name}=${JSON.stringify(raw)}: expected an integer in [${min}, ${max}], using ${fallback}`)
    return fallback
  }
  return value
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback

  const normalized = raw.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  console.warn(`[BrainConfig] Ignoring ${name}=${JSON.stringify(raw)}: expected a boolean, using ${fallback}`)
  return fallback
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim()
  return raw ? raw : fallback
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export function loadBrainConfig(env: Env = process.env, overrides: BrainConfigOverrides = {}): BrainConfig {
  const d = DEFAULT_BRAIN_CONFIG
  const heartbeatIntervalMs = readInt(env, 'BRAIN_HEARTBEAT_INTERVAL_MS', d.server.heartbeatIntervalMs, { min: 1 })
  const sweepIntervalMs = env.BUS_SWEEP_INTERVAL_MS === undefined
    ? d.bus.sweepIntervalMs
    : readInt(env, 'BUS_SWEEP_INTERVAL_MS', 0, { min: 0 }) || null

  const fromEnv: BrainConfig = {
    server: {
      host: readString(env, 'BRAIN_HOST', d.server.host),
      port: readInt(env, 'BRAIN_PORT', d.server.port, { max: 65535 }),
      heartbeatIntervalMs,
      heartbeatGraceMs: readInt(env, 'BRAIN_HEARTBEAT_GRACE_MS', heartbeatIntervalMs * 3, { min: 1 }),
      handshakeTimeoutMs: readInt(env, 'BRAIN_HANDSHAKE_TIMEOUT_MS', d.server.handshakeTimeoutMs, { min: 1 }),
    },
    bus: {
      requestTimeoutMs: readInt(env, 'BUS_REQUEST_TIMEOUT_MS', d.bus.requestTimeoutMs, { min: 1 }),
      sweepIntervalMs,
    },
    broadcaster: {
      host: readString(env, 'BROADCASTER_HOST', d.broadcaster.host),
      port: readInt(env, 'BROADCASTER_PORT', d.broadcaster.port, { max: 65535 }),
      portFallbacks: readInt(env, 'BROADCASTER_PORT_FALLBACKS', d.broadcaster.portFallbacks, { max: 100 }),
      retryWindowMs: readInt(env, 'BROADCAST_RETRY_WINDOW_MS', d.broadcaster.retryWindowMs, { min: 1 }),
      maxRetries: readInt(env, 'BROADCAST_MAX_RETRIES', d.broadcaster.maxRetries),
      queueLimit: readInt(env, 'BROADCAST_QUEUE_LIMIT', d.broadcaster.queueLimit, { min: 1 }),
    },
    bridge: {
      defaultTarget: readString(env, 'BRIDGE_DEFAULT_TARGET', d.bridge.defaultTarget),
      commandTimeoutMs: readInt(env, 'COMMAND_TIMEOUT_MS', d.bridge.commandTimeoutMs, { min: 1 }),
      mockMode: readBool(env, 'BRIDGE_MOCK_MODE', d.bridge.mockMode),
      mockStepDelayMs: readInt(env, 'MOCK_STEP_DELAY_MS', d.bridge.mockStepDelayMs),
    },
    routing: {
      defaultAgent: env.BRAIN_DEFAULT_AGENT?.trim() || d.routing.defaultAgent,
      bindings: d.routing.bindings,
    },
  }

  return {
    server: { ...fromEnv.server, ...overrides.server },
    bus: { ...fromEnv.bus, ...overrides.bus },
    broadcaster: { ...fromEnv.broadcaster, ...overrides.broadcaster },
    bridge: { ...fromEnv.bridge, ...overrides.bridge },
    routing: { ...fromEnv.routing, ...overrides.routing },
  }
}
