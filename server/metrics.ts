// server/metrics.ts
// In-process relay counters, exposed on /metrics

import type { RelayState } from './types.js'

export interface RelayMetrics {
  activeConnections: number
  /** Live sessions per state; `closed` and `failed` count every session that ended there */
  sessions: Record<RelayState, number>
  /** Close codes the relay sent to clients */
  closeCodes: Record<string, number>
  openUpstreams: number
  audio: {
    chunks: number
    bytes: number
    dropped: number
  }
  segments: {
    forwarded: number
    stale: number
    persisted: number
  }
  messagesSent: number
  errors: {
    total: number
    last?: {
      message: string
      timestamp: Date
    }
  }
  uptime: number // seconds
}

const serverStartTime = Date.now()

function emptyStateCounts(): Record<RelayState, number> {
  return {
    connecting: 0,
    accepted: 0,
    upstream_starting: 0,
    active: 0,
    closing: 0,
    closed: 0,
    failed: 0,
  }
}

function emptyMetrics(): Omit<RelayMetrics, 'uptime'> {
  return {
    activeConnections: 0,
    sessions: emptyStateCounts(),
    closeCodes: {},
    openUpstreams: 0,
    audio: { chunks: 0, bytes: 0, dropped: 0 },
    segments: { forwarded: 0, stale: 0, persisted: 0 },
    messagesSent: 0,
    errors: { total: 0 },
  }
}

let metrics = emptyMetrics()

export function trackConnectionOpened(): void {
  metrics.activeConnections++
}

export function trackConnectionClosed(): void {
  metrics.activeConnections = Math.max(0, metrics.activeConnections - 1)
}

/**
 * Moves one session between state buckets. `from` is null for a new session.
 */
export function recordStateTransition(from: RelayState | null, to: RelayState): void {
  if (from === to) {
    return
  }
  if (from) {
    metrics.sessions[from] = Math.max(0, metrics.sessions[from] - 1)
  }
  metrics.sessions[to]++
}

export function recordClientClose(code: number): void {
  const key = String(code)
  metrics.closeCodes[key] = (metrics.closeCodes[key] ?? 0) + 1
}

export function trackUpstreamOpened(): void {
  metrics.openUpstreams++
}

export function trackUpstreamReleased(): void {
  metrics.openUpstreams = Math.max(0, metrics.openUpstreams - 1)
}

export function recordAudioChunk(bytes: number): void {
  metrics.audio.chunks++
  metrics.audio.bytes += bytes
}

export function recordDroppedAudioChunk(): void {
  metrics.audio.dropped++
}

export function recordSegmentForwarded(): void {
  metrics.segments.forwarded++
}

export function recordStaleRevision(): void {
  metrics.segments.stale++
}

export function recordSegmentsPersisted(count: number): void {
  metrics.segments.persisted += count
}

export function recordMessageSent(): void {
  metrics.messagesSent++
}

export function recordError(message: string): void {
  metrics.errors.total++
  metrics.errors.last = {
    message,
    timestamp: new Date(),
  }
}

/**
 * Snapshot with a fresh uptime
 */
export function getMetrics(): RelayMetrics {
  return {
    ...metrics,
    sessions: { ...metrics.sessions },
    closeCodes: { ...metrics.closeCodes },
    audio: { ...metrics.audio },
    segments: { ...metrics.segments },
    errors: { ...metrics.errors },
    uptime: Math.floor((Date.now() - serverStartTime) / 1000),
  }
}

export function resetMetrics(): void {
  metrics = emptyMetrics()
}
