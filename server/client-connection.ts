import type { IncomingMessage } from 'http'
import { WebSocket } from 'ws'
import { SessionRelay } from './session-relay.js'
import {
  recordClientClose,
  recordError,
  trackConnectionClosed,
  trackConnectionOpened,
} from './metrics.js'
import { CloseCode, type TranscriptSink, type UpstreamSessionFactory } from './types.js'

export const TRANSCRIBE_PATH_PREFIX = '/ws/transcribe'

const SESSION_PATH_PATTERN = /^\/ws\/transcribe\/(\w+)\/?$/

const PING_INTERVAL_MS = 30000

/**
 * Extracts the session id from `/ws/transcribe/<id>/`.
 * Returns null when the id is missing or not a word token.
 */
export function parseSessionId(requestUrl: string | undefined): string | null {
  const pathname = new URL(requestUrl || '/', 'http://localhost').pathname
  const match = SESSION_PATH_PATTERN.exec(pathname)
  return match ? match[1] : null
}

export interface ClientConnectionDeps<C> {
  createUpstream: UpstreamSessionFactory<C>
  upstreamConfig: C
  sink: TranscriptSink
  finishTimeoutMs: number
  pendingAudioLimit: number
}

export interface ClientConnectionOptions<C> {
  ws: WebSocket
  req: IncomingMessage
  deps: ClientConnectionDeps<C>
}

/**
 * Wires a freshly upgraded client socket to a new session relay.
 * Returns the relay, or null when the connection was rejected.
 */
export function handleClientConnection<C>({
  ws,
  req,
  deps,
}: ClientConnectionOptions<C>): SessionRelay<C> | null {
  const sessionId = parseSessionId(req.url)

  if (!sessionId) {
    const errorMsg = 'Missing session id'
    console.error(`[WS-SERVER] ${errorMsg}`, { url: req.url })
    recordError(errorMsg)
    recordClientClose(CloseCode.MISSING_SESSION_ID)
    ws.close(CloseCode.MISSING_SESSION_ID, errorMsg)
    return null
  }

  console.log('[WS-SERVER] Client connected', {
    sessionId,
    remoteAddress: req.socket.remoteAddress,
  })

  trackConnectionOpened()

  const relay = new SessionRelay<C>({
    sessionId,
    client: ws,
    createUpstream: deps.createUpstream,
    upstreamConfig: deps.upstreamConfig,
    sink: deps.sink,
    finishTimeoutMs: deps.finishTimeoutMs,
    pendingAudioLimit: deps.pendingAudioLimit,
  })

  ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
    relay.handleClientMessage(toBuffer(data), isBinary)
  })

  const pingInterval = setInterval(() => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.ping()
    } else {
      clearInterval(pingInterval)
    }
  }, PING_INTERVAL_MS)

  ws.on('close', (code: number) => {
    clearInterval(pingInterval)
    trackConnectionClosed()
    relay
      .handleClientClose(code)
      .then(() => {
        console.log('[WS-SERVER] Session closed', { sessionId, state: relay.state })
      })
      .catch((error: unknown) => {
        console.error('[WS-SERVER] Error closing session:', error)
      })
  })

  ws.on('error', (error: Error) => {
    console.error('[WS-SERVER] Client WebSocket error', {
      sessionId,
      error: error.message,
      readyState: ws.readyState,
    })
    recordError(`Client WebSocket error: ${error.message}`)
  })

  relay.start().catch((error: unknown) => {
    console.error('[WS-SERVER] Unexpected error starting session:', error)
  })

  return relay
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data)
  }
  return Buffer.from(data)
}
