/**
 * Deepgram live transcription WebSocket bridge.
 *
 * Streams raw audio to Deepgram's /v1/listen endpoint and pushes every
 * message it gets back into an ordered event queue. The bridge does not
 * interpret results; reconciliation happens in the relay.
 *
 * Deepgram closes idle streams after ~10 seconds without audio, so a
 * KeepAlive message is sent on an interval while the socket is open.
 */

import { WebSocket } from 'ws'
import { AsyncEventQueue } from './event-queue.js'
import type { DeepgramConfig, UpstreamConfig } from './env.js'
import type { UpstreamEvent, UpstreamSession } from './types.js'

export class UpstreamStartError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UpstreamStartError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Builds the listen URL with the session configuration as query parameters.
 */
export function buildListenUrl(baseUrl: string, config: UpstreamConfig): string {
  const url = new URL(baseUrl)
  url.searchParams.set('model', config.model)
  url.searchParams.set('language', config.language)
  url.searchParams.set('encoding', config.encoding)
  url.searchParams.set('sample_rate', String(config.sampleRate))
  url.searchParams.set('channels', String(config.channels))
  url.searchParams.set('punctuate', String(config.punctuate))
  url.searchParams.set('interim_results', String(config.interimResults))
  url.searchParams.set('diarize', String(config.diarize))
  url.searchParams.set('smart_format', String(config.smartFormat))
  url.searchParams.set('vad_events', String(config.vadEvents))
  url.searchParams.set('utterance_end_ms', String(config.utteranceEndMs))
  return url.toString()
}

/**
 * Maps a raw Deepgram message to a relay event.
 *
 * Returns null for message types the relay has no use for. Throws on invalid JSON.
 */
export function parseDeepgramMessage(raw: string): UpstreamEvent | null {
  const message: unknown = JSON.parse(raw)
  if (!isRecord(message)) {
    return null
  }

  switch (message.type) {
    case 'Results':
      return { kind: 'transcript', result: message }
    case 'SpeechStarted':
      return { kind: 'speech_started' }
    case 'UtteranceEnd':
      return { kind: 'utterance_end' }
    case 'Metadata':
      return { kind: 'metadata', data: message }
    case 'Error': {
      const description =
        typeof message.description === 'string'
          ? message.description
          : typeof message.message === 'string'
            ? message.message
            : 'Unknown transcription service error'
      return { kind: 'error', message: description }
    }
    default:
      return null
  }
}

export interface DeepgramBridgeOptions {
  deepgram: DeepgramConfig
  upstream: Readonly<UpstreamConfig>
}

/**
 * Creates an upstream session against Deepgram.
 * Throws when no API key is configured.
 */
export function createDeepgramBridge({ deepgram, upstream }: DeepgramBridgeOptions): UpstreamSession {
  const apiKey = deepgram.apiKey
  if (!apiKey) {
    throw new UpstreamStartError('DEEPGRAM_API_KEY is not set')
  }

  const listenUrl = buildListenUrl(deepgram.url, upstream)
  const events = new AsyncEventQueue<UpstreamEvent>()

  let socket: WebSocket | null = null
  let startPromise: Promise<boolean> | null = null
  let finishPromise: Promise<void> | null = null
  let keepAliveTimer: NodeJS.Timeout | null = null
  let isOpen = false
  let isClosed = false

  const stopKeepAlive = () => {
    if (keepAliveTimer) {
      clearInterval(keepAliveTimer)
      keepAliveTimer = null
    }
  }

  const startKeepAlive = (ws: WebSocket) => {
    if (deepgram.keepAliveIntervalMs <= 0) {
      return
    }
    keepAliveTimer = setInterval(() => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify({ type: 'KeepAlive' }))
      }
    }, deepgram.keepAliveIntervalMs)
  }

  const openSocket = (): Promise<boolean> =>
    new Promise<boolean>((resolve) => {
      let settled = false
      const settle = (ok: boolean) => {
        if (!settled) {
          settled = true
          clearTimeout(startTimeout)
          resolve(ok)
        }
      }

      const ws = new WebSocket(listenUrl, {
        headers: { Authorization: `Token ${apiKey}` },
      })
      socket = ws

      const startTimeout = setTimeout(() => {
        console.error('[DeepgramBridge] Timeout opening Deepgram stream', {
          timeoutMs: deepgram.startTimeoutMs,
        })
        settle(false)
        ws.terminate()
      }, deepgram.startTimeoutMs)

      ws.on('open', () => {
        console.log('[DeepgramBridge] ✅ Connected to Deepgram live transcription')
        isOpen = true
        startKeepAlive(ws)
        settle(true)
      })

      ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
        if (isBinary) {
          return
        }

        try {
          const event = parseDeepgramMessage(data.toString())
          if (event) {
            events.push(event)
          }
        } catch (error) {
          console.error('[DeepgramBridge] Error parsing message:', {
            error: error instanceof Error ? error.message : String(error),
          })
        }
      })

      ws.on('error', (error) => {
        console.error('[DeepgramBridge] WebSocket error:', {
          error: error.message,
          readyState: ws.readyState,
        })
        if (isOpen) {
          events.push({ kind: 'error', message: error.message })
        }
        settle(false)
      })

      ws.on('close', (code, reason) => {
        console.log('[DeepgramBridge] WebSocket closed', {
          code,
          reason: reason.toString(),
        })
        isOpen = false
        isClosed = true
        stopKeepAlive()
        settle(false)
        events.push({ kind: 'close', code, reason: reason.toString() })
        events.end()
      })
    })

  const closeGracefully = async (): Promise<void> => {
    stopKeepAlive()
    const ws = socket

    if (!ws || isClosed) {
      events.end()
      return
    }

    if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate()
      return
    }

    const closed = new Promise<void>((resolve) => {
      ws.once('close', () => resolve())
    })

    if (ws.readyState === WebSocket.OPEN) {
      // CloseStream asks Deepgram to flush the remaining results and then close
      ws.send(JSON.stringify({ type: 'CloseStream' }))
    }

    await closed
    console.log('[DeepgramBridge] Deepgram stream closed gracefully')
  }

  return {
    events,

    start(): Promise<boolean> {
      if (!startPromise) {
        startPromise = finishPromise ? Promise.resolve(false) : openSocket()
      }
      return startPromise
    },

    send(chunk: Buffer) {
      if (!isOpen || isClosed || finishPromise || !socket) {
        return
      }

      try {
        socket.send(chunk)
      } catch (error) {
        console.error('[DeepgramBridge] Error sending audio chunk:', {
          error: error instanceof Error ? error.message : String(error),
          chunkSize: chunk.length,
        })
      }
    },

    finish(): Promise<void> {
      if (!finishPromise) {
        finishPromise = closeGracefully()
      }
      return finishPromise
    },

    abort() {
      stopKeepAlive()
      if (socket && !isClosed) {
        socket.terminate()
      }
      events.end()
    },
  }
}
