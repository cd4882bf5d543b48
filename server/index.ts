import http from 'http'
import { WebSocketServer } from 'ws'
import { loadConfig, type UpstreamConfig } from './env.js'
import { getMetrics } from './metrics.js'
import { createDeepgramBridge } from './deepgram-bridge.js'
import { TranscriptBatchQueue } from './transcript-batch-queue.js'
import { SqliteTranscriptRepository } from './transcript-repository.js'
import { TRANSCRIBE_PATH_PREFIX, handleClientConnection, type ClientConnectionDeps } from './client-connection.js'

const config = loadConfig()

if (config.testMode) {
  console.warn('[WS-SERVER] ⚠️ DEV TEST MODE ENABLED - unknown transcriptions are created on first write')
}

if (!config.deepgram.apiKey) {
  console.warn('[WS-SERVER] ⚠️ DEEPGRAM_API_KEY is not set - sessions will fail to start')
}

const repository = SqliteTranscriptRepository.open(config.databasePath)
const batchQueue = new TranscriptBatchQueue({
  repository,
  config: config.batch,
  createMissingTranscriptions: config.testMode,
})

const deps: ClientConnectionDeps<Readonly<UpstreamConfig>> = {
  createUpstream: (upstream) => createDeepgramBridge({ deepgram: config.deepgram, upstream }),
  upstreamConfig: config.upstream,
  sink: batchQueue,
  finishTimeoutMs: config.upstreamFinishTimeoutMs,
  pendingAudioLimit: config.pendingAudioLimit,
}

const server = http.createServer((req, res) => {
  const pathname = new URL(req.url || '/', 'http://localhost').pathname

  res.setHeader('Access-Control-Allow-Origin', '*')
  res.setHeader('Access-Control-Allow-Methods', 'GET')
  res.setHeader('Content-Type', 'application/json')

  if (pathname.startsWith(TRANSCRIBE_PATH_PREFIX)) {
    res.statusCode = 426
    res.end(JSON.stringify({ error: 'WebSocket endpoint. Use WebSocket upgrade.' }))
    return
  }

  if (pathname === '/health' && req.method === 'GET') {
    res.statusCode = 200
    res.end(JSON.stringify({
      status: 'ok',
      timestamp: new Date().toISOString(),
      queueLength: batchQueue.getMetrics().queueLength,
    }))
    return
  }

  if (pathname === '/metrics' && req.method === 'GET') {
    res.statusCode = 200
    res.end(JSON.stringify({
      ...getMetrics(),
      queue: batchQueue.getMetrics(),
    }, null, 2))
    return
  }

  if (pathname === '/' && req.method === 'GET') {
    res.statusCode = 200
    res.end(JSON.stringify({
      service: 'Live Transcription Relay',
      status: 'running',
      endpoints: {
        health: '/health',
        metrics: '/metrics',
        websocket: `${TRANSCRIBE_PATH_PREFIX}/{sessionId}/`,
      },
      timestamp: new Date().toISOString(),
    }))
    return
  }

  res.statusCode = 404
  res.end(JSON.stringify({ error: 'Not found' }))
})

const wss = new WebSocketServer({ noServer: true })

wss.on('connection', (ws, req: http.IncomingMessage) => {
  handleClientConnection({ ws, req, deps })
})

server.on('upgrade', (req, socket, head) => {
  const pathname = new URL(req.url || '/', 'http://localhost').pathname

  // The session id itself is validated after the upgrade so the client gets a close code
  if (!pathname.startsWith(TRANSCRIBE_PATH_PREFIX)) {
    console.warn(`[WS-SERVER] WebSocket upgrade rejected: unknown path ${pathname}`)
    socket.write('HTTP/1.1 404 Not Found\r\n\r\n')
    socket.destroy()
    return
  }

  wss.handleUpgrade(req, socket, head, (ws) => {
    wss.emit('connection', ws, req)
  })
})

server.listen(config.port, () => {
  console.log(`[WS-SERVER] Transcription relay listening on port ${config.port}`)
  console.log(`[WS-SERVER] WebSocket endpoint: ws://localhost:${config.port}${TRANSCRIBE_PATH_PREFIX}/{sessionId}/`)
  console.log(`[WS-SERVER] Health check: http://localhost:${config.port}/health`)
})

const gracefulShutdown = async (signal: string) => {
  console.log(`[WS-SERVER] Received ${signal}, starting graceful shutdown...`)

  for (const client of wss.clients) {
    client.close(1001, 'Server shutting down')
  }

  wss.close(() => {
    console.log('[WS-SERVER] WebSocket server closed')
  })

  server.close(() => {
    console.log('[WS-SERVER] HTTP server closed')
  })

  // Give relays time to drain their upstream sessions before the final flush
  await new Promise((resolve) => setTimeout(resolve, config.upstreamFinishTimeoutMs))

  try {
    await batchQueue.flushAll()
    console.log('[WS-SERVER] All pending transcripts flushed')
  } catch (error) {
    console.error('[WS-SERVER] Error flushing pending transcripts:', error)
  }

  repository.close()
  process.exit(0)
}

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM')
})
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT')
})
