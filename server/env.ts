// server/env.ts
/**
 * Environment configuration for the transcription relay server.
 */

import dotenv from 'dotenv'

dotenv.config()

export interface UpstreamConfig {
  model: string
  language: string
  encoding: string
  sampleRate: number
  channels: number
  punctuate: boolean
  interimResults: boolean
  diarize: boolean
  smartFormat: boolean
  vadEvents: boolean
  utteranceEndMs: number
}

export interface DeepgramConfig {
  apiKey?: string
  url: string
  keepAliveIntervalMs: number
  startTimeoutMs: number
}

export interface BatchQueueConfig {
  /** Flush interval in ms */
  flushIntervalMs: number
  maxBatchSize: number
  /** Appends beyond this many pending segments are rejected */
  maxQueueSize: number
}

export interface ServerConfig {
  port: number
  deepgram: DeepgramConfig
  upstream: Readonly<UpstreamConfig>
  upstreamFinishTimeoutMs: number
  pendingAudioLimit: number
  databasePath: string
  batch: BatchQueueConfig
  testMode: boolean
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback
  }
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) ? parsed : fallback
}

/**
 * Whether dev test mode is on.
 *
 * In test mode unknown transcription ids are created on first write instead of
 * being rejected. Always off under NODE_ENV=production.
 */
export function isTestModeEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NODE_ENV === 'production') {
    return false
  }

  const raw = env.WS_TEST_MODE
  return raw === 'true' || raw === '1'
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Fixed per session: handed to every upstream session as-is and never renegotiated.
  const upstream: Readonly<UpstreamConfig> = Object.freeze({
    model: env.DEEPGRAM_MODEL || 'nova-2',
    language: env.DEEPGRAM_LANGUAGE || 'en',
    encoding: env.AUDIO_ENCODING || 'linear16',
    sampleRate: readInt(env.AUDIO_SAMPLE_RATE, 16000),
    channels: readInt(env.AUDIO_CHANNELS, 1),
    punctuate: true,
    interimResults: true,
    diarize: true,
    smartFormat: true,
    vadEvents: true,
    utteranceEndMs: readInt(env.DEEPGRAM_UTTERANCE_END_MS, 1000),
  })

  return {
    port: readInt(env.PORT || env.WS_PORT, 3001),
    deepgram: {
      apiKey: env.DEEPGRAM_API_KEY || undefined,
      url: env.DEEPGRAM_URL || 'wss://api.deepgram.com/v1/listen',
      keepAliveIntervalMs: readInt(env.DEEPGRAM_KEEPALIVE_MS, 8000),
      startTimeoutMs: readInt(env.UPSTREAM_START_TIMEOUT_MS, 10000),
    },
    upstream,
    upstreamFinishTimeoutMs: readInt(env.UPSTREAM_FINISH_TIMEOUT_MS, 5000),
    pendingAudioLimit: readInt(env.PENDING_AUDIO_LIMIT, 50),
    databasePath: env.DATABASE_PATH || 'transcripts.db',
    batch: {
      flushIntervalMs: readInt(env.TRANSCRIPT_FLUSH_INTERVAL_MS, 300),
      maxBatchSize: readInt(env.TRANSCRIPT_MAX_BATCH_SIZE, 100),
      maxQueueSize: readInt(env.TRANSCRIPT_MAX_QUEUE_SIZE, 1000),
    },
    testMode: isTestModeEnabled(env),
  }
}
