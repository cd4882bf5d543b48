// server/types.ts
/**
 * Types shared by the transcription relay.
 */

/**
 * Close codes the relay sends to the browser.
 */
export const CloseCode = {
  /** Fatal error during an active session */
  INTERNAL_ERROR: 4000,
  /** Missing or invalid session id in the URL */
  MISSING_SESSION_ID: 4001,
  /** Transcription service could not be started */
  UPSTREAM_INIT_FAILED: 4002,
} as const

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode]

export type RelayState =
  | 'connecting'
  | 'accepted'
  | 'upstream_starting'
  | 'active'
  | 'closing'
  | 'closed'
  | 'failed'

/**
 * A recognized piece of speech after reconciliation.
 */
export interface TranscriptSegment {
  text: string
  isFinal: boolean
  speechFinal: boolean
  speaker: string | null
  /** Offset from stream start, seconds */
  start: number
  end: number
}

/**
 * Wire shape of a transcript segment, as the browser client expects it.
 */
export interface TranscriptSegmentPayload {
  text: string
  is_final: boolean
  speech_final: boolean
  speaker: string | null
  start: number
  end: number
}

export type SpeechEventType = 'speech_started' | 'utterance_end'

/**
 * Messages sent from the relay to the browser client.
 */
export type ClientMessage =
  | { type: 'status'; payload: string }
  | { type: 'error'; payload: string }
  | { type: 'transcript_segment'; payload: TranscriptSegmentPayload }
  | { type: 'event'; payload: { type: SpeechEventType } }

/**
 * Events coming out of an upstream transcription session, in provider order.
 */
export type UpstreamEvent =
  | { kind: 'transcript'; result: unknown }
  | { kind: 'speech_started' }
  | { kind: 'utterance_end' }
  | { kind: 'metadata'; data: unknown }
  | { kind: 'error'; message: string }
  | { kind: 'close'; code: number; reason: string }

/**
 * A streaming session against the transcription provider.
 * Owned by exactly one relay for its whole lifetime.
 */
export interface UpstreamSession {
  /** Ends once the provider connection is closed, finished or aborted */
  readonly events: AsyncIterable<UpstreamEvent>
  /** Resolves true once the provider accepted the stream */
  start(): Promise<boolean>
  send(chunk: Buffer): void
  /** Graceful drain and close. Safe to call more than once or before start */
  finish(): Promise<void>
  /** Drops the connection without draining */
  abort(): void
}

export type UpstreamSessionFactory<C> = (config: C) => UpstreamSession

/**
 * A finalized segment handed to persistence.
 */
export interface FinalizedSegment {
  sessionId: string
  text: string
  speaker: string | null
  start: number
  end: number
  isFinal: boolean
}

export interface TranscriptSink {
  appendSegment(segment: FinalizedSegment): Promise<void>
}

/**
 * The part of a client socket the relay talks to.
 */
export interface ClientSocket {
  readonly readyState: number
  send(data: string): void
  close(code?: number, reason?: string): void
}
