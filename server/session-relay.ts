/**
 * Session relay: one instance per browser connection.
 *
 * Lifecycle:
 *   connecting → accepted → upstream_starting → active → closing → closed
 * with `failed` reachable from every non-terminal state.
 *
 * The relay owns exactly one upstream session. Audio goes browser → upstream
 * from the socket's message callback; upstream events come back through a
 * single pump reading the upstream event queue, so provider order is kept.
 * Every exit path ends in shutdown(), which finishes the upstream once.
 */

import { WebSocket } from 'ws'
import {
  TranscriptLedger,
  reconcileTranscriptResult,
  toSegmentPayload,
} from './transcript-reconciliation.js'
import {
  CloseCode,
  type ClientMessage,
  type ClientSocket,
  type RelayState,
  type TranscriptSegment,
  type TranscriptSink,
  type UpstreamEvent,
  type UpstreamSession,
  type UpstreamSessionFactory,
} from './types.js'
import {
  recordAudioChunk,
  recordClientClose,
  recordDroppedAudioChunk,
  recordError,
  recordMessageSent,
  recordSegmentForwarded,
  recordStaleRevision,
  recordStateTransition,
  trackUpstreamOpened,
  trackUpstreamReleased,
} from './metrics.js'

export interface SessionRelayOptions<C> {
  sessionId: string
  client: ClientSocket
  createUpstream: UpstreamSessionFactory<C>
  upstreamConfig: C
  sink: TranscriptSink
  /** Upper bound for the upstream drain on shutdown */
  finishTimeoutMs: number
  /** Audio chunks held while the upstream is starting */
  pendingAudioLimit: number
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

const TERMINAL_STATES: ReadonlySet<RelayState> = new Set(['closed', 'failed'])

const CLOSE_REASONS: Record<CloseCode, string> = {
  [CloseCode.INTERNAL_ERROR]: 'Transcription service error',
  [CloseCode.MISSING_SESSION_ID]: 'Missing session id',
  [CloseCode.UPSTREAM_INIT_FAILED]: 'Transcription service unavailable',
}

export class SessionRelay<C = unknown> {
  readonly sessionId: string
  private readonly options: SessionRelayOptions<C>
  private readonly ledger = new TranscriptLedger()
  private currentState: RelayState = 'connecting'
  private upstream: UpstreamSession | null = null
  private pendingAudio: Buffer[] = []
  private pump: Promise<void> = Promise.resolve()
  private shutdownPromise: Promise<void> | null = null

  constructor(options: SessionRelayOptions<C>) {
    this.options = options
    this.sessionId = options.sessionId
    recordStateTransition(null, this.currentState)
  }

  get state(): RelayState {
    return this.currentState
  }

  get transcript(): TranscriptLedger {
    return this.ledger
  }

  /**
   * Resolves once every upstream event queued so far has been handled.
   */
  drained(): Promise<void> {
    return this.pump
  }

  /**
   * Accepts the client and opens the upstream session.
   * Never rejects: startup failures are reported to the client.
   */
  async start(): Promise<void> {
    if (this.currentState !== 'connecting') {
      return
    }

    this.setState('accepted')
    console.log('[SessionRelay] Client accepted', { sessionId: this.sessionId })

    this.setState('upstream_starting')
    let started = false
    let failureReason = 'transcription service did not accept the stream'

    try {
      this.upstream = this.options.createUpstream(this.options.upstreamConfig)
      trackUpstreamOpened()
      started = await this.upstream.start()
    } catch (error) {
      failureReason = errorMessage(error)
      console.error('[SessionRelay] Error initializing upstream session:', {
        sessionId: this.sessionId,
        error: failureReason,
      })
    }

    // The client may have gone away while the upstream was starting
    if (this.state !== 'upstream_starting') {
      return
    }

    if (!started) {
      recordError(`Upstream init failed: ${failureReason}`)
      await this.fail(
        `Could not connect to transcription service: ${failureReason}`,
        CloseCode.UPSTREAM_INIT_FAILED,
      )
      return
    }

    this.setState('active')
    console.log('[SessionRelay] ✅ Upstream session active', { sessionId: this.sessionId })
    this.sendToClient({ type: 'status', payload: 'Transcription service connected. Ready for audio.' })

    const upstream = this.upstream
    if (upstream) {
      this.flushPendingAudio(upstream)
      this.pump = this.pumpUpstreamEvents(upstream)
    }
  }

  /**
   * Handles one message from the client socket.
   */
  handleClientMessage(data: Buffer, isBinary: boolean): void {
    if (TERMINAL_STATES.has(this.currentState) || this.currentState === 'closing') {
      return
    }

    if (!isBinary) {
      // Reserved for control messages
      console.debug('[SessionRelay] Ignoring text message', {
        sessionId: this.sessionId,
        length: data.length,
      })
      return
    }

    recordAudioChunk(data.length)

    if (Math.random() < 0.01) { // ~1% of chunks
      console.debug('[SessionRelay] Audio chunk received', {
        sessionId: this.sessionId,
        bytes: data.length,
        state: this.currentState,
      })
    }

    if (this.currentState === 'active' && this.upstream) {
      this.upstream.send(data)
      return
    }

    if (this.pendingAudio.length >= this.options.pendingAudioLimit) {
      recordDroppedAudioChunk()
      console.warn('[SessionRelay] ⚠️ Pending audio limit reached, dropping chunk', {
        sessionId: this.sessionId,
        pendingChunks: this.pendingAudio.length,
      })
      return
    }
    this.pendingAudio.push(data)
  }

  /**
   * Handles the client socket closing, for any reason and any code.
   */
  async handleClientClose(code: number): Promise<void> {
    console.log('[SessionRelay] Client disconnected', {
      sessionId: this.sessionId,
      code,
      state: this.currentState,
    })

    if (this.currentState === 'failed') {
      await this.shutdown()
      return
    }

    if (this.currentState !== 'closed') {
      this.setState('closing')
    }

    await this.shutdown()
    await this.pump

    this.setState('closed')
  }

  /**
   * Releases the upstream session. Runs the finish at most once and never rejects.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.releaseUpstream()
    }
    return this.shutdownPromise
  }

  private async releaseUpstream(): Promise<void> {
    this.pendingAudio = []
    const upstream = this.upstream
    if (!upstream) {
      return
    }

    let timeout: NodeJS.Timeout | undefined
    try {
      const finished = await Promise.race([
        upstream.finish().then(() => true),
        new Promise<boolean>((resolve) => {
          timeout = setTimeout(() => resolve(false), this.options.finishTimeoutMs)
        }),
      ])

      if (!finished) {
        console.warn('[SessionRelay] ⚠️ Upstream did not finish within timeout, aborting', {
          sessionId: this.sessionId,
          timeoutMs: this.options.finishTimeoutMs,
        })
        upstream.abort()
      }
    } catch (error) {
      const message = errorMessage(error)
      console.error('[SessionRelay] Error finishing upstream session:', {
        sessionId: this.sessionId,
        error: message,
      })
      recordError(`Upstream finish failed: ${message}`)
      upstream.abort()
    } finally {
      clearTimeout(timeout)
      trackUpstreamReleased()
    }

    console.log('[SessionRelay] Session torn down', {
      sessionId: this.sessionId,
      ...this.ledger.summary(),
    })
  }

  private setState(next: RelayState): void {
    recordStateTransition(this.currentState, next)
    this.currentState = next
  }

  private async fail(message: string, code: CloseCode): Promise<void> {
    if (TERMINAL_STATES.has(this.currentState)) {
      return
    }

    this.setState('failed')
    this.sendToClient({ type: 'error', payload: message })

    if (this.options.client.readyState === WebSocket.OPEN) {
      recordClientClose(code)
      this.options.client.close(code, CLOSE_REASONS[code])
    }

    await this.shutdown()
  }

  private flushPendingAudio(upstream: UpstreamSession): void {
    const pending = this.pendingAudio
    this.pendingAudio = []
    for (const chunk of pending) {
      upstream.send(chunk)
    }
  }

  private async pumpUpstreamEvents(upstream: UpstreamSession): Promise<void> {
    try {
      for await (const event of upstream.events) {
        await this.handleUpstreamEvent(event)
      }
    } catch (error) {
      console.error('[SessionRelay] Upstream event pump stopped:', {
        sessionId: this.sessionId,
        error: errorMessage(error),
      })
    }
  }

  private async handleUpstreamEvent(event: UpstreamEvent): Promise<void> {
    switch (event.kind) {
      case 'transcript':
        this.handleTranscript(event.result)
        return

      case 'speech_started':
      case 'utterance_end':
        if (this.currentState === 'active') {
          this.sendToClient({ type: 'event', payload: { type: event.kind } })
        }
        return

      case 'metadata':
        console.debug('[SessionRelay] Upstream metadata', { sessionId: this.sessionId })
        return

      case 'error':
        recordError(`Upstream error: ${event.message}`)
        if (this.currentState === 'active') {
          await this.fail(`Transcription service error: ${event.message}`, CloseCode.INTERNAL_ERROR)
        } else {
          console.warn('[SessionRelay] Upstream error after session end', {
            sessionId: this.sessionId,
            error: event.message,
          })
        }
        return

      case 'close':
        if (this.currentState === 'active') {
          recordError(`Upstream closed unexpectedly: ${event.code}`)
          await this.fail(
            `Transcription service error: connection closed unexpectedly (code ${event.code})`,
            CloseCode.INTERNAL_ERROR,
          )
        }
        return
    }
  }

  private handleTranscript(result: unknown): void {
    if (this.currentState === 'failed' || this.currentState === 'closed') {
      return
    }

    let segment: TranscriptSegment | null
    try {
      segment = reconcileTranscriptResult(result)
    } catch (error) {
      const message = errorMessage(error)
      console.error('[SessionRelay] Error processing transcript event:', {
        sessionId: this.sessionId,
        error: message,
      })
      recordError(`Error processing transcript: ${message}`)
      return
    }

    if (!segment) {
      return
    }

    const decision = this.ledger.apply(segment)
    if (!decision.forward) {
      recordStaleRevision()
      return
    }

    // Only segments the client actually received are stored
    const forwarded =
      this.currentState === 'active' &&
      this.sendToClient({ type: 'transcript_segment', payload: toSegmentPayload(segment) })

    if (forwarded) {
      recordSegmentForwarded()
    }

    if (decision.persist && forwarded) {
      this.persist(segment)
    } else if (decision.persist) {
      console.warn('[SessionRelay] Final segment not delivered, skipping persistence', {
        sessionId: this.sessionId,
        start: segment.start,
        state: this.currentState,
      })
    }
  }

  private persist(segment: TranscriptSegment): void {
    this.options.sink
      .appendSegment({
        sessionId: this.sessionId,
        text: segment.text,
        speaker: segment.speaker,
        start: segment.start,
        end: segment.end,
        isFinal: true,
      })
      .catch((error: unknown) => {
        const message = errorMessage(error)
        console.error('[SessionRelay] Error queueing transcript segment:', {
          sessionId: this.sessionId,
          error: message,
        })
        recordError(`Error queueing transcript: ${message}`)
      })
  }

  /**
   * Returns whether the message was handed to an open client socket.
   */
  private sendToClient(message: ClientMessage): boolean {
    const client = this.options.client
    if (client.readyState !== WebSocket.OPEN) {
      return false
    }

    try {
      client.send(JSON.stringify(message))
      recordMessageSent()
      return true
    } catch (error) {
      console.error('[SessionRelay] Failed to send message to client:', {
        sessionId: this.sessionId,
        type: message.type,
        error: errorMessage(error),
      })
      return false
    }
  }
}
