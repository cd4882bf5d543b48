/**
 * Reconciliation of live recognition results.
 *
 * Deepgram sends several revisions of the same utterance while it listens:
 * interim hypotheses first, then an `is_final` result, sometimes followed by
 * `speech_final` once the speaker pauses. Every revision of one utterance
 * carries the same `start` offset, so the ledger below keeps one current
 * segment per start offset and decides what reaches the client and storage.
 */

import type { TranscriptSegment, TranscriptSegmentPayload } from './types.js'

export class MalformedTranscriptError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedTranscriptError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readNumber(source: Record<string, unknown>, field: string): number {
  const value = source[field]
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MalformedTranscriptError(`Field "${field}" must be a finite number`)
  }
  return value
}

/**
 * Turns a Deepgram `Results` message into a segment.
 *
 * Returns null when the top hypothesis is empty; throws
 * MalformedTranscriptError when required fields are missing.
 */
export function reconcileTranscriptResult(result: unknown): TranscriptSegment | null {
  if (!isRecord(result)) {
    throw new MalformedTranscriptError('Result is not an object')
  }

  const channel = result.channel
  if (!isRecord(channel) || !Array.isArray(channel.alternatives)) {
    throw new MalformedTranscriptError('Result has no channel alternatives')
  }

  const top: unknown = channel.alternatives[0]
  if (!isRecord(top)) {
    throw new MalformedTranscriptError('Result has no top alternative')
  }

  const transcript = typeof top.transcript === 'string' ? top.transcript.trim() : ''
  if (!transcript) {
    return null
  }

  const start = readNumber(result, 'start')
  const duration = readNumber(result, 'duration')

  // Diarization: the first word's speaker stands for the whole segment
  let speaker: string | null = null
  if (Array.isArray(top.words) && top.words.length > 0) {
    const firstWord: unknown = top.words[0]
    if (isRecord(firstWord) && typeof firstWord.speaker === 'number') {
      speaker = `speaker_${firstWord.speaker}`
    }
  }

  // speech_final implies final
  const speechFinal = result.speech_final === true

  return {
    text: transcript,
    isFinal: result.is_final === true || speechFinal,
    speechFinal,
    speaker,
    start,
    end: start + Math.max(0, duration),
  }
}

/**
 * 0 = interim, 1 = final, 2 = speech final.
 */
export function finalityRank(segment: Pick<TranscriptSegment, 'isFinal' | 'speechFinal'>): number {
  if (segment.speechFinal) {
    return 2
  }
  return segment.isFinal ? 1 : 0
}

export function toSegmentPayload(segment: TranscriptSegment): TranscriptSegmentPayload {
  return {
    text: segment.text,
    is_final: segment.isFinal,
    speech_final: segment.speechFinal,
    speaker: segment.speaker,
    start: segment.start,
    end: segment.end,
  }
}

export interface LedgerDecision {
  /** Send to the client */
  forward: boolean
  /** Hand to persistence */
  persist: boolean
}

interface LedgerEntry {
  segment: TranscriptSegment
  persistedRank: number
}

/**
 * Current segment per start offset for one session.
 */
export class TranscriptLedger {
  private readonly entries = new Map<number, LedgerEntry>()
  private staleCount = 0

  /**
   * Records a revision and returns what to do with it.
   *
   * A revision less final than the one already held for its offset is stale:
   * it is neither forwarded nor persisted. Otherwise it replaces the entry.
   * Persistence happens once per step up in finality, starting at final.
   */
  apply(segment: TranscriptSegment): LedgerDecision {
    const rank = finalityRank(segment)
    const existing = this.entries.get(segment.start)

    if (existing && finalityRank(existing.segment) > rank) {
      this.staleCount++
      return { forward: false, persist: false }
    }

    const persistedRank = existing ? existing.persistedRank : 0
    const persist = rank >= 1 && rank > persistedRank

    this.entries.set(segment.start, {
      segment,
      persistedRank: persist ? rank : persistedRank,
    })

    return { forward: true, persist }
  }

  /**
   * Client-visible transcript: one segment per offset, ordered by start.
   */
  segments(): TranscriptSegment[] {
    return [...this.entries.values()]
      .map((entry) => entry.segment)
      .sort((a, b) => a.start - b.start)
  }

  summary(): { segments: number; finalSegments: number; staleRevisions: number } {
    let finalSegments = 0
    for (const entry of this.entries.values()) {
      if (finalityRank(entry.segment) >= 1) {
        finalSegments++
      }
    }

    return {
      segments: this.entries.size,
      finalSegments,
      staleRevisions: this.staleCount,
    }
  }
}
