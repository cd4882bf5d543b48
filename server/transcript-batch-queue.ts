/**
 * Batched persistence of finalized transcript segments.
 *
 * Segments are not written one by one: appends land in an in-memory queue and
 * a timer flushes them in batches, one transaction per session. Write errors
 * are logged and counted; they never reach the live relay.
 */

import type { BatchQueueConfig } from './env.js'
import { recordSegmentsPersisted, recordError } from './metrics.js'
import { TranscriptionNotFoundError, type TranscriptRepository } from './transcript-repository.js'
import type { FinalizedSegment, TranscriptSink } from './types.js'

export interface QueueMetrics {
  queueLength: number
  totalQueued: number
  totalFlushed: number
  totalErrors: number
  lastFlushTime?: Date
  lastError?: {
    message: string
    timestamp: Date
  }
}

export interface TranscriptBatchQueueOptions {
  repository: TranscriptRepository
  config: BatchQueueConfig
  /** Create unknown transcriptions on first write instead of dropping their segments */
  createMissingTranscriptions?: boolean
}

export class TranscriptBatchQueue implements TranscriptSink {
  private readonly repository: TranscriptRepository
  private readonly config: BatchQueueConfig
  private readonly createMissingTranscriptions: boolean
  private readonly pendingSegments: FinalizedSegment[] = []
  private flushTimer: NodeJS.Timeout | null = null
  private isFlushing = false
  private readonly metrics: QueueMetrics = {
    queueLength: 0,
    totalQueued: 0,
    totalFlushed: 0,
    totalErrors: 0,
  }

  constructor(options: TranscriptBatchQueueOptions) {
    this.repository = options.repository
    this.config = options.config
    this.createMissingTranscriptions = options.createMissingTranscriptions ?? false
  }

  /**
   * Queues a finalized segment. Rejects when the queue is full.
   */
  async appendSegment(segment: FinalizedSegment): Promise<void> {
    if (this.pendingSegments.length >= this.config.maxQueueSize) {
      const errorMsg = `Queue overflow: ${this.pendingSegments.length} >= ${this.config.maxQueueSize}`
      console.error('[TranscriptBatchQueue] Queue overflow!', {
        queueLength: this.pendingSegments.length,
        maxQueueSize: this.config.maxQueueSize,
        sessionId: segment.sessionId,
      })
      this.recordFailure(errorMsg)
      throw new Error(errorMsg)
    }

    if (this.pendingSegments.length >= this.config.maxQueueSize * 0.8) {
      console.warn('[TranscriptBatchQueue] Queue approaching limit', {
        queueLength: this.pendingSegments.length,
        maxQueueSize: this.config.maxQueueSize,
      })
    }

    this.pendingSegments.push(segment)
    this.metrics.queueLength = this.pendingSegments.length
    this.metrics.totalQueued++

    if (!this.flushTimer) {
      this.startFlushTimer()
    }
  }

  /**
   * Writes one batch. Concurrent calls while a flush runs are no-ops.
   */
  async flushBatch(): Promise<void> {
    if (this.isFlushing || this.pendingSegments.length === 0) {
      return
    }

    this.isFlushing = true

    try {
      const batch = this.pendingSegments.splice(0, this.config.maxBatchSize)
      this.metrics.queueLength = this.pendingSegments.length

      const bySession = new Map<string, FinalizedSegment[]>()
      for (const segment of batch) {
        const segments = bySession.get(segment.sessionId) || []
        segments.push(segment)
        bySession.set(segment.sessionId, segments)
      }

      for (const [sessionId, segments] of bySession) {
        try {
          this.flushSession(sessionId, segments)
          recordSegmentsPersisted(segments.length)
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error)
          console.error('[TranscriptBatchQueue] Error flushing batch for session:', {
            sessionId,
            segmentCount: segments.length,
            error: message,
          })
          this.recordFailure(message)
        }
      }

      this.metrics.totalFlushed += batch.length
      this.metrics.lastFlushTime = new Date()

      if (batch.length >= this.config.maxBatchSize || this.pendingSegments.length === 0) {
        console.log('[TranscriptBatchQueue] Batch flushed', {
          batchSize: batch.length,
          remainingInQueue: this.pendingSegments.length,
          totalFlushed: this.metrics.totalFlushed,
        })
      }
    } finally {
      this.isFlushing = false
    }

    if (this.pendingSegments.length === 0) {
      this.stopFlushTimer()
    }
  }

  /**
   * Writes everything still queued. Used on graceful shutdown.
   */
  async flushAll(): Promise<void> {
    this.stopFlushTimer()

    while (this.pendingSegments.length > 0 && !this.isFlushing) {
      await this.flushBatch()
    }
  }

  stopFlushTimer(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer)
      this.flushTimer = null
    }
  }

  getMetrics(): QueueMetrics {
    return {
      ...this.metrics,
      queueLength: this.pendingSegments.length,
    }
  }

  private startFlushTimer(): void {
    this.flushTimer = setInterval(() => {
      this.flushBatch().catch((error: unknown) => {
        console.error('[TranscriptBatchQueue] Error in flush timer:', error)
        this.recordFailure(error instanceof Error ? error.message : String(error))
      })
    }, this.config.flushIntervalMs)
  }

  private flushSession(sessionId: string, segments: FinalizedSegment[]): void {
    if (!this.repository.findTranscription(sessionId)) {
      if (!this.createMissingTranscriptions) {
        throw new TranscriptionNotFoundError(sessionId)
      }
      this.repository.createTranscription(sessionId, `Live session ${sessionId}`)
    }

    this.repository.upsertSegments(
      sessionId,
      segments.map((segment) => ({
        text: segment.text,
        speaker: segment.speaker,
        startTime: segment.start,
        endTime: segment.end,
        isFinal: segment.isFinal,
      })),
    )
  }

  private recordFailure(message: string): void {
    this.metrics.totalErrors++
    this.metrics.lastError = {
      message,
      timestamp: new Date(),
    }
    recordError(message)
  }
}
