// server/__tests__/session-relay.test.ts
import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest'
import { getMetrics, resetMetrics } from '../metrics.js'
import { SessionRelay } from '../session-relay.js'
import { CloseCode, type UpstreamSession } from '../types.js'
import { FakeClientSocket, FakeSink, FakeUpstream, transcriptEvent } from './fakes.js'

interface Harness {
  relay: SessionRelay<{ language: string }>
  client: FakeClientSocket
  upstream: FakeUpstream
  sink: FakeSink
  createUpstream: Mock<(config: { language: string }) => UpstreamSession>
}

function createHarness(upstream = new FakeUpstream(), finishTimeoutMs = 5000): Harness {
  const client = new FakeClientSocket()
  const sink = new FakeSink()
  const createUpstream = vi.fn<(config: { language: string }) => UpstreamSession>(() => upstream)
  const relay = new SessionRelay({
    sessionId: 'abc123',
    client,
    createUpstream,
    upstreamConfig: { language: 'en' },
    sink,
    finishTimeoutMs,
    pendingAudioLimit: 3,
  })
  return { relay, client, upstream, sink, createUpstream }
}

describe('SessionRelay', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    resetMetrics()
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.useRealTimers()
  })

  describe('startup', () => {
    it('should become active and notify the client', async () => {
      const { relay, client, createUpstream } = createHarness()

      await relay.start()

      expect(relay.state).toBe('active')
      expect(createUpstream).toHaveBeenCalledWith({ language: 'en' })
      expect(client.messages()).toEqual([
        { type: 'status', payload: 'Transcription service connected. Ready for audio.' },
      ])
    })

    it('should report a failed start and close with the init failure code', async () => {
      const upstream = new FakeUpstream({ startResult: false })
      const { relay, client } = createHarness(upstream)

      await relay.start()

      expect(relay.state).toBe('failed')
      expect(client.messages()).toEqual([
        {
          type: 'error',
          payload: 'Could not connect to transcription service: transcription service did not accept the stream',
        },
      ])
      expect(client.closeCalls).toEqual([
        { code: CloseCode.UPSTREAM_INIT_FAILED, reason: 'Transcription service unavailable' },
      ])
      expect(upstream.finishCalls).toBe(1)
    })

    it('should report an upstream that throws while starting', async () => {
      const upstream = new FakeUpstream({ startResult: new Error('handshake refused') })
      const { relay, client } = createHarness(upstream)

      await relay.start()

      expect(relay.state).toBe('failed')
      expect(client.messages()).toEqual([
        { type: 'error', payload: 'Could not connect to transcription service: handshake refused' },
      ])
      expect(client.closeCalls[0]?.code).toBe(CloseCode.UPSTREAM_INIT_FAILED)
    })

    it('should report a factory that throws', async () => {
      const { relay, client, createUpstream } = createHarness()
      createUpstream.mockImplementation(() => {
        throw new Error('DEEPGRAM_API_KEY is not set')
      })

      await relay.start()

      expect(relay.state).toBe('failed')
      expect(client.messages()).toEqual([
        { type: 'error', payload: 'Could not connect to transcription service: DEEPGRAM_API_KEY is not set' },
      ])
      expect(client.closeCalls[0]?.code).toBe(CloseCode.UPSTREAM_INIT_FAILED)
    })

    it('should not go active when the client left during startup', async () => {
      const upstream = new FakeUpstream({ deferStart: true })
      const { relay, client } = createHarness(upstream)

      const starting = relay.start()
      await relay.handleClientClose(1001)
      upstream.releaseStart(true)
      await starting

      expect(relay.state).toBe('closed')
      expect(client.sent).toEqual([])
      expect(upstream.finishCalls).toBe(1)
    })
  })

  describe('audio forwarding', () => {
    it('should forward binary chunks in order', async () => {
      const { relay, upstream } = createHarness()
      await relay.start()

      relay.handleClientMessage(Buffer.from('one'), true)
      relay.handleClientMessage(Buffer.from('two'), true)

      expect(upstream.sent.map((chunk) => chunk.toString())).toEqual(['one', 'two'])
    })

    it('should ignore text messages', async () => {
      const { relay, upstream } = createHarness()
      await relay.start()

      relay.handleClientMessage(Buffer.from('{"type":"stop"}'), false)

      expect(upstream.sent).toEqual([])
    })

    it('should hold audio received while starting and flush it in order', async () => {
      const upstream = new FakeUpstream({ deferStart: true })
      const { relay } = createHarness(upstream)

      const starting = relay.start()
      relay.handleClientMessage(Buffer.from('a'), true)
      relay.handleClientMessage(Buffer.from('b'), true)
      expect(upstream.sent).toEqual([])

      upstream.releaseStart(true)
      await starting
      relay.handleClientMessage(Buffer.from('c'), true)

      expect(upstream.sent.map((chunk) => chunk.toString())).toEqual(['a', 'b', 'c'])
    })

    it('should drop chunks beyond the pending limit', async () => {
      const upstream = new FakeUpstream({ deferStart: true })
      const { relay } = createHarness(upstream)

      const starting = relay.start()
      for (const chunk of ['1', '2', '3', '4']) {
        relay.handleClientMessage(Buffer.from(chunk), true)
      }
      upstream.releaseStart(true)
      await starting

      expect(upstream.sent.map((chunk) => chunk.toString())).toEqual(['1', '2', '3'])
    })

    it('should discard audio after the session closed', async () => {
      const { relay, upstream } = createHarness()
      await relay.start()
      await relay.handleClientClose(1000)

      relay.handleClientMessage(Buffer.from('late'), true)

      expect(upstream.sent).toEqual([])
    })
  })

  describe('transcript events', () => {
    it('should forward both revisions and persist only the final one', async () => {
      const { relay, client, upstream, sink } = createHarness()
      await relay.start()

      upstream.emit(transcriptEvent({ transcript: 'hello', start: 0, duration: 0.5 }))
      upstream.emit(
        transcriptEvent({ transcript: 'hello world', start: 0, duration: 1, isFinal: true, speechFinal: true }),
      )
      upstream.events.end()
      await relay.drained()

      expect(client.messages().slice(1)).toEqual([
        {
          type: 'transcript_segment',
          payload: { text: 'hello', is_final: false, speech_final: false, speaker: null, start: 0, end: 0.5 },
        },
        {
          type: 'transcript_segment',
          payload: { text: 'hello world', is_final: true, speech_final: true, speaker: null, start: 0, end: 1 },
        },
      ])
      expect(sink.appended).toEqual([
        { sessionId: 'abc123', text: 'hello world', speaker: null, start: 0, end: 1, isFinal: true },
      ])
    })

    it('should drop empty hypotheses entirely', async () => {
      const { relay, client, upstream, sink } = createHarness()
      await relay.start()

      upstream.emit(transcriptEvent({ transcript: '', start: 1, duration: 0.3, isFinal: true }))
      upstream.emit(transcriptEvent({ transcript: '   ', start: 1.3, duration: 0.3, speechFinal: true }))
      upstream.events.end()
      await relay.drained()

      expect(client.messages()).toHaveLength(1)
      expect(sink.appended).toEqual([])
    })

    it('should not forward an interim revision after the final one for the same offset', async () => {
      const { relay, client, upstream, sink } = createHarness()
      await relay.start()

      upstream.emit(transcriptEvent({ transcript: 'see you', start: 2, duration: 0.5, isFinal: true }))
      upstream.emit(transcriptEvent({ transcript: 'see', start: 2, duration: 0.25 }))
      upstream.events.end()
      await relay.drained()

      const segments = client.messages().filter((message) => message.type === 'transcript_segment')
      expect(segments).toEqual([
        {
          type: 'transcript_segment',
          payload: { text: 'see you', is_final: true, speech_final: false, speaker: null, start: 2, end: 2.5 },
        },
      ])
      expect(sink.appended).toHaveLength(1)
      expect(getMetrics().segments).toEqual({ forwarded: 1, stale: 1, persisted: 0 })
    })

    it('should keep every revision after a final marked final', async () => {
      const { relay, client, upstream, sink } = createHarness()
      await relay.start()

      upstream.emit(transcriptEvent({ transcript: 'all set', start: 0, duration: 0.5, isFinal: true }))
      upstream.emit(transcriptEvent({ transcript: 'all set', start: 0, duration: 0.5, speechFinal: true }))
      upstream.events.end()
      await relay.drained()

      const payloads = client
        .messages()
        .flatMap((message) => (message.type === 'transcript_segment' ? [message.payload] : []))
      expect(payloads.map((payload) => [payload.is_final, payload.speech_final])).toEqual([
        [true, false],
        [true, true],
      ])
      expect(sink.appended).toHaveLength(2)
    })

    it('should label the speaker from the first word', async () => {
      const { relay, client, upstream } = createHarness()
      await relay.start()

      upstream.emit(transcriptEvent({ transcript: 'hi there', start: 0, duration: 0.5, speaker: 1 }))
      upstream.events.end()
      await relay.drained()

      const [, segment] = client.messages()
      expect(segment).toEqual({
        type: 'transcript_segment',
        payload: { text: 'hi there', is_final: false, speech_final: false, speaker: 'speaker_1', start: 0, end: 0.5 },
      })
    })

    it('should skip a malformed event and keep the session running', async () => {
      const { relay, client, upstream } = createHarness()
      await relay.start()

      upstream.emit({ kind: 'transcript', result: { type: 'Results', start: 0 } })
      upstream.emit(transcriptEvent({ transcript: 'still here', start: 1, duration: 0.5 }))
      upstream.events.end()
      await relay.drained()

      expect(relay.state).toBe('active')
      expect(client.messages().map((message) => message.type)).toEqual(['status', 'transcript_segment'])
    })

    it('should forward speech events as notifications', async () => {
      const { relay, client, upstream, sink } = createHarness()
      await relay.start()

      upstream.emit({ kind: 'speech_started' })
      upstream.emit({ kind: 'utterance_end' })
      upstream.emit({ kind: 'metadata', data: { request_id: 'req-1' } })
      upstream.events.end()
      await relay.drained()

      expect(client.messages().slice(1)).toEqual([
        { type: 'event', payload: { type: 'speech_started' } },
        { type: 'event', payload: { type: 'utterance_end' } },
      ])
      expect(sink.appended).toEqual([])
    })

    it('should keep the session alive when persistence fails', async () => {
      const { relay, client, upstream, sink } = createHarness()
      sink.failWith = new Error('database is locked')
      await relay.start()

      upstream.emit(transcriptEvent({ transcript: 'kept', start: 0, duration: 0.5, isFinal: true }))
      upstream.events.end()
      await relay.drained()

      expect(relay.state).toBe('active')
      expect(client.messages().map((message) => message.type)).toEqual(['status', 'transcript_segment'])
    })
  })

  describe('failure and teardown', () => {
    it('should send one error and close with the internal error code on an upstream error', async () => {
      const { relay, client, upstream } = createHarness()
      await relay.start()

      upstream.emit({ kind: 'error', message: 'quota exceeded' })
      await relay.drained()

      expect(relay.state).toBe('failed')
      expect(client.messages().slice(1)).toEqual([
        { type: 'error', payload: 'Transcription service error: quota exceeded' },
      ])
      expect(client.closeCalls).toEqual([
        { code: CloseCode.INTERNAL_ERROR, reason: 'Transcription service error' },
      ])
      expect(upstream.finishCalls).toBe(1)

      await relay.handleClientClose(CloseCode.INTERNAL_ERROR)
      expect(upstream.finishCalls).toBe(1)
      expect(relay.state).toBe('failed')
    })

    it('should fail when the upstream closes on its own', async () => {
      const { relay, client, upstream } = createHarness()
      await relay.start()

      upstream.emit({ kind: 'close', code: 1011, reason: 'internal' })
      await relay.drained()

      expect(relay.state).toBe('failed')
      expect(client.messages()[1]).toEqual({
        type: 'error',
        payload: 'Transcription service error: connection closed unexpectedly (code 1011)',
      })
      expect(client.closeCalls[0]?.code).toBe(CloseCode.INTERNAL_ERROR)
    })

    it('should count the failure and the close code it sent', async () => {
      const { relay, upstream } = createHarness()
      await relay.start()

      upstream.emit({ kind: 'close', code: 1011, reason: 'internal' })
      await relay.drained()

      const metrics = getMetrics()
      expect(metrics.sessions.failed).toBe(1)
      expect(metrics.sessions.active).toBe(0)
      expect(metrics.closeCodes).toEqual({ [String(CloseCode.INTERNAL_ERROR)]: 1 })
      expect(metrics.errors.total).toBe(1)
      expect(metrics.errors.last?.message).toBe('Upstream closed unexpectedly: 1011')
    })

    it('should finish the upstream exactly once on a clean disconnect', async () => {
      const { relay, upstream } = createHarness()
      await relay.start()

      await expect(relay.handleClientClose(1000)).resolves.toBeUndefined()

      expect(relay.state).toBe('closed')
      expect(upstream.finishCalls).toBe(1)
      expect(upstream.abortCalls).toBe(0)
    })

    it('should track the session through its states', async () => {
      const { relay } = createHarness()
      await relay.start()
      expect(getMetrics()).toMatchObject({
        sessions: { active: 1, connecting: 0 },
        openUpstreams: 1,
        messagesSent: 1,
      })

      await relay.handleClientClose(1000)

      expect(getMetrics()).toMatchObject({
        sessions: { active: 0, closing: 0, closed: 1 },
        openUpstreams: 0,
      })
    })

    it('should be idempotent when shut down twice', async () => {
      const { relay, client, upstream } = createHarness()
      await relay.start()
      const sentBefore = client.sent.length

      await relay.shutdown()
      await relay.shutdown()

      expect(upstream.finishCalls).toBe(1)
      expect(client.sent).toHaveLength(sentBefore)
    })

    it('should not persist results drained after the client left', async () => {
      const { relay, client, upstream, sink } = createHarness()
      await relay.start()
      client.readyState = 3

      upstream.emit(transcriptEvent({ transcript: 'last words', start: 4, duration: 1, isFinal: true }))
      await relay.handleClientClose(1000)

      expect(client.sent).toHaveLength(1)
      expect(sink.appended).toEqual([])
    })

    it('should never persist more segments than it forwarded', async () => {
      const { relay, client, upstream, sink } = createHarness()
      await relay.start()

      upstream.emit(transcriptEvent({ transcript: 'hello', start: 0, duration: 0.5, isFinal: true }))
      await vi.waitFor(() => expect(sink.appended).toHaveLength(1))
      client.readyState = 3
      upstream.emit(transcriptEvent({ transcript: 'bye', start: 1, duration: 0.5, isFinal: true }))
      await relay.handleClientClose(1000)

      const forwarded = client.messages().filter((message) => message.type === 'transcript_segment')
      expect(forwarded).toHaveLength(1)
      expect(sink.appended.map((segment) => segment.text)).toEqual(['hello'])
    })

    it('should abort an upstream that does not finish in time', async () => {
      vi.useFakeTimers()
      const upstream = new FakeUpstream({ hangOnFinish: true })
      const { relay } = createHarness(upstream, 1000)
      await relay.start()

      const closing = relay.handleClientClose(1000)
      await vi.advanceTimersByTimeAsync(1000)
      await closing

      expect(upstream.abortCalls).toBe(1)
      expect(relay.state).toBe('closed')
    })
  })
})
