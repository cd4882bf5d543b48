/**
 * SQLite storage for transcriptions and their finalized segments.
 */

import Database from 'better-sqlite3'

export class TranscriptionNotFoundError extends Error {
  constructor(readonly transcriptionId: string) {
    super(`Transcription not found: ${transcriptionId}`)
    this.name = 'TranscriptionNotFoundError'
  }
}

export interface TranscriptionRecord {
  id: string
  title: string
  createdAt: string
}

export interface StoredSegment {
  text: string
  speaker: string | null
  startTime: number
  endTime: number
  isFinal: boolean
}

export interface TranscriptRepository {
  findTranscription(id: string): TranscriptionRecord | null
  createTranscription(id: string, title: string): TranscriptionRecord
  /** Writes all segments in one transaction, one row per start offset */
  upsertSegments(transcriptionId: string, segments: StoredSegment[]): void
  listSegments(transcriptionId: string): StoredSegment[]
}

interface TranscriptionRow {
  id: string
  title: string
  created_at: string
}

interface SegmentRow {
  text: string
  speaker: string | null
  start_time: number
  end_time: number
  is_final: number
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS transcriptions (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS transcript_segments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    transcription_id TEXT NOT NULL REFERENCES transcriptions(id) ON DELETE CASCADE,
    text TEXT NOT NULL,
    speaker TEXT,
    start_time REAL NOT NULL,
    end_time REAL NOT NULL,
    is_final INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    UNIQUE (transcription_id, start_time)
  );
`

export class SqliteTranscriptRepository implements TranscriptRepository {
  private readonly db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
    this.db.pragma('foreign_keys = ON')
    this.db.exec(SCHEMA)
  }

  static open(path: string): SqliteTranscriptRepository {
    const db = new Database(path)
    if (path !== ':memory:') {
      db.pragma('journal_mode = WAL')
    }
    return new SqliteTranscriptRepository(db)
  }

  findTranscription(id: string): TranscriptionRecord | null {
    const row = this.db
      .prepare<[string], TranscriptionRow>('SELECT id, title, created_at FROM transcriptions WHERE id = ?')
      .get(id)

    return row ? { id: row.id, title: row.title, createdAt: row.created_at } : null
  }

  createTranscription(id: string, title: string): TranscriptionRecord {
    const createdAt = new Date().toISOString()
    this.db
      .prepare('INSERT OR IGNORE INTO transcriptions (id, title, created_at) VALUES (?, ?, ?)')
      .run(id, title, createdAt)

    const record = this.findTranscription(id)
    if (!record) {
      throw new TranscriptionNotFoundError(id)
    }
    return record
  }

  upsertSegments(transcriptionId: string, segments: StoredSegment[]): void {
    if (!this.findTranscription(transcriptionId)) {
      throw new TranscriptionNotFoundError(transcriptionId)
    }

    const statement = this.db.prepare(`
      INSERT INTO transcript_segments
        (transcription_id, text, speaker, start_time, end_time, is_final, created_at)
      VALUES (@transcriptionId, @text, @speaker, @startTime, @endTime, @isFinal, @createdAt)
      ON CONFLICT (transcription_id, start_time) DO UPDATE SET
        text = excluded.text,
        speaker = excluded.speaker,
        end_time = excluded.end_time,
        is_final = excluded.is_final
    `)

    const writeAll = this.db.transaction((rows: StoredSegment[]) => {
      const createdAt = new Date().toISOString()
      for (const segment of rows) {
        statement.run({
          transcriptionId,
          text: segment.text,
          speaker: segment.speaker,
          startTime: segment.startTime,
          endTime: segment.endTime,
          isFinal: segment.isFinal ? 1 : 0,
          createdAt,
        })
      }
    })

    writeAll(segments)
  }

  listSegments(transcriptionId: string): StoredSegment[] {
    const rows = this.db
      .prepare<[string], SegmentRow>(
        `SELECT text, speaker, start_time, end_time, is_final
         FROM transcript_segments
         WHERE transcription_id = ?
         ORDER BY start_time`,
      )
      .all(transcriptionId)

    return rows.map((row) => ({
      text: row.text,
      speaker: row.speaker,
      startTime: row.start_time,
      endTime: row.end_time,
      isFinal: row.is_final === 1,
    }))
  }

  close(): void {
    this.db.close()
  }
}
