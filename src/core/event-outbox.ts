/**
 * Event Outbox - Transactional Outbox Pattern
 * Entity write paths append rows here inside their own transaction;
 * the OutboxDispatcher drains them to the bus.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import {
  sqliteAll,
  sqliteExec,
  sqliteGet,
  sqliteRun,
  toDateFromSQLite,
  toSQLiteTimestamp,
  type SQLiteDatabase,
  type SQLiteParam
} from './sqlite-wrapper.js';
import {
  EventOperationSchema,
  OutboxStatusSchema,
  type OutboxEvent,
  type OutboxEventInput
} from './types.js';

export interface OutboxMetrics {
  pendingCount: number;
  dispatchedCount: number;
  oldestPendingAge: number | null;
}

export interface OutboxEventFilter {
  entity?: string;
  eventType?: string;
  dispatched?: boolean;
  limit?: number;
}

const EventRowSchema = z.object({
  id: z.string(),
  event_type: z.string(),
  version: z.number(),
  entity: z.string(),
  operation: EventOperationSchema,
  actor_id: z.string(),
  timestamp: z.string(),
  payload: z.string(),
  status: OutboxStatusSchema,
  dispatched: z.number(),
  dispatched_at: z.string().nullable()
});

const PayloadSchema = z.record(z.unknown());

const RowIdSchema = z.object({ id: z.string() });

const CountRowSchema = z.object({ count: z.number() });

export const EVENT_OUTBOX_SCHEMA = `
  -- Outbox: one row per committed entity mutation
  CREATE TABLE IF NOT EXISTS events (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    event_type TEXT NOT NULL,
    version INTEGER NOT NULL DEFAULT 1,
    entity TEXT NOT NULL,
    operation TEXT NOT NULL,
    actor_id TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    payload TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    dispatched INTEGER NOT NULL DEFAULT 0,
    dispatched_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_events_pending ON events(dispatched, seq);
  CREATE INDEX IF NOT EXISTS idx_events_entity ON events(entity, event_type);
`;

export class EventOutbox {
  /** Rows already reported as undecodable */
  private readonly undecodable = new Set<string>();

  constructor(private readonly db: SQLiteDatabase) {}

  ensureSchema(): void {
    sqliteExec(this.db, EVENT_OUTBOX_SCHEMA);
  }

  /**
   * Append an event row. Call from inside the transaction of the mutation it describes.
   */
  append(input: OutboxEventInput): OutboxEvent {
    const event: OutboxEvent = {
      id: randomUUID(),
      eventType: input.eventType,
      version: 1,
      entity: input.entity,
      operation: input.operation,
      actorId: input.actorId,
      timestamp: new Date(),
      payload: input.payload,
      status: 'pending',
      dispatched: false,
      dispatchedAt: null
    };

    sqliteRun(
      this.db,
      `INSERT INTO events (
        id, event_type, version, entity, operation, actor_id, timestamp, payload, status, dispatched
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'pending', 0)`,
      [
        event.id,
        event.eventType,
        event.version,
        event.entity,
        event.operation,
        event.actorId,
        toSQLiteTimestamp(event.timestamp),
        JSON.stringify(event.payload)
      ]
    );

    return event;
  }

  /**
   * Every undispatched row, in insertion order. Rows that fail to decode are
   * skipped and stay pending.
   */
  async getPending(limit?: number): Promise<OutboxEvent[]> {
    const params: SQLiteParam[] = [];
    let sql = `SELECT * FROM events WHERE dispatched = 0 ORDER BY seq ASC`;
    if (limit !== undefined) {
      sql += ` LIMIT ?`;
      params.push(limit);
    }

    const events: OutboxEvent[] = [];
    for (const row of sqliteAll(this.db, sql, params)) {
      const event = this.decodePending(row);
      if (event) events.push(event);
    }
    return events;
  }

  /**
   * Flip a row to dispatched. Returns false if it was already dispatched.
   */
  async markDispatched(eventId: string, at: Date = new Date()): Promise<boolean> {
    const result = sqliteRun(
      this.db,
      `UPDATE events
       SET dispatched = 1, status = 'completed', dispatched_at = ?
       WHERE id = ? AND dispatched = 0`,
      [toSQLiteTimestamp(at), eventId]
    );
    return result.changes > 0;
  }

  async getEvent(eventId: string): Promise<OutboxEvent | null> {
    const row = sqliteGet(this.db, `SELECT * FROM events WHERE id = ?`, [eventId]);
    return row === undefined ? null : this.rowToEvent(row);
  }

  async listEvents(filter: OutboxEventFilter = {}): Promise<OutboxEvent[]> {
    const clauses: string[] = [];
    const params: SQLiteParam[] = [];

    if (filter.entity !== undefined) {
      clauses.push('entity = ?');
      params.push(filter.entity);
    }
    if (filter.eventType !== undefined) {
      clauses.push('event_type = ?');
      params.push(filter.eventType);
    }
    if (filter.dispatched !== undefined) {
      clauses.push('dispatched = ?');
      params.push(filter.dispatched ? 1 : 0);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(filter.limit ?? 1000);

    return sqliteAll(
      this.db,
      `SELECT * FROM events ${where} ORDER BY seq ASC LIMIT ?`,
      params
    ).map(row => this.rowToEvent(row));
  }

  async getMetrics(): Promise<OutboxMetrics> {
    const pending = CountRowSchema.parse(
      sqliteGet(this.db, `SELECT COUNT(*) AS count FROM events WHERE dispatched = 0`)
    );
    const dispatched = CountRowSchema.parse(
      sqliteGet(this.db, `SELECT COUNT(*) AS count FROM events WHERE dispatched = 1`)
    );
    const oldest = z.object({ timestamp: z.string() }).optional().parse(
      sqliteGet(this.db, `SELECT timestamp FROM events WHERE dispatched = 0 ORDER BY seq ASC LIMIT 1`)
    );

    return {
      pendingCount: pending.count,
      dispatchedCount: dispatched.count,
      oldestPendingAge: oldest ? Date.now() - toDateFromSQLite(oldest.timestamp).getTime() : null
    };
  }

  /**
   * Delete dispatched rows older than the retention window
   */
  async cleanup(olderThanDays: number): Promise<number> {
    const threshold = new Date(Date.now() - olderThanDays * 24 * 60 * 60 * 1000);
    const result = sqliteRun(
      this.db,
      `DELETE FROM events WHERE dispatched = 1 AND dispatched_at < ?`,
      [toSQLiteTimestamp(threshold)]
    );
    return result.changes;
  }

  private decodePending(raw: unknown): OutboxEvent | null {
    try {
      return this.rowToEvent(raw);
    } catch (error) {
      const parsed = RowIdSchema.safeParse(raw);
      const id = parsed.success ? parsed.data.id : 'unknown';
      if (!this.undecodable.has(id)) {
        this.undecodable.add(id);
        console.warn(`[EventOutbox] Skipping undecodable event ${id}: ${errorMessage(error)}`);
      }
      return null;
    }
  }

  private rowToEvent(raw: unknown): OutboxEvent {
    const row = EventRowSchema.parse(raw);
    return {
      id: row.id,
      eventType: row.event_type,
      version: row.version,
      entity: row.entity,
      operation: row.operation,
      actorId: row.actor_id,
      timestamp: toDateFromSQLite(row.timestamp),
      payload: PayloadSchema.parse(JSON.parse(row.payload)),
      status: row.status,
      dispatched: row.dispatched === 1,
      dispatchedAt: row.dispatched_at === null ? null : toDateFromSQLite(row.dispatched_at)
    };
  }
}
