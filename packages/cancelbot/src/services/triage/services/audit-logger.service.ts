/**
 * Audit Logger
 * Append-only SQLite log of every triage decision. One row per run; nothing
 * here updates or deletes.
 */

import { Database, type RunResult } from 'sqlite3';
import { z } from 'zod';
import {
  ConfigurationError,
  ValidationError,
  createLogger,
  getErrorMessage,
  type Logger,
} from '@cancel-triage/shared';
import type { AuditEntry, AuditRecord } from '../../../types/index.js';
import type { IAuditLogger } from '../models/service-interfaces.js';
import { isRecord } from './response-parser.js';

type SqlParam = string | number | null;

function run(db: Database, sql: string, params: SqlParam[] = []): Promise<RunResult> {
  return new Promise<RunResult>((resolve, reject) => {
    db.run(sql, params, function (this: RunResult, err: Error | null) {
      if (err) {
        reject(err);
      } else {
        resolve(this);
      }
    });
  });
}

/**
 * Open with a callback so a bad path rejects instead of emitting an unhandled 'error' event
 */
function open(path: string): Promise<Database> {
  return new Promise<Database>((resolve, reject) => {
    const db = new Database(path, (err: Error | null) => (err ? reject(err) : resolve(db)));
  });
}

function all(db: Database, sql: string, params: SqlParam[] = []): Promise<unknown[]> {
  return new Promise<unknown[]>((resolve, reject) => {
    db.all(sql, params, (err: Error | null, rows: unknown[]) => (err ? reject(err) : resolve(rows)));
  });
}

const actionRowSchema = z.object({
  id: z.number(),
  ticket_id: z.string(),
  order_id: z.string().nullable(),
  intent: z.enum(['cancel_order', 'not_cancellation']),
  success: z.number(),
  result_json: z.string(),
  created_at: z.string(),
});

type ActionRow = z.infer<typeof actionRowSchema>;

function parseResult(json: string): Record<string, unknown> {
  const value: unknown = JSON.parse(json);
  return isRecord(value) ? value : { value };
}

function rowToRecord(row: ActionRow): AuditRecord {
  return {
    id: row.id,
    ticketId: row.ticket_id,
    orderId: row.order_id,
    intent: row.intent,
    success: row.success === 1,
    result: parseResult(row.result_json),
    createdAt: row.created_at,
  };
}

export class SqliteAuditLogger implements IAuditLogger {
  private db: Database | null = null;
  private logger: Logger;

  constructor(private readonly path: string, logger?: Logger) {
    this.logger = logger ?? createLogger('Audit');
  }

  get dbPath(): string {
    return this.path;
  }

  /**
   * Opens the database on first call and creates the schema if absent.
   *
   * @throws ConfigurationError when the database file cannot be opened
   */
  async init(): Promise<void> {
    if (!this.db) {
      try {
        this.db = await open(this.path);
      } catch (error) {
        throw new ConfigurationError(
          `Cannot open audit database ${this.path}: ${getErrorMessage(error)}`,
          error instanceof Error ? error : undefined
        );
      }
    }

    const db = this.db;
    await run(db, `
      create table if not exists actions (
        id integer primary key autoincrement,
        ticket_id text not null,
        order_id text,
        intent text not null,
        success integer not null,
        result_json text not null,
        created_at datetime default current_timestamp
      );
    `);
    await run(db, `create index if not exists idx_actions_ticket on actions(ticket_id, created_at);`);
  }

  async log(entry: AuditEntry): Promise<number> {
    const result = await run(this.connection(), `
      insert into actions (ticket_id, order_id, intent, success, result_json)
      values (?,?,?,?,?)
    `, [
      entry.ticketId,
      entry.orderId,
      entry.intent,
      entry.success ? 1 : 0,
      JSON.stringify(entry.result),
    ]);
    this.logger.info(`recorded ${entry.intent} for ${entry.ticketId} (success=${entry.success})`);
    return result.lastID;
  }

  /**
   * Newest first
   */
  async listRecent(limit: number): Promise<AuditRecord[]> {
    const rows = await all(this.connection(), `
      select id, ticket_id, order_id, intent, success, result_json, created_at
      from actions
      order by id desc
      limit ?
    `, [Math.max(0, Math.floor(limit))]);

    return rows.map((row) => {
      const parsed = actionRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new ValidationError(`Unexpected row in actions table: ${parsed.error.message}`);
      }
      return rowToRecord(parsed.data);
    });
  }

  close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return Promise.resolve();
    }
    this.db = null;
    return new Promise<void>((resolve, reject) => {
      db.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private connection(): Database {
    if (!this.db) {
      throw new ConfigurationError('Audit database is not open; call init() first');
    }
    return this.db;
  }
}
