import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';

import type { AuditEvent, AuditLevel, AuditSink, AuditStage } from './audit.js';

type DBRow = {
  session_id: string;
  task_id: string | null;
  timestamp: string;
  level: AuditLevel;
  stage: AuditStage;
  message: string;
  data_json: string | null;
};

export class SQLiteAuditSink implements AuditSink {
  private db: Database.Database;

  constructor(dbPath = 'data/shellpilot.db') {
    if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        task_id TEXT,
        timestamp TEXT NOT NULL,
        level TEXT NOT NULL,
        stage TEXT NOT NULL,
        message TEXT NOT NULL,
        data_json TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_audit_events_task
        ON audit_events(task_id, id);
    `);
  }

  write(event: AuditEvent): void {
    this.db
      .prepare(
        `INSERT INTO audit_events
          (session_id, task_id, timestamp, level, stage, message, data_json)
         VALUES
          (@session_id, @task_id, @timestamp, @level, @stage, @message, @data_json)`
      )
      .run({
        session_id: event.session_id,
        task_id: event.task_id ?? null,
        timestamp: event.timestamp,
        level: event.level,
        stage: event.stage,
        message: event.message,
        data_json:
          event.data === undefined ? null : JSON.stringify(event.data)
      });
  }

  listByTask(task_id: string, limit = 1000): AuditEvent[] {
    const rows = this.db
      .prepare(
        `SELECT session_id, task_id, timestamp, level, stage, message, data_json
         FROM audit_events
         WHERE task_id = ?
         ORDER BY id ASC
         LIMIT ?`
      )
      .all(task_id, limit) as DBRow[];

    return rows.map(r => ({
      session_id: r.session_id,
      task_id: r.task_id ?? undefined,
      timestamp: r.timestamp,
      level: r.level,
      stage: r.stage,
      message: r.message,
      data: r.data_json ? JSON.parse(r.data_json) : undefined
    }));
  }

  close(): void {
    this.db.close();
  }
}
