import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';

import type {
  TaskPriority,
  TaskRecord,
  TaskSnapshot,
  TaskSnapshotStore,
  TaskStatus
} from './taskStore.js';

type TaskRow = {
  id: string;
  description: string;
  actions_json: string;
  status: TaskStatus;
  priority: TaskPriority;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  result: string | null;
  error: string | null;
};

type QueueRow = { task_id: string };

export class SQLiteTaskSnapshotStore implements TaskSnapshotStore {
  private db: Database.Database;

  constructor(dbPath = 'data/shellpilot.db') {
    if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        description TEXT NOT NULL,
        actions_json TEXT NOT NULL,
        status TEXT NOT NULL,
        priority TEXT NOT NULL,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        result TEXT,
        error TEXT
      );
      CREATE TABLE IF NOT EXISTS task_queue (
        position INTEGER PRIMARY KEY,
        task_id TEXT NOT NULL
      );
    `);
  }

  load(): TaskSnapshot | undefined {
    const rows = this.db
      .prepare(`SELECT * FROM tasks ORDER BY created_at ASC, rowid ASC`)
      .all() as TaskRow[];
    const queueRows = this.db
      .prepare(`SELECT task_id FROM task_queue ORDER BY position ASC`)
      .all() as QueueRow[];
    if (rows.length === 0 && queueRows.length === 0) return undefined;

    const tasks: Record<string, TaskRecord> = {};
    for (const row of rows) tasks[row.id] = this.deserializeRow(row);
    return { tasks, queue: queueRows.map(r => r.task_id) };
  }

  save(snapshot: TaskSnapshot): void {
    const insertTask = this.db.prepare(
      `INSERT INTO tasks
        (id, description, actions_json, status, priority, created_at, started_at, completed_at, result, error)
       VALUES
        (@id, @description, @actions_json, @status, @priority, @created_at, @started_at, @completed_at, @result, @error)`
    );
    const insertQueue = this.db.prepare(
      `INSERT INTO task_queue (position, task_id) VALUES (?, ?)`
    );
    const write = this.db.transaction((next: TaskSnapshot) => {
      this.db.prepare(`DELETE FROM tasks`).run();
      this.db.prepare(`DELETE FROM task_queue`).run();
      for (const task of Object.values(next.tasks)) {
        insertTask.run({
          id: task.id,
          description: task.description,
          actions_json: JSON.stringify(task.actions),
          status: task.status,
          priority: task.priority,
          created_at: task.created_at,
          started_at: task.started_at ?? null,
          completed_at: task.completed_at ?? null,
          result: task.result ?? null,
          error: task.error ?? null
        });
      }
      next.queue.forEach((task_id, position) => insertQueue.run(position, task_id));
    });
    write(snapshot);
  }

  close(): void {
    this.db.close();
  }

  private deserializeRow(row: TaskRow): TaskRecord {
    const actions: unknown = JSON.parse(row.actions_json);
    return {
      id: row.id,
      description: row.description,
      actions: Array.isArray(actions) ? actions.map(String) : [],
      status: row.status,
      priority: row.priority,
      created_at: row.created_at,
      started_at: row.started_at ?? undefined,
      completed_at: row.completed_at ?? undefined,
      result: row.result ?? undefined,
      error: row.error ?? undefined
    };
  }
}
