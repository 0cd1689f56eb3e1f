import { randomUUID } from 'crypto';
import type { AuditSink } from './audit.js';
import { NoopAuditSink, safeWrite } from './audit.js';
import { errorMessage } from './errors.js';

export type TaskStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type TaskPriority = 'low' | 'medium' | 'high' | 'urgent';

export const TASK_PRIORITIES: readonly TaskPriority[] = ['urgent', 'high', 'medium', 'low'];

const PRIORITY_RANK: Record<TaskPriority, number> = {
  urgent: 0,
  high: 1,
  medium: 2,
  low: 3
};

const FINISHED: ReadonlySet<TaskStatus> = new Set(['completed', 'failed', 'cancelled']);

export interface TaskRecord {
  id: string;
  description: string;
  /** Action payloads, kept for duplicate detection. */
  actions: string[];
  status: TaskStatus;
  priority: TaskPriority;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  result?: string;
  error?: string;
}

export interface TaskSnapshot {
  tasks: Record<string, TaskRecord>;
  queue: string[];
}

/**
 * Best-effort persistence for the task map and queue order. The store writes
 * the whole snapshot after every mutation and reads it once at startup.
 */
export interface TaskSnapshotStore {
  load(): TaskSnapshot | undefined;
  save(snapshot: TaskSnapshot): void;
}

function copyTask(task: TaskRecord): TaskRecord {
  return { ...task, actions: [...task.actions] };
}

function copySnapshot(snapshot: TaskSnapshot): TaskSnapshot {
  const tasks: Record<string, TaskRecord> = {};
  for (const [id, task] of Object.entries(snapshot.tasks)) tasks[id] = copyTask(task);
  return { tasks, queue: [...snapshot.queue] };
}

export class InMemoryTaskSnapshotStore implements TaskSnapshotStore {
  private snapshot?: TaskSnapshot;

  constructor(initial?: TaskSnapshot) {
    this.snapshot = initial ? copySnapshot(initial) : undefined;
  }

  load(): TaskSnapshot | undefined {
    return this.snapshot ? copySnapshot(this.snapshot) : undefined;
  }

  save(snapshot: TaskSnapshot): void {
    this.snapshot = copySnapshot(snapshot);
  }
}

export interface TaskStoreOptions {
  persistence?: TaskSnapshotStore;
  audit?: AuditSink;
  session_id?: string;
}

function sameActions(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

export class TaskStore {
  private tasks = new Map<string, TaskRecord>();
  private pendingQueue: string[] = [];
  private persistence?: TaskSnapshotStore;
  private audit: AuditSink;
  private session_id: string;

  constructor(opts: TaskStoreOptions = {}) {
    this.persistence = opts.persistence;
    this.audit = opts.audit ?? new NoopAuditSink();
    this.session_id = opts.session_id ?? 'default';
    this.restore();
  }

  create(
    description: string,
    priority: TaskPriority = 'medium',
    actions: readonly string[] = []
  ): string {
    const id = randomUUID();
    this.tasks.set(id, {
      id,
      description,
      actions: [...actions],
      status: 'pending',
      priority,
      created_at: new Date().toISOString()
    });
    this.enqueue(id, priority);
    this.persist();
    return id;
  }

  start(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task || task.status !== 'pending') return false;
    task.status = 'running';
    task.started_at = new Date().toISOString();
    this.dequeue(id);
    this.persist();
    return true;
  }

  complete(id: string, result: string): boolean {
    const task = this.tasks.get(id);
    if (!task || task.status !== 'running') return false;
    task.status = 'completed';
    task.completed_at = new Date().toISOString();
    task.result = result;
    this.dequeue(id);
    this.persist();
    return true;
  }

  fail(id: string, error: string): boolean {
    const task = this.tasks.get(id);
    if (!task || task.status !== 'running') return false;
    task.status = 'failed';
    task.completed_at = new Date().toISOString();
    task.error = error;
    this.dequeue(id);
    this.persist();
    return true;
  }

  cancel(id: string, reason?: string): boolean {
    const task = this.tasks.get(id);
    if (!task || task.status !== 'pending') return false;
    task.status = 'cancelled';
    task.completed_at = new Date().toISOString();
    if (reason) task.error = reason;
    this.dequeue(id);
    this.persist();
    return true;
  }

  get(id: string): TaskRecord | undefined {
    const task = this.tasks.get(id);
    return task ? copyTask(task) : undefined;
  }

  list(): TaskRecord[] {
    return [...this.tasks.values()].map(copyTask);
  }

  pending(): TaskRecord[] {
    return this.list().filter(t => t.status === 'pending');
  }

  current(): TaskRecord | undefined {
    for (const task of this.tasks.values()) {
      if (task.status === 'running') return copyTask(task);
    }
    return undefined;
  }

  queue(): string[] {
    return [...this.pendingQueue];
  }

  nextPending(): TaskRecord | undefined {
    for (const id of this.pendingQueue) {
      const task = this.tasks.get(id);
      if (task?.status === 'pending') return copyTask(task);
    }
    return undefined;
  }

  findDuplicate(
    description: string,
    actions?: readonly string[]
  ): TaskRecord | undefined {
    const match = this.matching(description, actions).next();
    return match.done ? undefined : copyTask(match.value);
  }

  hasPendingDuplicate(description: string, actions?: readonly string[]): boolean {
    for (const task of this.matching(description, actions)) {
      if (task.status === 'pending') return true;
    }
    return false;
  }

  clearFinished(): number {
    let removed = 0;
    for (const [id, task] of this.tasks) {
      if (!FINISHED.has(task.status)) continue;
      this.tasks.delete(id);
      this.dequeue(id);
      removed++;
    }
    if (removed > 0) this.persist();
    return removed;
  }

  snapshot(): TaskSnapshot {
    const tasks: Record<string, TaskRecord> = {};
    for (const [id, task] of this.tasks) tasks[id] = copyTask(task);
    return { tasks, queue: [...this.pendingQueue] };
  }

  private *matching(
    description: string,
    actions?: readonly string[]
  ): Generator<TaskRecord> {
    for (const task of this.tasks.values()) {
      if (task.description !== description) continue;
      if (actions && !sameActions(task.actions, actions)) continue;
      yield task;
    }
  }

  // Inserted before the first task of strictly lower priority, which keeps
  // equal priorities in creation order.
  private enqueue(id: string, priority: TaskPriority): void {
    const rank = PRIORITY_RANK[priority];
    const index = this.pendingQueue.findIndex(existing => {
      const other = this.tasks.get(existing);
      return other !== undefined && PRIORITY_RANK[other.priority] > rank;
    });
    if (index === -1) this.pendingQueue.push(id);
    else this.pendingQueue.splice(index, 0, id);
  }

  private dequeue(id: string): void {
    const index = this.pendingQueue.indexOf(id);
    if (index >= 0) this.pendingQueue.splice(index, 1);
  }

  private persist(): void {
    if (!this.persistence) return;
    try {
      this.persistence.save(this.snapshot());
    } catch (err) {
      this.log('warn', 'Failed to persist task snapshot', { error: errorMessage(err) });
    }
  }

  private restore(): void {
    if (!this.persistence) return;
    let snapshot: TaskSnapshot | undefined;
    try {
      snapshot = this.persistence.load();
    } catch (err) {
      this.log('warn', 'Failed to load task snapshot, starting empty', {
        error: errorMessage(err)
      });
      return;
    }
    if (!snapshot) return;

    for (const [id, task] of Object.entries(snapshot.tasks)) {
      this.tasks.set(id, copyTask(task));
    }
    const queue = snapshot.queue.filter(id => this.tasks.has(id));
    const dropped = snapshot.queue.length - queue.length;
    this.pendingQueue = queue;
    if (dropped > 0) {
      this.log('warn', `Dropped ${dropped} queue entr${dropped === 1 ? 'y' : 'ies'} without a task`);
    }
    this.log('info', `Restored ${this.tasks.size} task(s)`, { queued: queue.length });
  }

  private log(level: 'info' | 'warn', message: string, data?: unknown): void {
    safeWrite(this.audit, {
      session_id: this.session_id,
      timestamp: new Date().toISOString(),
      level,
      stage: 'store',
      message,
      data
    });
  }
}
