export type AuditLevel = 'info' | 'warn' | 'error';

export type AuditStage =
  | 'submit'
  | 'task'
  | 'dispatch'
  | 'interaction'
  | 'progress'
  | 'store'
  | 'trace';

export interface AuditEvent {
  session_id: string;
  task_id?: string;
  timestamp: string;
  level: AuditLevel;
  stage: AuditStage;
  message: string;
  data?: unknown;
}

export interface AuditSink {
  write(event: AuditEvent): void;
}

export class ConsoleAuditSink implements AuditSink {
  write(event: AuditEvent): void {
    const task = event.task_id ? ` [${event.task_id}]` : '';
    const line = `[${event.timestamp}] [${event.level}] [${event.session_id}]${task} ${event.stage}: ${event.message}`;
    if (event.level === 'error') {
      console.error(line, event.data ?? '');
    } else {
      console.log(line, event.data ?? '');
    }
  }
}

export class InMemoryAuditSink implements AuditSink {
  events: AuditEvent[] = [];

  write(event: AuditEvent): void {
    this.events.push(event);
  }

  atLevel(level: AuditLevel): AuditEvent[] {
    return this.events.filter(e => e.level === level);
  }
}

export class NoopAuditSink implements AuditSink {
  write(): void {}
}

/**
 * Writes to a sink that may fail (a closed database, a full disk). A failed
 * write goes to stderr instead of propagating into the task being logged.
 */
export function safeWrite(sink: AuditSink, event: AuditEvent): void {
  try {
    sink.write(event);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`[audit] dropped ${event.stage} event "${event.message}": ${reason}`);
  }
}
