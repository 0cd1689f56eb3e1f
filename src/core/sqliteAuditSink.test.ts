import { describe, test, expect, afterEach } from 'vitest';
import { SQLiteAuditSink } from './sqliteAuditSink.js';

describe('SQLiteAuditSink', () => {
  let sink: SQLiteAuditSink | undefined;

  afterEach(() => {
    sink?.close();
    sink = undefined;
  });

  test('lists events for a task in write order', () => {
    sink = new SQLiteAuditSink(':memory:');
    sink.write({
      session_id: 's1',
      task_id: 't1',
      timestamp: '2024-01-01T00:00:00.000Z',
      level: 'info',
      stage: 'submit',
      message: 'Created task with 1 action(s)',
      data: { actions: ['ls'] }
    });
    sink.write({
      session_id: 's1',
      task_id: 't2',
      timestamp: '2024-01-01T00:00:01.000Z',
      level: 'info',
      stage: 'task',
      message: 'other task'
    });
    sink.write({
      session_id: 's1',
      task_id: 't1',
      timestamp: '2024-01-01T00:00:02.000Z',
      level: 'error',
      stage: 'task',
      message: 'Task failed: boom'
    });

    const events = sink.listByTask('t1');
    expect(events.map(e => e.message)).toEqual([
      'Created task with 1 action(s)',
      'Task failed: boom'
    ]);
    expect(events[0]?.data).toEqual({ actions: ['ls'] });
    expect(events[1]?.data).toBeUndefined();
    expect(events[1]?.level).toBe('error');
  });

  test('respects the limit', () => {
    sink = new SQLiteAuditSink(':memory:');
    for (let i = 0; i < 5; i++) {
      sink.write({
        session_id: 's1',
        task_id: 't1',
        timestamp: new Date(i * 1000).toISOString(),
        level: 'info',
        stage: 'dispatch',
        message: `Action ${i + 1}/5`
      });
    }
    expect(sink.listByTask('t1', 2).map(e => e.message)).toEqual(['Action 1/5', 'Action 2/5']);
  });
});
