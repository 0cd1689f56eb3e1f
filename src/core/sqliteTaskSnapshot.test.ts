import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { SQLiteTaskSnapshotStore } from './sqliteTaskSnapshot.js';
import { TaskStore } from './taskStore.js';

describe('SQLiteTaskSnapshotStore', () => {
  let dir: string;
  let dbPath: string;
  const opened: SQLiteTaskSnapshotStore[] = [];

  function open(): SQLiteTaskSnapshotStore {
    const store = new SQLiteTaskSnapshotStore(dbPath);
    opened.push(store);
    return store;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellpilot-tasks-'));
    dbPath = path.join(dir, 'nested', 'tasks.db');
  });

  afterEach(async () => {
    for (const store of opened.splice(0)) store.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('returns undefined for an empty database', () => {
    expect(open().load()).toBeUndefined();
  });

  test('round-trips tasks and queue order', () => {
    const snapshots = open();
    snapshots.save({
      tasks: {
        a: {
          id: 'a',
          description: 'RUN_COMMAND{ls}',
          actions: ['ls'],
          status: 'completed',
          priority: 'high',
          created_at: '2024-01-01T00:00:00.000Z',
          started_at: '2024-01-01T00:00:01.000Z',
          completed_at: '2024-01-01T00:00:02.000Z',
          result: 'Executed 1 action(s):\n- ls'
        },
        b: {
          id: 'b',
          description: 'WAIT{1}',
          actions: ['wait:1'],
          status: 'pending',
          priority: 'low',
          created_at: '2024-01-01T00:00:03.000Z'
        },
        c: {
          id: 'c',
          description: 'WAIT{2}',
          actions: ['wait:2'],
          status: 'pending',
          priority: 'urgent',
          created_at: '2024-01-01T00:00:04.000Z'
        }
      },
      queue: ['c', 'b']
    });

    const loaded = open().load();
    expect(loaded?.queue).toEqual(['c', 'b']);
    expect(loaded?.tasks.a).toEqual({
      id: 'a',
      description: 'RUN_COMMAND{ls}',
      actions: ['ls'],
      status: 'completed',
      priority: 'high',
      created_at: '2024-01-01T00:00:00.000Z',
      started_at: '2024-01-01T00:00:01.000Z',
      completed_at: '2024-01-01T00:00:02.000Z',
      result: 'Executed 1 action(s):\n- ls',
      error: undefined
    });
    expect(loaded?.tasks.b?.started_at).toBeUndefined();
  });

  test('save replaces the previous snapshot', () => {
    const snapshots = open();
    snapshots.save({
      tasks: {
        a: {
          id: 'a',
          description: 'x',
          actions: [],
          status: 'pending',
          priority: 'medium',
          created_at: '2024-01-01T00:00:00.000Z'
        }
      },
      queue: ['a']
    });
    snapshots.save({ tasks: {}, queue: [] });
    expect(snapshots.load()).toBeUndefined();
  });

  test('backs a task store across restarts', () => {
    const first = new TaskStore({ persistence: open() });
    const low = first.create('a', 'low');
    const urgent = first.create('b', 'urgent');

    const second = new TaskStore({ persistence: open() });
    expect(second.queue()).toEqual([urgent, low]);
    expect(second.get(low)?.priority).toBe('low');
  });
});
