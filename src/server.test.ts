import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import type http from 'http';
import { z } from 'zod';
import { AgentExecutor } from './core/executor.js';
import { InMemoryNotificationSink } from './core/notifications.js';
import { TaskStore } from './core/taskStore.js';
import { InMemoryTelemetry } from './core/telemetry.js';
import { createAgentServer } from './server.js';
import { ScriptedShell } from './testing/scriptedShell.js';

const API_KEY = 'test-secret';

const Accepted = z.object({ task_id: z.string() });
const EventList = z.object({
  events: z.array(z.object({ seq: z.number(), event: z.object({ name: z.string() }) }))
});

describe('agent HTTP API', () => {
  let shell: ScriptedShell;
  let store: TaskStore;
  let executor: AgentExecutor;
  let server: http.Server;
  let baseUrl: string;

  beforeEach(async () => {
    shell = new ScriptedShell();
    store = new TaskStore();
    const notifications = new InMemoryNotificationSink();
    const telemetry = new InMemoryTelemetry();
    executor = new AgentExecutor(
      { transport: shell, store, notifications, telemetry },
      {
        session_id: 'http-test',
        actionDelayMs: 0,
        settleDelayMs: 1,
        keyEchoDelayMs: 0,
        quiescenceMs: 5,
        maxCaptureMs: 200
      }
    );
    server = createAgentServer({
      agent: { executor, store, notifications, telemetry },
      apiKey: API_KEY
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    shell.dispose();
    await new Promise<void>((resolve, reject) =>
      server.close(err => (err ? reject(err) : resolve()))
    );
  });

  function call(method: string, path: string, body?: unknown, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: {
        'content-type': 'application/json',
        'x-api-key': API_KEY,
        ...headers
      },
      body: body === undefined ? undefined : JSON.stringify(body)
    });
  }

  test('health and metrics need no key', async () => {
    const health = await fetch(`${baseUrl}/healthz`);
    expect(health.status).toBe(200);
    expect(await health.json()).toEqual({ ok: true, session_id: 'http-test' });

    const metrics = await fetch(`${baseUrl}/v1/metrics`);
    expect(await metrics.json()).toEqual({ counters: {}, histograms: {} });
  });

  test('rejects requests without a valid key', async () => {
    const res = await fetch(`${baseUrl}/v1/status`);
    expect(res.status).toBe(401);

    const bearer = await fetch(`${baseUrl}/v1/status`, {
      headers: { authorization: `Bearer ${API_KEY}` }
    });
    expect(bearer.status).toBe(200);
  });

  test('accepts a message and exposes the task', async () => {
    shell.on('ls\n', 'a.txt\n');

    const res = await call('POST', '/v1/messages', { text: 'RUN_COMMAND{ls}', priority: 'high' });
    expect(res.status).toBe(202);
    const body: unknown = await res.json();
    const { task_id } = Accepted.parse(body);
    expect(body).toMatchObject({ accepted: true, links: { self: `/v1/tasks/${task_id}` } });

    await expect.poll(() => store.get(task_id)?.status, { timeout: 2000 }).toBe('completed');

    const task = await call('GET', `/v1/tasks/${task_id}`);
    expect(await task.json()).toMatchObject({
      id: task_id,
      priority: 'high',
      status: 'completed'
    });

    const events = await call('GET', '/v1/events?since=0');
    const recorded = EventList.parse(await events.json()).events;
    expect(recorded.map(e => e.event.name)).toEqual([
      'task_created',
      'command_output',
      'task_completed'
    ]);

    const later = await call('GET', '/v1/events?since=2');
    expect(EventList.parse(await later.json()).events.map(e => e.seq)).toEqual([3]);
  });

  test('reports busy and rejected submissions', async () => {
    const first = await call('POST', '/v1/messages', { text: 'WAIT{0.2}' });
    expect(first.status).toBe(202);

    const busy = await call('POST', '/v1/messages', { text: 'RUN_COMMAND{ls}' });
    expect(busy.status).toBe(409);
    expect(await busy.json()).toEqual({ accepted: false, reason: 'busy' });

    const status = await call('GET', '/v1/status');
    expect(await status.json()).toMatchObject({ state: 'running_task', busy: true });

    const input = await call('POST', '/v1/input', { text: 'q' });
    expect(input.status).toBe(409);

    await expect.poll(() => executor.status().busy, { timeout: 2000 }).toBe(false);

    const empty = await call('POST', '/v1/messages', { text: 'just chatting' });
    expect(empty.status).toBe(200);
    expect(await empty.json()).toEqual({ accepted: false, reason: 'no_actions' });
  });

  test('validates request bodies', async () => {
    const missing = await call('POST', '/v1/messages', { priority: 'high' });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({ error: 'Invalid request body' });

    const badPriority = await call('POST', '/v1/messages', { text: 'WAIT{1}', priority: 'asap' });
    expect(badPriority.status).toBe(400);

    const notJson = await fetch(`${baseUrl}/v1/messages`, {
      method: 'POST',
      headers: { 'x-api-key': API_KEY },
      body: '{oops'
    });
    expect(notJson.status).toBe(400);
    expect(await notJson.json()).toEqual({ error: 'Invalid JSON body' });
  });

  test('cancels pending tasks and clears finished ones', async () => {
    const id = store.create('RUN_COMMAND{make}', 'low', ['make']);

    const cancelled = await call('POST', `/v1/tasks/${id}/cancel`);
    expect(cancelled.status).toBe(200);
    expect(await cancelled.json()).toMatchObject({ id, status: 'cancelled' });

    const again = await call('POST', `/v1/tasks/${id}/cancel`);
    expect(again.status).toBe(409);

    const missing = await call('POST', '/v1/tasks/nope/cancel');
    expect(missing.status).toBe(404);

    const cleared = await call('DELETE', '/v1/tasks');
    expect(await cleared.json()).toEqual({ removed: 1 });

    const list = await call('GET', '/v1/tasks');
    expect(await list.json()).toEqual({
      tasks: [],
      queue: [],
      priorities: ['urgent', 'high', 'medium', 'low']
    });
  });

  test('forwards input while idle and reports an idle stop', async () => {
    shell.on('echo hi\n', 'hi\n');

    const input = await call('POST', '/v1/input', { text: 'echo hi\n' });
    expect(input.status).toBe(202);
    expect(shell.sent).toEqual(['echo hi\n']);

    const stop = await call('POST', '/v1/stop');
    expect(await stop.json()).toEqual({ stopped: false });
  });

  test('maps a dead shell to 503', async () => {
    shell.connected = false;
    const res = await call('POST', '/v1/input', { text: 'ls\n' });
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: 'Shell connection is not established' });
  });

  test('answers a malformed task id with 400', async () => {
    const read = await call('GET', '/v1/tasks/%ZZ');
    expect(read.status).toBe(400);
    expect(await read.json()).toEqual({ error: 'Malformed task id' });

    const cancel = await call('POST', '/v1/tasks/%ZZ/cancel');
    expect(cancel.status).toBe(400);
  });

  test('unknown routes are 404', async () => {
    const res = await call('GET', '/v1/nothing');
    expect(res.status).toBe(404);
  });
});
