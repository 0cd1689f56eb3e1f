import http from 'http';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { TransportError, errorMessage } from './core/errors.js';
import { TASK_PRIORITIES } from './core/taskStore.js';
import type { Agent } from './index.js';
import { createAgent } from './index.js';

const MessageBody = z.object({
  text: z.string().min(1),
  priority: z.enum(['low', 'medium', 'high', 'urgent']).optional()
});

const InputBody = z.object({
  text: z.string().min(1)
});

export interface AgentServerOptions {
  agent: Pick<Agent, 'executor' | 'store' | 'notifications' | 'telemetry'>;
  /** When set, every route except health and metrics requires it. */
  apiKey?: string;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
  }
}

function decodeTaskId(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpError(400, 'Malformed task id');
  }
}

function isAuthorized(req: http.IncomingMessage, requiredApiKey?: string): boolean {
  if (!requiredApiKey) return true;
  const headerKey = req.headers['x-api-key'];
  if (typeof headerKey === 'string' && headerKey === requiredApiKey) {
    return true;
  }
  const auth = req.headers['authorization'];
  if (typeof auth === 'string' && auth.startsWith('Bearer ')) {
    const token = auth.slice('Bearer '.length);
    return token === requiredApiKey;
  }
  return false;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'content-type': 'application/json',
    'content-length': Buffer.byteLength(payload)
  });
  res.end(payload);
}

async function readBody<T>(req: http.IncomingMessage, schema: z.ZodType<T>): Promise<T> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) chunks.push(Buffer.from(chunk));
  const raw = Buffer.concat(chunks).toString('utf8');
  let json: unknown = {};
  if (raw) {
    try {
      json = JSON.parse(raw);
    } catch {
      throw new HttpError(400, 'Invalid JSON body');
    }
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new HttpError(400, 'Invalid request body', parsed.error.issues);
  }
  return parsed.data;
}

export function createAgentServer({ agent, apiKey }: AgentServerOptions): http.Server {
  const { executor, store, notifications, telemetry } = agent;

  return http.createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
      const path = url.pathname;

      if (req.method === 'GET' && path === '/healthz') {
        return sendJson(res, 200, { ok: true, session_id: executor.session_id });
      }

      if (req.method === 'GET' && path === '/v1/metrics') {
        return sendJson(res, 200, telemetry.metrics.snapshot());
      }

      if (!isAuthorized(req, apiKey)) {
        return sendJson(res, 401, { error: 'Unauthorized' });
      }

      if (req.method === 'POST' && path === '/v1/messages') {
        const body = await readBody(req, MessageBody);
        const result = executor.submit(body.text, { priority: body.priority });
        if (!result.accepted) {
          return sendJson(res, result.reason === 'busy' ? 409 : 200, {
            accepted: false,
            reason: result.reason
          });
        }
        // The run reports its own failures through the store and events.
        void result.completion;
        return sendJson(res, 202, {
          accepted: true,
          task_id: result.task_id,
          links: { self: `/v1/tasks/${result.task_id}` }
        });
      }

      if (req.method === 'GET' && path === '/v1/status') {
        return sendJson(res, 200, executor.status());
      }

      if (req.method === 'GET' && path === '/v1/tasks') {
        return sendJson(res, 200, {
          tasks: store.list(),
          queue: store.queue(),
          priorities: TASK_PRIORITIES
        });
      }

      if (req.method === 'DELETE' && path === '/v1/tasks') {
        return sendJson(res, 200, { removed: store.clearFinished() });
      }

      const cancelMatch = /^\/v1\/tasks\/([^/]+)\/cancel$/.exec(path);
      if (req.method === 'POST' && cancelMatch) {
        const id = decodeTaskId(cancelMatch[1]);
        const task = store.get(id);
        if (!task) return sendJson(res, 404, { error: 'Not found' });
        if (!store.cancel(id, 'Cancelled by user')) {
          return sendJson(res, 409, { error: `Task is ${task.status}`, task });
        }
        return sendJson(res, 200, store.get(id));
      }

      const taskMatch = /^\/v1\/tasks\/([^/]+)$/.exec(path);
      if (req.method === 'GET' && taskMatch) {
        const task = store.get(decodeTaskId(taskMatch[1]));
        if (!task) return sendJson(res, 404, { error: 'Not found' });
        return sendJson(res, 200, task);
      }

      if (req.method === 'POST' && path === '/v1/stop') {
        return sendJson(res, 200, { stopped: await executor.stop() });
      }

      if (req.method === 'POST' && path === '/v1/input') {
        const body = await readBody(req, InputBody);
        if (!(await executor.sendInput(body.text))) {
          return sendJson(res, 409, { error: 'A task is running; input is not accepted' });
        }
        return sendJson(res, 202, { sent: true });
      }

      if (req.method === 'GET' && path === '/v1/events') {
        const since = Number(url.searchParams.get('since') ?? 0);
        if (!Number.isInteger(since) || since < 0) {
          return sendJson(res, 400, { error: 'since must be a non-negative integer' });
        }
        return sendJson(res, 200, { events: notifications.since(since) });
      }

      return sendJson(res, 404, { error: 'Route not found' });
    } catch (err) {
      if (err instanceof HttpError) {
        return sendJson(res, err.status, { error: err.message, details: err.details });
      }
      if (err instanceof TransportError) {
        return sendJson(res, 503, { error: err.message });
      }
      return sendJson(res, 500, { error: errorMessage(err) });
    }
  });
}

export function start(): http.Server {
  dotenv.config();
  const config = loadConfig();
  const agent = createAgent(config);
  const server = createAgentServer({ agent, apiKey: config.apiKey });
  server.on('close', () => agent.close());
  server.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(`shellpilot server listening on :${config.port}`);
  });
  return server;
}

function isMainModule(): boolean {
  if (!process.argv[1]) return false;
  return resolve(process.argv[1]) === fileURLToPath(import.meta.url);
}

if (isMainModule() || process.env.SHELLPILOT_AUTOSTART === '1') {
  start();
}
