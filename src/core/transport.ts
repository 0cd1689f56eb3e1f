import { setTimeout as sleep } from 'timers/promises';

/**
 * The single shared shell connection. Writes and reads are ordered and
 * half-duplex; the executor's single-flight guard keeps tasks from
 * interleaving on it.
 */
export interface ShellTransport {
  send(data: string): void | Promise<void>;
  /** Drains whatever output has arrived, with control codes stripped. */
  readAvailable(): string | Promise<string>;
  isConnected(): boolean;
}

export interface CaptureOptions {
  /** No new output for this long ends the capture. */
  quiescenceMs: number;
  /** Hard limit on the whole capture. */
  maxWaitMs: number;
  pollMs?: number;
}

/**
 * Reads until the shell has been quiet for `quiescenceMs`. Silence is only a
 * heuristic for "command finished": a slow command that pauses longer than
 * the window is reported early.
 */
export async function captureOutput(
  transport: ShellTransport,
  opts: CaptureOptions
): Promise<string> {
  const pollMs = opts.pollMs ?? Math.min(100, Math.max(1, opts.quiescenceMs));
  const start = Date.now();
  let lastOutputAt = start;
  let output = '';

  for (;;) {
    await sleep(pollMs);
    const chunk = await transport.readAvailable();
    const now = Date.now();
    if (chunk) {
      output += chunk;
      lastOutputAt = now;
    }
    if (now - lastOutputAt >= opts.quiescenceMs) break;
    if (now - start >= opts.maxWaitMs) break;
  }

  return output;
}

const ANSI_ESCAPE = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;

/** Removes ANSI escape sequences and control characters, keeping newlines and tabs. */
export function stripControlCodes(text: string): string {
  return text.replace(ANSI_ESCAPE, '').replace(CONTROL_CHARS, '');
}
