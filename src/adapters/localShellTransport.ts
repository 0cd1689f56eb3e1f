import { spawn } from 'child_process';
import type { ChildProcessWithoutNullStreams } from 'child_process';
import { TransportError } from '../core/errors.js';
import type { ShellTransport } from '../core/transport.js';
import { stripControlCodes } from '../core/transport.js';

export interface LocalShellOptions {
  shell?: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Buffered output beyond this many characters drops the oldest text. */
  maxBufferChars?: number;
}

/**
 * Shell transport over a spawned local shell process. Stands in for a
 * remote terminal when the server runs without one.
 */
export class LocalShellTransport implements ShellTransport {
  private child?: ChildProcessWithoutNullStreams;
  private buffer = '';
  private exited = false;
  private maxBufferChars: number;

  constructor(private opts: LocalShellOptions = {}) {
    this.maxBufferChars = opts.maxBufferChars ?? 1024 * 1024;
  }

  open(): void {
    if (this.child) return;
    const child = spawn(this.opts.shell ?? '/bin/sh', this.opts.args ?? ['-i'], {
      cwd: this.opts.cwd,
      env: { ...process.env, ...this.opts.env, LANG: 'en_US.UTF-8' },
      stdio: 'pipe'
    });
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => this.append(chunk));
    child.stderr.on('data', (chunk: string) => this.append(chunk));
    child.on('exit', () => {
      this.exited = true;
    });
    child.on('error', err => {
      this.exited = true;
      this.append(`\n[shell error] ${err.message}\n`);
    });
    // EPIPE once the shell has gone; the write callback rejects the send.
    child.stdin.on('error', () => {
      this.exited = true;
    });
    this.child = child;
  }

  send(data: string): Promise<void> {
    const child = this.child;
    if (!child || this.exited) {
      return Promise.reject(new TransportError('Shell process is not running'));
    }
    return new Promise((resolve, reject) => {
      child.stdin.write(data, err => (err ? reject(new TransportError(err.message)) : resolve()));
    });
  }

  readAvailable(): string {
    const output = stripControlCodes(this.buffer);
    this.buffer = '';
    return output;
  }

  isConnected(): boolean {
    return this.child !== undefined && !this.exited;
  }

  close(): void {
    const child = this.child;
    if (!child) return;
    if (!child.stdin.destroyed) child.stdin.end();
    if (child.exitCode === null && child.signalCode === null) child.kill();
  }

  private append(chunk: string): void {
    this.buffer += chunk;
    if (this.buffer.length > this.maxBufferChars) {
      this.buffer = this.buffer.slice(-this.maxBufferChars);
    }
  }
}
