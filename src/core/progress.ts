import { setTimeout as sleep } from 'timers/promises';
import type { InteractionCategory, InteractionClassifier } from './interaction.js';
import { extractProgressPercent, isInformational } from './interaction.js';
import type { ShellTransport } from './transport.js';

export interface ProgressMonitorOptions {
  pollIntervalMs?: number;
  ceilingMs?: number;
  onOutput?(output: string): void;
  onProgress?(percent: number): void;
}

export type ProgressReport =
  | { kind: 'completed'; polls: number; percent?: number }
  | {
      kind: 'interaction';
      category: InteractionCategory;
      output: string;
      polls: number;
    }
  | { kind: 'timeout'; polls: number; percent?: number }
  | { kind: 'stopped'; polls: number };

/**
 * Watches a long-running command (package installs, downloads) until it
 * completes, asks for input, or the ceiling expires. A timeout only means
 * the watch gave up; the command may still be running.
 */
export class ProgressMonitor {
  private stopped = false;
  private pollIntervalMs: number;
  private ceilingMs: number;

  constructor(
    private transport: ShellTransport,
    private classifier: InteractionClassifier,
    private opts: ProgressMonitorOptions = {}
  ) {
    this.pollIntervalMs = opts.pollIntervalMs ?? 2000;
    this.ceilingMs = opts.ceilingMs ?? 300_000;
  }

  stop(): void {
    this.stopped = true;
  }

  async watch(): Promise<ProgressReport> {
    const start = Date.now();
    let polls = 0;
    let percent: number | undefined;

    while (Date.now() - start < this.ceilingMs) {
      await sleep(this.pollIntervalMs);
      if (this.stopped) return { kind: 'stopped', polls };
      polls++;

      const output = await this.transport.readAvailable();
      if (!output) continue;
      this.opts.onOutput?.(output);

      const extracted = extractProgressPercent(output);
      if (extracted !== undefined) {
        percent = extracted;
        this.opts.onProgress?.(extracted);
      }

      const category = this.classifier.classify(output);
      if (category === 'completion') return { kind: 'completed', polls, percent };
      if (category && !isInformational(category)) {
        return { kind: 'interaction', category, output, polls };
      }
    }

    return { kind: 'timeout', polls, percent };
  }
}
