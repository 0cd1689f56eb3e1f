import { describe, test, expect } from 'vitest';
import { ScriptedShell } from '../testing/scriptedShell.js';
import { InteractionClassifier } from './interaction.js';
import { ProgressMonitor } from './progress.js';

const classifier = new InteractionClassifier();

describe('ProgressMonitor', () => {
  test('reports completion with the progress seen on the way', async () => {
    const shell = new ScriptedShell();
    shell.queueReads('10%', '55%', '100% complete');
    const percents: number[] = [];
    const outputs: string[] = [];
    const monitor = new ProgressMonitor(shell, classifier, {
      pollIntervalMs: 1,
      ceilingMs: 5000,
      onOutput: output => outputs.push(output),
      onProgress: percent => percents.push(percent)
    });

    const report = await monitor.watch();
    expect(report).toEqual({ kind: 'completed', polls: 3, percent: 100 });
    expect(percents).toEqual([10, 55, 100]);
    expect(outputs).toEqual(['10%', '55%', '100% complete']);
  });

  test('returns a prompt that shows up mid-download', async () => {
    const shell = new ScriptedShell();
    shell.queueReads('Downloading 10%', 'Do you want to continue? [Y/n]');
    const monitor = new ProgressMonitor(shell, classifier, { pollIntervalMs: 1, ceilingMs: 5000 });

    expect(await monitor.watch()).toEqual({
      kind: 'interaction',
      category: 'confirmation',
      output: 'Do you want to continue? [Y/n]',
      polls: 2
    });
  });

  test('times out with the last known percentage', async () => {
    const shell = new ScriptedShell();
    shell.queueReads('Downloading 40%');
    const monitor = new ProgressMonitor(shell, classifier, { pollIntervalMs: 1, ceilingMs: 30 });

    const report = await monitor.watch();
    expect(report.kind).toBe('timeout');
    if (report.kind !== 'timeout') return;
    expect(report.percent).toBe(40);
    expect(report.polls).toBeGreaterThan(1);
  });

  test('stops when asked', async () => {
    const shell = new ScriptedShell();
    const monitor = new ProgressMonitor(shell, classifier, { pollIntervalMs: 1, ceilingMs: 5000 });
    monitor.stop();
    expect(await monitor.watch()).toEqual({ kind: 'stopped', polls: 0 });
  });
});
