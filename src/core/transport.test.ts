import { describe, test, expect, afterEach } from 'vitest';
import { ScriptedShell } from '../testing/scriptedShell.js';
import { captureOutput, stripControlCodes } from './transport.js';

describe('captureOutput', () => {
  let shell: ScriptedShell;

  afterEach(() => shell.dispose());

  test('collects output until the shell goes quiet', async () => {
    shell = new ScriptedShell();
    shell.emit('line 1\n');
    shell.emitLater(5, 'line 2\n');
    const output = await captureOutput(shell, { quiescenceMs: 40, maxWaitMs: 2000, pollMs: 2 });
    expect(output).toBe('line 1\nline 2\n');
  });

  test('returns an empty string when nothing arrives', async () => {
    shell = new ScriptedShell();
    const output = await captureOutput(shell, { quiescenceMs: 5, maxWaitMs: 1000 });
    expect(output).toBe('');
  });

  test('stops at the hard limit for chatty output', async () => {
    shell = new ScriptedShell();
    shell.queueReads(...Array.from({ length: 1000 }, () => '.'));
    const started = Date.now();
    const output = await captureOutput(shell, { quiescenceMs: 1000, maxWaitMs: 30, pollMs: 2 });
    expect(Date.now() - started).toBeLessThan(1000);
    expect(output.length).toBeGreaterThan(0);
    expect(output).toMatch(/^\.+$/);
  });
});

describe('stripControlCodes', () => {
  test('removes colour codes and control characters', () => {
    expect(stripControlCodes('\x1b[32mok\x1b[0m\x07 done\r\n')).toBe('ok done\r\n');
  });

  test('keeps tabs and newlines', () => {
    expect(stripControlCodes('a\tb\nc')).toBe('a\tb\nc');
  });
});
