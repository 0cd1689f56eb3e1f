import { describe, test, expect } from 'vitest';
import { ConversationHistory } from './history.js';

describe('ConversationHistory', () => {
  test('records shell output as a system message', () => {
    const history = new ConversationHistory();
    history.addShellOutput('ls', 'a.txt');
    expect(history.recent()).toMatchObject([
      { role: 'system', content: '[shell]\ncommand: ls\noutput: a.txt' }
    ]);
  });

  test('drops the oldest non-system message past the limit', () => {
    const history = new ConversationHistory(3);
    history.add('system', 'context');
    history.add('user', 'one');
    history.add('assistant', 'two');
    history.add('user', 'three');
    expect(history.size()).toBe(3);
    expect(history.recent().map(m => m.content)).toEqual(['context', 'two', 'three']);
  });

  test('keeps the last system message in front of a recent window', () => {
    const history = new ConversationHistory();
    history.add('system', 'old context');
    history.add('system', 'new context');
    for (const n of ['a', 'b', 'c', 'd']) history.add('user', n);
    expect(history.recent(2).map(m => m.content)).toEqual(['new context', 'c', 'd']);
  });

  test('returns the tail unchanged when it already holds a system message', () => {
    const history = new ConversationHistory();
    history.add('user', 'a');
    history.addShellOutput('pwd', '/root');
    history.add('assistant', 'b');
    expect(history.recent(2).map(m => m.role)).toEqual(['system', 'assistant']);
  });
});
