import { describe, test, expect, vi } from 'vitest';
import type { DecisionRequest } from '../core/decision.js';
import { INTERACTION_SYSTEM_PROMPT } from '../core/decision.js';
import type { ChatCompletionClient } from './openaiDecisionMaker.js';
import { OpenAIDecisionMaker } from './openaiDecisionMaker.js';

function fakeClient(content: string | null) {
  const create = vi.fn(async () => ({ choices: [{ message: { content } }] }));
  const client: ChatCompletionClient = { chat: { completions: { create } } };
  return { client, create };
}

const request: DecisionRequest = {
  session_id: 's1',
  task_id: 't1',
  category: 'confirmation',
  output: 'Continue? (y/n)',
  instruction: 'The shell is waiting for input after the last action.',
  history: [
    { role: 'assistant', content: 'RUN_COMMAND{apt upgrade}', timestamp: 1 },
    { role: 'system', content: '[shell]\ncommand: apt upgrade\noutput: Continue? (y/n)', timestamp: 2 }
  ]
};

describe('OpenAIDecisionMaker', () => {
  test('sends the system prompt, history and instruction', async () => {
    const { client, create } = fakeClient('SEND_KEYS{"y","enter"}');
    const maker = new OpenAIDecisionMaker(client, { model: 'test-model' });

    await expect(maker.decide(request)).resolves.toBe('SEND_KEYS{"y","enter"}');
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: INTERACTION_SYSTEM_PROMPT },
        { role: 'assistant', content: 'RUN_COMMAND{apt upgrade}' },
        { role: 'system', content: '[shell]\ncommand: apt upgrade\noutput: Continue? (y/n)' },
        { role: 'user', content: 'The shell is waiting for input after the last action.' }
      ],
      temperature: 0.2,
      max_tokens: 512
    });
  });

  test('returns an empty reply for empty content', async () => {
    const { client } = fakeClient(null);
    await expect(new OpenAIDecisionMaker(client).decide(request)).resolves.toBe('');
  });

  test('propagates client errors', async () => {
    const client: ChatCompletionClient = {
      chat: {
        completions: {
          create: async () => {
            throw new Error('401 Unauthorized');
          }
        }
      }
    };
    await expect(new OpenAIDecisionMaker(client).decide(request)).rejects.toThrow('401 Unauthorized');
  });
});
