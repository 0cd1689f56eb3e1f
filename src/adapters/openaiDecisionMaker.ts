import OpenAI from 'openai';
import type { DecisionMaker, DecisionRequest } from '../core/decision.js';
import { INTERACTION_SYSTEM_PROMPT } from '../core/decision.js';

type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;

/** The slice of the OpenAI client this adapter calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAIDecisionMakerOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
}

/**
 * Decision-maker backed by an OpenAI-compatible chat completions endpoint.
 */
export class OpenAIDecisionMaker implements DecisionMaker {
  name = 'openai';

  constructor(
    private client: ChatCompletionClient,
    private opts: OpenAIDecisionMakerOptions = {}
  ) {}

  static fromApiKey(
    apiKey: string,
    baseURL?: string,
    opts: OpenAIDecisionMakerOptions = {}
  ): OpenAIDecisionMaker {
    return new OpenAIDecisionMaker(new OpenAI({ apiKey, baseURL }), opts);
  }

  async decide(request: DecisionRequest): Promise<string> {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.opts.systemPrompt ?? INTERACTION_SYSTEM_PROMPT },
      ...request.history.map(toChatMessage),
      { role: 'user', content: request.instruction }
    ];

    const response = await this.client.chat.completions.create({
      model: this.opts.model ?? 'gpt-4o-mini',
      messages,
      temperature: this.opts.temperature ?? 0.2,
      max_tokens: this.opts.maxTokens ?? 512
    });

    return response.choices[0]?.message.content ?? '';
  }
}

function toChatMessage(message: DecisionRequest['history'][number]): ChatMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}
