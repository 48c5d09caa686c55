import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { CompletionRequest, CompletionResult, DialogueMessage, LLMProvider } from '../types/llm';
import { callWithRetry } from '../utils/retry';
import { logger } from '../utils/logger';

export interface OpenAIServiceOptions {
  apiKey: string;
  maxAttempts?: number;
  retryDelayMs?: number;
}

function toOpenAIMessage(message: DialogueMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    default:
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIService implements LLMProvider {
  readonly name = 'openai' as const;
  private client: OpenAI;
  private maxAttempts: number;
  private retryDelayMs: number;

  constructor(options: OpenAIServiceOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey });
    this.maxAttempts = options.maxAttempts ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const response = await callWithRetry(
      'OpenAI',
      'complete',
      () =>
        this.client.chat.completions.create(
          {
            model: request.model,
            messages: request.messages.map(toOpenAIMessage),
            temperature: request.temperature,
            top_p: request.topP,
            frequency_penalty: request.frequencyPenalty,
            presence_penalty: request.presencePenalty,
            max_tokens: request.maxTokens,
            response_format: request.jsonMode ? { type: 'json_object' } : undefined,
          },
          { timeout: request.timeoutMs, maxRetries: 0 }
        ),
      { maxAttempts: this.maxAttempts, baseDelayMs: this.retryDelayMs }
    );

    const content = response.choices[0]?.message?.content?.trim() ?? '';
    const tokensUsed = {
      prompt: response.usage?.prompt_tokens ?? 0,
      completion: response.usage?.completion_tokens ?? 0,
    };

    logger.debug('OpenAI completion', { model: request.model, tokens: tokensUsed });
    return { content, tokensUsed };
  }
}
