import Anthropic from '@anthropic-ai/sdk';
import { CompletionRequest, CompletionResult, DialogueMessage, LLMProvider } from '../types/llm';
import { callWithRetry } from '../utils/retry';
import { logger } from '../utils/logger';

const DEFAULT_MAX_TOKENS = 512;
const JSON_ONLY_INSTRUCTION = 'Respond with a single JSON object and nothing else.';

export interface AnthropicServiceOptions {
  apiKey: string;
  maxAttempts?: number;
  retryDelayMs?: number;
}

interface AnthropicTurn {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Anthropic takes system text separately and needs at least one user turn,
 * so system-only requests are sent as a single user message.
 */
export function splitSystemPrompt(messages: DialogueMessage[]): { system: string | undefined; turns: AnthropicTurn[] } {
  const systemParts: string[] = [];
  const turns: AnthropicTurn[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push(message.content);
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }

  if (turns.length === 0) {
    return { system: undefined, turns: [{ role: 'user', content: systemParts.join('\n\n') }] };
  }

  return { system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined, turns };
}

export class AnthropicService implements LLMProvider {
  readonly name = 'anthropic' as const;
  private client: Anthropic;
  private maxAttempts: number;
  private retryDelayMs: number;

  constructor(options: AnthropicServiceOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey });
    this.maxAttempts = options.maxAttempts ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const { system, turns } = splitSystemPrompt(request.messages);
    // No native JSON mode: the instruction rides on the system prompt instead.
    const systemPrompt = request.jsonMode
      ? [system, JSON_ONLY_INSTRUCTION].filter(Boolean).join('\n\n')
      : system;

    const response = await callWithRetry(
      'Anthropic',
      'complete',
      () =>
        this.client.messages.create(
          {
            model: request.model,
            system: systemPrompt,
            messages: turns,
            temperature: request.temperature,
            top_p: request.topP,
            max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          },
          { timeout: request.timeoutMs, maxRetries: 0 }
        ),
      { maxAttempts: this.maxAttempts, baseDelayMs: this.retryDelayMs }
    );

    const content = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();

    const tokensUsed = {
      prompt: response.usage?.input_tokens ?? 0,
      completion: response.usage?.output_tokens ?? 0,
    };

    logger.debug('Anthropic completion', { model: request.model, tokens: tokensUsed });
    return { content, tokensUsed };
  }
}
