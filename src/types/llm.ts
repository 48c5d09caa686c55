export type LLMProviderName = 'openai' | 'anthropic';

export interface DialogueMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: DialogueMessage[];
  timeoutMs: number;
  temperature?: number;
  topP?: number;
  /** OpenAI only; Anthropic has no repetition penalties. */
  frequencyPenalty?: number;
  /** OpenAI only. */
  presencePenalty?: number;
  maxTokens?: number;
  /** JSON object response: OpenAI's response_format, an extra system instruction for Anthropic. */
  jsonMode?: boolean;
}

export interface CompletionResult {
  content: string;
  tokensUsed: { prompt: number; completion: number };
}

export interface LLMProvider {
  readonly name: LLMProviderName;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
