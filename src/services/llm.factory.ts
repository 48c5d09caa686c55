import { LLMProvider, LLMProviderName } from '../types/llm';
import { OpenAIService } from './openai.service';
import { AnthropicService } from './anthropic.service';

export interface LLMCredentials {
  OPENAI_API_KEY?: string;
  ANTHROPIC_API_KEY?: string;
}

export interface LLMModelSettings {
  MAIN_MODEL?: string;
  CLASSIFIER_MODEL?: string;
}

export interface LLMModels {
  main: string;
  classifier: string;
}

const DEFAULT_MODELS: Record<LLMProviderName, LLMModels> = {
  openai: { main: 'gpt-4o', classifier: 'gpt-4o-mini' },
  anthropic: { main: 'claude-3-5-sonnet-latest', classifier: 'claude-3-5-haiku-latest' },
};

function belongsTo(provider: LLMProviderName, model: string): boolean {
  return model.startsWith('claude') === (provider === 'anthropic');
}

export class LLMFactory {
  static create(provider: LLMProviderName, credentials: LLMCredentials): LLMProvider {
    switch (provider) {
      case 'openai':
        if (!credentials.OPENAI_API_KEY) {
          throw new Error('OPENAI_API_KEY is required for the openai provider');
        }
        return new OpenAIService({ apiKey: credentials.OPENAI_API_KEY });
      case 'anthropic':
        if (!credentials.ANTHROPIC_API_KEY) {
          throw new Error('ANTHROPIC_API_KEY is required for the anthropic provider');
        }
        return new AnthropicService({ apiKey: credentials.ANTHROPIC_API_KEY });
      default:
        throw new Error(`Unsupported LLM provider: ${String(provider)}`);
    }
  }

  /** Provider defaults for unset models; a model from the other provider fails startup. */
  static resolveModels(provider: LLMProviderName, settings: LLMModelSettings): LLMModels {
    const models: LLMModels = {
      main: settings.MAIN_MODEL ?? DEFAULT_MODELS[provider].main,
      classifier: settings.CLASSIFIER_MODEL ?? DEFAULT_MODELS[provider].classifier,
    };

    for (const [key, model] of Object.entries({ MAIN_MODEL: models.main, CLASSIFIER_MODEL: models.classifier })) {
      if (!belongsTo(provider, model)) {
        throw new Error(`${key} "${model}" is not a model of the ${provider} provider`);
      }
    }

    return models;
  }
}
