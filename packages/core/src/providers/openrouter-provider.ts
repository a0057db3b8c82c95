import OpenAI from 'openai';

import { CompletionRequest, CompletionResponse, LLMProvider } from './llm-provider';
import { completeWithChatApi } from './openai-sdk-utils';

/**
 * OpenRouter API configuration constants
 */
const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
const OPENROUTER_HTTP_REFERER = 'curia';
const OPENROUTER_X_TITLE = 'Curia - Senate Debate Engine';

/**
 * OpenRouter provider using the OpenAI SDK pointed at OpenRouter's endpoint.
 *
 * Models are given by their fully qualified OpenRouter names (e.g. "openai/gpt-4o-mini").
 */
export class OpenRouterProvider implements LLMProvider {
  private client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({
      apiKey,
      baseURL: OPENROUTER_BASE_URL,
      defaultHeaders: {
        'HTTP-Referer': OPENROUTER_HTTP_REFERER,
        'X-Title': OPENROUTER_X_TITLE,
      },
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    return completeWithChatApi(this.client, request);
  }
}
