import OpenAI from 'openai';

import { CompletionRequest, CompletionResponse, LLMProvider } from './llm-provider';
import { completeWithChatApi } from './openai-sdk-utils';

export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    return completeWithChatApi(this.client, request);
  }
}
