import OpenAI from 'openai';

import { CHAT_ROLES, CompletionRequest, CompletionResponse } from './llm-provider';

/**
 * Sends a single system + user exchange through the Chat Completions API.
 * Shared by every provider built on the OpenAI SDK.
 */
export async function completeWithChatApi(client: OpenAI, request: CompletionRequest): Promise<CompletionResponse> {
  const chat = await client.chat.completions.create({
    model: request.model,
    temperature: request.temperature,
    messages: [
      { role: CHAT_ROLES.SYSTEM, content: request.systemPrompt },
      { role: CHAT_ROLES.USER, content: request.userPrompt },
    ],
    ...(request.maxTokens != null && { max_tokens: request.maxTokens }),
  });

  const out: CompletionResponse = { text: chat.choices[0]?.message?.content ?? '' };
  if (chat.usage) {
    out.usage = {
      inputTokens: chat.usage.prompt_tokens,
      outputTokens: chat.usage.completion_tokens,
      totalTokens: chat.usage.total_tokens,
    };
  }
  return out;
}
