/**
 * Supported LLM provider identifiers.
 */
export const LLM_PROVIDERS = {
  OPENAI: 'openai',
  OPENROUTER: 'openrouter',
} as const;

export type LlmProviderType = (typeof LLM_PROVIDERS)[keyof typeof LLM_PROVIDERS];

export function isLlmProviderType(value: unknown): value is LlmProviderType {
  return value === LLM_PROVIDERS.OPENAI || value === LLM_PROVIDERS.OPENROUTER;
}

/**
 * Chat message roles.
 */
export const CHAT_ROLES = {
  SYSTEM: 'system',
  USER: 'user',
} as const;

export interface CompletionRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens?: number;
}

export interface CompletionUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface CompletionResponse {
  text: string;
  usage?: CompletionUsage;
}

export interface LLMProvider {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
