import { createValidationError } from '../utils/common';
import { EXIT_CONFIG_ERROR } from '../utils/exit-codes';

import { LLM_PROVIDERS, LLMProvider } from './llm-provider';
import { OpenAIProvider } from './openai-provider';
import { OpenRouterProvider } from './openrouter-provider';

/**
 * Environment variable names for API keys
 */
const OPENAI_API_KEY_ENV = 'OPENAI_API_KEY';
const OPENROUTER_API_KEY_ENV = 'OPENROUTER_API_KEY';

/**
 * Creates a provider after checking that its API key is present in the environment.
 *
 * @throws {ErrorWithCode} EXIT_CONFIG_ERROR if the key is missing or blank.
 */
function createProviderWithApiKey<T extends LLMProvider>(
  envVarName: string,
  ProviderClass: new (apiKey: string) => T
): T {
  const apiKey = process.env[envVarName];
  if (!apiKey || apiKey.trim() === '') {
    throw createValidationError(`${envVarName} is not set`, EXIT_CONFIG_ERROR);
  }
  return new ProviderClass(apiKey);
}

/**
 * Creates an LLM provider by type, reading its API key from the environment.
 *
 * @param providerType - "openai" or "openrouter".
 * @throws {ErrorWithCode} EXIT_CONFIG_ERROR for an unknown type or a missing key.
 */
export function createProvider(providerType: string): LLMProvider {
  switch (providerType) {
    case LLM_PROVIDERS.OPENAI:
      return createProviderWithApiKey(OPENAI_API_KEY_ENV, OpenAIProvider);

    case LLM_PROVIDERS.OPENROUTER:
      return createProviderWithApiKey(OPENROUTER_API_KEY_ENV, OpenRouterProvider);

    default: {
      const supportedTypes = Object.values(LLM_PROVIDERS).join(', ');
      throw createValidationError(
        `Unsupported provider type: ${providerType}. Supported types are: ${supportedTypes}`,
        EXIT_CONFIG_ERROR
      );
    }
  }
}
