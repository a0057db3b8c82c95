import { EXIT_CONFIG_ERROR } from '../utils/exit-codes';
import { captureError } from '../utils/test-utils';

import { OpenAIProvider } from './openai-provider';
import { OpenRouterProvider } from './openrouter-provider';
import { createProvider } from './provider-factory';

jest.mock('./openai-provider');
jest.mock('./openrouter-provider');

const TEST_OPENAI_API_KEY = 'test-openai-key';
const TEST_OPENROUTER_API_KEY = 'test-openrouter-key';
const ENV_VAR_OPENAI_API_KEY = 'OPENAI_API_KEY';
const ENV_VAR_OPENROUTER_API_KEY = 'OPENROUTER_API_KEY';
const SUPPORTED_TYPES_SUFFIX = 'Supported types are: openai, openrouter';

function expectProviderError(providerType: string, expectedMessage: string): void {
  const error = captureError(() => createProvider(providerType));
  expect(error.message).toBe(expectedMessage);
  expect(error.code).toBe(EXIT_CONFIG_ERROR);
}

describe('Provider Factory', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should create OpenAI provider with valid API key', () => {
    process.env[ENV_VAR_OPENAI_API_KEY] = TEST_OPENAI_API_KEY;

    const provider = createProvider('openai');

    expect(OpenAIProvider).toHaveBeenCalledWith(TEST_OPENAI_API_KEY);
    expect(provider).toBeInstanceOf(OpenAIProvider);
  });

  it('should create OpenRouter provider with valid API key', () => {
    process.env[ENV_VAR_OPENROUTER_API_KEY] = TEST_OPENROUTER_API_KEY;

    const provider = createProvider('openrouter');

    expect(OpenRouterProvider).toHaveBeenCalledWith(TEST_OPENROUTER_API_KEY);
    expect(provider).toBeInstanceOf(OpenRouterProvider);
  });

  it('should throw error when OpenAI API key is missing', () => {
    delete process.env[ENV_VAR_OPENAI_API_KEY];
    expectProviderError('openai', 'OPENAI_API_KEY is not set');
  });

  it('should throw error when OpenRouter API key is missing', () => {
    delete process.env[ENV_VAR_OPENROUTER_API_KEY];
    expectProviderError('openrouter', 'OPENROUTER_API_KEY is not set');
  });

  it('should treat a whitespace-only API key as missing', () => {
    process.env[ENV_VAR_OPENAI_API_KEY] = '   ';
    expectProviderError('openai', 'OPENAI_API_KEY is not set');
  });

  it('should throw error for unsupported provider type', () => {
    expectProviderError('anthropic', `Unsupported provider type: anthropic. ${SUPPORTED_TYPES_SUFFIX}`);
  });

  it('should match provider types case-sensitively', () => {
    process.env[ENV_VAR_OPENAI_API_KEY] = TEST_OPENAI_API_KEY;
    expectProviderError('OpenAI', `Unsupported provider type: OpenAI. ${SUPPORTED_TYPES_SUFFIX}`);
  });
});
