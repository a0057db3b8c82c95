import { LLMProvider } from '../providers/llm-provider';
import { isStance } from '../types/senate.types';
import { getErrorMessage, isRecord } from '../utils/common';

import { ContentGenerationError, ContentGenerator, GeneratedSpeech, SpeechRequest } from './content-generator';
import { buildSystemPrompt, buildUserPrompt } from './speech-prompts';

export const DEFAULT_LLM_MODEL = 'gpt-4o-mini';
export const DEFAULT_LLM_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 600;

export interface LlmContentGeneratorOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Removes a Markdown code fence wrapped around the whole reply, if present.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match ? match[1] : trimmed;
}

/**
 * Validates a model reply of the form `{ speech, translation, stance, keyPoints }`.
 *
 * @throws {ContentGenerationError} If the reply is not JSON or a field is missing or invalid.
 */
export function parseSpeechReply(text: string, senatorName: string): GeneratedSpeech {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch (error: unknown) {
    throw new ContentGenerationError(`Model reply is not valid JSON: ${getErrorMessage(error)}`, senatorName);
  }
  if (!isRecord(parsed)) {
    throw new ContentGenerationError('Model reply is not a JSON object', senatorName);
  }

  const { speech, translation, stance, keyPoints } = parsed;
  if (typeof speech !== 'string' || speech.trim() === '') {
    throw new ContentGenerationError('Model reply has no speech', senatorName);
  }
  if (!isStance(stance)) {
    throw new ContentGenerationError(`Model reply has an invalid stance: ${String(stance)}`, senatorName);
  }
  const points = Array.isArray(keyPoints) ? keyPoints.filter((p): p is string => typeof p === 'string') : [];

  return {
    content: {
      original: speech.trim(),
      translation: typeof translation === 'string' ? translation.trim() : '',
    },
    stance,
    keyPoints: points,
  };
}

/**
 * Generates speeches with a language model.
 */
export class LlmContentGenerator implements ContentGenerator {
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(private readonly provider: LLMProvider, options: LlmContentGeneratorOptions = {}) {
    this.model = options.model ?? DEFAULT_LLM_MODEL;
    this.temperature = options.temperature ?? DEFAULT_LLM_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async generate(request: SpeechRequest): Promise<GeneratedSpeech> {
    const response = await this.provider.complete({
      model: this.model,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      systemPrompt: buildSystemPrompt(request),
      userPrompt: buildUserPrompt(request),
    });
    return parseSpeechReply(response.text, request.senator.name);
  }
}
