import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { generateText } from 'ai';
import type { LecternConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';

export interface CompletionRequest {
  system?: string;
  prompt: string;
  abortSignal: AbortSignal;
}

/** A hosted text-completion endpoint. Retries and rate limiting live in CompletionClient. */
export interface CompletionProvider {
  readonly modelId: string;
  generate(request: CompletionRequest): Promise<string>;
}

function resolveProviderKind(modelId: string): 'anthropic' | 'google' | 'unknown' {
  const normalized = modelId.trim().toLowerCase();
  if (normalized.startsWith('claude-')) return 'anthropic';
  if (normalized.startsWith('gemini-') || normalized.startsWith('gemma-')) return 'google';
  return 'unknown';
}

export function resolveLanguageModel(config: LecternConfig, modelId = config.defaultModel) {
  const kind = resolveProviderKind(modelId);

  if (kind === 'anthropic') {
    if (!config.anthropicApiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY is required for Claude models.');
    }
    return createAnthropic({ apiKey: config.anthropicApiKey })(modelId);
  }

  if (kind === 'google') {
    if (!config.googleGenerativeAiApiKey) {
      throw new ConfigurationError('GOOGLE_GENERATIVE_AI_API_KEY is required for Gemini/Gemma models.');
    }
    return createGoogleGenerativeAI({ apiKey: config.googleGenerativeAiApiKey })(modelId);
  }

  throw new ConfigurationError(
    `Unsupported DEFAULT_MODEL "${modelId}". Use a Claude model (claude-*) or Gemini/Gemma model (gemini-*/gemma-*).`,
  );
}

export function createLanguageModelProvider(config: LecternConfig): CompletionProvider {
  const model = resolveLanguageModel(config);

  return {
    modelId: config.defaultModel,
    async generate(request) {
      const result = await generateText({
        model,
        system: request.system,
        prompt: request.prompt,
        temperature: config.temperature,
        maxOutputTokens: config.maxTokens,
        // CompletionClient owns the retry policy.
        maxRetries: 0,
        abortSignal: request.abortSignal,
      });
      return result.text;
    },
  };
}
