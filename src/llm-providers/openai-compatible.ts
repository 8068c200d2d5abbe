import { createOpenAICompatible } from '@ai-sdk/openai-compatible';

import type { LlmConfig } from '../config.js';
import type { LanguageModel } from 'ai';

import { ConfigurationError } from '../errors.js';

import { BaseLLMProvider } from './base.js';

export class OpenAICompatibleProvider extends BaseLLMProvider {
  readonly name = 'openai-compatible';
  readonly model: string;
  private readonly provider: ReturnType<typeof createOpenAICompatible>;

  constructor(config: LlmConfig, env: NodeJS.ProcessEnv = process.env) {
    super();
    const baseUrl = config.baseUrl;
    if (baseUrl === undefined || baseUrl.length === 0) {
      throw new ConfigurationError('openai-compatible provider requires llm.baseUrl');
    }
    this.model = config.model;
    this.provider = createOpenAICompatible({
      name: 'openai-compatible',
      baseURL: baseUrl,
      apiKey: config.apiKey ?? env.OPENAI_API_KEY,
      ...(config.headers !== undefined ? { headers: config.headers } : {}),
    });
  }

  protected languageModel(): LanguageModel {
    return this.provider.chatModel(this.model);
  }
}
