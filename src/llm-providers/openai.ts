import { createOpenAI } from '@ai-sdk/openai';

import type { LlmConfig } from '../config.js';
import type { LanguageModel } from 'ai';

import { BaseLLMProvider } from './base.js';

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'openai';
  readonly model: string;
  private readonly provider: ReturnType<typeof createOpenAI>;
  private readonly mode: LlmConfig['openaiMode'];

  constructor(config: LlmConfig, env: NodeJS.ProcessEnv = process.env) {
    super();
    this.model = config.model;
    this.mode = config.openaiMode;
    this.provider = createOpenAI({
      apiKey: config.apiKey ?? env.OPENAI_API_KEY,
      ...(config.baseUrl !== undefined ? { baseURL: config.baseUrl } : {}),
      ...(config.headers !== undefined ? { headers: config.headers } : {}),
    });
  }

  protected languageModel(): LanguageModel {
    return this.mode === 'responses' ? this.provider.responses(this.model) : this.provider.chat(this.model);
  }
}
