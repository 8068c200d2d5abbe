import { createOpenRouter } from '@openrouter/ai-sdk-provider';

import type { LlmConfig } from '../config.js';
import type { LanguageModel } from 'ai';

import { DEFAULT_OPENROUTER_BASE_URL } from '../config.js';
import { BaseLLMProvider } from './base.js';

const DEFAULT_HEADERS = {
  'HTTP-Referer': 'https://mcp-tool-hub.local',
  'X-Title': 'mcp-tool-hub',
} as const;

export class OpenRouterProvider extends BaseLLMProvider {
  readonly name = 'openrouter';
  readonly model: string;
  readonly baseUrl: string;
  private readonly provider: ReturnType<typeof createOpenRouter>;

  constructor(config: LlmConfig, env: NodeJS.ProcessEnv = process.env) {
    super();
    this.model = config.model;
    this.baseUrl = config.baseUrl ?? DEFAULT_OPENROUTER_BASE_URL;
    this.provider = createOpenRouter({
      apiKey: config.apiKey ?? env.OPENROUTER_API_KEY,
      baseURL: this.baseUrl,
      headers: {
        'HTTP-Referer': env.OPENROUTER_REFERER ?? DEFAULT_HEADERS['HTTP-Referer'],
        'X-Title': env.OPENROUTER_TITLE ?? DEFAULT_HEADERS['X-Title'],
        ...(config.headers ?? {}),
      },
    });
  }

  protected languageModel(): LanguageModel {
    return this.provider(this.model);
  }
}
