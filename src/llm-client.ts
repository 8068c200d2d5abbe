import type { LlmConfig } from './config.js';
import type { LLMProvider } from './llm-providers/base.js';
import type { LogEntry, LogFn, ModelStreamPart, TurnRequest, TurnResult } from './types.js';

import { OpenAICompatibleProvider } from './llm-providers/openai-compatible.js';
import { OpenAIProvider } from './llm-providers/openai.js';
import { OpenRouterProvider } from './llm-providers/openrouter.js';

export function createProvider(config: LlmConfig, env: NodeJS.ProcessEnv = process.env): LLMProvider {
  switch (config.provider) {
    case 'openrouter':
      return new OpenRouterProvider(config, env);
    case 'openai':
      return new OpenAIProvider(config, env);
    case 'openai-compatible':
      return new OpenAICompatibleProvider(config, env);
  }
}

/**
 * Logging front for a provider. Every turn is reported as an llm request/response pair.
 */
export class LLMClient implements LLMProvider {
  private readonly provider: LLMProvider;
  private readonly onLog?: LogFn;
  private turn = 0;

  constructor(provider: LLMProvider, options?: { onLog?: LogFn }) {
    this.provider = provider;
    this.onLog = options?.onLog;
  }

  static fromConfig(config: LlmConfig, options?: { onLog?: LogFn; env?: NodeJS.ProcessEnv }): LLMClient {
    return new LLMClient(createProvider(config, options?.env), { onLog: options?.onLog });
  }

  get name(): string {
    return this.provider.name;
  }

  get model(): string {
    return this.provider.model;
  }

  async executeTurn(request: TurnRequest): Promise<TurnResult> {
    this.turn += 1;
    this.logRequest(request, false);
    const result = await this.provider.executeTurn(request);
    if (result.status.type === 'success') {
      this.log({
        severity: 'VRB',
        direction: 'response',
        message: `ok in ${String(result.latencyMs)}ms, ${String(result.toolCalls.length)} tool call(s)`,
        details: { latency_ms: result.latencyMs, finish_reason: result.finishReason ?? 'unknown' },
      });
    } else {
      this.log({
        severity: 'ERR',
        direction: 'response',
        message: `${result.status.type}: ${result.status.message}`,
        details: { latency_ms: result.latencyMs, status: result.status.type },
      });
    }
    return result;
  }

  async *streamTurn(request: TurnRequest): AsyncGenerator<ModelStreamPart> {
    this.turn += 1;
    this.logRequest(request, true);
    const startTime = Date.now();
    try {
      // eslint-disable-next-line functional/no-loop-statements
      for await (const part of this.provider.streamTurn(request)) {
        if (part.type === 'finish') {
          this.log({
            severity: 'VRB',
            direction: 'response',
            message: `stream finished in ${String(Date.now() - startTime)}ms`,
            details: { latency_ms: Date.now() - startTime, finish_reason: part.finishReason ?? 'unknown' },
          });
        }
        yield part;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log({ severity: 'ERR', direction: 'response', message, details: { latency_ms: Date.now() - startTime } });
      throw error;
    }
  }

  private logRequest(request: TurnRequest, stream: boolean): void {
    this.log({
      severity: 'VRB',
      direction: 'request',
      message: `${stream ? 'stream' : 'turn'} with ${String(request.messages.length)} message(s), ${String(request.tools.length)} tool(s)`,
      details: { messages: request.messages.length, tools: request.tools.length, stream },
    });
  }

  private log(entry: Pick<LogEntry, 'severity' | 'direction' | 'message' | 'details'>): void {
    this.onLog?.({
      timestamp: Date.now(),
      type: 'llm',
      remoteIdentifier: `${this.provider.name}:${this.provider.model}`,
      iteration: this.turn,
      ...entry,
    });
  }
}
