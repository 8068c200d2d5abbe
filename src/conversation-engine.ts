import type { LLMProvider } from './llm-providers/base.js';
import type { ConversationStore } from './persistence.js';
import type { SessionRegistry } from './tools/session-registry.js';
import type { ToolCatalog } from './tools/tool-catalog.js';
import type {
  ConversationEvent,
  ConversationMessage,
  LogFn,
  ModelToolCall,
  ToolCallOutcome,
  ToolCallRequest,
  TurnRequest,
} from './types.js';

import { DEFAULT_MAX_ITERATIONS, DEFAULT_SYSTEM_PROMPT, DEFAULT_TEMPERATURE, DEFAULT_TOOL_TIMEOUT_MS } from './config.js';
import { ModelCallError, describeError } from './errors.js';
import { mapLlmError } from './llm-providers/llm-error-mapping.js';
import { ToolCallAccumulator } from './tool-call-accumulator.js';
import { buildCatalog, resolveToolName, toModelSchema } from './tools/tool-catalog.js';
import { ToolInvoker, payloadToText } from './tools/tool-invoker.js';
import { warn } from './utils.js';

export const EMPTY_RESPONSE_FALLBACK = "I apologize, but I couldn't generate a response.";
export const ITERATION_LIMIT_FALLBACK = "I apologize, but I couldn't complete the task within the allowed steps.";

export interface ConversationEngineOptions {
  registry: Pick<SessionRegistry, 'listTools' | 'call' | 'listServers'>;
  model: LLMProvider;
  systemPrompt?: string;
  maxIterations?: number;
  temperature?: number;
  maxOutputTokens?: number;
  toolTimeoutMs?: number;
  // Prior messages of a resumed session; they are treated as already persisted
  history?: ConversationMessage[];
  store?: { sessionId: string; store: Pick<ConversationStore, 'appendMessages'> };
  // Aborts in-flight model requests, e.g. on process shutdown
  abortSignal?: AbortSignal;
  onLog?: LogFn;
}

const toolMessage = (outcome: ToolCallOutcome): ConversationMessage => ({
  role: 'tool',
  content: outcome.ok
    ? payloadToText(outcome.payload)
    : JSON.stringify({ error: outcome.error, message: `Tool ${outcome.name} failed` }),
  toolCallId: outcome.id,
  name: outcome.name,
  timestamp: Date.now(),
});

const copyMessage = (message: ConversationMessage): ConversationMessage => ({
  ...message,
  ...(message.toolCalls !== undefined ? { toolCalls: message.toolCalls.map((call) => ({ ...call, arguments: { ...call.arguments } })) } : {}),
});

/**
 * Drives the model/tool loop over one ordered message history.
 *
 * Each iteration sends the whole history plus the current tool catalog, appends the assistant
 * message and, when it asked for tools, runs every call concurrently and appends one tool message
 * per call in request order. The loop ends when the model answers without tool calls or after
 * `maxIterations` model calls. Tool failures are folded into history; model failures throw.
 *
 * Not safe for concurrent `send` calls on the same instance.
 */
export class ConversationEngine {
  private readonly registry: Pick<SessionRegistry, 'listTools' | 'call' | 'listServers'>;
  private readonly model: LLMProvider;
  private readonly invoker: ToolInvoker;
  private readonly maxIterations: number;
  private readonly temperature: number;
  private readonly maxOutputTokens?: number;
  private readonly toolTimeoutMs: number;
  private readonly store?: { sessionId: string; store: Pick<ConversationStore, 'appendMessages'> };
  private readonly abortSignal?: AbortSignal;
  private readonly onLog?: LogFn;
  private messages: ConversationMessage[];
  private persistedCount: number;

  constructor(opts: ConversationEngineOptions) {
    this.registry = opts.registry;
    this.model = opts.model;
    this.maxIterations = Math.max(1, Math.trunc(opts.maxIterations ?? DEFAULT_MAX_ITERATIONS));
    this.temperature = opts.temperature ?? DEFAULT_TEMPERATURE;
    this.maxOutputTokens = opts.maxOutputTokens;
    this.toolTimeoutMs = opts.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.store = opts.store;
    this.abortSignal = opts.abortSignal;
    this.onLog = opts.onLog;
    this.invoker = new ToolInvoker({ registry: opts.registry, defaultTimeoutMs: this.toolTimeoutMs, onLog: opts.onLog });

    const seed = (opts.history ?? []).map(copyMessage);
    const systemPrompt = opts.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.messages = seed.length > 0 && seed[0].role === 'system'
      ? seed
      : [{ role: 'system', content: systemPrompt, timestamp: Date.now() }, ...seed];
    // Seeded messages are already stored; a prompt synthesized in front of them stays in memory only
    this.persistedCount = seed.length > 0 ? this.messages.length : 0;
  }

  getHistory(): readonly ConversationMessage[] {
    return this.messages.map(copyMessage);
  }

  /** Drop everything but the leading system message. */
  clearHistory(): void {
    this.messages = this.messages.slice(0, 1);
    this.persistedCount = this.messages.length;
  }

  addSystemMessage(text: string): void {
    this.append({ role: 'system', content: text, timestamp: Date.now() });
  }

  async send(userText: string): Promise<string> {
    this.append({ role: 'user', content: userText, timestamp: Date.now() });
    try {
      // eslint-disable-next-line functional/no-loop-statements
      for (let iteration = 1; iteration <= this.maxIterations; iteration += 1) {
        const catalog = buildCatalog(this.registry);
        const result = await this.callModel(iteration, () => this.model.executeTurn(this.buildTurnRequest(catalog)));
        if (result.status.type !== 'success') throw new ModelCallError(result.status);
        const requests = this.toRequests(result.toolCalls, catalog);
        this.appendAssistant(result.content, requests);
        if (requests.length === 0) {
          return result.content.length > 0 ? result.content : EMPTY_RESPONSE_FALLBACK;
        }
        const outcomes = await this.invoker.executeAll(requests, this.toolTimeoutMs);
        outcomes.forEach((outcome) => { this.append(toolMessage(outcome)); });
      }
      this.log('WRN', `iteration limit of ${String(this.maxIterations)} reached with tool calls pending`);
      return ITERATION_LIMIT_FALLBACK;
    } finally {
      await this.persist();
    }
  }

  /**
   * Same loop as `send`, consumed incrementally. Per iteration: tokens in generation order, then one
   * `tool_call_started` per call once the model turn is over, then results in the same order as the
   * started events. The last event is always `done`.
   */
  async *sendStreaming(userText: string): AsyncGenerator<ConversationEvent> {
    this.append({ role: 'user', content: userText, timestamp: Date.now() });
    try {
      // eslint-disable-next-line functional/no-loop-statements
      for (let iteration = 1; iteration <= this.maxIterations; iteration += 1) {
        const catalog = buildCatalog(this.registry);
        const accumulator = new ToolCallAccumulator();
        let content = '';
        this.log('VRB', `model turn ${String(iteration)} (streaming)`, iteration);
        try {
          // eslint-disable-next-line functional/no-loop-statements
          for await (const part of this.model.streamTurn(this.buildTurnRequest(catalog))) {
            if (part.type === 'content') {
              content += part.text;
              yield { type: 'token', text: part.text };
            } else if (part.type === 'tool-call-delta') {
              accumulator.append(part);
            }
          }
        } catch (error) {
          throw error instanceof ModelCallError ? error : new ModelCallError(mapLlmError(error));
        }

        const requests = this.toRequests(accumulator.finalize(), catalog);
        this.appendAssistant(content, requests);
        if (requests.length === 0) {
          yield { type: 'done', content: content.length > 0 ? content : EMPTY_RESPONSE_FALLBACK };
          return;
        }
        // eslint-disable-next-line functional/no-loop-statements
        for (const request of requests) {
          yield { type: 'tool_call_started', id: request.id, name: request.name, arguments: request.arguments };
        }
        const outcomes = await this.invoker.executeAll(requests, this.toolTimeoutMs);
        outcomes.forEach((outcome) => { this.append(toolMessage(outcome)); });
        // eslint-disable-next-line functional/no-loop-statements
        for (const outcome of outcomes) {
          yield { type: 'tool_call_result', id: outcome.id, name: outcome.name, outcome };
        }
      }
      this.log('WRN', `iteration limit of ${String(this.maxIterations)} reached with tool calls pending`);
      yield { type: 'done', content: ITERATION_LIMIT_FALLBACK };
    } finally {
      await this.persist();
    }
  }

  private async callModel<T>(iteration: number, fn: () => Promise<T>): Promise<T> {
    this.log('VRB', `model turn ${String(iteration)}`, iteration);
    try {
      return await fn();
    } catch (error) {
      throw error instanceof ModelCallError ? error : new ModelCallError(mapLlmError(error));
    }
  }

  private buildTurnRequest(catalog: ToolCatalog): TurnRequest {
    return {
      messages: this.messages.map(copyMessage),
      tools: toModelSchema(catalog),
      temperature: this.temperature,
      ...(this.maxOutputTokens !== undefined ? { maxOutputTokens: this.maxOutputTokens } : {}),
      ...(this.abortSignal !== undefined ? { abortSignal: this.abortSignal } : {}),
    };
  }

  private toRequests(calls: ModelToolCall[], catalog: ToolCatalog): ToolCallRequest[] {
    return calls.map((call) => {
      const { serverName, toolName } = resolveToolName(call.name, catalog);
      return { id: call.id, name: call.name, serverName, toolName, arguments: call.arguments };
    });
  }

  private appendAssistant(content: string, requests: ToolCallRequest[]): void {
    this.append({
      role: 'assistant',
      content,
      ...(requests.length > 0 ? { toolCalls: requests } : {}),
      timestamp: Date.now(),
    });
  }

  private append(message: ConversationMessage): void {
    this.messages.push(message);
  }

  private async persist(): Promise<void> {
    if (this.store === undefined) return;
    const pending = this.messages.slice(this.persistedCount);
    if (pending.length === 0) return;
    try {
      await this.store.store.appendMessages(this.store.sessionId, pending);
      this.persistedCount += pending.length;
    } catch (error) {
      warn(`failed to persist ${String(pending.length)} message(s) for session ${this.store.sessionId}: ${describeError(error)}`);
    }
  }

  private log(severity: 'VRB' | 'WRN', message: string, iteration?: number): void {
    this.onLog?.({
      timestamp: Date.now(),
      severity,
      direction: 'request',
      type: 'engine',
      remoteIdentifier: `${this.model.name}:${this.model.model}`,
      message,
      ...(iteration !== undefined ? { iteration } : {}),
    });
  }
}
