import { jsonSchema } from '@ai-sdk/provider-utils';
import { generateText, streamText, tool } from 'ai';

import type {
  ConversationMessage,
  ModelStreamPart,
  ModelToolCall,
  ModelToolSchema,
  TurnRequest,
  TurnResult,
} from '../types.js';
import type { LanguageModel, ModelMessage, TextPart, ToolCallPart, ToolSet } from 'ai';

import { ModelCallError } from '../errors.js';
import { parseToolArguments } from '../utils.js';

import { mapLlmError, type FailedTurnStatus } from './llm-error-mapping.js';

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  executeTurn: (request: TurnRequest) => Promise<TurnResult>;
  streamTurn: (request: TurnRequest) => AsyncIterable<ModelStreamPart>;
}

/**
 * Shared turn execution over the `ai` SDK. Tools are declared without `execute`, so the SDK returns
 * the calls and never runs them; the conversation engine owns tool execution.
 * Subclasses only supply the language model.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly model: string;

  protected abstract languageModel(): LanguageModel;

  async executeTurn(request: TurnRequest): Promise<TurnResult> {
    const startTime = Date.now();
    try {
      const result = await generateText({
        model: this.languageModel(),
        messages: this.convertMessages(request.messages),
        tools: this.convertTools(request.tools),
        maxRetries: 0,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.maxOutputTokens !== undefined ? { maxOutputTokens: request.maxOutputTokens } : {}),
        ...(request.abortSignal !== undefined ? { abortSignal: request.abortSignal } : {}),
      });
      const toolCalls: ModelToolCall[] = result.toolCalls.map((call) => ({
        id: call.toolCallId,
        name: call.toolName,
        arguments: parseToolArguments(call.input),
      }));
      return {
        status: { type: 'success', hasToolCalls: toolCalls.length > 0 },
        content: result.text,
        toolCalls,
        finishReason: result.finishReason,
        latencyMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        status: this.mapError(error),
        content: '',
        toolCalls: [],
        latencyMs: Date.now() - startTime,
      };
    }
  }

  /**
   * Stream one model turn. Text arrives as `content` parts; tool calls arrive as fragments keyed by
   * the order in which the model opened them. A failure ends the iteration with a ModelCallError.
   */
  async *streamTurn(request: TurnRequest): AsyncGenerator<ModelStreamPart> {
    let capturedError: unknown;
    const result = streamText({
      model: this.languageModel(),
      messages: this.convertMessages(request.messages),
      tools: this.convertTools(request.tools),
      maxRetries: 0,
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.maxOutputTokens !== undefined ? { maxOutputTokens: request.maxOutputTokens } : {}),
      ...(request.abortSignal !== undefined ? { abortSignal: request.abortSignal } : {}),
      onError: ({ error }) => { capturedError ??= error; },
    });

    const indexById = new Map<string, number>();
    const argumentsSeen = new Set<string>();
    try {
      // eslint-disable-next-line functional/no-loop-statements
      for await (const part of result.fullStream) {
        if (part.type === 'text-delta') {
          if (part.text.length > 0) yield { type: 'content', text: part.text };
        } else if (part.type === 'tool-input-start') {
          const index = indexById.size;
          indexById.set(part.id, index);
          yield { type: 'tool-call-delta', index, id: part.id, name: part.toolName };
        } else if (part.type === 'tool-input-delta') {
          const index = indexById.get(part.id);
          if (index !== undefined && part.delta.length > 0) {
            argumentsSeen.add(part.id);
            yield { type: 'tool-call-delta', index, arguments: part.delta };
          }
        } else if (part.type === 'tool-call') {
          // Providers that do not stream tool input only report the completed call
          const known = indexById.get(part.toolCallId);
          const index = known ?? indexById.size;
          if (known === undefined) indexById.set(part.toolCallId, index);
          if (!argumentsSeen.has(part.toolCallId)) {
            argumentsSeen.add(part.toolCallId);
            yield {
              type: 'tool-call-delta',
              index,
              id: part.toolCallId,
              name: part.toolName,
              arguments: JSON.stringify(part.input ?? {}),
            };
          }
        } else if (part.type === 'error') {
          capturedError ??= part.error;
          break;
        } else if (part.type === 'finish') {
          yield { type: 'finish', finishReason: part.finishReason };
        }
      }
    } catch (error) {
      if (error instanceof ModelCallError) throw error;
      capturedError ??= error;
    }
    if (capturedError !== undefined) throw new ModelCallError(this.mapError(capturedError));
  }

  protected mapError(error: unknown): FailedTurnStatus {
    return mapLlmError(error);
  }

  protected convertTools(tools: ModelToolSchema[]): ToolSet | undefined {
    if (tools.length === 0) return undefined;
    return tools.reduce<ToolSet>((acc, schema) => {
      acc[schema.function.name] = tool({
        description: schema.function.description,
        inputSchema: jsonSchema<Record<string, unknown>>(schema.function.parameters),
      });
      return acc;
    }, {});
  }

  protected convertMessages(messages: ConversationMessage[]): ModelMessage[] {
    // Tool results must name their tool; fall back to the call that requested them
    const toolNameById = new Map<string, string>();
    return messages.map((message): ModelMessage => {
      switch (message.role) {
        case 'system':
          return { role: 'system', content: message.content };
        case 'user':
          return { role: 'user', content: message.content };
        case 'assistant': {
          const calls = message.toolCalls ?? [];
          if (calls.length === 0) return { role: 'assistant', content: message.content };
          const parts: (TextPart | ToolCallPart)[] = message.content.length > 0 ? [{ type: 'text', text: message.content }] : [];
          calls.forEach((call) => {
            toolNameById.set(call.id, call.name);
            parts.push({ type: 'tool-call', toolCallId: call.id, toolName: call.name, input: call.arguments });
          });
          return { role: 'assistant', content: parts };
        }
        case 'tool': {
          const toolCallId = message.toolCallId ?? '';
          return {
            role: 'tool',
            content: [{
              type: 'tool-result',
              toolCallId,
              toolName: message.name ?? toolNameById.get(toolCallId) ?? 'unknown',
              output: { type: 'text', value: message.content },
            }],
          };
        }
      }
    });
  }
}
