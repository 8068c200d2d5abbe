// Core types for the MCP tool hub

import type { HubErrorKind } from './errors.js';

export type TransportKind = 'stdio' | 'sse' | 'streamable-http';

interface BaseServerDescriptor {
  name: string;
}

export interface StdioServerDescriptor extends BaseServerDescriptor {
  transport: 'stdio';
  command: string;
  args: string[];
  env: Record<string, string>;
  cwd?: string;
}

export interface SseServerDescriptor extends BaseServerDescriptor {
  transport: 'sse';
  url: string;
  headers: Record<string, string>;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
}

export interface StreamableHttpServerDescriptor extends BaseServerDescriptor {
  transport: 'streamable-http';
  url: string;
  headers: Record<string, string>;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  // Send DELETE for the MCP session when the connection closes (default true)
  terminateOnClose?: boolean;
}

export type ServerDescriptor = StdioServerDescriptor | SseServerDescriptor | StreamableHttpServerDescriptor;

/** Tool as advertised by a remote server, owned by exactly one server. */
export interface ToolDescriptor {
  serverName: string;
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

/**
 * A live session with one remote tool server.
 * Tools are a snapshot taken at connect time. Once closed, a connection rejects every call.
 */
export interface Connection {
  readonly name: string;
  readonly transport: TransportKind;
  readonly tools: readonly ToolDescriptor[];
  readonly connectedAt: number;
  readonly closed: boolean;
  readonly pid?: number;
  readonly sessionId?: string;
  callTool: (toolName: string, args: Record<string, unknown>, timeoutMs?: number) => Promise<unknown>;
  close: () => Promise<void>;
}

export interface TransportConnector {
  connect: (descriptor: ServerDescriptor) => Promise<Connection>;
}

export interface ServerInfo {
  name: string;
  transport: TransportKind;
  toolCount: number;
  tools: string[];
  connectedAt: number;
  closed: boolean;
  attempts: number;
  pid?: number;
  sessionId?: string;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ContentRecord =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: string }
  | { type: 'audio'; data: string; mimeType: string }
  | { type: 'resource'; uri: string; mimeType?: string; text?: string }
  | { type: 'resource_link'; uri: string; name?: string; mimeType?: string }
  | { type: 'unknown'; data: JsonValue };

export interface StructuredPayload {
  content: ContentRecord[];
  isError: boolean;
  structuredContent?: Record<string, JsonValue>;
}

export interface SerializationErrorPayload {
  error: 'serialization_failed';
  message: string;
}

export type ToolPayload = JsonValue | StructuredPayload | SerializationErrorPayload;

/** Shape of a raw tool result, decided once at the serialization boundary. */
export type ClassifiedToolResult =
  | { kind: 'scalar'; value: JsonValue }
  | { kind: 'structured'; blocks: readonly unknown[]; isError: boolean; structuredContent?: Record<string, JsonValue> }
  | { kind: 'opaque'; value: unknown };

export interface ToolCallRequest {
  id: string;
  // Name as the model used it, typically `server__tool`
  name: string;
  serverName: string;
  toolName: string;
  arguments: Record<string, unknown>;
}

export type ToolCallOutcome =
  | { id: string; name: string; ok: true; payload: ToolPayload; latencyMs: number }
  | { id: string; name: string; ok: false; error: string; errorKind: HubErrorKind; latencyMs: number };

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  toolCalls?: ToolCallRequest[];
  toolCallId?: string;
  // Tool name on tool messages
  name?: string;
  timestamp: number;
}

// Function-calling schema entry handed to the model
export interface ModelToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ModelToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type TurnStatus =
  | { type: 'success'; hasToolCalls: boolean }
  | { type: 'rate_limit'; retryAfterMs?: number; message: string }
  | { type: 'auth_error'; message: string }
  | { type: 'quota_exceeded'; message: string }
  | { type: 'model_error'; message: string; retryable: boolean }
  | { type: 'timeout'; message: string }
  | { type: 'network_error'; message: string; retryable: boolean }
  | { type: 'invalid_response'; message: string };

export interface TurnRequest {
  messages: ConversationMessage[];
  tools: ModelToolSchema[];
  temperature?: number;
  maxOutputTokens?: number;
  abortSignal?: AbortSignal;
}

export interface TurnResult {
  status: TurnStatus;
  content: string;
  toolCalls: ModelToolCall[];
  finishReason?: string;
  latencyMs: number;
}

// Incremental output of a streaming model turn. Tool-call fragments are keyed by index.
export type ModelStreamPart =
  | { type: 'content'; text: string }
  | { type: 'tool-call-delta'; index: number; id?: string; name?: string; arguments?: string }
  | { type: 'finish'; finishReason?: string };

export type ConversationEvent =
  | { type: 'token'; text: string }
  | { type: 'tool_call_started'; id: string; name: string; arguments: Record<string, unknown> }
  | { type: 'tool_call_result'; id: string; name: string; outcome: ToolCallOutcome }
  | { type: 'done'; content: string };

export type LogSeverity = 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: LogSeverity;
  direction: 'request' | 'response';
  type: 'llm' | 'tool' | 'mcp' | 'engine';
  remoteIdentifier: string;             // 'provider:model', 'mcp:server' or 'server:tool'
  message: string;
  iteration?: number;
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogFn = (entry: LogEntry) => void;
