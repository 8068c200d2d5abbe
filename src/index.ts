// Library exports for programmatic use
export { ConversationEngine, EMPTY_RESPONSE_FALLBACK, ITERATION_LIMIT_FALLBACK } from './conversation-engine.js';
export type { ConversationEngineOptions } from './conversation-engine.js';
export { SessionRegistry } from './tools/session-registry.js';
export type { AddOptions, AddResult, SessionRegistryOptions } from './tools/session-registry.js';
export { McpTransportConnector, createTransportForDescriptor } from './tools/transport-connector.js';
export type { BuiltTransport, McpTransportConnectorOptions, TransportFactory } from './tools/transport-connector.js';
export { McpConnection } from './tools/mcp-connection.js';
export { TOOL_NAME_SEPARATOR, buildCatalog, fullToolName, resolveToolName, toModelSchema } from './tools/tool-catalog.js';
export type { ToolCatalog } from './tools/tool-catalog.js';
export { ToolInvoker, classifyToolResult, payloadToText, serializeToolResult } from './tools/tool-invoker.js';
export { ToolCallAccumulator } from './tool-call-accumulator.js';
export { LLMClient, createProvider } from './llm-client.js';
export { BaseLLMProvider } from './llm-providers/base.js';
export type { LLMProvider } from './llm-providers/base.js';
export { mapLlmError } from './llm-providers/llm-error-mapping.js';
export { OpenAIProvider } from './llm-providers/openai.js';
export { OpenAICompatibleProvider } from './llm-providers/openai-compatible.js';
export { OpenRouterProvider } from './llm-providers/openrouter.js';
export { SQLiteConversationStore } from './persistence.js';
export type { ConversationStore, SessionRecord } from './persistence.js';
export { ShutdownController } from './shutdown-controller.js';
export { StructuredLogger, createStructuredLogger } from './logging/structured-logger.js';
export { loadConfiguration, parseConfiguration, serverDescriptorsFromConfig, validateServerDescriptor } from './config.js';
export type { Configuration, LlmConfig } from './config.js';
export * from './errors.js';
export { setWarningSink } from './utils.js';

export type {
  ClassifiedToolResult,
  Connection,
  ContentRecord,
  ConversationEvent,
  ConversationMessage,
  LogEntry,
  LogFn,
  ModelStreamPart,
  ModelToolCall,
  ModelToolSchema,
  ServerDescriptor,
  ServerInfo,
  ToolCallOutcome,
  ToolCallRequest,
  ToolDescriptor,
  ToolPayload,
  TransportConnector,
  TransportKind,
  TurnRequest,
  TurnResult,
  TurnStatus,
} from './types.js';
