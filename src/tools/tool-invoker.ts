import type { SessionRegistry } from './session-registry.js';
import type {
  ClassifiedToolResult,
  ContentRecord,
  JsonValue,
  LogFn,
  ToolCallOutcome,
  ToolCallRequest,
  ToolPayload,
} from '../types.js';

import { ServerNotFoundError, describeError, errorKindOf } from '../errors.js';
import { isJsonObject, isJsonValue, isPlainObject } from '../utils.js';

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

/**
 * Decide once what a raw tool result is. MCP results carry a `content` block list; legacy servers
 * answer with `toolResult`; anything JSON-shaped is a plain value; the rest is opaque.
 */
export function classifyToolResult(raw: unknown): ClassifiedToolResult {
  if (isPlainObject(raw) && Array.isArray(raw.content)) {
    const structured = raw.structuredContent;
    return {
      kind: 'structured',
      blocks: raw.content,
      isError: raw.isError === true,
      ...(isJsonObject(structured) ? { structuredContent: structured } : {}),
    };
  }
  if (isPlainObject(raw) && 'toolResult' in raw && Object.keys(raw).every((key) => key === 'toolResult' || key === '_meta')) {
    return classifyToolResult(raw.toolResult);
  }
  if (isJsonValue(raw)) return { kind: 'scalar', value: raw };
  return { kind: 'opaque', value: raw };
}

function toContentRecord(block: unknown): ContentRecord {
  if (!isPlainObject(block)) {
    return { type: 'unknown', data: isJsonValue(block) ? block : String(block) };
  }
  switch (block.type) {
    case 'text':
      return { type: 'text', text: asString(block.text) ?? '' };
    case 'image':
      return { type: 'image', data: asString(block.data) ?? '', mimeType: asString(block.mimeType) ?? 'application/octet-stream' };
    case 'audio':
      return { type: 'audio', data: asString(block.data) ?? '', mimeType: asString(block.mimeType) ?? 'application/octet-stream' };
    case 'resource': {
      const resource: Record<string, unknown> = isPlainObject(block.resource) ? block.resource : {};
      const mimeType = asString(resource.mimeType);
      const text = asString(resource.text);
      return {
        type: 'resource',
        uri: asString(resource.uri) ?? '',
        ...(mimeType !== undefined ? { mimeType } : {}),
        ...(text !== undefined ? { text } : {}),
      };
    }
    case 'resource_link': {
      const name = asString(block.name);
      const mimeType = asString(block.mimeType);
      return {
        type: 'resource_link',
        uri: asString(block.uri) ?? '',
        ...(name !== undefined ? { name } : {}),
        ...(mimeType !== undefined ? { mimeType } : {}),
      };
    }
    default:
      return { type: 'unknown', data: isJsonValue(block) ? block : String(block) };
  }
}

const toJsonCompatible = (_key: string, value: unknown): unknown => {
  if (value instanceof Map) return Object.fromEntries(Array.from(value, ([key, item]): [string, unknown] => [String(key), item]));
  if (value instanceof Set) return Array.from(value);
  if (typeof value === 'bigint' || typeof value === 'function' || typeof value === 'symbol') return String(value);
  return value;
};

/** An object's own fields as JSON, or undefined when it has none or cannot be encoded. */
function fieldsAsJson(value: unknown): JsonValue | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  try {
    const parsed: unknown = JSON.parse(JSON.stringify(value, toJsonCompatible));
    if (isPlainObject(parsed) && Object.keys(parsed).length === 0) return undefined;
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Canonical payload for a tool result. Never throws: a failure to serialize becomes an error payload.
 */
export function serializeToolResult(raw: unknown): ToolPayload {
  try {
    const classified = classifyToolResult(raw);
    switch (classified.kind) {
      case 'scalar':
        return classified.value;
      case 'structured':
        return {
          content: classified.blocks.map((block) => toContentRecord(block)),
          isError: classified.isError,
          ...(classified.structuredContent !== undefined ? { structuredContent: classified.structuredContent } : {}),
        };
      case 'opaque':
        return fieldsAsJson(classified.value) ?? String(classified.value);
    }
  } catch (error) {
    return { error: 'serialization_failed', message: describeError(error) };
  }
}

/** Payload rendered as the text content of a tool message. Strings stay verbatim. */
export function payloadToText(payload: ToolPayload): string {
  return typeof payload === 'string' ? payload : JSON.stringify(payload);
}

export interface ToolInvokerOptions {
  registry: Pick<SessionRegistry, 'call' | 'listServers'>;
  defaultTimeoutMs?: number;
  onLog?: LogFn;
}

/**
 * Runs resolved tool calls against the registry. Every failure (not found, closed, timeout, remote error)
 * comes back as a failed outcome carrying the request id; nothing is thrown.
 */
export class ToolInvoker {
  private readonly registry: Pick<SessionRegistry, 'call' | 'listServers'>;
  private readonly defaultTimeoutMs?: number;
  private readonly onLog?: LogFn;

  constructor(opts: ToolInvokerOptions) {
    this.registry = opts.registry;
    this.defaultTimeoutMs = opts.defaultTimeoutMs;
    this.onLog = opts.onLog;
  }

  async execute(request: ToolCallRequest, timeoutMs?: number): Promise<ToolCallOutcome> {
    const start = Date.now();
    const remote = `${request.serverName.length > 0 ? request.serverName : '?'}:${request.toolName}`;
    this.log('VRB', 'request', remote, `call id=${request.id}`);
    try {
      if (request.serverName.length === 0) {
        throw new ServerNotFoundError(request.name, this.registry.listServers());
      }
      const raw = await this.registry.call(request.serverName, request.toolName, request.arguments, timeoutMs ?? this.defaultTimeoutMs);
      const payload = serializeToolResult(raw);
      const latencyMs = Date.now() - start;
      this.log('VRB', 'response', remote, `ok id=${request.id} in ${String(latencyMs)}ms`);
      return { id: request.id, name: request.name, ok: true, payload, latencyMs };
    } catch (error) {
      const latencyMs = Date.now() - start;
      const message = describeError(error);
      this.log('WRN', 'response', remote, `failed id=${request.id} in ${String(latencyMs)}ms: ${message}`);
      return { id: request.id, name: request.name, ok: false, error: message, errorKind: errorKindOf(error), latencyMs };
    }
  }

  /** Fan out, then fan in. Outcomes come back in request order whatever order the calls finish in. */
  async executeAll(requests: ToolCallRequest[], timeoutMs?: number): Promise<ToolCallOutcome[]> {
    return await Promise.all(requests.map((request) => this.execute(request, timeoutMs)));
  }

  private log(severity: 'VRB' | 'WRN', direction: 'request' | 'response', remoteIdentifier: string, message: string): void {
    this.onLog?.({ timestamp: Date.now(), severity, direction, type: 'tool', remoteIdentifier, message });
  }
}
