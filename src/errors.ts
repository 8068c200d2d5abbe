import type { TurnStatus } from './types.js';

export type HubErrorKind =
  | 'configuration'
  | 'duplicate_server'
  | 'connection_failed'
  | 'server_not_found'
  | 'tool_not_found'
  | 'closed_resource'
  | 'closed_registry'
  | 'timeout'
  | 'execution_error'
  | 'model_call_failed';

export interface HubErrorMeaning {
  retryable: boolean;
  summary: string;
}

export const HUB_ERROR_KIND_MEANINGS: Record<HubErrorKind, HubErrorMeaning> = {
  configuration: {
    retryable: false,
    summary: 'Server descriptor is malformed; rejected before any resource is acquired.',
  },
  duplicate_server: {
    retryable: false,
    summary: 'A server with the same name is already registered.',
  },
  connection_failed: {
    retryable: true,
    summary: 'Handshake or transport failure while connecting; retried up to the configured attempts.',
  },
  server_not_found: {
    retryable: false,
    summary: 'No connected server has this name.',
  },
  tool_not_found: {
    retryable: false,
    summary: 'The server does not advertise this tool.',
  },
  closed_resource: {
    retryable: false,
    summary: 'The connection was removed or shut down.',
  },
  closed_registry: {
    retryable: false,
    summary: 'The registry was shut down and accepts no new servers.',
  },
  timeout: {
    retryable: false,
    summary: 'Tool call exceeded its timeout; the remote side may still be working.',
  },
  execution_error: {
    retryable: false,
    summary: 'The remote tool or its transport failed during the call.',
  },
  model_call_failed: {
    retryable: false,
    summary: 'The language-model endpoint failed; propagated to the caller.',
  },
};

export class HubError extends Error {
  readonly kind: HubErrorKind;

  constructor(kind: HubErrorKind, message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'HubError';
    this.kind = kind;
  }
}

export class ConfigurationError extends HubError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('configuration', issues.length > 0 ? `${message}:\n${issues.map((i) => `  ${i}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class DuplicateServerError extends HubError {
  readonly serverName: string;

  constructor(serverName: string) {
    super('duplicate_server', `Server '${serverName}' is already registered`);
    this.name = 'DuplicateServerError';
    this.serverName = serverName;
  }
}

export class ConnectionEstablishmentError extends HubError {
  readonly serverName: string;
  readonly attempts: number;

  constructor(serverName: string, attempts: number, cause: unknown) {
    super('connection_failed', `Failed to connect to '${serverName}' after ${String(attempts)} attempt(s): ${describeError(cause)}`, { cause });
    this.name = 'ConnectionEstablishmentError';
    this.serverName = serverName;
    this.attempts = attempts;
  }
}

export class ServerNotFoundError extends HubError {
  readonly serverName: string;
  readonly available: string[];

  constructor(serverName: string, available: string[]) {
    super('server_not_found', `Server '${serverName}' not found. Available: [${available.join(', ')}]`);
    this.name = 'ServerNotFoundError';
    this.serverName = serverName;
    this.available = available;
  }
}

export class ToolNotFoundError extends HubError {
  readonly serverName: string;
  readonly toolName: string;
  readonly available: string[];

  constructor(serverName: string, toolName: string, available: string[]) {
    super('tool_not_found', `Tool '${toolName}' not found on server '${serverName}'. Available: [${available.join(', ')}]`);
    this.name = 'ToolNotFoundError';
    this.serverName = serverName;
    this.toolName = toolName;
    this.available = available;
  }
}

export class ClosedResourceError extends HubError {
  readonly serverName: string;

  constructor(serverName: string) {
    super('closed_resource', `Connection to '${serverName}' is closed`);
    this.name = 'ClosedResourceError';
    this.serverName = serverName;
  }
}

export class ClosedRegistryError extends HubError {
  constructor() {
    super('closed_registry', 'Session registry is closed');
    this.name = 'ClosedRegistryError';
  }
}

export class ToolTimeoutError extends HubError {
  readonly timeoutMs: number;

  constructor(serverName: string, toolName: string, timeoutMs: number) {
    super('timeout', `Tool '${toolName}' on server '${serverName}' timed out after ${String(timeoutMs)}ms`);
    this.name = 'ToolTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ModelCallError extends HubError {
  readonly status: Exclude<TurnStatus, { type: 'success' }>;

  constructor(status: Exclude<TurnStatus, { type: 'success' }>) {
    super('model_call_failed', `Model call failed (${status.type}): ${status.message}`);
    this.name = 'ModelCallError';
    this.status = status;
  }
}

export const isHubError = (value: unknown): value is HubError => value instanceof HubError;

export const describeError = (value: unknown): string => {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

export const errorKindOf = (value: unknown): HubErrorKind => (isHubError(value) ? value.kind : 'execution_error');
