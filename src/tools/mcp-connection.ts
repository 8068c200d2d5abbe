import type { Connection, LogFn, ToolDescriptor, TransportKind } from '../types.js';
import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { ClosedResourceError } from '../errors.js';
import { killProcessTree } from '../utils/process-tree.js';

export interface ConnectionResources {
  serverName: string;
  client: Client;
  transport?: Transport;
  // Read lazily: stdio transports only know the pid once started
  pid?: () => number | undefined;
  // Ends the remote session (streamable HTTP DELETE)
  terminate?: () => Promise<void>;
  killGracefulMs?: number;
  log?: LogFn;
}

const logWarning = (resources: ConnectionResources, message: string): void => {
  resources.log?.({
    timestamp: Date.now(),
    severity: 'WRN',
    direction: 'response',
    type: 'mcp',
    remoteIdentifier: `mcp:${resources.serverName}`,
    message,
  });
};

/**
 * Release everything one connection attempt acquired. Each step tolerates the previous
 * one having already torn part of it down.
 */
export async function releaseResources(resources: ConnectionResources): Promise<void> {
  const pid = resources.pid?.();
  if (resources.terminate !== undefined) {
    try {
      await resources.terminate();
    } catch (e) {
      logWarning(resources, `session termination failed: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  // Tree first: once the root exits, its children can no longer be found
  if (pid !== undefined) {
    try {
      await killProcessTree(pid, {
        gracefulMs: resources.killGracefulMs ?? 1000,
        logger: (message) => { logWarning(resources, message); },
      });
    } catch (e) {
      logWarning(resources, `process tree kill failed: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  try {
    await resources.client.close();
  } catch (e) {
    logWarning(resources, `client close failed: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (resources.transport !== undefined) {
    try {
      await resources.transport.close();
    } catch (e) {
      logWarning(resources, `transport close failed: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
}

export interface McpConnectionOptions {
  transportKind: TransportKind;
  resources: ConnectionResources;
  tools: ToolDescriptor[];
  // Default bound for each request when the caller gives none
  readTimeoutMs?: number;
  sessionId?: () => string | undefined;
}

export class McpConnection implements Connection {
  readonly name: string;
  readonly transport: TransportKind;
  readonly tools: readonly ToolDescriptor[];
  readonly connectedAt = Date.now();
  private readonly resources: ConnectionResources;
  private readonly readTimeoutMs?: number;
  private readonly sessionIdReader?: () => string | undefined;
  private closePromise?: Promise<void>;

  constructor(opts: McpConnectionOptions) {
    this.name = opts.resources.serverName;
    this.transport = opts.transportKind;
    this.tools = Object.freeze([...opts.tools]);
    this.resources = opts.resources;
    this.readTimeoutMs = opts.readTimeoutMs;
    this.sessionIdReader = opts.sessionId;
  }

  get closed(): boolean {
    return this.closePromise !== undefined;
  }

  get pid(): number | undefined {
    return this.resources.pid?.();
  }

  get sessionId(): string | undefined {
    return this.sessionIdReader?.();
  }

  async callTool(toolName: string, args: Record<string, unknown>, timeoutMs?: number): Promise<unknown> {
    if (this.closed) throw new ClosedResourceError(this.name);
    const timeout = timeoutMs ?? this.readTimeoutMs;
    return await this.resources.client.callTool(
      { name: toolName, arguments: args },
      undefined,
      timeout !== undefined ? { timeout } : undefined,
    );
  }

  close(): Promise<void> {
    this.closePromise ??= releaseResources(this.resources);
    return this.closePromise;
  }
}
