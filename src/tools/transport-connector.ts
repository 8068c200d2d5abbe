import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';

import type { Connection, LogFn, ServerDescriptor, ToolDescriptor, TransportConnector } from '../types.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { TRANSPORT_TIMEOUT_DEFAULTS, validateServerDescriptor } from '../config.js';
import { isPlainObject, warn, withTimeout } from '../utils.js';

import { McpConnection, releaseResources } from './mcp-connection.js';

export interface BuiltTransport {
  transport: Transport;
  pid?: () => number | undefined;
  sessionId?: () => string | undefined;
  terminate?: () => Promise<void>;
}

export type TransportFactory = (descriptor: ServerDescriptor) => Promise<BuiltTransport>;

export interface McpTransportConnectorOptions {
  clientInfo?: { name: string; version: string };
  onLog?: LogFn;
  // Replaces the built-in transports (stdio, SSE, streamable HTTP)
  transportFactory?: TransportFactory;
  killGracefulMs?: number;
}

interface ResolvedTimeouts {
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
}

/**
 * Format a server descriptor for logs. Env and header values are never printed, only their keys.
 */
export function formatServerDescriptorForLog(descriptor: ServerDescriptor): string {
  const parts: string[] = [`server='${descriptor.name}'`, `transport=${descriptor.transport}`];
  switch (descriptor.transport) {
    case 'stdio': {
      parts.push(`command='${descriptor.command}'`);
      if (descriptor.args.length > 0) {
        parts.push(`args=[${descriptor.args.map((a) => `'${a}'`).join(', ')}]`);
      }
      const envKeys = Object.keys(descriptor.env);
      if (envKeys.length > 0) parts.push(`env_keys=[${envKeys.join(', ')}]`);
      if (descriptor.cwd !== undefined) parts.push(`cwd='${descriptor.cwd}'`);
      break;
    }
    case 'sse':
    case 'streamable-http': {
      parts.push(`url='${descriptor.url}'`);
      const headerKeys = Object.keys(descriptor.headers);
      if (headerKeys.length > 0) parts.push(`header_keys=[${headerKeys.join(', ')}]`);
      break;
    }
  }
  return parts.join(', ');
}

export function resolveTimeouts(descriptor: ServerDescriptor): ResolvedTimeouts {
  if (descriptor.transport === 'stdio') return {};
  const defaults = TRANSPORT_TIMEOUT_DEFAULTS[descriptor.transport];
  return {
    connectTimeoutMs: descriptor.connectTimeoutMs ?? defaults.connectTimeoutMs,
    readTimeoutMs: descriptor.readTimeoutMs ?? defaults.readTimeoutMs,
  };
}

export async function createTransportForDescriptor(descriptor: ServerDescriptor, log: LogFn): Promise<BuiltTransport> {
  switch (descriptor.transport) {
    case 'stdio': {
      const transport = new StdioClientTransport({
        command: descriptor.command,
        args: descriptor.args,
        env: { ...getDefaultEnvironment(), ...descriptor.env },
        cwd: descriptor.cwd,
        stderr: 'pipe',
      });
      try {
        transport.stderr?.on('data', (chunk: Buffer) => {
          log({
            timestamp: Date.now(),
            severity: 'VRB',
            direction: 'response',
            type: 'mcp',
            remoteIdentifier: `mcp:${descriptor.name}`,
            message: `stderr: ${chunk.toString('utf8').trim()}`,
          });
        });
      } catch (e) { warn(`mcp stdio stderr relay failed: ${e instanceof Error ? e.message : String(e)}`); }
      return { transport, pid: () => transport.pid ?? undefined };
    }
    case 'streamable-http': {
      const { StreamableHTTPClientTransport } = await import('@modelcontextprotocol/sdk/client/streamableHttp.js');
      const transport = new StreamableHTTPClientTransport(new URL(descriptor.url), {
        requestInit: { headers: descriptor.headers },
      });
      const built: BuiltTransport = { transport, sessionId: () => transport.sessionId };
      if (descriptor.terminateOnClose !== false) {
        built.terminate = async () => {
          if (transport.sessionId !== undefined) await transport.terminateSession();
        };
      }
      return built;
    }
    case 'sse': {
      const resolvedHeaders = descriptor.headers;
      const customFetch: typeof fetch = async (input, init) => {
        const headers = new Headers(init?.headers);
        Object.entries(resolvedHeaders).forEach(([k, v]) => { headers.set(k, v); });
        return fetch(input, { ...init, headers });
      };
      // eslint-disable-next-line @typescript-eslint/no-deprecated -- SSE servers are still common
      const transport = new SSEClientTransport(new URL(descriptor.url), {
        eventSourceInit: { fetch: customFetch },
        requestInit: { headers: resolvedHeaders },
        fetch: customFetch,
      });
      return { transport };
    }
  }
}

const toToolDescriptor = (serverName: string, tool: { name: string; description?: string; inputSchema?: unknown }): ToolDescriptor => ({
  serverName,
  name: tool.name,
  description: tool.description ?? '',
  inputSchema: isPlainObject(tool.inputSchema) ? tool.inputSchema : {},
});

/**
 * Opens one connection per call: builds the transport, runs the `initialize` handshake, then snapshots
 * the tool list. A failed attempt releases what it acquired before the error propagates. No retries here.
 */
export class McpTransportConnector implements TransportConnector {
  private readonly clientInfo: { name: string; version: string };
  private readonly log: LogFn;
  private readonly transportFactory: TransportFactory;
  private readonly killGracefulMs?: number;

  constructor(opts: McpTransportConnectorOptions = {}) {
    this.clientInfo = opts.clientInfo ?? { name: 'mcp-tool-hub', version: '0.1.0' };
    this.log = opts.onLog ?? (() => undefined);
    this.transportFactory = opts.transportFactory ?? ((descriptor) => createTransportForDescriptor(descriptor, this.log));
    this.killGracefulMs = opts.killGracefulMs;
  }

  async connect(raw: ServerDescriptor): Promise<Connection> {
    const descriptor = validateServerDescriptor(raw);
    const { connectTimeoutMs, readTimeoutMs } = resolveTimeouts(descriptor);
    const remote = `mcp:${descriptor.name}`;
    this.log({
      timestamp: Date.now(),
      severity: 'VRB',
      direction: 'request',
      type: 'mcp',
      remoteIdentifier: remote,
      message: `connecting: ${formatServerDescriptorForLog(descriptor)}`,
    });

    const client = new Client(this.clientInfo, { capabilities: {} });
    const acquired: { built?: BuiltTransport; abandoned?: boolean } = {};
    const start = Date.now();
    const handshake = async (): Promise<ToolDescriptor[]> => {
      const built = await this.transportFactory(descriptor);
      acquired.built = built;
      if (acquired.abandoned === true) {
        // The attempt already timed out and was cleaned up without this transport
        await releaseResources({
          serverName: descriptor.name,
          client,
          transport: built.transport,
          pid: built.pid,
          terminate: built.terminate,
          killGracefulMs: this.killGracefulMs,
          log: this.log,
        });
        throw new Error(`connection attempt to '${descriptor.name}' was abandoned`);
      }
      const requestOptions = connectTimeoutMs !== undefined ? { timeout: connectTimeoutMs } : undefined;
      await client.connect(built.transport, requestOptions);
      const listed = await client.listTools(undefined, requestOptions);
      return listed.tools.map((tool) => toToolDescriptor(descriptor.name, tool));
    };

    try {
      const tools = connectTimeoutMs !== undefined
        ? await withTimeout(handshake(), connectTimeoutMs, () => new Error(`handshake with '${descriptor.name}' timed out after ${String(connectTimeoutMs)}ms`))
        : await handshake();
      const resources = {
        serverName: descriptor.name,
        client,
        transport: acquired.built?.transport,
        pid: acquired.built?.pid,
        terminate: acquired.built?.terminate,
        killGracefulMs: this.killGracefulMs,
        log: this.log,
      };
      this.log({
        timestamp: Date.now(),
        severity: 'VRB',
        direction: 'response',
        type: 'mcp',
        remoteIdentifier: remote,
        message: `connected in ${String(Date.now() - start)}ms, ${String(tools.length)} tools [${tools.map((t) => t.name).join(', ')}]`,
      });
      return new McpConnection({
        transportKind: descriptor.transport,
        resources,
        tools,
        readTimeoutMs,
        sessionId: acquired.built?.sessionId,
      });
    } catch (error) {
      acquired.abandoned = true;
      await releaseResources({
        serverName: descriptor.name,
        client,
        transport: acquired.built?.transport,
        pid: acquired.built?.pid,
        terminate: acquired.built?.terminate,
        killGracefulMs: this.killGracefulMs,
        log: this.log,
      });
      this.log({
        timestamp: Date.now(),
        severity: 'WRN',
        direction: 'response',
        type: 'mcp',
        remoteIdentifier: remote,
        message: `connection failed: ${error instanceof Error ? error.message : String(error)}`,
      });
      throw error;
    }
  }
}
