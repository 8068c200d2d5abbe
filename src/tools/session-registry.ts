import { Mutex } from 'async-mutex';

import type { Connection, LogEntry, LogFn, ServerDescriptor, ServerInfo, ToolDescriptor, TransportConnector } from '../types.js';

import { DEFAULT_RETRY_DELAY_MS, validateServerDescriptor } from '../config.js';
import {
  ClosedRegistryError,
  ClosedResourceError,
  ConfigurationError,
  ConnectionEstablishmentError,
  DuplicateServerError,
  ServerNotFoundError,
  ToolNotFoundError,
  ToolTimeoutError,
} from '../errors.js';
import { delay, withTimeout } from '../utils.js';

// Extra time given to the transport-level timeout so the registry timer always fires first
const TRANSPORT_TIMEOUT_MARGIN_MS = 1000;

export interface SessionRegistryOptions {
  connector: TransportConnector;
  onLog?: LogFn;
  // Applied to `call` when the caller passes no timeout
  defaultCallTimeoutMs?: number;
}

export interface AddOptions {
  retryAttempts?: number;
  retryDelayMs?: number;
}

export type AddResult =
  | { ok: true; connection: Connection }
  | { ok: false; error: Error };

interface RegistryEntry {
  connection: Connection;
  attempts: number;
}

/**
 * Owns every live connection, keyed by server name. Mutations of the name map go through one mutex;
 * connecting happens outside it against a reserved name, so independent servers connect concurrently.
 * Lookups read the map without awaiting and therefore never observe a half-applied mutation.
 */
export class SessionRegistry {
  private readonly connector: TransportConnector;
  private readonly onLog?: LogFn;
  private readonly defaultCallTimeoutMs?: number;
  private readonly mutex = new Mutex();
  private readonly entries = new Map<string, RegistryEntry>();
  // Names with a connection attempt in flight
  private readonly pending = new Set<string>();
  // Names whose connection was removed or shut down
  private readonly retired = new Set<string>();
  private closed = false;

  constructor(opts: SessionRegistryOptions) {
    this.connector = opts.connector;
    this.onLog = opts.onLog;
    this.defaultCallTimeoutMs = opts.defaultCallTimeoutMs;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async addOne(raw: ServerDescriptor, retryAttempts = 0, retryDelayMs = DEFAULT_RETRY_DELAY_MS): Promise<Connection> {
    const descriptor = validateServerDescriptor(raw);
    const name = descriptor.name;
    await this.mutex.runExclusive(() => {
      if (this.closed) throw new ClosedRegistryError();
      if (this.entries.has(name) || this.pending.has(name)) throw new DuplicateServerError(name);
      this.pending.add(name);
    });

    let result: { connection: Connection; attempts: number };
    try {
      result = await this.connectWithRetry(descriptor, Math.max(0, Math.trunc(retryAttempts)), retryDelayMs);
    } catch (error) {
      await this.mutex.runExclusive(() => { this.pending.delete(name); });
      throw error;
    }

    const accepted = await this.mutex.runExclusive(() => {
      this.pending.delete(name);
      if (this.closed) return false;
      this.entries.set(name, { connection: result.connection, attempts: result.attempts });
      this.retired.delete(name);
      return true;
    });
    if (!accepted) {
      // closeAll ran while this server was connecting
      await result.connection.close();
      throw new ClosedRegistryError();
    }
    this.log('VRB', `registered '${name}' (${result.connection.transport}, ${String(result.connection.tools.length)} tools, ${String(result.attempts)} attempt(s))`, `mcp:${name}`);
    return result.connection;
  }

  /**
   * Add a batch. Best-effort mode connects all descriptors concurrently and reports every outcome.
   * Fail-fast mode connects in order and stops at the first failure; earlier successes stay registered
   * and descriptors after the failure are absent from the result.
   */
  async addMany(descriptors: ServerDescriptor[], failFast = false, opts: AddOptions = {}): Promise<Map<string, AddResult>> {
    const names = descriptors.map((d) => d.name);
    const duplicates = names.filter((name, idx) => names.indexOf(name) !== idx);
    if (duplicates.length > 0) {
      throw new ConfigurationError(`Duplicate server names in batch: ${Array.from(new Set(duplicates)).join(', ')}`);
    }
    const attempt = async (descriptor: ServerDescriptor): Promise<AddResult> => {
      try {
        const connection = await this.addOne(descriptor, opts.retryAttempts ?? 0, opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
        return { ok: true, connection };
      } catch (error) {
        return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
      }
    };

    const results = new Map<string, AddResult>();
    if (!failFast) {
      const outcomes = await Promise.all(descriptors.map((descriptor) => attempt(descriptor)));
      descriptors.forEach((descriptor, idx) => { results.set(descriptor.name, outcomes[idx]); });
      return results;
    }
    // eslint-disable-next-line functional/no-loop-statements -- sequential by contract
    for (const descriptor of descriptors) {
      const outcome = await attempt(descriptor);
      results.set(descriptor.name, outcome);
      if (!outcome.ok) break;
    }
    return results;
  }

  async call(serverName: string, toolName: string, args: Record<string, unknown>, timeoutMs?: number): Promise<unknown> {
    const connection = this.resolveConnection(serverName);
    if (!connection.tools.some((tool) => tool.name === toolName)) {
      throw new ToolNotFoundError(serverName, toolName, connection.tools.map((tool) => tool.name));
    }
    const timeout = timeoutMs ?? this.defaultCallTimeoutMs;
    if (timeout === undefined) {
      return await connection.callTool(toolName, args);
    }
    return await withTimeout(
      connection.callTool(toolName, args, timeout + TRANSPORT_TIMEOUT_MARGIN_MS),
      timeout,
      () => new ToolTimeoutError(serverName, toolName, timeout),
    );
  }

  async remove(name: string): Promise<void> {
    const entry = await this.mutex.runExclusive(() => {
      const existing = this.entries.get(name);
      if (existing === undefined) return undefined;
      this.entries.delete(name);
      this.retired.add(name);
      return existing;
    });
    if (entry === undefined) return;
    await entry.connection.close();
    this.log('VRB', `removed '${name}'`, `mcp:${name}`);
  }

  /**
   * Close every connection, one after another in registration order, then refuse new servers for good.
   */
  async closeAll(): Promise<void> {
    const entries = await this.mutex.runExclusive(() => {
      this.closed = true;
      const snapshot = Array.from(this.entries.entries());
      snapshot.forEach(([name]) => { this.retired.add(name); });
      this.entries.clear();
      return snapshot;
    });
    // eslint-disable-next-line functional/no-loop-statements -- sequential teardown
    for (const [name, entry] of entries) {
      try {
        await entry.connection.close();
      } catch (error) {
        this.log('WRN', `close failed: ${error instanceof Error ? error.message : String(error)}`, `mcp:${name}`);
      }
    }
    if (entries.length > 0) this.log('VRB', `closed ${String(entries.length)} connection(s)`, 'mcp:registry');
  }

  listServers(): string[] {
    return Array.from(this.entries.keys());
  }

  listTools(serverName?: string): ToolDescriptor[] {
    if (serverName !== undefined) {
      return [...this.resolveConnection(serverName).tools];
    }
    return Array.from(this.entries.values()).flatMap((entry) => entry.connection.tools);
  }

  getServerInfo(name: string): ServerInfo | undefined {
    const entry = this.entries.get(name);
    if (entry === undefined) return undefined;
    const { connection } = entry;
    return {
      name,
      transport: connection.transport,
      toolCount: connection.tools.length,
      tools: connection.tools.map((tool) => tool.name),
      connectedAt: connection.connectedAt,
      closed: connection.closed,
      attempts: entry.attempts,
      ...(connection.pid !== undefined ? { pid: connection.pid } : {}),
      ...(connection.sessionId !== undefined ? { sessionId: connection.sessionId } : {}),
    };
  }

  private resolveConnection(serverName: string): Connection {
    const entry = this.entries.get(serverName);
    if (entry !== undefined) {
      if (entry.connection.closed) throw new ClosedResourceError(serverName);
      return entry.connection;
    }
    if (this.retired.has(serverName)) throw new ClosedResourceError(serverName);
    throw new ServerNotFoundError(serverName, this.listServers());
  }

  private async connectWithRetry(descriptor: ServerDescriptor, retryAttempts: number, retryDelayMs: number): Promise<{ connection: Connection; attempts: number }> {
    const maxAttempts = retryAttempts + 1;
    const remote = `mcp:${descriptor.name}`;
    let lastError: unknown;
    // eslint-disable-next-line functional/no-loop-statements
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (this.closed) throw new ClosedRegistryError();
      try {
        const connection = await this.connector.connect(descriptor);
        return { connection, attempts: attempt };
      } catch (error) {
        if (error instanceof ConfigurationError) throw error;
        lastError = error;
        const message = error instanceof Error ? error.message : String(error);
        this.log('WRN', `connect attempt ${String(attempt)}/${String(maxAttempts)} failed: ${message}`, remote);
        if (attempt < maxAttempts) await delay(retryDelayMs);
      }
    }
    throw new ConnectionEstablishmentError(descriptor.name, maxAttempts, lastError);
  }

  private log(severity: LogEntry['severity'], message: string, remoteIdentifier: string): void {
    this.onLog?.({
      timestamp: Date.now(),
      severity,
      direction: 'response',
      type: 'mcp',
      remoteIdentifier,
      message,
    });
  }
}
