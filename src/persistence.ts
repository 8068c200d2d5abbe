import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

import type { ConversationMessage, MessageRole, ServerDescriptor, ToolCallRequest } from './types.js';
import type { Statement } from 'better-sqlite3';

import { validateServerDescriptor } from './config.js';
import { parseToolArguments, isPlainObject, warn } from './utils.js';

export interface SessionRecord {
  id: string;
  createdAt: number;
}

/**
 * Storage collaborator of the conversation engine: sessions, their message history, and saved
 * server descriptors.
 */
export interface ConversationStore {
  createSession: () => SessionRecord;
  hasSession: (sessionId: string) => boolean;
  appendMessages: (sessionId: string, messages: readonly ConversationMessage[]) => void;
  loadMessages: (sessionId: string) => ConversationMessage[];
  saveServerConfig: (descriptor: ServerDescriptor) => void;
  listServerConfigs: () => ServerDescriptor[];
  deleteServerConfig: (name: string) => boolean;
  close: () => void;
}

interface MessageRow {
  seq: number;
  role: string;
  content: string;
  tool_calls: string | null;
  tool_call_id: string | null;
  name: string | null;
  created_at: number;
}

interface ServerConfigRow {
  name: string;
  transport: string;
  config: string;
}

interface MaxSeqRow {
  max_seq: number | null;
}

interface MessageInsert {
  session_id: string;
  seq: number;
  role: string;
  content: string;
  tool_calls: string | null;
  tool_call_id: string | null;
  name: string | null;
  created_at: number;
}

const isRole = (value: string): value is MessageRole => (
  value === 'system' || value === 'user' || value === 'assistant' || value === 'tool'
);

const decodeToolCalls = (raw: string | null): ToolCallRequest[] | undefined => {
  if (raw === null) return undefined;
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return undefined;
  return parsed.filter(isPlainObject).map((call) => ({
    id: typeof call.id === 'string' ? call.id : '',
    name: typeof call.name === 'string' ? call.name : '',
    serverName: typeof call.serverName === 'string' ? call.serverName : '',
    toolName: typeof call.toolName === 'string' ? call.toolName : '',
    arguments: parseToolArguments(call.arguments),
  }));
};

export class SQLiteConversationStore implements ConversationStore {
  private readonly db: Database.Database;
  private readonly insertSessionStmt: Statement<[string, number]>;
  private readonly hasSessionStmt: Statement<[string], { id: string }>;
  private readonly maxSeqStmt: Statement<[string], MaxSeqRow>;
  private readonly insertMessageStmt: Statement<[MessageInsert]>;
  private readonly loadMessagesStmt: Statement<[string], MessageRow>;
  private readonly upsertServerStmt: Statement<[{ name: string; transport: string; config: string; created_at: number }]>;
  private readonly listServersStmt: Statement<[], ServerConfigRow>;
  private readonly deleteServerStmt: Statement<[string]>;
  private readonly appendTx: (sessionId: string, messages: readonly ConversationMessage[]) => void;

  constructor(opts: { path: string }) {
    const filePath = opts.path;
    if (filePath !== ':memory:') {
      const dir = path.dirname(filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
    this.db = new Database(filePath);
    if (filePath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }
    this.db.pragma('busy_timeout = 5000');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS server_configs (
        name TEXT PRIMARY KEY,
        transport TEXT NOT NULL,
        config TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        created_at INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS messages (
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        seq INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        tool_calls TEXT,
        tool_call_id TEXT,
        name TEXT,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (session_id, seq)
      );
    `);

    this.insertSessionStmt = this.db.prepare<[string, number]>('INSERT INTO sessions (id, created_at) VALUES (?, ?)');
    this.hasSessionStmt = this.db.prepare<[string], { id: string }>('SELECT id FROM sessions WHERE id = ? LIMIT 1');
    this.maxSeqStmt = this.db.prepare<[string], MaxSeqRow>('SELECT MAX(seq) AS max_seq FROM messages WHERE session_id = ?');
    this.insertMessageStmt = this.db.prepare<[MessageInsert]>(`
      INSERT INTO messages (session_id, seq, role, content, tool_calls, tool_call_id, name, created_at)
      VALUES (@session_id, @seq, @role, @content, @tool_calls, @tool_call_id, @name, @created_at)
    `);
    this.loadMessagesStmt = this.db.prepare<[string], MessageRow>(`
      SELECT seq, role, content, tool_calls, tool_call_id, name, created_at
      FROM messages
      WHERE session_id = ?
      ORDER BY seq ASC
    `);
    this.upsertServerStmt = this.db.prepare<[{ name: string; transport: string; config: string; created_at: number }]>(`
      INSERT INTO server_configs (name, transport, config, created_at)
      VALUES (@name, @transport, @config, @created_at)
      ON CONFLICT(name) DO UPDATE SET transport = excluded.transport, config = excluded.config
    `);
    this.listServersStmt = this.db.prepare<[], ServerConfigRow>('SELECT name, transport, config FROM server_configs ORDER BY created_at ASC, name ASC');
    this.deleteServerStmt = this.db.prepare<[string]>('DELETE FROM server_configs WHERE name = ?');

    this.appendTx = this.db.transaction((sessionId: string, messages: readonly ConversationMessage[]) => {
      if (this.hasSessionStmt.get(sessionId) === undefined) {
        throw new Error(`Unknown session '${sessionId}'`);
      }
      const start = (this.maxSeqStmt.get(sessionId)?.max_seq ?? -1) + 1;
      messages.forEach((message, offset) => {
        this.insertMessageStmt.run({
          session_id: sessionId,
          seq: start + offset,
          role: message.role,
          content: message.content,
          tool_calls: message.toolCalls !== undefined ? JSON.stringify(message.toolCalls) : null,
          tool_call_id: message.toolCallId ?? null,
          name: message.name ?? null,
          created_at: message.timestamp,
        });
      });
    });
  }

  createSession(): SessionRecord {
    const record = { id: crypto.randomUUID(), createdAt: Date.now() };
    this.insertSessionStmt.run(record.id, record.createdAt);
    return record;
  }

  hasSession(sessionId: string): boolean {
    return this.hasSessionStmt.get(sessionId) !== undefined;
  }

  appendMessages(sessionId: string, messages: readonly ConversationMessage[]): void {
    if (messages.length === 0) return;
    this.appendTx(sessionId, messages);
  }

  loadMessages(sessionId: string): ConversationMessage[] {
    return this.loadMessagesStmt.all(sessionId).flatMap((row): ConversationMessage[] => {
      if (!isRole(row.role)) {
        warn(`skipping stored message ${String(row.seq)} of session ${sessionId} with unknown role '${row.role}'`);
        return [];
      }
      const toolCalls = decodeToolCalls(row.tool_calls);
      return [{
        role: row.role,
        content: row.content,
        ...(toolCalls !== undefined ? { toolCalls } : {}),
        ...(row.tool_call_id !== null ? { toolCallId: row.tool_call_id } : {}),
        ...(row.name !== null ? { name: row.name } : {}),
        timestamp: row.created_at,
      }];
    });
  }

  saveServerConfig(descriptor: ServerDescriptor): void {
    const valid = validateServerDescriptor(descriptor);
    const { name, ...config } = valid;
    this.upsertServerStmt.run({ name, transport: valid.transport, config: JSON.stringify(config), created_at: Date.now() });
  }

  listServerConfigs(): ServerDescriptor[] {
    return this.listServersStmt.all().flatMap((row): ServerDescriptor[] => {
      try {
        const config: unknown = JSON.parse(row.config);
        return [validateServerDescriptor({ ...(isPlainObject(config) ? config : {}), name: row.name })];
      } catch (error) {
        warn(`skipping stored server config '${row.name}': ${error instanceof Error ? error.message : String(error)}`);
        return [];
      }
    });
  }

  deleteServerConfig(name: string): boolean {
    return this.deleteServerStmt.run(name).changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
