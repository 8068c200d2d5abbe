import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import Database from 'better-sqlite3';
import { afterEach, describe, expect, it } from 'vitest';

import type { ConversationMessage } from '../../types.js';

import { ConversationEngine } from '../../conversation-engine.js';
import { ConfigurationError } from '../../errors.js';
import { SQLiteConversationStore } from '../../persistence.js';
import { SessionRegistry } from '../../tools/session-registry.js';
import { setWarningSink } from '../../utils.js';
import { FakeConnector, ScriptedProvider, stdioDescriptor } from '../support/fakes.js';

const stores: SQLiteConversationStore[] = [];
const dirs: string[] = [];

const openStore = (dbPath = ':memory:'): SQLiteConversationStore => {
  const store = new SQLiteConversationStore({ path: dbPath });
  stores.push(store);
  return store;
};

const tempDbPath = (): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mcp-hub-db-'));
  dirs.push(dir);
  return path.join(dir, 'nested', 'hub.db');
};

afterEach(() => {
  stores.splice(0).forEach((store) => { store.close(); });
  dirs.splice(0).forEach((dir) => { fs.rmSync(dir, { recursive: true, force: true }); });
  setWarningSink(undefined);
});

const turn: ConversationMessage[] = [
  { role: 'system', content: 'You are a test assistant.', timestamp: 1 },
  { role: 'user', content: 'Any alerts?', timestamp: 2 },
  {
    role: 'assistant',
    content: '',
    toolCalls: [{ id: 'call_1', name: 'weather__get_alerts', serverName: 'weather', toolName: 'get_alerts', arguments: { state: 'CA' } }],
    timestamp: 3,
  },
  { role: 'tool', content: 'No alerts for CA', toolCallId: 'call_1', name: 'weather__get_alerts', timestamp: 4 },
];

describe('SQLiteConversationStore sessions', () => {
  it('creates sessions with distinct ids', () => {
    const store = openStore();

    const first = store.createSession();
    const second = store.createSession();

    expect(first.id).not.toBe(second.id);
    expect(store.hasSession(first.id)).toBe(true);
    expect(store.hasSession('missing')).toBe(false);
  });

  it('round-trips messages with tool calls in order', () => {
    const store = openStore();
    const { id } = store.createSession();

    store.appendMessages(id, turn);

    expect(store.loadMessages(id)).toEqual(turn);
  });

  it('continues numbering across appends', () => {
    const store = openStore();
    const { id } = store.createSession();

    store.appendMessages(id, turn.slice(0, 2));
    store.appendMessages(id, []);
    store.appendMessages(id, turn.slice(2));

    expect(store.loadMessages(id).map((m) => m.timestamp)).toEqual([1, 2, 3, 4]);
  });

  it('refuses messages for an unknown session', () => {
    const store = openStore();

    expect(() => { store.appendMessages('ghost', turn); }).toThrow("Unknown session 'ghost'");
  });

  it('keeps sessions apart', () => {
    const store = openStore();
    const a = store.createSession();
    const b = store.createSession();

    store.appendMessages(a.id, turn.slice(0, 1));

    expect(store.loadMessages(a.id)).toHaveLength(1);
    expect(store.loadMessages(b.id)).toEqual([]);
  });

  it('survives reopening a file-backed database and skips rows it cannot read', () => {
    const dbPath = tempDbPath();
    const writer = new SQLiteConversationStore({ path: dbPath });
    const { id } = writer.createSession();
    writer.appendMessages(id, turn.slice(0, 2));
    writer.close();

    const raw = new Database(dbPath);
    raw.prepare('INSERT INTO messages (session_id, seq, role, content, created_at) VALUES (?, ?, ?, ?, ?)').run(id, 2, 'narrator', 'odd', 5);
    raw.close();

    const warnings: string[] = [];
    setWarningSink((message) => { warnings.push(message); });
    const reader = openStore(dbPath);

    expect(reader.loadMessages(id)).toEqual(turn.slice(0, 2));
    expect(warnings).toEqual([`skipping stored message 2 of session ${id} with unknown role 'narrator'`]);
  });
});

describe('SQLiteConversationStore server configs', () => {
  it('saves, replaces, lists and deletes descriptors', () => {
    const store = openStore();

    store.saveServerConfig({ name: 'fs', transport: 'stdio', command: 'fs-mcp', args: [], env: {} });
    store.saveServerConfig({ name: 'fs', transport: 'stdio', command: 'fs-mcp', args: ['--root', '/tmp'], env: {} });
    store.saveServerConfig({ name: 'remote', transport: 'sse', url: 'https://mcp.example.com/sse', headers: {} });

    const listed = store.listServerConfigs().sort((a, b) => a.name.localeCompare(b.name));
    expect(listed).toEqual([
      { name: 'fs', transport: 'stdio', command: 'fs-mcp', args: ['--root', '/tmp'], env: {} },
      { name: 'remote', transport: 'sse', url: 'https://mcp.example.com/sse', headers: {} },
    ]);

    expect(store.deleteServerConfig('fs')).toBe(true);
    expect(store.deleteServerConfig('fs')).toBe(false);
    expect(store.listServerConfigs().map((d) => d.name)).toEqual(['remote']);
  });

  it('rejects an invalid descriptor without storing it', () => {
    const store = openStore();

    expect(() => { store.saveServerConfig({ name: 'fs', transport: 'stdio', command: '', args: [], env: {} }); }).toThrow(ConfigurationError);
    expect(store.listServerConfigs()).toEqual([]);
  });
});

describe('SQLiteConversationStore with the conversation engine', () => {
  it('lets a later engine resume a stored session', async () => {
    const store = openStore();
    const { id } = store.createSession();
    const registry = new SessionRegistry({
      connector: new FakeConnector({ docs: { tools: [{ name: 'search' }], handlers: { search: () => 'two hits' } } }),
    });
    await registry.addOne(stdioDescriptor('docs'));

    const first = new ConversationEngine({
      registry,
      model: new ScriptedProvider([
        { toolCalls: [{ id: 'c1', name: 'docs__search', arguments: { q: 'mcp' } }] },
        { content: 'Found two hits.' },
      ]),
      systemPrompt: 'Stored prompt',
      store: { sessionId: id, store },
    });
    await first.send('search docs');

    const stored = store.loadMessages(id);
    expect(stored.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool', 'assistant']);
    expect(stored[2].toolCalls).toEqual([{ id: 'c1', name: 'docs__search', serverName: 'docs', toolName: 'search', arguments: { q: 'mcp' } }]);
    expect(stored[3]).toMatchObject({ toolCallId: 'c1', name: 'docs__search', content: 'two hits' });

    const model = new ScriptedProvider([{ content: 'Still two.' }]);
    const second = new ConversationEngine({ registry, model, history: stored, store: { sessionId: id, store } });
    await second.send('how many?');

    expect(model.requests[0].messages[0].content).toBe('Stored prompt');
    expect(store.loadMessages(id)).toHaveLength(7);
  });
});
