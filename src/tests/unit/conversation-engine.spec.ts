import { afterEach, describe, expect, it, vi } from 'vitest';

import type { ConversationEvent, ConversationMessage } from '../../types.js';

import { ConversationEngine, EMPTY_RESPONSE_FALLBACK, ITERATION_LIMIT_FALLBACK } from '../../conversation-engine.js';
import { ModelCallError } from '../../errors.js';
import { SessionRegistry } from '../../tools/session-registry.js';
import { delay, setWarningSink } from '../../utils.js';
import { FakeConnector, ScriptedProvider, collect, stdioDescriptor, type ScriptedTurn } from '../support/fakes.js';

const ALERTS_TEXT = JSON.stringify({ content: [{ type: 'text', text: 'No alerts for CA' }], isError: false });
const SEARCH_TEXT = JSON.stringify({ content: [{ type: 'text', text: '3 documents match X' }], isError: false });

const twoToolTurn: ScriptedTurn = {
  content: 'Let me check',
  toolCalls: [
    { id: 'call_1', name: 'weather__get_alerts', arguments: { state: 'CA' } },
    { id: 'call_2', name: 'docs__search', arguments: { q: 'X' } },
  ],
};

async function setup(turns: ScriptedTurn[], extra: Partial<ConstructorParameters<typeof ConversationEngine>[0]> = {}): Promise<{
  engine: ConversationEngine;
  model: ScriptedProvider;
  connector: FakeConnector;
}> {
  const connector = new FakeConnector({
    weather: {
      tools: [{ name: 'get_alerts', description: 'Weather alerts' }],
      handlers: {
        // Slower than docs, so results complete out of request order
        get_alerts: async (args) => {
          await delay(30);
          return { content: [{ type: 'text', text: `No alerts for ${String(args.state)}` }] };
        },
      },
    },
    docs: {
      tools: [{ name: 'search', description: 'Search documents' }],
      handlers: { search: (args) => ({ content: [{ type: 'text', text: `3 documents match ${String(args.q)}` }] }) },
    },
  });
  const registry = new SessionRegistry({ connector });
  await registry.addOne(stdioDescriptor('weather'));
  await registry.addOne(stdioDescriptor('docs'));
  const model = new ScriptedProvider(turns);
  const engine = new ConversationEngine({ registry, model, systemPrompt: 'You are a test assistant.', ...extra });
  return { engine, model, connector };
}

const roles = (history: readonly ConversationMessage[]): string[] => history.map((m) => m.role);

const describeEvent = (event: ConversationEvent): string => {
  switch (event.type) {
    case 'token':
      return `token:${event.text}`;
    case 'tool_call_started':
      return `started:${event.id}`;
    case 'tool_call_result':
      return `result:${event.id}`;
    case 'done':
      return `done:${event.content}`;
  }
};

afterEach(() => {
  setWarningSink(undefined);
});

describe('ConversationEngine.send', () => {
  it('runs concurrent tool calls and appends results in request order', async () => {
    const { engine, model, connector } = await setup([twoToolTurn, { content: 'Done.' }]);

    const answer = await engine.send('Any weather alerts, and docs on X?');

    expect(answer).toBe('Done.');
    const history = engine.getHistory();
    expect(roles(history)).toEqual(['system', 'user', 'assistant', 'tool', 'tool', 'assistant']);
    expect(history[2].content).toBe('Let me check');
    expect(history[2].toolCalls?.map((c) => [c.id, c.serverName, c.toolName])).toEqual([
      ['call_1', 'weather', 'get_alerts'],
      ['call_2', 'docs', 'search'],
    ]);
    expect(history[3]).toMatchObject({ role: 'tool', toolCallId: 'call_1', name: 'weather__get_alerts', content: ALERTS_TEXT });
    expect(history[4]).toMatchObject({ role: 'tool', toolCallId: 'call_2', name: 'docs__search', content: SEARCH_TEXT });
    expect(history[5].content).toBe('Done.');

    expect(connector.connections.get('weather')?.calls[0]?.args).toEqual({ state: 'CA' });
    expect(model.requests).toHaveLength(2);
    expect(model.requests[0].tools.map((t) => t.function.name)).toEqual(['weather__get_alerts', 'docs__search']);
    expect(model.requests[0].temperature).toBe(0.7);
    expect(roles(model.requests[1].messages)).toEqual(['system', 'user', 'assistant', 'tool', 'tool']);
  });

  it('feeds a call to a nonexistent server back to the model and keeps going', async () => {
    const { engine } = await setup([
      { toolCalls: [{ id: 'g1', name: 'ghost__run', arguments: {} }] },
      { content: 'The ghost server is not available.' },
    ]);

    const answer = await engine.send('Use the ghost tool');

    expect(answer).toBe('The ghost server is not available.');
    const toolMessage = engine.getHistory()[3];
    expect(toolMessage.toolCallId).toBe('g1');
    expect(JSON.parse(toolMessage.content)).toEqual({
      error: "Server 'ghost' not found. Available: [weather, docs]",
      message: 'Tool ghost__run failed',
    });
  });

  it('stops after maxIterations model calls when the model never stops asking for tools', async () => {
    const looping: ScriptedTurn[] = [1, 2, 3, 4].map((n) => ({ toolCalls: [{ id: `c${String(n)}`, name: 'docs__search', arguments: { q: 'again' } }] }));
    const { engine, model } = await setup(looping, { maxIterations: 3 });

    const answer = await engine.send('loop forever');

    expect(answer).toBe(ITERATION_LIMIT_FALLBACK);
    expect(model.requests).toHaveLength(3);
    expect(roles(engine.getHistory())).toEqual(['system', 'user', 'assistant', 'tool', 'assistant', 'tool', 'assistant', 'tool']);
  });

  it('answers with the fallback when the model returns nothing', async () => {
    const { engine } = await setup([{ content: '' }]);

    expect(await engine.send('hello?')).toBe(EMPTY_RESPONSE_FALLBACK);
    expect(engine.getHistory()[2]).toMatchObject({ role: 'assistant', content: '' });
  });

  it('propagates a failed model turn as ModelCallError', async () => {
    const { engine } = await setup([{ fail: { type: 'auth_error', message: '401 invalid api key' } }]);

    const error = await engine.send('hi').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error instanceof Error ? error.message : '').toBe('Model call failed (auth_error): 401 invalid api key');
    expect(roles(engine.getHistory())).toEqual(['system', 'user']);
  });

  it('hands the output limit and abort signal to every model turn', async () => {
    const controller = new AbortController();
    const { engine, model } = await setup([{ content: 'ok' }], { abortSignal: controller.signal, maxOutputTokens: 256 });

    await engine.send('hi');

    expect(model.requests[0].abortSignal).toBe(controller.signal);
    expect(model.requests[0].maxOutputTokens).toBe(256);
  });

  it('classifies an exception thrown by the model', async () => {
    const { engine } = await setup([{ throws: new Error('socket hang up') }]);

    const error = await engine.send('hi').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error instanceof ModelCallError ? error.status : undefined).toEqual({ type: 'network_error', message: 'socket hang up', retryable: true });
  });
});

describe('ConversationEngine.sendStreaming', () => {
  it('emits tokens, then started events, then results in request order, then done', async () => {
    const { engine } = await setup([
      { ...twoToolTurn, chunks: ['Let me ', 'check'] },
      { chunks: ['Do', 'ne.'] },
    ]);

    const events = await collect(engine.sendStreaming('Any weather alerts, and docs on X?'));

    expect(events.map(describeEvent)).toEqual([
      'token:Let me ',
      'token:check',
      'started:call_1',
      'started:call_2',
      'result:call_1',
      'result:call_2',
      'token:Do',
      'token:ne.',
      'done:Done.',
    ]);
    expect(events[2]).toEqual({ type: 'tool_call_started', id: 'call_1', name: 'weather__get_alerts', arguments: { state: 'CA' } });
    const firstResult = events[4];
    expect(firstResult.type === 'tool_call_result' ? firstResult.outcome : undefined).toMatchObject({
      ok: true,
      payload: { content: [{ type: 'text', text: 'No alerts for CA' }], isError: false },
    });
    expect(roles(engine.getHistory())).toEqual(['system', 'user', 'assistant', 'tool', 'tool', 'assistant']);
    expect(engine.getHistory()[2].content).toBe('Let me check');
    expect(engine.getHistory()[5].content).toBe('Done.');
  });

  it('ends with the iteration fallback when the cap is reached', async () => {
    const looping: ScriptedTurn[] = [1, 2].map((n) => ({ toolCalls: [{ id: `s${String(n)}`, name: 'docs__search', arguments: {} }] }));
    const { engine, model } = await setup(looping, { maxIterations: 2 });

    const events = await collect(engine.sendStreaming('loop'));

    expect(events.at(-1)).toEqual({ type: 'done', content: ITERATION_LIMIT_FALLBACK });
    expect(model.requests).toHaveLength(2);
  });

  it('throws ModelCallError from the stream when the model fails', async () => {
    const { engine } = await setup([{ fail: { type: 'rate_limit', message: '429 slow down', retryAfterMs: 1000 } }]);

    await expect(collect(engine.sendStreaming('hi'))).rejects.toBeInstanceOf(ModelCallError);
  });
});

describe('ConversationEngine history', () => {
  it('clears back to the system prompt and accepts extra system messages', async () => {
    const { engine } = await setup([{ content: 'one' }]);
    await engine.send('first');

    engine.clearHistory();
    expect(engine.getHistory()).toEqual([expect.objectContaining({ role: 'system', content: 'You are a test assistant.' })]);

    engine.addSystemMessage('Answer in French.');
    expect(roles(engine.getHistory())).toEqual(['system', 'system']);
  });

  it('hands out copies of the history', async () => {
    const { engine } = await setup([{ content: 'one' }]);
    await engine.send('first');

    const copy = engine.getHistory();
    copy[1].content = 'tampered';

    expect(engine.getHistory()[1].content).toBe('first');
  });

  it('resumes from seeded history', async () => {
    const seed: ConversationMessage[] = [
      { role: 'system', content: 'Stored prompt', timestamp: 1 },
      { role: 'user', content: 'earlier question', timestamp: 2 },
      { role: 'assistant', content: 'earlier answer', timestamp: 3 },
    ];
    const { engine, model } = await setup([{ content: 'follow-up answer' }], { history: seed });

    await engine.send('follow-up');

    expect(model.requests[0].messages.map((m) => m.content)).toEqual(['Stored prompt', 'earlier question', 'earlier answer', 'follow-up']);
  });
});

describe('ConversationEngine persistence', () => {
  it('stores only the messages appended by each send', async () => {
    const appendMessages = vi.fn((_sessionId: string, _messages: readonly ConversationMessage[]): void => undefined);
    const { engine } = await setup([{ content: 'one' }, { content: 'two' }], { store: { sessionId: 'session-1', store: { appendMessages } } });

    await engine.send('first');
    await engine.send('second');

    expect(appendMessages).toHaveBeenCalledTimes(2);
    const [firstId, firstBatch] = appendMessages.mock.calls[0];
    expect(firstId).toBe('session-1');
    expect(roles(firstBatch)).toEqual(['system', 'user', 'assistant']);
    expect(roles(appendMessages.mock.calls[1][1])).toEqual(['user', 'assistant']);
  });

  it('never stores a seed again when it had no system message', async () => {
    const appendMessages = vi.fn((_sessionId: string, _messages: readonly ConversationMessage[]): void => undefined);
    const seed: ConversationMessage[] = [
      { role: 'user', content: 'earlier question', timestamp: 1 },
      { role: 'assistant', content: 'earlier answer', timestamp: 2 },
    ];
    const { engine, model } = await setup([{ content: 'ok' }], { history: seed, store: { sessionId: 'session-3', store: { appendMessages } } });

    await engine.send('follow-up');

    expect(roles(model.requests[0].messages)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(appendMessages).toHaveBeenCalledTimes(1);
    expect(appendMessages.mock.calls[0][1].map((m) => `${m.role}:${m.content}`)).toEqual(['user:follow-up', 'assistant:ok']);
  });

  it('skips seeded messages and reports store failures as warnings', async () => {
    const warnings: string[] = [];
    setWarningSink((message) => { warnings.push(message); });
    const appendMessages = vi.fn((_sessionId: string, _messages: readonly ConversationMessage[]): void => {
      throw new Error('disk full');
    });
    const seed: ConversationMessage[] = [{ role: 'system', content: 'Stored prompt', timestamp: 1 }];
    const { engine } = await setup([{ content: 'ok' }], { history: seed, store: { sessionId: 'session-2', store: { appendMessages } } });

    await expect(engine.send('hi')).resolves.toBe('ok');

    expect(roles(appendMessages.mock.calls[0][1])).toEqual(['user', 'assistant']);
    expect(warnings).toEqual(['failed to persist 2 message(s) for session session-2: disk full']);
  });
});
