import { describe, expect, it } from 'vitest';

import { ToolCallAccumulator } from '../../tool-call-accumulator.js';

describe('ToolCallAccumulator', () => {
  it('assembles interleaved fragments by index', () => {
    const acc = new ToolCallAccumulator();
    acc.append({ index: 0, id: 'call_a', name: 'weather__get_alerts' });
    acc.append({ index: 1, id: 'call_b', name: 'docs__search', arguments: '{"q":' });
    acc.append({ index: 0, arguments: '{"state":' });
    acc.append({ index: 0, arguments: '"CA"}' });
    acc.append({ index: 1, arguments: '"X"}' });

    expect(acc.finalize()).toEqual([
      { id: 'call_a', name: 'weather__get_alerts', arguments: { state: 'CA' } },
      { id: 'call_b', name: 'docs__search', arguments: { q: 'X' } },
    ]);
  });

  it('orders calls by index, not by arrival', () => {
    const acc = new ToolCallAccumulator();
    acc.append({ index: 2, id: 'late', name: 'b__two', arguments: '{}' });
    acc.append({ index: 0, id: 'early', name: 'a__one', arguments: '{}' });

    expect(acc.finalize().map((call) => call.id)).toEqual(['early', 'late']);
  });

  it('joins a name sent in pieces and accepts a repeated full name', () => {
    const acc = new ToolCallAccumulator();
    acc.append({ index: 0, id: 'x', name: 'docs' });
    acc.append({ index: 0, name: '__search' });
    acc.append({ index: 1, id: 'y', name: 'docs' });
    acc.append({ index: 1, name: 'docs__search' });

    expect(acc.finalize().map((call) => call.name)).toEqual(['docs__search', 'docs__search']);
  });

  it('keeps the first id and synthesizes a missing one', () => {
    const acc = new ToolCallAccumulator();
    acc.append({ index: 0, id: 'first', name: 'a__t' });
    acc.append({ index: 0, id: 'second' });
    acc.append({ index: 3, name: 'b__t' });

    expect(acc.finalize().map((call) => call.id)).toEqual(['first', 'call_3']);
  });

  it('drops nameless entries and repairs or defaults arguments', () => {
    const acc = new ToolCallAccumulator();
    acc.append({ index: 0, id: 'no-name', arguments: '{"a":1}' });
    acc.append({ index: 1, id: 'broken', name: 'a__t', arguments: '{"a":1,' });
    acc.append({ index: 2, id: 'empty', name: 'b__t' });
    acc.append({ index: 3, id: 'list', name: 'c__t', arguments: '[1,2]' });

    expect(acc.finalize()).toEqual([
      { id: 'broken', name: 'a__t', arguments: { a: 1 } },
      { id: 'empty', name: 'b__t', arguments: {} },
      { id: 'list', name: 'c__t', arguments: {} },
    ]);
  });

  it('refuses fragments after finalize', () => {
    const acc = new ToolCallAccumulator();
    acc.append({ index: 0, id: 'a', name: 'a__t' });
    expect(acc.size).toBe(1);
    acc.finalize();

    expect(() => { acc.append({ index: 0, arguments: '{}' }); }).toThrow('tool call accumulator already finalized');
  });
});
