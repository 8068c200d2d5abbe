import type { ModelToolCall } from './types.js';

import { parseToolArguments } from './utils.js';

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

/**
 * Assembles streamed tool-call fragments. Fragments are keyed by the index the model assigned;
 * id and name are taken from whichever fragment first carries them, argument text is concatenated.
 * Calls become usable only through `finalize`, once the model turn has ended.
 */
export class ToolCallAccumulator {
  private readonly partials = new Map<number, PartialToolCall>();
  private finalized = false;

  append(fragment: { index: number; id?: string; name?: string; arguments?: string }): void {
    if (this.finalized) throw new Error('tool call accumulator already finalized');
    const current = this.partials.get(fragment.index) ?? { id: '', name: '', arguments: '' };
    if (fragment.id !== undefined && fragment.id.length > 0 && current.id.length === 0) current.id = fragment.id;
    if (fragment.name !== undefined && fragment.name.length > 0) {
      // Some providers send the name once, others in pieces
      current.name = current.name.length === 0 || fragment.name.startsWith(current.name) ? fragment.name : current.name + fragment.name;
    }
    if (fragment.arguments !== undefined) current.arguments += fragment.arguments;
    this.partials.set(fragment.index, current);
  }

  get size(): number {
    return this.partials.size;
  }

  /**
   * Completed calls in index order. Entries without a name are dropped; a missing id is
   * synthesized from the index.
   */
  finalize(): ModelToolCall[] {
    this.finalized = true;
    return Array.from(this.partials.entries())
      .sort(([a], [b]) => a - b)
      .filter(([, partial]) => partial.name.length > 0)
      .map(([index, partial]) => ({
        id: partial.id.length > 0 ? partial.id : `call_${String(index)}`,
        name: partial.name,
        arguments: parseToolArguments(partial.arguments),
      }));
  }
}
