import { isRecord, readNumber, readRecord, readString, type JsonValue, type UnknownObject } from '../../types/common-types.js';
import { tryParseJson } from '../shared/jsonish.js';

export interface ToolCallAccumulator {
  id: string;
  name: string;
  argumentsSoFar: string;
}

export interface CompletedToolCall {
  id: string;
  name: string;
  input: JsonValue;
}

/**
 * In-flight tool calls keyed by the upstream's own per-call index. A call is
 * released once id, name and arguments are all present and the arguments
 * parse; anything short of that stays buffered.
 */
export class ToolCallAccumulatorSet {
  private readonly pending = new Map<number, ToolCallAccumulator>();

  get size(): number {
    return this.pending.size;
  }

  merge(entry: UnknownObject): CompletedToolCall | undefined {
    const index = readNumber(entry, 'index') ?? 0;
    let acc = this.pending.get(index);
    if (!acc) {
      acc = { id: '', name: '', argumentsSoFar: '' };
      this.pending.set(index, acc);
    }
    const id = readString(entry, 'id');
    if (id !== undefined) {
      acc.id = id;
    }
    const fn = readRecord(entry, 'function');
    if (fn) {
      const name = readString(fn, 'name');
      if (name !== undefined) {
        acc.name = name;
      }
      const args = readString(fn, 'arguments');
      if (args !== undefined) {
        acc.argumentsSoFar += args;
      }
    }
    if (!acc.id || !acc.name || !acc.argumentsSoFar) {
      return undefined;
    }
    const input = tryParseJson(acc.argumentsSoFar);
    if (input === undefined) {
      return undefined;
    }
    this.pending.delete(index);
    return { id: acc.id, name: acc.name, input };
  }

  mergeAll(entries: unknown[]): CompletedToolCall[] {
    const completed: CompletedToolCall[] = [];
    for (const entry of entries) {
      if (!isRecord(entry)) continue;
      const call = this.merge(entry);
      if (call) completed.push(call);
    }
    return completed;
  }
}
