import { Readable } from 'node:stream';

import type { UnknownObject } from '../../src/types/common-types.js';

/** One `data:` line per payload, each followed by a blank line. */
export function dataLines(payloads: unknown[]): string {
  return payloads.map((payload) => `data: ${typeof payload === 'string' ? payload : JSON.stringify(payload)}\n\n`).join('');
}

export function sseBody(...chunks: string[]): Readable {
  return Readable.from(chunks);
}

export function claudeEvent(event: string, payload: UnknownObject): string {
  return `event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`;
}

export function parseDataEvent(event: string): unknown {
  if (!event.startsWith('data: ')) {
    throw new Error(`not a data event: ${event}`);
  }
  return JSON.parse(event.slice('data: '.length));
}

export function connectionReset(): Error {
  return Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
}

/** A well-formed single text block Claude stream with usage on both ends. */
export function completeClaudeStream(text: string, outputTokens: number): string {
  return [
    claudeEvent('message_start', { type: 'message_start', message: { usage: { input_tokens: 12, output_tokens: 1 } } }),
    claudeEvent('content_block_start', { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } }),
    claudeEvent('content_block_delta', { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text } }),
    claudeEvent('content_block_stop', { type: 'content_block_stop', index: 0 }),
    claudeEvent('message_delta', { type: 'message_delta', delta: { stop_reason: 'end_turn' }, usage: { output_tokens: outputTokens } }),
    claudeEvent('message_stop', { type: 'message_stop' })
  ].join('');
}
