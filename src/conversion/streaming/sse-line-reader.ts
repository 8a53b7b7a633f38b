import { StringDecoder } from 'node:string_decoder';

import { isDialectRelayError, TransportDisconnectError, UpstreamProtocolError } from '../errors.js';
import { describeError } from '../../utils/log-helpers.js';

/** Upstream chunks can be far larger than the usual 64 KiB line limits. */
export const MAX_SSE_LINE_LENGTH = 1024 * 1024;

export type ByteSource = AsyncIterable<Uint8Array | string>;

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function assertLineLength(length: number, limit: number): void {
  if (length > limit) {
    throw new UpstreamProtocolError(`sse line exceeds ${limit} characters`, { length });
  }
}

/**
 * Splits an upstream byte stream into lines (without the terminator). Read
 * failures are wrapped in TransportDisconnectError so callers can apply the
 * disconnect-tolerance rule.
 */
export async function* readSseLines(source: ByteSource, maxLineLength = MAX_SSE_LINE_LENGTH): AsyncGenerator<string, void, undefined> {
  const decoder = new StringDecoder('utf8');
  let pending = '';
  const iterator = source[Symbol.asyncIterator]();
  let exhausted = false;
  try {
    while (true) {
      let next: IteratorResult<Uint8Array | string>;
      try {
        next = await iterator.next();
      } catch (error) {
        exhausted = true;
        if (isDialectRelayError(error)) {
          throw error;
        }
        throw new TransportDisconnectError(`upstream read failed: ${describeError(error)}`, error);
      }
      if (next.done) {
        exhausted = true;
        break;
      }
      const chunk = next.value;
      pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        assertLineLength(newline, maxLineLength);
        const line = stripCarriageReturn(pending.slice(0, newline));
        pending = pending.slice(newline + 1);
        yield line;
        newline = pending.indexOf('\n');
      }
      assertLineLength(pending.length, maxLineLength);
    }
  } finally {
    if (!exhausted) {
      await iterator.return?.();
    }
  }
  pending += decoder.end();
  if (pending.length > 0) {
    yield stripCarriageReturn(pending);
  }
}

/**
 * Payload of a `data:` line, or undefined for any other field. The space
 * after the colon is optional.
 */
export function readDataPayload(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith('data:')) {
    return undefined;
  }
  return trimmed.slice('data:'.length).trimStart();
}

export function formatSseEvent(event: string, payload: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`;
}

export function formatSseData(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}
