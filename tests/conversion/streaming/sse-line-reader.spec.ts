import { describe, expect, it } from '@jest/globals';

import { TransportDisconnectError, UpstreamProtocolError } from '../../../src/conversion/errors.js';
import { readDataPayload, readSseLines } from '../../../src/conversion/streaming/sse-line-reader.js';

async function* chunksOf(...chunks: Array<string | Buffer>): AsyncGenerator<string | Buffer> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

async function* failingAfter(chunk: string, error: Error): AsyncGenerator<string> {
  yield chunk;
  throw error;
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) {
    out.push(line);
  }
  return out;
}

describe('readSseLines', () => {
  it('splits across chunk boundaries and strips carriage returns', async () => {
    await expect(collect(readSseLines(chunksOf('a\r\nb', 'c\n', '\ntail')))).resolves.toEqual(['a', 'bc', '', 'tail']);
  });

  it('decodes multi-byte characters split between chunks', async () => {
    const bytes = Buffer.from('é\n', 'utf8');
    await expect(collect(readSseLines(chunksOf(bytes.subarray(0, 1), bytes.subarray(1))))).resolves.toEqual(['é']);
  });

  it('rejects lines over the limit', async () => {
    await expect(collect(readSseLines(chunksOf('0123456789\n'), 8))).rejects.toThrow(UpstreamProtocolError);
    await expect(collect(readSseLines(chunksOf('0123456789'), 8))).rejects.toThrow('sse line exceeds 8 characters');
  });

  it('wraps read failures as transport disconnects', async () => {
    const lines = collect(readSseLines(failingAfter('first\n', new Error('socket hang up'))));
    await expect(lines).rejects.toThrow(TransportDisconnectError);
    await expect(collect(readSseLines(failingAfter('first\n', new Error('socket hang up'))))).rejects.toThrow(
      'upstream read failed: socket hang up'
    );
  });
});

describe('readDataPayload', () => {
  it('accepts data lines with or without the space', () => {
    expect(readDataPayload('data: {"a":1}')).toBe('{"a":1}');
    expect(readDataPayload('data:{"a":1}')).toBe('{"a":1}');
    expect(readDataPayload('data: [DONE]')).toBe('[DONE]');
  });

  it('ignores other fields', () => {
    expect(readDataPayload('event: ping')).toBeUndefined();
    expect(readDataPayload(': keep-alive')).toBeUndefined();
    expect(readDataPayload('')).toBeUndefined();
  });
});
