import { PassThrough } from 'node:stream';

import { describe, expect, it } from '@jest/globals';

import { TransportDisconnectError } from '../../../src/conversion/errors.js';
import { collectStream } from '../../../src/conversion/streaming/event-channel.js';
import {
  detectClaudeToolStop,
  detectGeminiToolStop,
  detectResponsesToolStop,
  relayClaudeStream
} from '../../../src/conversion/streaming/sse-passthrough-relay.js';
import { connectionReset, sseBody } from '../../helpers/sse-fixtures.js';

const toolStopEvent = 'event: message_delta\ndata: {"type":"message_delta","delta":{"stop_reason":"tool_use"}}\n\n';

describe('SsePassthroughRelay', () => {
  it('forwards whole events regardless of chunk boundaries', async () => {
    const body = sseBody('event: message_start\ndata: {"type":"message_start"}\n', '\nevent: ping\n', 'data: {"type":"ping"}\n\n: comment\ndata: x');
    const result = await collectStream(relayClaudeStream(body));
    expect(result).toEqual({
      events: [
        'event: message_start\ndata: {"type":"message_start"}\n\n',
        'event: ping\ndata: {"type":"ping"}\n\n',
        ': comment\ndata: x\n'
      ]
    });
  });

  it('treats a reset after a tool_use stop as a normal end', async () => {
    const body = new PassThrough();
    const channels = relayClaudeStream(body);
    body.write(toolStopEvent);
    const iterator = channels.events[Symbol.asyncIterator]();
    await expect(iterator.next()).resolves.toEqual({ value: toolStopEvent, done: false });
    body.destroy(connectionReset());
    await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
    await expect(channels.errors.settled).resolves.toBeUndefined();
  });

  it('reports a reset when no tool stop was seen', async () => {
    const body = new PassThrough();
    const channels = relayClaudeStream(body);
    body.write('event: ping\ndata: {"type":"ping"}\n\n');
    const iterator = channels.events[Symbol.asyncIterator]();
    await iterator.next();
    body.destroy(connectionReset());
    await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
    await expect(channels.errors.settled).resolves.toBeInstanceOf(TransportDisconnectError);
  });
});

describe('tool stop detectors', () => {
  it('matches the raw markers of each dialect', () => {
    expect(detectClaudeToolStop('data: {"delta":{"stop_reason": "tool_use"}}')).toBe(true);
    expect(detectClaudeToolStop('data: {"delta":{"stop_reason":"end_turn"}}')).toBe(false);
    expect(detectGeminiToolStop('data: {"candidates":[{"content":{"parts":[{"functionCall":{}}]}}]}')).toBe(true);
    expect(detectResponsesToolStop('data: {"type":"response.completed","output":[{"type":"function_call"}]}')).toBe(true);
    expect(detectResponsesToolStop('data: {"type":"response.output_item.added","item":{"type":"function_call"}}')).toBe(false);
  });
});
