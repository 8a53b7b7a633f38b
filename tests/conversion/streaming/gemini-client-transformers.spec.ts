import { describe, expect, it } from '@jest/globals';

import { UpstreamProtocolError } from '../../../src/conversion/errors.js';
import { AnthropicToGeminiTranscoder } from '../../../src/conversion/streaming/anthropic-to-gemini-transformer.js';
import { collectStream } from '../../../src/conversion/streaming/event-channel.js';
import {
  OpenAIToGeminiTranscoder,
  transcodeOpenAIStreamToGemini
} from '../../../src/conversion/streaming/openai-to-gemini-transformer.js';
import { dataLines, parseDataEvent, sseBody } from '../../helpers/sse-fixtures.js';

describe('AnthropicToGeminiTranscoder', () => {
  it('streams text, reassembles tool input and closes with usage', () => {
    const transcoder = new AnthropicToGeminiTranscoder();
    const feed = (event: Record<string, unknown>): unknown[] => transcoder.processChunk(event).map(parseDataEvent);

    expect(feed({ type: 'message_start', message: { usage: { input_tokens: 12, output_tokens: 1 } } })).toEqual([]);
    expect(feed({ type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } })).toEqual([]);
    expect(feed({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hi' } })).toEqual([
      { candidates: [{ content: { parts: [{ text: 'Hi' }], role: 'model' } }] }
    ]);
    expect(feed({ type: 'content_block_stop', index: 0 })).toEqual([]);
    feed({ type: 'content_block_start', index: 1, content_block: { type: 'tool_use', id: 'toolu_1', name: 'lookup' } });
    feed({ type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{"q":' } });
    feed({ type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '"x"}' } });
    expect(feed({ type: 'content_block_stop', index: 1 })).toEqual([
      { candidates: [{ content: { parts: [{ functionCall: { name: 'lookup', args: { q: 'x' } } }], role: 'model' } }] }
    ]);
    expect(feed({ type: 'message_delta', delta: { stop_reason: 'tool_use' }, usage: { output_tokens: 7 } })).toEqual([
      {
        candidates: [{ finishReason: 'STOP' }],
        usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 7, totalTokenCount: 19 }
      }
    ]);
    expect(transcoder.toolUseStopped).toBe(true);
  });

  it('sends empty args for a tool block without input', () => {
    const transcoder = new AnthropicToGeminiTranscoder();
    transcoder.processChunk({ type: 'content_block_start', index: 0, content_block: { type: 'tool_use', name: 'ping' } });
    expect(transcoder.processChunk({ type: 'content_block_stop', index: 0 }).map(parseDataEvent)).toEqual([
      { candidates: [{ content: { parts: [{ functionCall: { name: 'ping', args: {} } }], role: 'model' } }] }
    ]);
  });

  it('fails on an error event', () => {
    const transcoder = new AnthropicToGeminiTranscoder();
    expect(() => transcoder.processChunk({ type: 'error', error: { type: 'overloaded_error' } })).toThrow(UpstreamProtocolError);
  });
});

describe('OpenAIToGeminiTranscoder', () => {
  it('maps text, completed calls, finish reasons and the usage trailer', async () => {
    const body = sseBody(
      dataLines([
        { choices: [{ delta: { content: 'Hi' }, finish_reason: null }] },
        { choices: [{ delta: { tool_calls: [{ index: 0, id: 'call_1', function: { name: 'lookup', arguments: '{"q":"x"}' } }] } }] },
        { choices: [{ delta: {}, finish_reason: 'tool_calls' }] },
        { choices: [], usage: { prompt_tokens: 9, completion_tokens: 3 } },
        '[DONE]'
      ])
    );
    const { events, error } = await collectStream(transcodeOpenAIStreamToGemini(body));
    expect(error).toBeUndefined();
    expect(events.map(parseDataEvent)).toEqual([
      { candidates: [{ content: { parts: [{ text: 'Hi' }], role: 'model' } }] },
      { candidates: [{ content: { parts: [{ functionCall: { name: 'lookup', args: { q: 'x' } } }], role: 'model' } }] },
      { candidates: [{ finishReason: 'STOP' }] },
      { usageMetadata: { promptTokenCount: 9, candidatesTokenCount: 3, totalTokenCount: 12 } }
    ]);
  });

  it('marks the tool stop on a tool finish reason', () => {
    const transcoder = new OpenAIToGeminiTranscoder();
    expect(transcoder.processChunk({ choices: [{ finish_reason: 'length' }] }).map(parseDataEvent)).toEqual([
      { candidates: [{ finishReason: 'MAX_TOKENS' }] }
    ]);
    expect(transcoder.toolUseStopped).toBe(false);
    transcoder.processChunk({ choices: [{ finish_reason: 'tool_calls' }] });
    expect(transcoder.toolUseStopped).toBe(true);
  });
});
