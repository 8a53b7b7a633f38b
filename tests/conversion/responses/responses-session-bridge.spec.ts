import { describe, expect, it } from '@jest/globals';

import { UnrecognizedFormatError } from '../../../src/conversion/errors.js';
import {
  claudeResponseToResponses,
  EMPTY_SESSION,
  flattenSession,
  openAIResponseToResponses,
  parseResponsesInput,
  responsesToOpenAIMessages
} from '../../../src/conversion/responses/responses-session-bridge.js';

describe('responses session bridge', () => {
  it('wraps a bare string input as a text item', () => {
    expect(parseResponsesInput('hi')).toEqual([{ type: 'text', content: 'hi' }]);
  });

  it('rejects input that is neither a string nor a list', () => {
    expect(() => parseResponsesInput(5)).toThrow(UnrecognizedFormatError);
    expect(() => parseResponsesInput(null)).toThrow('unsupported responses input type: null');
  });

  it('puts history ahead of the new input and skips tool items', () => {
    const session = { items: [{ type: 'message', role: 'assistant', content: [{ type: 'output_text', text: 'earlier' }] }] };
    const messages = flattenSession(session, [
      { type: 'message', role: 'user', content: [{ type: 'input_text', text: 'a' }, { type: 'input_text', text: 'b' }] },
      { type: 'tool_call', content: {} },
      'not an object'
    ]);
    expect(messages).toEqual([
      { role: 'assistant', content: [{ type: 'text', text: 'earlier' }] },
      { role: 'user', content: [{ type: 'text', text: 'a\nb' }] }
    ]);
    expect(session.items).toHaveLength(1);
  });

  it('fails on unknown item types and empty text items', () => {
    expect(() => flattenSession(EMPTY_SESSION, [{ type: 'reasoning' }])).toThrow('unrecognized responses item type: reasoning');
    expect(() => flattenSession(EMPTY_SESSION, [{ type: 'text', content: '' }])).toThrow('responses text item has empty content');
  });

  it('builds lenient chat messages with instructions first', () => {
    expect(responsesToOpenAIMessages(EMPTY_SESSION, [{ type: 'reasoning' }, { type: 'message', content: 'hi' }], 'sys')).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'hi' }
    ]);
  });

  it('renders Claude text blocks as output items', () => {
    const response = claudeResponseToResponses(
      { model: 'claude-test', content: [{ type: 'text', text: 'hi' }, { type: 'tool_use', id: 'toolu_1' }], usage: { input_tokens: 5, output_tokens: 2 } },
      'resp_1'
    );
    expect(response).toMatchObject({ id: 'resp_1', object: 'response', model: 'claude-test', status: 'completed' });
    expect(response.output).toEqual([{ type: 'text', content: 'hi' }]);
    expect(response.usage).toEqual({ input_tokens: 5, output_tokens: 2, total_tokens: 7 });
  });

  it('renders the first chat choice with cached token details', () => {
    const response = openAIResponseToResponses(
      { model: 'gpt-test', choices: [{ message: { content: 'yo' } }], usage: { prompt_tokens: 4, completion_tokens: 1, prompt_tokens_details: { cached_tokens: 1 } } },
      'resp_2'
    );
    expect(response.output).toEqual([{ type: 'text', content: 'yo' }]);
    expect(response.usage).toEqual({
      input_tokens: 3,
      output_tokens: 1,
      total_tokens: 4,
      input_tokens_details: { cached_tokens: 1 },
      cache_read_input_tokens: 1
    });
  });
});
