import { describe, expect, it } from '@jest/globals';

import {
  claudeMessagesToOpenAI,
  claudeToolsToOpenAI,
  openAIResponseToClaude
} from '../../../src/conversion/codecs/openai-codec.js';

describe('openai codec', () => {
  it('splits tool results into their own messages ahead of the text', () => {
    const messages = claudeMessagesToOpenAI(
      [
        { role: 'user', content: 'weather in sf?' },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'checking' },
            { type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: { city: 'sf' } }
          ]
        },
        {
          role: 'user',
          content: [
            { type: 'tool_result', tool_use_id: 'toolu_1', content: 'sunny' },
            { type: 'text', text: 'thanks' }
          ]
        }
      ],
      'be brief'
    );
    expect(messages).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'weather in sf?' },
      {
        role: 'assistant',
        content: 'checking',
        tool_calls: [{ id: 'toolu_1', type: 'function', function: { name: 'get_weather', arguments: '{"city":"sf"}' } }]
      },
      { role: 'tool', tool_call_id: 'toolu_1', content: 'sunny' },
      { role: 'user', content: 'thanks' }
    ]);
  });

  it('serializes structured tool results', () => {
    const messages = claudeMessagesToOpenAI(
      [{ role: 'user', content: [{ type: 'tool_result', tool_use_id: 'toolu_2', content: { temp: 20 } }] }],
      undefined
    );
    expect(messages).toEqual([{ role: 'tool', tool_call_id: 'toolu_2', content: '{"temp":20}' }]);
  });

  it('cleans tool schemas', () => {
    expect(
      claudeToolsToOpenAI([{ name: 'lookup', description: 'find', input_schema: { type: 'object', title: 'Lookup', additionalProperties: false } }])
    ).toEqual([{ type: 'function', function: { name: 'lookup', description: 'find', parameters: { type: 'object' } } }]);
  });

  it('forces tool_use and falls back to empty input on bad arguments', () => {
    const response = openAIResponseToClaude(
      {
        model: 'gpt-test',
        choices: [
          {
            message: { content: 'hi', tool_calls: [{ id: 'call_1', function: { name: 'lookup', arguments: 'not json' } }] },
            finish_reason: 'stop'
          },
          { message: { content: 'ignored' } }
        ],
        usage: { prompt_tokens: 5, completion_tokens: 3 }
      },
      'msg_test'
    );
    expect(response).toEqual({
      id: 'msg_test',
      type: 'message',
      role: 'assistant',
      model: 'gpt-test',
      content: [
        { type: 'text', text: 'hi' },
        { type: 'tool_use', id: 'call_1', name: 'lookup', input: {} }
      ],
      stop_reason: 'tool_use',
      stop_sequence: null,
      usage: { input_tokens: 5, output_tokens: 3 }
    });
  });

  it('returns an empty message with no stop reason when there are no choices', () => {
    const response = openAIResponseToClaude({ choices: [] }, 'msg_empty');
    expect(response.content).toEqual([]);
    expect(response.stop_reason).toBeNull();
    expect(response.model).toBeUndefined();
  });
});
