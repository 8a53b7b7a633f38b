import type { Readable } from 'node:stream';

import { isRecord, readArray, readRecord, readString, type UnknownObject } from '../../types/common-types.js';
import { isToolInvocationFinish } from '../shared/stop-reason-mapping.js';
import { AnthropicBlockWriter } from './anthropic-block-writer.js';
import type { StreamChannels } from './event-channel.js';
import { JsonChunkTranscoder } from './json-chunk-transcoder.js';
import { launchTranscoder, type LaunchOptions } from './stream-runner.js';
import { ToolCallAccumulatorSet } from './tool-call-accumulator.js';

/**
 * Stateful transformer: OpenAI chat.completion.chunk deltas → Claude content
 * block events. Tool calls are buffered until their arguments form valid
 * JSON and are then emitted as one start/delta/stop triple.
 */
export class OpenAIToAnthropicTranscoder extends JsonChunkTranscoder {
  readonly name = 'openai-to-anthropic';
  private readonly blocks = new AnthropicBlockWriter();
  private readonly toolCalls = new ToolCallAccumulatorSet();

  get toolUseStopped(): boolean {
    return this.blocks.toolUseStopped;
  }

  get pendingToolCalls(): number {
    return this.toolCalls.size;
  }

  protected translate(chunk: UnknownObject): string[] {
    const choices = readArray(chunk, 'choices') ?? [];
    const choice = choices.length > 0 && isRecord(choices[0]) ? choices[0] : undefined;
    if (!choice) {
      return [];
    }

    const events: string[] = [];
    const delta = readRecord(choice, 'delta');
    if (delta) {
      const text = readString(delta, 'content');
      if (text) {
        events.push(...this.blocks.textDelta(text));
      }
      const toolCalls = readArray(delta, 'tool_calls');
      if (toolCalls) {
        events.push(...this.blocks.closeText(true));
        for (const call of this.toolCalls.mergeAll(toolCalls)) {
          events.push(...this.blocks.toolUse(call.id, call.name, call.input));
        }
      }
    }

    // finish chunks from some upstreams carry no delta at all
    const finishReason = readString(choice, 'finish_reason');
    if (finishReason !== undefined) {
      events.push(...this.blocks.closeText());
      if (isToolInvocationFinish(finishReason)) {
        events.push(...this.blocks.toolUseStop());
      }
    }
    return events;
  }

  finish(): string[] {
    return this.blocks.closeText();
  }
}

export function transcodeOpenAIStreamToAnthropic(body: Readable, options?: LaunchOptions): StreamChannels {
  return launchTranscoder(new OpenAIToAnthropicTranscoder(), body, options);
}
