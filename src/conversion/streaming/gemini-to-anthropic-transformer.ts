import type { Readable } from 'node:stream';

import { isRecord, readArray, readRecord, readString, type UnknownObject } from '../../types/common-types.js';
import { toJsonValue } from '../shared/jsonish.js';
import { AnthropicBlockWriter } from './anthropic-block-writer.js';
import type { StreamChannels } from './event-channel.js';
import { JsonChunkTranscoder } from './json-chunk-transcoder.js';
import { launchTranscoder, type LaunchOptions } from './stream-runner.js';

/**
 * Gemini `streamGenerateContent?alt=sse` chunks → Claude block events.
 * Gemini sends each functionCall whole, so nothing is accumulated: every call
 * is flushed as a tool_use triple right away.
 */
export class GeminiToAnthropicTranscoder extends JsonChunkTranscoder {
  readonly name = 'gemini-to-anthropic';
  private readonly blocks = new AnthropicBlockWriter();

  get toolUseStopped(): boolean {
    return this.blocks.toolUseStopped;
  }

  protected translate(chunk: UnknownObject): string[] {
    const candidates = readArray(chunk, 'candidates') ?? [];
    const candidate = candidates.length > 0 && isRecord(candidates[0]) ? candidates[0] : undefined;
    if (!candidate) {
      return [];
    }

    const events: string[] = [];
    for (const part of readArray(readRecord(candidate, 'content') ?? {}, 'parts') ?? []) {
      if (!isRecord(part)) continue;
      const text = readString(part, 'text');
      if (text && part.thought !== true) {
        events.push(...this.blocks.textDelta(text));
      }
      const call = readRecord(part, 'functionCall');
      if (call) {
        events.push(...this.blocks.closeText(true));
        const id = `toolu_${this.blocks.toolBlockCount}`;
        events.push(...this.blocks.toolUse(id, readString(call, 'name') ?? '', toJsonValue(call.args ?? {})));
      }
    }

    if (readString(candidate, 'finishReason') !== undefined) {
      events.push(...this.blocks.closeText());
      if (this.blocks.toolBlockCount > 0) {
        events.push(...this.blocks.toolUseStop());
      }
    }
    return events;
  }

  finish(): string[] {
    return this.blocks.closeText();
  }
}

export function transcodeGeminiStreamToAnthropic(body: Readable, options?: LaunchOptions): StreamChannels {
  return launchTranscoder(new GeminiToAnthropicTranscoder(), body, options);
}
