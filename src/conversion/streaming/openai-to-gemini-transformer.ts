import type { Readable } from 'node:stream';

import { isRecord, readArray, readRecord, readString, type UnknownObject } from '../../types/common-types.js';
import { isToolInvocationFinish, openAIFinishReasonToGemini } from '../shared/stop-reason-mapping.js';
import { normalizeUsage } from '../shared/usage-normalizer.js';
import { toGeminiUsageMetadata } from '../shared/usage-rendering.js';
import type { StreamChannels } from './event-channel.js';
import { JsonChunkTranscoder } from './json-chunk-transcoder.js';
import { formatSseData } from './sse-line-reader.js';
import { launchTranscoder, type LaunchOptions } from './stream-runner.js';
import { ToolCallAccumulatorSet } from './tool-call-accumulator.js';

/** OpenAI chat chunks → Gemini SSE chunks. */
export class OpenAIToGeminiTranscoder extends JsonChunkTranscoder {
  readonly name = 'openai-to-gemini';
  private readonly toolCalls = new ToolCallAccumulatorSet();
  private toolStop = false;

  get toolUseStopped(): boolean {
    return this.toolStop;
  }

  protected translate(chunk: UnknownObject): string[] {
    const choices = readArray(chunk, 'choices') ?? [];
    if (choices.length === 0) {
      // usage-only trailer (stream_options.include_usage)
      const usage = readRecord(chunk, 'usage');
      return usage ? [formatSseData({ usageMetadata: toGeminiUsageMetadata(normalizeUsage(usage)) })] : [];
    }
    const choice = isRecord(choices[0]) ? choices[0] : undefined;
    if (!choice) {
      return [];
    }

    const events: string[] = [];
    const delta = readRecord(choice, 'delta');
    if (delta) {
      const text = readString(delta, 'content');
      if (text) {
        events.push(formatSseData({ candidates: [{ content: { parts: [{ text }], role: 'model' } }] }));
      }
      for (const call of this.toolCalls.mergeAll(readArray(delta, 'tool_calls') ?? [])) {
        events.push(
          formatSseData({ candidates: [{ content: { parts: [{ functionCall: { name: call.name, args: call.input } }], role: 'model' } }] })
        );
      }
    }

    const finishReason = readString(choice, 'finish_reason');
    if (finishReason) {
      if (isToolInvocationFinish(finishReason)) {
        this.toolStop = true;
      }
      events.push(formatSseData({ candidates: [{ finishReason: openAIFinishReasonToGemini(finishReason) }] }));
    }
    return events;
  }

  finish(): string[] {
    return [];
  }
}

export function transcodeOpenAIStreamToGemini(body: Readable, options?: LaunchOptions): StreamChannels {
  return launchTranscoder(new OpenAIToGeminiTranscoder(), body, options);
}
