import type { Readable } from 'node:stream';

import { readNumber, readRecord, readString, type UnknownObject } from '../../types/common-types.js';
import { tryParseJson } from '../shared/jsonish.js';
import { claudeStopReasonToGemini } from '../shared/stop-reason-mapping.js';
import { normalizeUsage } from '../shared/usage-normalizer.js';
import { toGeminiUsageMetadata } from '../shared/usage-rendering.js';
import type { StreamChannels } from './event-channel.js';
import { JsonChunkTranscoder } from './json-chunk-transcoder.js';
import { formatSseData } from './sse-line-reader.js';
import { launchTranscoder, type LaunchOptions } from './stream-runner.js';

interface PendingToolBlock {
  name: string;
  json: string;
}

const USAGE_FIELDS = [
  'input_tokens',
  'output_tokens',
  'cache_creation_input_tokens',
  'cache_read_input_tokens'
] as const;

/**
 * Claude message events → Gemini SSE chunks for a Gemini-speaking client.
 * Text deltas go out immediately; tool_use blocks are reassembled and sent as
 * one functionCall part when the block stops; message_delta usage closes the
 * turn with a finishReason chunk. `error` events end the stream through the
 * shared chunk loop.
 */
export class AnthropicToGeminiTranscoder extends JsonChunkTranscoder {
  readonly name = 'anthropic-to-gemini';
  private readonly toolBlocks = new Map<number, PendingToolBlock>();
  private readonly usage: UnknownObject = {};
  private toolStop = false;

  get toolUseStopped(): boolean {
    return this.toolStop;
  }

  protected translate(event: UnknownObject): string[] {
    switch (event.type) {
      case 'message_start':
        this.mergeUsage(readRecord(readRecord(event, 'message') ?? {}, 'usage'));
        return [];
      case 'content_block_start':
        return this.startBlock(event);
      case 'content_block_delta':
        return this.applyDelta(event);
      case 'content_block_stop':
        return this.stopBlock(event);
      case 'message_delta':
        return this.finishMessage(event);
      default:
        return [];
    }
  }

  finish(): string[] {
    return [];
  }

  private startBlock(event: UnknownObject): string[] {
    const block = readRecord(event, 'content_block');
    if (block?.type === 'tool_use') {
      this.toolBlocks.set(readNumber(event, 'index') ?? 0, { name: readString(block, 'name') ?? '', json: '' });
    }
    return [];
  }

  private applyDelta(event: UnknownObject): string[] {
    const delta = readRecord(event, 'delta') ?? {};
    if (delta.type === 'text_delta') {
      const text = readString(delta, 'text') ?? '';
      return [formatSseData({ candidates: [{ content: { parts: [{ text }], role: 'model' } }] })];
    }
    if (delta.type === 'input_json_delta') {
      const pending = this.toolBlocks.get(readNumber(event, 'index') ?? 0);
      if (pending) {
        pending.json += readString(delta, 'partial_json') ?? '';
      }
    }
    return [];
  }

  private stopBlock(event: UnknownObject): string[] {
    const index = readNumber(event, 'index') ?? 0;
    const pending = this.toolBlocks.get(index);
    if (!pending) {
      return [];
    }
    this.toolBlocks.delete(index);
    const args = pending.json ? tryParseJson(pending.json) ?? {} : {};
    return [formatSseData({ candidates: [{ content: { parts: [{ functionCall: { name: pending.name, args } }], role: 'model' } }] })];
  }

  private finishMessage(event: UnknownObject): string[] {
    const delta = readRecord(event, 'delta') ?? {};
    const stopReason = readString(delta, 'stop_reason');
    if (stopReason === 'tool_use') {
      this.toolStop = true;
    }
    const usage = readRecord(event, 'usage');
    if (!usage) {
      return [];
    }
    this.mergeUsage(usage);
    return [
      formatSseData({
        candidates: [{ finishReason: claudeStopReasonToGemini(stopReason) }],
        usageMetadata: toGeminiUsageMetadata(normalizeUsage(this.usage))
      })
    ];
  }

  private mergeUsage(usage: UnknownObject | undefined): void {
    if (!usage) return;
    for (const field of USAGE_FIELDS) {
      const value = readNumber(usage, field);
      if (value !== undefined) {
        this.usage[field] = value;
      }
    }
  }
}

export function transcodeAnthropicStreamToGemini(body: Readable, options?: LaunchOptions): StreamChannels {
  return launchTranscoder(new AnthropicToGeminiTranscoder(), body, options);
}
