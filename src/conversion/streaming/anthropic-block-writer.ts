import type { JsonValue } from '../../types/common-types.js';
import { formatSseEvent } from './sse-line-reader.js';

type TextState = 'idle' | 'text_open' | 'closed';

/**
 * Owns the block bookkeeping of one Claude event stream. Text and tool-use
 * blocks count their indices independently; each counter only moves when a
 * block of its own kind closes.
 */
export class AnthropicBlockWriter {
  private textState: TextState = 'idle';
  private textBlockIndex = 0;
  private toolUseBlockIndex = 0;
  private toolUseStopEmitted = false;
  private toolBlocks = 0;

  get toolUseStopped(): boolean {
    return this.toolUseStopEmitted;
  }

  get textOpen(): boolean {
    return this.textState === 'text_open';
  }

  get toolBlockCount(): number {
    return this.toolBlocks;
  }

  textDelta(text: string): string[] {
    const events: string[] = [];
    if (this.textState !== 'text_open') {
      events.push(
        formatSseEvent('content_block_start', {
          type: 'content_block_start',
          index: this.textBlockIndex,
          content_block: { type: 'text', text: '' }
        })
      );
      this.textState = 'text_open';
    }
    events.push(
      formatSseEvent('content_block_delta', {
        type: 'content_block_delta',
        index: this.textBlockIndex,
        delta: { type: 'text_delta', text }
      })
    );
    return events;
  }

  /** Close an open text block; `advance` moves the text index past it. */
  closeText(advance = false): string[] {
    if (this.textState !== 'text_open') {
      return [];
    }
    const stop = formatSseEvent('content_block_stop', { type: 'content_block_stop', index: this.textBlockIndex });
    this.textState = 'closed';
    if (advance) {
      this.textBlockIndex++;
    }
    return [stop];
  }

  toolUse(id: string, name: string, input: JsonValue): string[] {
    const index = this.toolUseBlockIndex++;
    this.toolBlocks++;
    return [
      formatSseEvent('content_block_start', {
        type: 'content_block_start',
        index,
        content_block: { type: 'tool_use', id, name }
      }),
      formatSseEvent('content_block_delta', {
        type: 'content_block_delta',
        index,
        delta: { type: 'input_json_delta', partial_json: JSON.stringify(input) }
      }),
      formatSseEvent('content_block_stop', { type: 'content_block_stop', index })
    ];
  }

  /** At most once per stream. */
  toolUseStop(): string[] {
    if (this.toolUseStopEmitted) {
      return [];
    }
    this.toolUseStopEmitted = true;
    return [formatSseEvent('message_delta', { type: 'message_delta', delta: { stop_reason: 'tool_use' } })];
  }
}
