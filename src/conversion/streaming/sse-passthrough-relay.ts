import type { Readable } from 'node:stream';

import type { StreamChannels } from './event-channel.js';
import { launchTranscoder, type EventSink, type LaunchOptions, type StreamTranscoder } from './stream-runner.js';

export type ToolStopDetector = (line: string) => boolean;

/** Raw substring match: no JSON parse on the hot path. */
export const detectClaudeToolStop: ToolStopDetector = (line) =>
  line.includes('"stop_reason":"tool_use"') || line.includes('"stop_reason": "tool_use"');

export const detectGeminiToolStop: ToolStopDetector = (line) => line.includes('"functionCall"');

export const detectResponsesToolStop: ToolStopDetector = (line) =>
  line.includes('response.completed') && line.includes('"function_call"');

/**
 * Forwards an already block-structured SSE stream untouched. Lines are
 * buffered until the blank line that ends an event and the whole event
 * (including id:, retry: and comment lines) goes out as one string, so
 * downstream patching always sees complete events.
 */
export class SsePassthroughRelay implements StreamTranscoder {
  private toolStopSeen = false;
  private emitted = 0;
  private buffer: string[] = [];

  constructor(
    readonly name: string,
    private readonly detectToolStop: ToolStopDetector
  ) {}

  get toolUseStopped(): boolean {
    return this.toolStopSeen;
  }

  get emittedEvents(): number {
    return this.emitted;
  }

  async run(lines: AsyncIterable<string>, sink: EventSink): Promise<void> {
    try {
      for await (const line of lines) {
        if (sink.cancelled) return;
        if (this.detectToolStop(line)) {
          this.toolStopSeen = true;
        }
        this.buffer.push(`${line}\n`);
        if (line === '') {
          await this.flush(sink);
        }
      }
    } finally {
      // trailing event without its blank line still goes out
      if (!sink.cancelled) {
        await this.flush(sink);
      }
    }
  }

  private async flush(sink: EventSink): Promise<void> {
    if (this.buffer.length === 0) {
      return;
    }
    const event = this.buffer.join('');
    this.buffer = [];
    if (await sink.emit(event)) {
      this.emitted++;
    }
  }
}

export function relayClaudeStream(body: Readable, options?: LaunchOptions): StreamChannels {
  return launchTranscoder(new SsePassthroughRelay('claude-passthrough', detectClaudeToolStop), body, options);
}

export function relayGeminiStream(body: Readable, options?: LaunchOptions): StreamChannels {
  return launchTranscoder(new SsePassthroughRelay('gemini-passthrough', detectGeminiToolStop), body, options);
}

export function relayResponsesStream(body: Readable, options?: LaunchOptions): StreamChannels {
  return launchTranscoder(new SsePassthroughRelay('responses-passthrough', detectResponsesToolStop), body, options);
}
