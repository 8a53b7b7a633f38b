import { isRecord, type UnknownObject } from '../../types/common-types.js';
import { UpstreamProtocolError } from '../errors.js';
import { tryParseJson } from '../shared/jsonish.js';
import { readDataPayload } from './sse-line-reader.js';
import type { EventSink, StreamTranscoder } from './stream-runner.js';

/**
 * Shared driving loop for upstreams that send one JSON object per `data:`
 * line. Blank lines, other SSE fields, `[DONE]` and unparsable chunks are
 * skipped; an `error` member ends the stream.
 */
export abstract class JsonChunkTranscoder implements StreamTranscoder {
  abstract readonly name: string;
  abstract get toolUseStopped(): boolean;
  private emitted = 0;
  private upstreamFailed = false;

  get emittedEvents(): number {
    return this.emitted;
  }

  protected abstract translate(chunk: UnknownObject): string[];

  /** Events owed at end of input, e.g. closing an open block. */
  abstract finish(): string[];

  processChunk(chunk: UnknownObject): string[] {
    if ('error' in chunk) {
      this.upstreamFailed = true;
      throw new UpstreamProtocolError(`upstream error: ${JSON.stringify(chunk.error)}`);
    }
    return this.translate(chunk);
  }

  async run(lines: AsyncIterable<string>, sink: EventSink): Promise<void> {
    try {
      for await (const line of lines) {
        if (sink.cancelled) return;
        const payload = readDataPayload(line);
        if (payload === undefined || payload === '' || payload === '[DONE]') continue;
        const chunk = tryParseJson(payload);
        if (!isRecord(chunk)) continue;
        await this.forward(this.processChunk(chunk), sink);
      }
    } catch (error) {
      // a broken read still gets its closing events; an upstream error object does not
      if (!this.upstreamFailed) {
        await this.forward(this.finish(), sink);
      }
      throw error;
    }
    await this.forward(this.finish(), sink);
  }

  private async forward(events: string[], sink: EventSink): Promise<void> {
    for (const event of events) {
      if (!(await sink.emit(event))) return;
      this.emitted++;
    }
  }
}
