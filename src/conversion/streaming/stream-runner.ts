import type { Readable } from 'node:stream';

import { resolveStreamCapacity } from '../../config/env-config.js';
import { isReadDisconnect } from '../errors.js';
import { describeError } from '../../utils/log-helpers.js';
import { createModuleLogger } from '../../utils/logger.js';
import { ErrorSlot, EventChannel, type StreamChannels } from './event-channel.js';
import { readSseLines, MAX_SSE_LINE_LENGTH } from './sse-line-reader.js';

const log = createModuleLogger('stream-runner');

export interface EventSink {
  /** Resolves false once the consumer has gone away. */
  emit(event: string): Promise<boolean>;
  readonly cancelled: boolean;
}

/**
 * One instance per upstream stream. All state lives on the instance and is
 * only touched by the task driving `run`.
 */
export interface StreamTranscoder {
  readonly name: string;
  /** Whether the client has already been told the turn ended in a tool call. */
  readonly toolUseStopped: boolean;
  readonly emittedEvents: number;
  run(lines: AsyncIterable<string>, sink: EventSink): Promise<void>;
}

export interface LaunchOptions {
  capacity?: number;
  maxLineLength?: number;
}

/**
 * Starts a transcoder on its own task and hands back the two channels. The
 * terminal error (if any) is recorded before the event channel closes; a
 * read failure after a delivered tool-use stop counts as a client hang-up and
 * is dropped.
 */
export function launchTranscoder(transcoder: StreamTranscoder, body: Readable, options: LaunchOptions = {}): StreamChannels {
  const events = new EventChannel<string>(options.capacity ?? resolveStreamCapacity());
  const errors = new ErrorSlot();
  const sink: EventSink = {
    emit: (event) => events.send(event),
    get cancelled() {
      return events.cancelled;
    }
  };

  const drive = async (): Promise<void> => {
    try {
      await transcoder.run(readSseLines(body, options.maxLineLength ?? MAX_SSE_LINE_LENGTH), sink);
      log.debug(`${transcoder.name} finished events=${transcoder.emittedEvents}`);
    } catch (error) {
      if (transcoder.toolUseStopped && isReadDisconnect(error)) {
        log.debug(`${transcoder.name} peer closed after tool_use stop: ${describeError(error)}`);
        return;
      }
      const terminal = error instanceof Error ? error : new Error(String(error));
      log.warn(`${transcoder.name} stream failed after ${transcoder.emittedEvents} events: ${describeError(terminal)}`);
      errors.report(terminal);
    } finally {
      errors.seal();
      events.close();
      if (!body.destroyed) {
        body.destroy();
      }
    }
  };

  void drive();
  return { events, errors };
}
