import type { Readable } from 'node:stream';
import type { Command } from 'commander';

import { transcodeAnthropicStreamToGemini } from '../../conversion/streaming/anthropic-to-gemini-transformer.js';
import type { StreamChannels } from '../../conversion/streaming/event-channel.js';
import { transcodeGeminiStreamToAnthropic } from '../../conversion/streaming/gemini-to-anthropic-transformer.js';
import { transcodeOpenAIStreamToAnthropic } from '../../conversion/streaming/openai-to-anthropic-transformer.js';
import { transcodeOpenAIStreamToGemini } from '../../conversion/streaming/openai-to-gemini-transformer.js';
import { relayClaudeStream, relayGeminiStream } from '../../conversion/streaming/sse-passthrough-relay.js';
import type { CliLogger } from '../logger.js';
import type { CliRuntime } from '../runtime.js';
import { failWith } from './exit.js';

export type TranscodeCommandContext = {
  runtime: CliRuntime;
  logger: CliLogger;
};

type SourceDialect = 'openai' | 'gemini' | 'claude';
type TargetDialect = 'claude' | 'gemini';

const ROUTES: Record<SourceDialect, Record<TargetDialect, (body: Readable) => StreamChannels>> = {
  openai: { claude: transcodeOpenAIStreamToAnthropic, gemini: transcodeOpenAIStreamToGemini },
  gemini: { claude: transcodeGeminiStreamToAnthropic, gemini: relayGeminiStream },
  claude: { claude: relayClaudeStream, gemini: transcodeAnthropicStreamToGemini }
};

function isSourceDialect(value: string): value is SourceDialect {
  return value === 'openai' || value === 'gemini' || value === 'claude';
}

function isTargetDialect(value: string): value is TargetDialect {
  return value === 'claude' || value === 'gemini';
}

export function createTranscodeCommand(program: Command, ctx: TranscodeCommandContext): void {
  program
    .command('transcode')
    .description('Replay a captured upstream stream through a transcoder and print the client events')
    .argument('<file>', 'Captured upstream stream (raw SSE text)')
    .requiredOption('--from <dialect>', 'Upstream dialect: openai | gemini | claude')
    .option('--to <dialect>', 'Client dialect: claude | gemini', 'claude')
    .action(async (file: string, opts: { from: string; to: string }) => {
      const from = opts.from.toLowerCase();
      const to = opts.to.toLowerCase();
      if (!isSourceDialect(from) || !isTargetDialect(to)) {
        failWith('transcode', `unsupported route ${opts.from} -> ${opts.to}`);
      }

      const channels = ROUTES[from][to](ctx.runtime.openStream(file));
      let count = 0;
      for await (const event of channels.events) {
        ctx.runtime.writeOut(event);
        count++;
      }
      const error = await channels.errors.settled;
      if (error) {
        ctx.logger.error(`stream failed after ${count} events: ${error.message}`);
        failWith('transcode', error.message);
      }
    });
}
