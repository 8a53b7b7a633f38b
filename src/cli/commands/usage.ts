import type { Command } from 'commander';

import { tryParseJson } from '../../conversion/shared/jsonish.js';
import { normalizeUsage } from '../../conversion/shared/usage-normalizer.js';
import { isRecord } from '../../types/common-types.js';
import type { CliRuntime } from '../runtime.js';
import { failWith } from './exit.js';

export type UsageCommandContext = {
  runtime: CliRuntime;
};

export function createUsageCommand(program: Command, ctx: UsageCommandContext): void {
  program
    .command('usage')
    .description('Normalize a raw usage object (Claude, OpenAI or Gemini) to canonical form')
    .argument('<json>', 'Usage object as JSON text')
    .action((json: string) => {
      const raw = tryParseJson(json);
      if (!isRecord(raw)) {
        failWith('usage', 'usage must be a JSON object');
      }
      ctx.runtime.writeOut(`${JSON.stringify(normalizeUsage(raw), null, 2)}\n`);
    });
}
