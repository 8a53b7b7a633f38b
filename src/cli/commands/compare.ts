import type { Command } from 'commander';

import type { CliLogger } from '../logger.js';
import type { CliRuntime } from '../runtime.js';
import { analyzeClaudeStream, compareReports } from '../stream-report.js';
import { failWith } from './exit.js';
import { printReport } from './verify.js';

export type CompareCommandContext = {
  runtime: CliRuntime;
  logger: CliLogger;
};

function formatDelta(delta: number): string {
  return delta > 0 ? `+${delta}` : String(delta);
}

export function createCompareCommand(program: Command, ctx: CompareCommandContext): void {
  program
    .command('compare')
    .description('Compare a relayed Claude stream against the upstream capture')
    .argument('<proxyFile>', 'Stream captured from the relay')
    .argument('<upstreamFile>', 'Stream captured straight from the upstream')
    .action(async (proxyFile: string, upstreamFile: string) => {
      const proxy = analyzeClaudeStream(await ctx.runtime.readText(proxyFile));
      const upstream = analyzeClaudeStream(await ctx.runtime.readText(upstreamFile));
      printReport(ctx.logger, 'proxy', proxy);
      printReport(ctx.logger, 'upstream', upstream);

      const result = compareReports(proxy, upstream);
      if (result.inputTokenDelta === undefined || result.outputTokenDelta === undefined) {
        ctx.logger.warning('usage missing on at least one side');
      } else if (result.inputTokenDelta !== 0 || result.outputTokenDelta !== 0) {
        ctx.logger.warning(
          `token mismatch: input ${formatDelta(result.inputTokenDelta)}, output ${formatDelta(result.outputTokenDelta)}`
        );
      } else {
        ctx.logger.success('token counts match');
      }
      if (!result.sequenceEqual) {
        ctx.logger.warning('event sequences differ');
      }
      if (!result.textEqual) {
        failWith('compare', `text differs (proxy ${proxy.text.length} chars, upstream ${upstream.text.length} chars)`);
      }
      ctx.logger.success('text matches');
    });
}
