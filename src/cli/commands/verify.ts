import type { Command } from 'commander';

import type { CliLogger } from '../logger.js';
import type { CliRuntime } from '../runtime.js';
import { analyzeClaudeStream, type StreamReport } from '../stream-report.js';
import { failWith } from './exit.js';

export type VerifyCommandContext = {
  runtime: CliRuntime;
  logger: CliLogger;
};

export function printReport(logger: CliLogger, label: string, report: StreamReport): void {
  logger.info(`${label}: ${report.eventCount} events, text length ${report.text.length}`);
  logger.info(`message_start=${report.hasMessageStart} message_stop=${report.hasMessageStop}`);
  for (const [type, count] of Object.entries(report.typeCounts)) {
    logger.debug(`${type}: ${count}`);
  }
  for (const [kind, count] of Object.entries(report.blockCounts)) {
    logger.debug(`block ${kind}: ${count}`);
  }
  const usage = report.finalUsage;
  if (usage) {
    logger.info(`usage input=${usage.inputTokens ?? '-'} output=${usage.outputTokens ?? '-'}`);
    if (usage.cacheCreationInputTokens !== undefined) logger.info(`cache_creation=${usage.cacheCreationInputTokens}`);
    if (usage.cacheReadInputTokens !== undefined) logger.info(`cache_read=${usage.cacheReadInputTokens}`);
  }
  for (const problem of report.problems) {
    logger.warning(problem);
  }
}

export function createVerifyCommand(program: Command, ctx: VerifyCommandContext): void {
  program
    .command('verify')
    .description('Check a captured Claude SSE stream for completeness and usage')
    .argument('<file>', 'Captured stream (raw SSE text)')
    .option('--lenient', 'Report problems without failing')
    .action(async (file: string, opts: { lenient?: boolean }) => {
      const report = analyzeClaudeStream(await ctx.runtime.readText(file));
      printReport(ctx.logger, file, report);
      if (report.problems.length === 0) {
        ctx.logger.success('stream verified');
        return;
      }
      if (!opts.lenient) {
        failWith('verify', `${report.problems.length} problem(s) found`);
      }
    });
}
