import { Command } from 'commander';

import { createCompareCommand } from './commands/compare.js';
import { createTranscodeCommand } from './commands/transcode.js';
import { createUsageCommand } from './commands/usage.js';
import { createVerifyCommand } from './commands/verify.js';
import { createCliLogger } from './logger.js';
import type { CliRuntime } from './runtime.js';

export type CliProgramContext = {
  cliVersion: string;
  runtime: CliRuntime;
};

export function createCliProgram(ctx: CliProgramContext): Command {
  const program = new Command();
  const logger = createCliLogger(ctx.runtime);

  program.configureOutput({
    writeOut: (str) => ctx.runtime.writeOut(str),
    writeErr: (str) => ctx.runtime.writeErr(str)
  });
  // set before the subcommands exist so they inherit it and never call process.exit
  program.exitOverride();

  program
    .name('dialect-relay')
    .description('Inspect and replay LLM API streams across the Claude, OpenAI, Gemini and Responses dialects')
    .version(ctx.cliVersion);

  createVerifyCommand(program, { runtime: ctx.runtime, logger });
  createTranscodeCommand(program, { runtime: ctx.runtime, logger });
  createUsageCommand(program, { runtime: ctx.runtime });
  createCompareCommand(program, { runtime: ctx.runtime, logger });

  return program;
}
