import { CommanderError } from 'commander';

import { describeError } from '../utils/log-helpers.js';
import { createCliProgram } from './program.js';
import type { CliRuntime } from './runtime.js';

export const CLI_VERSION = '0.4.0';

export async function runCli(argv: string[], ctx: { cliVersion?: string; runtime: CliRuntime }): Promise<number> {
  const program = createCliProgram({ cliVersion: ctx.cliVersion ?? CLI_VERSION, runtime: ctx.runtime });

  try {
    await program.parseAsync(argv, { from: 'node' });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander already printed its own usage errors; ours carry a message to show
      if (err.code.startsWith('dialect-relay.')) {
        ctx.runtime.writeErr(`${err.message}\n`);
      }
      return err.exitCode;
    }
    ctx.runtime.writeErr(`${describeError(err)}\n`);
    return 1;
  }
}
