import { CommanderError } from 'commander';

/** Ends the current command with exit code 1; runCli turns it into the return value. */
export function failWith(command: string, message: string): never {
  throw new CommanderError(1, `dialect-relay.${command}`, message);
}
