/**
 * CLI program definition
 */

import { Command } from 'commander';
import { version } from '../package.json';
import { registerKeyCommand } from './commands/register';
import type { RegisterCommandDeps } from './commands/register';
import { disableColors } from './utils/output';

export function createProgram(deps?: RegisterCommandDeps): Command {
  const program = new Command();

  program
    .name('authkey')
    .description('Install a public key in a remote host\'s authorized_keys for passwordless SSH')
    .version(version, '-V, --version', 'Show version information')
    .option('--no-color', 'Disable colored output');

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts().color === false) {
      disableColors();
    }
  });

  registerKeyCommand(program, deps);

  // Error handling
  program.showHelpAfterError();

  return program;
}
