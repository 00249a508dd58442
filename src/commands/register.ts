/**
 * Register command - install a public key on a remote host
 */

import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import { GENERATED_PUBLIC_KEY_PATH } from '../constants';
import { validatePort, validateTarget } from '../schemas';
import type { AuthkeyConfig } from '../schemas';
import {
  KeyRegistrar,
  fsKeyStore,
  sshCopyId,
  sshKeygen,
  sshRemoteExec,
} from '../services';
import type { RegisterArgs, RegistrarDecisions } from '../services';
import type { TargetAddress } from '../types';
import { expandHome, loadConfig, resolveConfig } from '../utils/config';
import type { ResolvedConfig } from '../utils/config';
import { withErrorHandler } from '../utils/errors';
import { printHeader } from '../utils/output';
import { terminalDecisions, unattendedDecisions } from './prompts';

/**
 * Options as produced by commander
 */
export interface RegisterOptions {
  generate?: boolean;
  port?: number;
  comment?: string;
  prompt: boolean;
  copyId: boolean;
}

export type RegistrarFactory = (
  config: ResolvedConfig,
  decisions: RegistrarDecisions
) => Pick<KeyRegistrar, 'run'>;

export interface RegisterCommandDeps {
  createRegistrar: RegistrarFactory;
  loadConfig: () => AuthkeyConfig;
}

export const createDefaultRegistrar: RegistrarFactory = (config, decisions) =>
  new KeyRegistrar(
    {
      remote: sshRemoteExec,
      keyStore: fsKeyStore,
      keyGen: sshKeygen,
      copyId: sshCopyId,
      decisions,
    },
    {
      defaultPublicKeyPath: config.publicKeyPath,
      generatedPublicKeyPath: GENERATED_PUBLIC_KEY_PATH,
      connectTimeout: config.connectTimeout,
    }
  );

const defaultDeps: RegisterCommandDeps = {
  createRegistrar: createDefaultRegistrar,
  loadConfig: () => loadConfig(),
};

function parsePortOption(value: string): number {
  const result = validatePort(value);
  if (!result.success) {
    throw new InvalidArgumentError(result.error);
  }
  return result.data;
}

function parseTargetArgument(value: string): TargetAddress {
  const result = validateTarget(value);
  if (!result.success) {
    throw new InvalidArgumentError(result.error);
  }
  return result.data;
}

/**
 * Combine parsed command-line values with config defaults
 */
export function buildRegisterArgs(
  address: TargetAddress,
  publicKeyPath: string | undefined,
  options: RegisterOptions,
  config: ResolvedConfig
): RegisterArgs {
  return {
    target: { ...address, port: options.port ?? config.port },
    publicKeyPath: publicKeyPath ? expandHome(publicKeyPath) : undefined,
    generate: options.generate ?? false,
    promptIfDuplicate: options.prompt,
    useCopyId: options.copyId && config.useCopyId,
    comment: options.comment,
  };
}

/**
 * Configure the program as the register command
 */
export function registerKeyCommand(program: Command, deps: RegisterCommandDeps = defaultDeps): void {
  program
    .argument('<target>', 'Remote user and host (e.g. user@192.168.1.100)', parseTargetArgument)
    .argument('[public-key-path]', 'Public key to install (default: ~/.ssh/id_rsa.pub)')
    .option('-g, --generate', 'Generate a new ed25519 key pair before sending it')
    .option('-p, --port <port>', 'SSH port (default: 22)', parsePortOption)
    .option('-c, --comment <text>', 'Comment for a generated key')
    .option('--no-prompt', 'Never ask: keep existing keys and continue past duplicates')
    .option('--no-copy-id', 'Never delegate to ssh-copy-id')
    .allowExcessArguments(false)
    .addHelpText('after', `
Examples:
  $ authkey root@192.168.1.100
  $ authkey user@example.com ~/.ssh/id_ed25519.pub
  $ authkey -g -p 2222 deploy@example.com`)
    .action(withErrorHandler(async (
      address: TargetAddress,
      publicKeyPath: string | undefined,
      options: RegisterOptions
    ) => {
      const config = resolveConfig(deps.loadConfig());
      const args = buildRegisterArgs(address, publicKeyPath, options, config);
      const decisions = options.prompt ? terminalDecisions : unattendedDecisions;

      printHeader('SSH Key Registration');

      const registrar = deps.createRegistrar(config, decisions);
      process.exitCode = await registrar.run(args);
    }));
}
