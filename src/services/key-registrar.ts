/**
 * Key registration workflow
 *
 * Resolves (or generates) a public key, then makes sure it is present,
 * deduplicated and correctly permissioned in the remote user's
 * ~/.ssh/authorized_keys.
 */

import ora from 'ora';
import { printSuccess, printWarning, printInfo, printKeyValue } from '../utils/output';
import { CLIError, FATAL_EXIT_CODE, KeyGenError, RemoteExecError, reportError } from '../utils/errors';
import type { KeyMaterial, Target } from '../types';
import { formatDestination } from '../types';
import type { RemoteExec } from './remote-exec';
import type { KeyStore } from './key-store';
import { extractFingerprint, keyPairPaths, loadKeyMaterial } from './key-store';
import type { KeyGenerator } from './key-gen';
import type { CopyIdTool } from './copy-id';
import {
  REGISTER_COMMAND,
  VERIFY_COMMAND,
  buildPresenceCheckCommand,
  buildRegisterInput,
} from './authorized-keys';
import { VERIFY_TOKEN } from '../constants';

/**
 * Decisions normally taken by the user at a prompt
 */
export interface RegistrarDecisions {
  /** Replace the existing key pair at privateKeyPath? */
  confirmOverwrite(privateKeyPath: string): Promise<boolean>;
  /** Continue registering a key the target already appears to have? */
  confirmContinue(target: Target): Promise<boolean>;
  /** Comment for a newly generated key */
  keyComment(): Promise<string>;
}

export interface RegistrarDeps {
  remote: RemoteExec;
  keyStore: KeyStore;
  keyGen: KeyGenerator;
  /** Absent when the fast path must never be used */
  copyId?: CopyIdTool;
  decisions: RegistrarDecisions;
}

export interface RegistrarSettings {
  /** Used when no path is given and no key is generated */
  defaultPublicKeyPath: string;
  /** Where --generate puts the pair when no path is given */
  generatedPublicKeyPath: string;
  /** Seconds allowed to connect during verification */
  connectTimeout: number;
}

/**
 * Parsed command-line arguments
 */
export interface RegisterArgs {
  readonly target: Target;
  readonly publicKeyPath?: string;
  readonly generate: boolean;
  readonly promptIfDuplicate: boolean;
  readonly useCopyId: boolean;
  readonly comment?: string;
}

export class KeyRegistrar {
  constructor(
    private readonly deps: RegistrarDeps,
    private readonly settings: RegistrarSettings
  ) {}

  /**
   * Resolve the public key to register, generating a pair first if requested
   */
  async resolveKeyMaterial(
    explicitPath: string | undefined,
    generateRequested: boolean,
    comment?: string
  ): Promise<KeyMaterial> {
    if (!generateRequested) {
      return loadKeyMaterial(this.deps.keyStore, explicitPath ?? this.settings.defaultPublicKeyPath);
    }

    const { privateKeyPath, publicKeyPath } = keyPairPaths(
      explicitPath ?? this.settings.generatedPublicKeyPath
    );

    if (this.deps.keyStore.exists(privateKeyPath)) {
      printWarning(`SSH key already exists at ${privateKeyPath}`);
      const overwrite = await this.deps.decisions.confirmOverwrite(privateKeyPath);
      if (!overwrite) {
        printInfo('Using existing key');
        return loadKeyMaterial(this.deps.keyStore, publicKeyPath);
      }
    }

    const keyComment = comment ?? (await this.deps.decisions.keyComment());

    printInfo('Generating new SSH key...');
    const result = this.deps.keyGen.generate(privateKeyPath, keyComment);
    if (!result.success) {
      throw new KeyGenError(`Failed to generate SSH key: ${result.error.message}`, result.error);
    }
    printSuccess(`SSH key generated at ${privateKeyPath}`);

    return loadKeyMaterial(this.deps.keyStore, publicKeyPath);
  }

  /**
   * Best-effort check: substring match of the key body in authorized_keys
   */
  isKeyAlreadyPresent(target: Target, keyContent: string): boolean {
    const fingerprint = extractFingerprint(keyContent);
    if (!fingerprint) {
      return false;
    }

    const result = this.deps.remote.exec(target, buildPresenceCheckCommand(fingerprint));
    return result.exitCode === 0;
  }

  /**
   * Append the key and deduplicate the remote file in one round trip
   */
  registerKey(target: Target, key: KeyMaterial): void {
    // ssh may ask for a password on the same terminal
    const spinner = ora({
      text: `Adding SSH key to ${formatDestination(target)}...`,
      discardStdin: false,
    }).start();

    const result = this.deps.remote.exec(target, REGISTER_COMMAND, {
      input: buildRegisterInput(key.content),
    });

    if (result.exitCode !== 0) {
      spinner.fail('Failed to add SSH key');
      throw new RemoteExecError(
        `Remote registration failed with exit code ${result.exitCode}`,
        result.exitCode,
        result.stderr
      );
    }

    spinner.succeed('SSH key added');
  }

  /**
   * Non-interactive connection test. Never throws.
   */
  verifyConnection(target: Target): boolean {
    try {
      const result = this.deps.remote.exec(target, VERIFY_COMMAND, {
        batchMode: true,
        connectTimeout: this.settings.connectTimeout,
      });
      return result.exitCode === 0 && result.stdout.trim() === VERIFY_TOKEN;
    } catch {
      return false;
    }
  }

  /**
   * Full workflow. Returns the process exit status.
   */
  async run(args: RegisterArgs): Promise<number> {
    const { target } = args;

    try {
      const key = await this.resolveKeyMaterial(args.publicKeyPath, args.generate, args.comment);
      printKeyValue('Public key', key.path);

      const copyId = this.deps.copyId;
      if (args.useCopyId && copyId && copyId.isAvailable()) {
        printInfo('Using ssh-copy-id to add the key...');
        if (copyId.copy(target, key.path)) {
          printSuccess('SSH key added with ssh-copy-id');
          this.printConnectHint(target);
          return 0;
        }
        printWarning('ssh-copy-id failed, falling back to the manual method...');
      }

      printInfo('Checking whether the key is already on the server...');
      if (this.isKeyAlreadyPresent(target, key.content)) {
        printWarning('This key is already present on the server');
        if (args.promptIfDuplicate && !(await this.deps.decisions.confirmContinue(target))) {
          printInfo('Operation cancelled');
          return 0;
        }
      }

      this.registerKey(target, key);

      printInfo('Testing connection...');
      if (this.verifyConnection(target)) {
        printSuccess('Connection test succeeded');
      } else {
        printWarning('Key added, but the connection test failed');
      }

      this.printConnectHint(target);
      return 0;
    } catch (error) {
      if (error instanceof CLIError) {
        reportError(error);
        return FATAL_EXIT_CODE;
      }
      throw error;
    }
  }

  private printConnectHint(target: Target): void {
    printSuccess('Done');
    printInfo(`You can now connect with: ssh -p ${target.port} ${formatDestination(target)}`);
  }
}
