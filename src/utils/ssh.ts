/**
 * SSH utilities using the native ssh command.
 * Authentication is left to the user's ssh setup (agent, config, password prompt).
 */

import { spawnSync } from 'child_process';
import type { Target, RemoteExecOptions, RemoteExecResult } from '../types';
import { formatDestination } from '../types';

/**
 * Build SSH command arguments for a target
 */
export function buildSSHArgs(target: Target, options: RemoteExecOptions = {}): string[] {
  const { batchMode = false, connectTimeout } = options;

  const args = ['-p', target.port.toString()];

  if (batchMode) {
    args.push('-o', 'BatchMode=yes');
  }

  if (connectTimeout !== undefined) {
    args.push('-o', `ConnectTimeout=${connectTimeout}`);
  }

  args.push(formatDestination(target));

  return args;
}

/**
 * Execute a command via SSH (synchronous)
 */
export function sshExec(
  target: Target,
  command: string,
  options: RemoteExecOptions = {}
): RemoteExecResult {
  const sshArgs = [...buildSSHArgs(target, options), command];

  const result = spawnSync('ssh', sshArgs, {
    encoding: 'utf-8',
    shell: false,
    input: options.input,
    stdio: [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
  });

  if (result.error) {
    return {
      stdout: '',
      stderr: `SSH command failed: ${result.error.message}`,
      exitCode: result.status ?? 255,
    };
  }

  return {
    stdout: result.stdout || '',
    stderr: result.stderr || '',
    exitCode: result.status ?? 255,
  };
}
