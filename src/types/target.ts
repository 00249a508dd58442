/**
 * Remote target and key type definitions
 */

/**
 * Remote host a key is registered on
 */
export interface Target {
  readonly host: string;
  readonly port: number;
  readonly user?: string;
}

/**
 * Target as written on the command line, before the port is known
 */
export type TargetAddress = Omit<Target, 'port'>;

/**
 * Public key read from a local file
 */
export interface KeyMaterial {
  readonly path: string;
  /** First non-empty line of the file, trimmed */
  readonly content: string;
  /** Base64 key body (second field of the key line); empty when the line has none */
  readonly fingerprint: string;
}

/**
 * Remote command execution result
 */
export interface RemoteExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Options for a single remote invocation
 */
export interface RemoteExecOptions {
  /** Data written to the remote command's standard input */
  input?: string;
  /** Fail instead of prompting for a password or passphrase */
  batchMode?: boolean;
  /** Connect timeout in seconds */
  connectTimeout?: number;
}

/**
 * Destination string understood by ssh (user@host or host)
 */
export function formatDestination(target: Target): string {
  return target.user ? `${target.user}@${target.host}` : target.host;
}
