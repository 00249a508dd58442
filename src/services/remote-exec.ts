/**
 * Remote command execution capability
 */

import type { Target, RemoteExecOptions, RemoteExecResult } from '../types';
import { sshExec } from '../utils/ssh';

export interface RemoteExec {
  exec(target: Target, command: string, options?: RemoteExecOptions): RemoteExecResult;
}

export const sshRemoteExec: RemoteExec = {
  exec(target, command, options) {
    return sshExec(target, command, options);
  },
};
