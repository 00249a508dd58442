/**
 * Optional ssh-copy-id fast path
 */

import { spawnSync } from 'child_process';
import type { Target } from '../types';
import { formatDestination } from '../types';
import { commandExists } from '../utils/dependencies';

export interface CopyIdTool {
  isAvailable(): boolean;
  /** Install the public key on the target; true on success */
  copy(target: Target, publicKeyPath: string): boolean;
}

export const sshCopyId: CopyIdTool = {
  isAvailable() {
    return commandExists('ssh-copy-id');
  },

  copy(target, publicKeyPath) {
    const result = spawnSync('ssh-copy-id', [
      '-i', publicKeyPath,
      '-p', target.port.toString(),
      formatDestination(target)
    ], {
      stdio: 'inherit',
      shell: false
    });

    return !result.error && result.status === 0;
  },
};
