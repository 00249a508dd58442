/**
 * Local tool detection
 */

import { spawnSync } from 'child_process';
import { shellEscape } from './shell';

/**
 * Check if a command exists on the system
 */
export function commandExists(command: string): boolean {
  const result = spawnSync('sh', ['-c', `command -v ${shellEscape(command)}`], {
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe']
  });
  return result.status === 0;
}
