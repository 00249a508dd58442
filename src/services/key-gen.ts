/**
 * SSH key pair generation
 */

import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { GENERATED_KEY_TYPE } from '../constants';
import type { Result } from '../types';
import { ok, err } from '../types';

export interface KeyGenerator {
  /** Create (or replace) the pair at privateKeyPath and privateKeyPath.pub */
  generate(privateKeyPath: string, comment: string): Result<void, Error>;
}

function removeKeyPair(privateKeyPath: string): void {
  fs.rmSync(privateKeyPath, { force: true });
  fs.rmSync(`${privateKeyPath}.pub`, { force: true });
}

/**
 * ssh-keygen backed generator. Runs attached to the terminal so the user
 * can choose a passphrase.
 */
export const sshKeygen: KeyGenerator = {
  generate(privateKeyPath, comment) {
    const dir = path.dirname(privateKeyPath);
    // The existing pair is only replaced once ssh-keygen has succeeded
    const tmpPath = `${privateKeyPath}.tmp-${process.pid}`;

    try {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
      removeKeyPair(tmpPath);

      const result = spawnSync('ssh-keygen', [
        '-t', GENERATED_KEY_TYPE,
        '-C', comment,
        '-f', tmpPath
      ], {
        stdio: 'inherit'
      });

      if (result.error) {
        return err(result.error);
      }

      if (result.status !== 0) {
        return err(new Error(`ssh-keygen exited with code ${result.status ?? 'unknown'}`));
      }

      fs.renameSync(tmpPath, privateKeyPath);
      fs.renameSync(`${tmpPath}.pub`, `${privateKeyPath}.pub`);
      return ok(undefined);
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    } finally {
      removeKeyPair(tmpPath);
    }
  },
};
