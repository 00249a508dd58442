/**
 * Application-wide constants
 */

import * as os from 'os';
import * as path from 'path';

/**
 * Default values
 */
export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_CONNECT_TIMEOUT = 5;
export const GENERATED_KEY_TYPE = 'ed25519';

/**
 * Local key paths
 */
export const LOCAL_SSH_DIR = path.join(os.homedir(), '.ssh');
export const DEFAULT_PUBLIC_KEY_PATH = path.join(LOCAL_SSH_DIR, 'id_rsa.pub');
export const GENERATED_PUBLIC_KEY_PATH = path.join(LOCAL_SSH_DIR, `id_${GENERATED_KEY_TYPE}.pub`);

/**
 * Remote paths (relative to the remote user's home, expanded by the remote shell)
 */
export const REMOTE_SSH_DIR = '~/.ssh';
export const REMOTE_AUTHORIZED_KEYS = `${REMOTE_SSH_DIR}/authorized_keys`;
export const REMOTE_AUTHORIZED_KEYS_TMP = `${REMOTE_AUTHORIZED_KEYS}.tmp`;

/**
 * Configuration file
 */
export const CONFIG_ENV_VAR = 'AUTHKEY_CONFIG';
export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.config', 'authkey', 'config.yml');

/**
 * Command printed by the remote end of the connection test
 */
export const VERIFY_TOKEN = 'ok';
