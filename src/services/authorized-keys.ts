/**
 * Remote authorized_keys commands
 *
 * Key content is never interpolated into a command string: the register
 * command reads the key line from standard input, and the fingerprint used
 * by the presence check is single-quote escaped.
 */

import {
  REMOTE_SSH_DIR,
  REMOTE_AUTHORIZED_KEYS,
  REMOTE_AUTHORIZED_KEYS_TMP,
  VERIFY_TOKEN,
} from '../constants';
import { shellEscape } from '../utils/shell';

/**
 * Steps of the register command, joined with && so a failing step stops
 * everything after it. The original file is only replaced by the final mv.
 */
export const REGISTER_STEPS: readonly string[] = [
  `mkdir -p ${REMOTE_SSH_DIR}`,
  `chmod 700 ${REMOTE_SSH_DIR}`,
  `cat >> ${REMOTE_AUTHORIZED_KEYS}`,
  `chmod 600 ${REMOTE_AUTHORIZED_KEYS}`,
  `sed '/^[[:space:]]*$/d' ${REMOTE_AUTHORIZED_KEYS} | LC_ALL=C sort -u > ${REMOTE_AUTHORIZED_KEYS_TMP}`,
  `chmod 600 ${REMOTE_AUTHORIZED_KEYS_TMP}`,
  `mv -f ${REMOTE_AUTHORIZED_KEYS_TMP} ${REMOTE_AUTHORIZED_KEYS}`,
];

export const REGISTER_COMMAND = REGISTER_STEPS.join(' && ');

export const VERIFY_COMMAND = `echo ${VERIFY_TOKEN}`;

/**
 * Command exiting 0 iff the fingerprint occurs in the remote authorized_keys
 */
export function buildPresenceCheckCommand(fingerprint: string): string {
  return `grep -qF -- ${shellEscape(fingerprint)} ${REMOTE_AUTHORIZED_KEYS} 2>/dev/null`;
}

/**
 * Standard input for REGISTER_COMMAND. The leading newline terminates a
 * last line that lacks one; the resulting blank line is dropped by sed.
 */
export function buildRegisterInput(keyLine: string): string {
  return `\n${keyLine.trim()}\n`;
}
