/**
 * Interactive prompts utilities
 */

import * as os from 'os';
import * as readline from 'readline';
import { colors } from '../utils/output';
import type { RegistrarDecisions } from '../services';
import { formatDestination } from '../types';

/**
 * Create readline interface
 */
export function createRL(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });
}

/**
 * Prompt for input with default value
 */
export async function prompt(question: string, defaultValue?: string): Promise<string> {
  const rl = createRL();
  const defaultStr = defaultValue ? ` [${defaultValue}]` : '';

  return new Promise((resolve) => {
    rl.question(`${colors.info(question)}${defaultStr}: `, (answer) => {
      rl.close();
      resolve(answer.trim() || defaultValue || '');
    });
  });
}

/**
 * Prompt for yes/no confirmation
 */
export async function confirm(question: string, defaultYes = true): Promise<boolean> {
  const defaultStr = defaultYes ? 'Y/n' : 'y/N';
  const answer = await prompt(`${question} (${defaultStr})`);

  if (!answer) {
    return defaultYes;
  }

  return answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes';
}

/**
 * Default comment for generated keys
 */
export function defaultKeyComment(): string {
  return `${os.userInfo().username}@${os.hostname()}`;
}

/**
 * Decisions answered at the terminal
 */
export const terminalDecisions: RegistrarDecisions = {
  confirmOverwrite: (privateKeyPath) => confirm(`Overwrite ${privateKeyPath}?`, false),
  confirmContinue: (target) => confirm(`Add the key to ${formatDestination(target)} anyway?`, false),
  keyComment: () => prompt('Key comment (e.g. your email)', defaultKeyComment()),
};

/**
 * Decisions for --no-prompt: keep existing keys, continue past duplicates
 */
export const unattendedDecisions: RegistrarDecisions = {
  confirmOverwrite: async () => false,
  confirmContinue: async () => true,
  keyComment: async () => defaultKeyComment(),
};
