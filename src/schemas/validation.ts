/**
 * Validation utilities for the config file and command-line values
 * Provides user-friendly error messages and formatting
 */

import { z } from 'zod';
import chalk from 'chalk';
import { AuthkeyConfigSchema } from './config.schema';
import type { AuthkeyConfig } from './config.schema';
import { PortArgSchema, TargetArgSchema } from './args.schema';
import type { Result, TargetAddress } from '../types';
import { ok, err } from '../types';

/**
 * Validation error with path and message
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Format Zod path to readable string
 */
function formatPath(path: PropertyKey[]): string {
  if (path.length === 0) return 'root';

  return path.map((segment, index) => {
    if (typeof segment === 'number') {
      return `[${segment}]`;
    }
    if (typeof segment === 'symbol') {
      return `[Symbol(${segment.description ?? ''})]`;
    }
    return index === 0 ? segment : `.${segment}`;
  }).join('');
}

/**
 * Transform Zod errors to ValidationIssues
 */
function transformZodErrors(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format validation errors for console output
 */
export function formatValidationErrors(errors: ValidationIssue[], fileName: string): string {
  const lines: string[] = [
    chalk.red.bold(`Validation failed for ${fileName}`),
  ];

  for (const error of errors) {
    lines.push(chalk.yellow(`  → ${error.path}: `) + error.message);
  }

  return lines.join('\n');
}

/**
 * Validate config file content
 */
export function validateConfig(data: unknown): Result<AuthkeyConfig, ValidationIssue[]> {
  const result = AuthkeyConfigSchema.safeParse(data);

  if (result.success) {
    return ok(result.data);
  }

  return err(transformZodErrors(result.error));
}

/**
 * Validate a --port value
 */
export function validatePort(value: string): Result<number, string> {
  const result = PortArgSchema.safeParse(value);
  return result.success ? ok(result.data) : err(result.error.issues[0]?.message ?? 'Invalid port');
}

/**
 * Validate a user@host (or bare host) target
 */
export function validateTarget(value: string): Result<TargetAddress, string> {
  const result = TargetArgSchema.safeParse(value);
  if (!result.success) {
    return err(result.error.issues[0]?.message ?? 'Invalid target');
  }

  const { user, host } = result.data;
  return ok(user === undefined ? { host } : { user, host });
}
