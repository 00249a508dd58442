import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CommanderError } from 'commander';
import { homedir } from 'os';
import { join } from 'path';
import { createProgram } from '../program';
import { terminalDecisions, unattendedDecisions } from '../commands/prompts';
import type { RegisterArgs, RegistrarDecisions } from '../services';
import type { AuthkeyConfig } from '../schemas';
import type { ResolvedConfig } from '../utils/config';

interface Harness {
  parse(argv: string[]): Promise<unknown>;
  runs: RegisterArgs[];
  factoryCalls: Array<{ config: ResolvedConfig; decisions: RegistrarDecisions }>;
  stderr: () => string;
}

function createHarness(config: AuthkeyConfig = {}, status = 0): Harness {
  const runs: RegisterArgs[] = [];
  const factoryCalls: Harness['factoryCalls'] = [];
  let errOutput = '';

  const program = createProgram({
    loadConfig: () => config,
    createRegistrar: (resolved, decisions) => {
      factoryCalls.push({ config: resolved, decisions });
      return {
        run: async (args: RegisterArgs) => {
          runs.push(args);
          return status;
        },
      };
    },
  });

  program.exitOverride().configureOutput({
    writeOut: () => {},
    writeErr: (text) => {
      errOutput += text;
    },
  });

  return {
    parse: (argv) => program.parseAsync(argv, { from: 'user' }),
    runs,
    factoryCalls,
    stderr: () => errOutput,
  };
}

async function commanderError(promise: Promise<unknown>): Promise<CommanderError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a CommanderError');
}

describe('authkey program', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it('builds arguments with defaults', async () => {
    const harness = createHarness();

    await harness.parse(['deploy@example.test']);

    expect(harness.runs).toEqual([{
      target: { user: 'deploy', host: 'example.test', port: 22 },
      publicKeyPath: undefined,
      generate: false,
      promptIfDuplicate: true,
      useCopyId: true,
      comment: undefined,
    }]);
    expect(harness.factoryCalls[0].decisions).toBe(terminalDecisions);
    expect(process.exitCode).toBe(0);
  });

  it('passes flags and the key path through', async () => {
    const harness = createHarness();

    await harness.parse(['-g', '-p', '2222', '-c', 'ci@runner', 'root@10.0.0.5', '~/keys/ci.pub']);

    expect(harness.runs[0]).toEqual({
      target: { user: 'root', host: '10.0.0.5', port: 2222 },
      publicKeyPath: join(homedir(), 'keys', 'ci.pub'),
      generate: true,
      promptIfDuplicate: true,
      useCopyId: true,
      comment: 'ci@runner',
    });
  });

  it('switches to unattended decisions with --no-prompt', async () => {
    const harness = createHarness();

    await harness.parse(['--no-prompt', '--no-copy-id', 'example.test']);

    expect(harness.runs[0]).toMatchObject({
      target: { host: 'example.test', port: 22 },
      promptIfDuplicate: false,
      useCopyId: false,
    });
    expect(harness.factoryCalls[0].decisions).toBe(unattendedDecisions);
  });

  it('takes defaults from the config file', async () => {
    const harness = createHarness({ port: 2200, use_copy_id: false, connect_timeout: 12 });

    await harness.parse(['deploy@example.test']);

    expect(harness.runs[0]).toMatchObject({ target: { port: 2200 }, useCopyId: false });
    expect(harness.factoryCalls[0].config.connectTimeout).toBe(12);
  });

  it('lets --port override the config file', async () => {
    const harness = createHarness({ port: 2200 });

    await harness.parse(['--port', '2022', 'deploy@example.test']);

    expect(harness.runs[0].target.port).toBe(2022);
  });

  it('sets the exit code returned by the registrar', async () => {
    const harness = createHarness({}, 1);

    await harness.parse(['deploy@example.test']);

    expect(process.exitCode).toBe(1);
  });

  it('fails when the target is missing', async () => {
    const harness = createHarness();

    const error = await commanderError(harness.parse([]));

    expect(error.code).toBe('commander.missingArgument');
    expect(error.exitCode).toBe(1);
    expect(harness.stderr()).toContain('Usage: authkey');
    expect(harness.runs).toHaveLength(0);
  });

  it('fails on too many positional arguments', async () => {
    const harness = createHarness();

    const error = await commanderError(harness.parse(['a@b', 'key.pub', 'extra']));

    expect(error.code).toBe('commander.excessArguments');
    expect(error.exitCode).toBe(1);
  });

  it('fails on an unknown flag', async () => {
    const harness = createHarness();

    const error = await commanderError(harness.parse(['--force', 'a@b']));

    expect(error.code).toBe('commander.unknownOption');
    expect(error.exitCode).toBe(1);
  });

  it('fails on an invalid port', async () => {
    const harness = createHarness();

    const error = await commanderError(harness.parse(['--port', 'ssh', 'a@b']));

    expect(error.code).toBe('commander.invalidArgument');
    expect(error.exitCode).toBe(1);
    expect(harness.stderr()).toContain('Port must be a number');
  });

  it('fails on an invalid target', async () => {
    const harness = createHarness();

    const error = await commanderError(harness.parse(['root@']));

    expect(error.code).toBe('commander.invalidArgument');
    expect(error.exitCode).toBe(1);
  });

  it('exits 0 for --help', async () => {
    const harness = createHarness();

    const error = await commanderError(harness.parse(['--help']));

    expect(error.code).toBe('commander.helpDisplayed');
    expect(error.exitCode).toBe(0);
  });
});
