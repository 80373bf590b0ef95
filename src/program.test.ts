import type { ReportConfig } from '@/types';
import { describe, expect, it, vi } from 'vitest';
import type { ReportDeps } from './handler';
import { createProgram } from './program';
import { MemoryWriter } from './test/memory-writer';

const client = {
  getCostAndUsage: vi.fn(() => ({ promise: () => Promise.resolve({}) })),
};

const setup = (exitCode = 0) => {
  const run = vi.fn(async (_config: ReportConfig, _deps: ReportDeps) => exitCode);
  const createClient = vi.fn((_region: string) => client);
  const exit = vi.fn((_code: number) => undefined);
  const program = createProgram({ run, createClient, writer: new MemoryWriter(), env: {}, exit })
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
  return { run, createClient, exit, program };
};

describe('createProgram', () => {
  it.each(['0', 'abc', '2.5'])('rejects --days %s before creating a client', async (value) => {
    const { run, createClient, program } = setup();

    await expect(program.parseAsync(['--days', value], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.invalidArgument',
      exitCode: 1,
    });
    expect(createClient).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
  });

  it('runs a 30 day json report in us-east-1 for --json', async () => {
    const { run, createClient, exit, program } = setup();

    await program.parseAsync(['--json'], { from: 'user' });

    expect(createClient).toHaveBeenCalledWith('us-east-1');
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toEqual({
      mode: 'json',
      days: 30,
      region: 'us-east-1',
      color: true,
    });
    expect(run.mock.calls[0][1].client).toBe(client);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('passes days, region and color through to the report', async () => {
    const { run, program } = setup();

    await program.parseAsync(['--days', '7', '--region', 'eu-west-1', '--no-color'], {
      from: 'user',
    });

    expect(run.mock.calls[0][0]).toEqual({
      mode: 'human',
      days: 7,
      region: 'eu-west-1',
      color: false,
    });
  });

  it('hands the report exit code to exit', async () => {
    const { exit, program } = setup(1);

    await program.parseAsync([], { from: 'user' });

    expect(exit).toHaveBeenCalledWith(1);
  });
});
