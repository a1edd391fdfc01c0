import * as path from 'path';
import { CommanderError } from 'commander';
import { describe, expect, it, vi } from 'vitest';
import { ConfigError } from '@downsort/core';
import { parseArgs, resolveOptions } from './options';
import { parseCliEnv } from './env';

function fakeConsole() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('parseArgs', () => {
  it('reads short flags', () => {
    expect(parseArgs(['-p', 'inbox', '-d', '-l'], fakeConsole())).toEqual({
      path: 'inbox',
      dryRun: true,
      list: true,
    });
  });

  it('reads long flags', () => {
    expect(
      parseArgs(['--path', 'inbox', '--config', 'cats.json', '--duplicates', 'first-wins', '--quiet'], fakeConsole())
    ).toEqual({ path: 'inbox', config: 'cats.json', duplicates: 'first-wins', quiet: true });
  });

  it('rejects an unknown duplicate policy', () => {
    const out = fakeConsole();
    expect(() => parseArgs(['--duplicates', 'sometimes'], out)).toThrow(CommanderError);
    expect(out.error).toHaveBeenCalledTimes(1);
  });

  it('rejects unknown flags', () => {
    expect(() => parseArgs(['--recursive'], fakeConsole())).toThrow(CommanderError);
  });
});

describe('resolveOptions', () => {
  const cwd = path.join(path.sep, 'work');
  const home = path.join(path.sep, 'home', 'tester');

  it('defaults to the Downloads folder in the home directory', () => {
    expect(resolveOptions({}, {}, cwd, home)).toEqual({
      root: path.join(home, 'Downloads'),
      simulate: false,
      list: false,
      configPath: undefined,
      duplicates: 'last-wins',
      quiet: false,
    });
  });

  it('takes the root and config from the environment', () => {
    const options = resolveOptions({}, { DOWNSORT_PATH: 'inbox', DOWNSORT_CONFIG: 'cats.json' }, cwd, home);
    expect(options.root).toBe(path.join(cwd, 'inbox'));
    expect(options.configPath).toBe(path.join(cwd, 'cats.json'));
  });

  it('lets flags override the environment', () => {
    const options = resolveOptions(
      { path: '/srv/drop', duplicates: 'error', dryRun: true },
      { DOWNSORT_PATH: 'inbox', DOWNSORT_DUPLICATES: 'first-wins' },
      cwd,
      home
    );
    expect(options.root).toBe(path.resolve('/srv/drop'));
    expect(options.duplicates).toBe('error');
    expect(options.simulate).toBe(true);
  });

  it('uses the duplicate policy from the environment', () => {
    expect(resolveOptions({}, { DOWNSORT_DUPLICATES: 'first-wins' }, cwd, home).duplicates).toBe('first-wins');
  });

  it('rejects an unknown duplicate policy', () => {
    expect(() => resolveOptions({ duplicates: 'sometimes' }, {}, cwd, home)).toThrow(
      'Unknown duplicate policy: sometimes'
    );
  });
});

describe('parseCliEnv', () => {
  it('normalizes the duplicate policy and drops blank values', () => {
    expect(parseCliEnv({ DOWNSORT_DUPLICATES: ' First-Wins ', DOWNSORT_PATH: '  ', HOME: '/home/tester' })).toEqual({
      DOWNSORT_PATH: undefined,
      DOWNSORT_DUPLICATES: 'first-wins',
    });
  });

  it('rejects an unknown duplicate policy', () => {
    expect(() => parseCliEnv({ DOWNSORT_DUPLICATES: 'sometimes' })).toThrow(ConfigError);
  });
});
