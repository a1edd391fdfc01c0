import * as os from 'os';
import * as path from 'path';
import { Command, Option } from 'commander';
import {
  ConfigError,
  DEFAULT_ROOT_DIRNAME,
  DuplicatePolicySchema,
  type ConsoleLike,
  type DuplicatePolicy,
} from '@downsort/core';
import type { CliEnv } from './env';

export interface CliOptions {
  root: string;
  simulate: boolean;
  list: boolean;
  configPath?: string;
  duplicates: DuplicatePolicy;
  quiet: boolean;
}

/** Flags as commander hands them over, before defaults are applied. */
export type RawCliOptions = {
  path?: string;
  dryRun?: boolean;
  list?: boolean;
  config?: string;
  duplicates?: string;
  quiet?: boolean;
};

export function createProgram(out: ConsoleLike = console): Command {
  return new Command()
    .name('downsort')
    .description('Organize your Downloads folder')
    .option('-p, --path <dir>', `Path to downloads folder (default: ~/${DEFAULT_ROOT_DIRNAME})`)
    .option('-d, --dry-run', 'Show what would be moved without actually moving files')
    .option('-l, --list', 'List files by category after organization')
    .option('-c, --config <file>', 'JSON category table to use instead of the built-in one')
    .addOption(
      new Option('--duplicates <policy>', 'Which category keeps an extension listed twice').choices(
        DuplicatePolicySchema.options
      )
    )
    .option('-q, --quiet', 'Only print errors and the summary')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out.log(text.trimEnd()),
      writeErr: (text) => out.error(text.trimEnd()),
    });
}

/**
 * Parses user arguments (no node/script prefix).
 * @throws CommanderError on unknown flags, bad choices, or --help
 */
export function parseArgs(argv: string[], out: ConsoleLike = console): RawCliOptions {
  const program = createProgram(out);
  program.parse(argv, { from: 'user' });
  return program.opts<RawCliOptions>();
}

/**
 * Applies defaults: flags beat environment variables, which beat built-ins.
 * Relative paths resolve against `cwd`.
 */
export function resolveOptions(raw: RawCliOptions, env: CliEnv, cwd: string, home: string = os.homedir()): CliOptions {
  const rootInput = raw.path ?? env.DOWNSORT_PATH;
  const root = rootInput ? path.resolve(cwd, rootInput) : path.join(home, DEFAULT_ROOT_DIRNAME);

  const configInput = raw.config ?? env.DOWNSORT_CONFIG;
  const configPath = configInput ? path.resolve(cwd, configInput) : undefined;

  let duplicates: DuplicatePolicy = env.DOWNSORT_DUPLICATES ?? 'last-wins';
  if (raw.duplicates !== undefined) {
    const parsed = DuplicatePolicySchema.safeParse(raw.duplicates);
    if (!parsed.success) {
      throw new ConfigError(`Unknown duplicate policy: ${raw.duplicates}`);
    }
    duplicates = parsed.data;
  }

  return {
    root,
    simulate: raw.dryRun ?? false,
    list: raw.list ?? false,
    configPath,
    duplicates,
    quiet: raw.quiet ?? false,
  };
}
