import pc from 'picocolors';
import { CommanderError } from 'commander';
import {
  ConsoleEventSink,
  DEFAULT_CATEGORY_TABLE,
  DownsortError,
  ExtensionClassifier,
  Organizer,
  RootNotFoundError,
  loadCategoryTable,
  type ConsoleLike,
} from '@downsort/core';
import { loadEnvFile, parseCliEnv } from './env';
import { formatDryRunBanner, formatListing } from './listing';
import { parseArgs, resolveOptions, type CliOptions } from './options';

export const EXIT_OK = 0;
/** Missing root, bad configuration, or a category folder that cannot be created. */
export const EXIT_FATAL = 1;
/** The run finished but at least one file could not be moved. */
export const EXIT_PARTIAL = 2;

export interface RunContext {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
  out?: ConsoleLike;
  colors?: boolean;
}

function reportFatal(error: unknown, out: ConsoleLike): number {
  // The organizer already reported a missing root through its sink.
  if (error instanceof RootNotFoundError) return EXIT_FATAL;
  if (error instanceof DownsortError) {
    out.error(`[CLI] ${error.message}`);
    return EXIT_FATAL;
  }
  throw error;
}

/**
 * Runs one organize pass for the given arguments and returns the exit code.
 */
export function run(argv: string[], context: RunContext = {}): number {
  const out = context.out ?? console;
  const cwd = context.cwd ?? process.cwd();

  let options: CliOptions;
  try {
    const raw = parseArgs(argv, out);
    options = resolveOptions(raw, parseCliEnv(context.env ?? process.env), cwd, context.home);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    return reportFatal(error, out);
  }

  try {
    const table = options.configPath ? loadCategoryTable(options.configPath) : DEFAULT_CATEGORY_TABLE;
    const classifier = new ExtensionClassifier(table, { duplicates: options.duplicates });
    const sink = new ConsoleEventSink({
      quiet: options.quiet,
      colors: context.colors ?? pc.isColorSupported,
      console: out,
    });
    const organizer = new Organizer(options.root, { classifier, sink });

    if (options.simulate) {
      for (const line of formatDryRunBanner()) out.log(line);
    }

    const summary = organizer.organize({ simulate: options.simulate });

    if (options.list) {
      out.log(formatListing(organizer.listByCategory()).join('\n'));
    }

    return summary.skipped > 0 ? EXIT_PARTIAL : EXIT_OK;
  } catch (error) {
    return reportFatal(error, out);
  }
}

export function main(argv: string[]): number {
  const envPath = loadEnvFile(process.cwd());
  if (envPath) {
    console.log(`[CLI] Loaded .env from: ${envPath}`);
  }
  return run(argv);
}
