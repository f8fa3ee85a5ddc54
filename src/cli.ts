#!/usr/bin/env node
/**
 * deny-ledger command line.
 *
 *   deny-ledger run --start <date> --end <date> [--sources a,b] [--max-records n] [--parallel] [--verbose]
 *   deny-ledger serve [--port n]
 *
 * Exit codes: 0 success or partial failure, 1 every source failed,
 * 2 invalid arguments or configuration.
 */

import * as dotenv from 'dotenv';
import { normalizeTimestamp } from './classification/classifier';
import { buildSources, loadConfig } from './config/config';
import { SOURCE_KIND_LABELS, SOURCE_KIND_ORDER, SourceKind, parseSourceKind } from './domain/deny-event';
import { ExtractionError, errorDomain } from './domain/errors';
import { ExitCode, TimeWindow } from './domain/run';
import { formatSummary } from './engine/summary';
import { LogLevel, logger, setLogLevel } from './logger';
import { RuntimeOverrides, createRuntime } from './runtime';
import { createApp, createAppContext } from './server';

export type CliCommand =
  | {
      command: 'run';
      window: TimeWindow;
      sources?: SourceKind[];
      maxRecords?: number;
      parallel: boolean;
      verbose: boolean;
    }
  | { command: 'serve'; port?: number; verbose: boolean }
  | { command: 'help' };

export type CliParseResult = { success: true; value: CliCommand } | { success: false; error: string };

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parseArg(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index >= 0 && index + 1 < args.length && !args[index + 1].startsWith('--')) {
    return args[index + 1];
  }
  return undefined;
}

/** First of the named options given without a value. */
function missingValue(args: string[], names: readonly string[]): string | undefined {
  return names.find((name) => args.includes(`--${name}`) && parseArg(args, name) === undefined);
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

function parsePositiveInt(value: string): number | undefined {
  if (!/^\d+$/.test(value.trim())) return undefined;
  const n = Number.parseInt(value, 10);
  return n > 0 ? n : undefined;
}

export function helpText(): string {
  return [
    'Usage: deny-ledger <command> [options]',
    '',
    'Commands:',
    '  run     Extract deny events for a time window',
    '  serve   Start the HTTP API',
    '',
    'Run options:',
    '  --start <date>        Window start (inclusive), ISO date or timestamp',
    '  --end <date>          Window end (exclusive)',
    `  --sources <a,b>       Subset of: ${SOURCE_KIND_ORDER.map((k) => SOURCE_KIND_LABELS[k]).join(', ')}`,
    '  --max-records <n>     Per-source record cap',
    '  --parallel            Run sources concurrently',
    '  --verbose             Debug logging',
    '',
    'Serve options:',
    '  --port <n>            Listen port (default: PORT or 5000)',
  ].join('\n');
}

/** Parse argv (without node and script). Pure; never exits. */
export function parseCliArgs(args: string[]): CliParseResult {
  const [command, ...rest] = args;
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return { success: true, value: { command: 'help' } };
  }

  if (command === 'serve') {
    const missing = missingValue(rest, ['port']);
    if (missing) return { success: false, error: `Missing value for --${missing}` };
    const portArg = parseArg(rest, 'port');
    let port: number | undefined;
    if (portArg !== undefined) {
      port = parsePositiveInt(portArg);
      if (port === undefined || port > 65535) {
        return { success: false, error: `Invalid --port: ${portArg}` };
      }
    }
    return { success: true, value: { command: 'serve', port, verbose: hasFlag(rest, 'verbose') } };
  }

  if (command !== 'run') {
    return { success: false, error: `Unknown command: ${command}` };
  }

  const missing = missingValue(rest, ['start', 'end', 'sources', 'max-records']);
  if (missing) return { success: false, error: `Missing value for --${missing}` };

  const startArg = parseArg(rest, 'start');
  const endArg = parseArg(rest, 'end');
  if (!startArg || !endArg) {
    return { success: false, error: 'Both --start and --end are required' };
  }
  const start = normalizeTimestamp(startArg);
  if (!start) return { success: false, error: `Invalid --start: ${startArg}` };
  const end = normalizeTimestamp(endArg);
  if (!end) return { success: false, error: `Invalid --end: ${endArg}` };

  let sources: SourceKind[] | undefined;
  const sourcesArg = parseArg(rest, 'sources');
  if (sourcesArg !== undefined) {
    sources = [];
    for (const name of sourcesArg.split(',').filter((s) => s.trim().length > 0)) {
      const kind = parseSourceKind(name);
      if (!kind) return { success: false, error: `Unknown source: ${name.trim()}` };
      if (!sources.includes(kind)) sources.push(kind);
    }
    if (sources.length === 0) return { success: false, error: '--sources names no source' };
  }

  let maxRecords: number | undefined;
  const maxArg = parseArg(rest, 'max-records');
  if (maxArg !== undefined) {
    maxRecords = parsePositiveInt(maxArg);
    if (maxRecords === undefined) return { success: false, error: `Invalid --max-records: ${maxArg}` };
  }

  return {
    success: true,
    value: {
      command: 'run',
      window: { start: new Date(start), end: new Date(end) },
      ...(sources ? { sources } : {}),
      ...(maxRecords !== undefined ? { maxRecords } : {}),
      parallel: hasFlag(rest, 'parallel'),
      verbose: hasFlag(rest, 'verbose'),
    },
  };
}

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  overrides?: RuntimeOverrides;
}

/** Run the CLI and return the exit code. */
export async function main(args: string[], options: MainOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO;
  const parsed = parseCliArgs(args);
  if (!parsed.success) {
    io.err(`Error: ${parsed.error}`);
    io.err(helpText());
    return ExitCode.InvalidArguments;
  }
  const cmd = parsed.value;
  if (cmd.command === 'help') {
    io.out(helpText());
    return ExitCode.Success;
  }

  const loaded = loadConfig(options.env ?? process.env);
  if (!loaded.valid) {
    io.err('Invalid configuration:');
    for (const error of loaded.errors) io.err(`  ${error}`);
    return ExitCode.InvalidArguments;
  }
  const config = loaded.config;
  setLogLevel(cmd.verbose ? LogLevel.Debug : config.logLevel);

  if (cmd.command === 'serve') {
    const runtime = await createRuntime(config, options.overrides);
    const app = createApp(createAppContext({
      sources: runtime.sources,
      createOrchestrator: runtime.createOrchestrator,
      logger: options.overrides?.logger,
    }));
    const port = cmd.port ?? config.port;
    app.listen(port, () => {
      logger.info('Server listening', { port, sources: runtime.sources.map((s) => s.sourceKind) });
    });
    return ExitCode.Success;
  }

  const built = buildSources(config, {
    only: cmd.sources,
    maxRecords: cmd.maxRecords,
    endpointFactory: options.overrides?.endpointFactory,
  });
  if (!built.success) {
    for (const error of built.errors) io.err(`Error: ${error}`);
    return ExitCode.InvalidArguments;
  }

  const runtime = await createRuntime(
    { ...config, executionMode: cmd.parallel ? 'parallel' : config.executionMode },
    options.overrides,
  );

  try {
    const summary = await runtime.createOrchestrator().run({ window: cmd.window, sources: built.sources });
    io.out(formatSummary(summary));
    return summary.exitCode;
  } catch (err) {
    if (err instanceof ExtractionError) {
      io.err(`Error: ${err.message}`);
      const domain = errorDomain(err.typedError);
      return domain === 'VALIDATION' || domain === 'CONFIG' ? ExitCode.InvalidArguments : ExitCode.Fatal;
    }
    throw err;
  }
}

if (require.main === module) {
  dotenv.config();
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error('Fatal error', { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = ExitCode.Fatal;
    });
}
