#!/usr/bin/env node
/**
 * ska-stream command line
 */

import { setTimeout as sleep } from 'timers/promises';
import { CheckpointManager, checkpointExpectation } from './checkpoint.js';
import { createConfig, loadConfig, mergeConfig } from './config.js';
import { isSkaError } from './errors.js';
import { configureLogger, parseLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';
import { startMCPServer } from './mcp/server.js';
import { DiscretizationEngine } from './oscillator.js';
import { StreamRunner } from './pipeline.js';
import type { StepOutput, StreamConfig } from './types.js';

// =============================================================================
// Arguments
// =============================================================================

export interface CliArgs {
  command: string | undefined;
  positional: string[];
  config: string | null;
  samples: number | null;
  logLevel: LogLevel | null;
  resume: boolean;
  realtime: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    command: argv[0],
    positional: [],
    config: null,
    samples: null,
    logLevel: null,
    resume: false,
    realtime: false,
  };

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        args.config = requireValue(argv, ++i, arg);
        break;
      case '--samples': {
        const value = Number(requireValue(argv, ++i, arg));
        if (!Number.isInteger(value) || value < 0) {
          throw new Error(`--samples expects a non-negative integer`);
        }
        args.samples = value;
        break;
      }
      case '--log-level': {
        const level = parseLogLevel(requireValue(argv, ++i, arg));
        if (level === null) {
          throw new Error(`--log-level expects debug, info, warn, error or silent`);
        }
        args.logLevel = level;
        break;
      }
      case '--resume':
        args.resume = true;
        break;
      case '--realtime':
        args.realtime = true;
        break;
      default:
        if (arg.startsWith('--')) throw new Error(`Unknown option: ${arg}`);
        args.positional.push(arg);
    }
  }
  return args;
}

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i];
  if (value === undefined) throw new Error(`${flag} expects a value`);
  return value;
}

/**
 * Effective configuration: file (or defaults), then command line overrides
 */
export async function resolveConfig(args: CliArgs): Promise<StreamConfig> {
  const base = args.config ? await loadConfig(args.config) : createConfig();
  const overrides: Record<string, Record<string, unknown>> = {};

  if (args.samples !== null) overrides.oscillator = { sampleCount: args.samples };
  if (args.resume) overrides.checkpoint = { enabled: true, resume: true };
  if (args.logLevel !== null) overrides.logging = { level: args.logLevel };

  return mergeConfig(base, overrides);
}

// =============================================================================
// Commands
// =============================================================================

async function runCommand(config: StreamConfig): Promise<number> {
  const runner = new StreamRunner(config);
  runner.on('step', (output: StepOutput) => console.log(JSON.stringify(output)));

  const onSignal = (): void => runner.stop();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const summary = await runner.run();
    console.error(JSON.stringify(summary));
    return 0;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

async function generateCommand(config: StreamConfig, realtime: boolean): Promise<number> {
  const engine = new DiscretizationEngine(config.oscillator);
  if (realtime && engine.limit === null) {
    throw new Error('--realtime needs a sample count or duration');
  }

  let stopped = false;
  const onSignal = (): void => {
    stopped = true;
  };
  process.once('SIGINT', onSignal);

  try {
    for (const sample of engine.samples()) {
      if (stopped) break;
      console.log(JSON.stringify(sample));
      if (realtime) await sleep(engine.epsilon * 1000);
    }
    return 0;
  } finally {
    process.off('SIGINT', onSignal);
  }
}

async function checkpointCommand(config: StreamConfig, positional: string[]): Promise<number> {
  const manager = new CheckpointManager(config.checkpoint, process.cwd(), checkpointExpectation(config));
  const [action, id] = positional;

  switch (action) {
    case 'list': {
      const entries = await manager.list();
      console.log(`Checkpoints in ${manager.dir}: ${entries.length}`);
      for (const e of entries) {
        console.log(`  ${e.id}  (last index ${e.lastIndex})`);
      }
      return 0;
    }

    case 'verify': {
      if (!id) throw new Error('Usage: checkpoint verify <id>');
      const result = await manager.verify(id);
      console.log(`${result.valid ? '✓' : '✗'} ${id}: ${result.details}`);
      return result.valid ? 0 : 1;
    }

    case 'restore': {
      const restored = await manager.restore();
      for (const w of restored.warnings) console.log(`  ! ${w}`);
      if (restored.status === 'cold') {
        console.log('No valid checkpoint; a run would cold-start');
        return 1;
      }
      const { checkpoint } = restored;
      console.log(`Would resume from ${checkpoint.id} at index ${checkpoint.lastIndex + 1}`);
      console.log(`  step ${checkpoint.learner.step}, knowledge ${checkpoint.learner.knowledge}`);
      console.log(`  weights [${checkpoint.learner.weights.join(', ')}]`);
      return 0;
    }

    default:
      throw new Error('Usage: checkpoint list|verify <id>|restore');
  }
}

function printHelp(): void {
  console.log(`
ska-stream - streaming oscillator with forward-only entropy learning

Commands:
  run         Stream samples through the learner, one JSON line per step
  generate    Print oscillator samples (--realtime paces them by ε seconds)
  checkpoint  list | verify <id> | restore
  config      Print the effective configuration
  mcp         Serve the Model Context Protocol on stdio
  help        Show this help

Options:
  --config <file>      JSON configuration (partial, merged over defaults)
  --samples <n>        Sample count
  --resume             Resume from the latest valid checkpoint
  --log-level <level>  debug | info | warn | error | silent
  --realtime           Pace 'generate' in wall-clock time
`);
}

// =============================================================================
// Main
// =============================================================================

export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.command === undefined || args.command === 'help') {
    printHelp();
    return 0;
  }

  const config = await resolveConfig(args);
  // stdout carries data for these commands; informational logs stay quiet unless asked for
  const dataCommand = args.command === 'run' || args.command === 'generate' || args.command === 'mcp';
  configureLogger({
    ...config.logging,
    level: args.logLevel ?? (dataCommand ? 'warn' : config.logging.level),
  });

  switch (args.command) {
    case 'run':
      return runCommand(config);
    case 'generate':
      return generateCommand(config, args.realtime);
    case 'checkpoint':
      return checkpointCommand(config, args.positional);
    case 'config':
      console.log(JSON.stringify(config, null, 2));
      return 0;
    case 'mcp':
      await startMCPServer({ config });
      return 0;
    default:
      printHelp();
      return 1;
  }
}

const isMain = import.meta.url === `file://${process.argv[1]}`;
if (isMain) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(isSkaError(error) ? `${error.code}: ${error.message}` : `Error: ${String(error)}`);
      process.exitCode = 1;
    }
  );
}
