#!/usr/bin/env node
/**
 * Milestones CLI
 *
 * Usage:
 *   milestones run [-c file] [-w names...] [--dry-run]   Run workflows, resuming progress
 *   milestones status [-c file]                          Show stored progress
 *   milestones validate [-c file]                        Check configuration
 *
 * Exit codes:
 *   0   - no workflow failed
 *   1   - a workflow failed, or the configuration is invalid
 *   130 - cancelled by SIGINT/SIGTERM
 */

import 'dotenv/config';

import { access, realpath } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { Command, Option } from 'commander';

import { formatStatusLine, MilestoneEngine, type EngineDependencies, type RunReport } from './app.js';
import {
  applyOverrides,
  ConfigError,
  loadConfigFile,
  loadConfigFromEnv,
  type EngineConfig,
  type Environment,
} from './config/index.js';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CANCELLED = 130;

const DEFAULT_CONFIG_FILE = 'milestones.yaml';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  env: Environment;
  signal?: AbortSignal;
  /** Injected into the engine; tests use it to avoid the network. */
  engine?: EngineDependencies;
}

interface ConfigOptions {
  config?: string;
}

interface RunCommandOptions extends ConfigOptions {
  workflow?: string[];
  dryRun?: boolean;
  progressFile?: string;
  logLevel?: string;
}

// =============================================================================
// PROGRAM
// =============================================================================

/**
 * Parse and execute one command line. Resolves to the exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let exitCode = EXIT_OK;
  const program = new Command();

  program
    .name('milestones')
    .description('Drive long-running two-account workflows to their milestones')
    .version('0.1.0', '-v, --version', 'Show version number')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  program
    .command('run')
    .description('Run workflows until they complete, block, fail or are cancelled')
    .option('-c, --config <file>', 'YAML configuration file')
    .option('-w, --workflow <names...>', 'Only run these workflows')
    .option('--dry-run', 'Simulate every remote call; stored progress is not changed')
    .option('--progress-file <path>', 'Store progress in this JSON file')
    .addOption(new Option('--log-level <level>', 'Minimum log level').choices([...LOG_LEVELS]))
    .action(async (options: RunCommandOptions) => {
      const config = applyOverrides(await resolveConfig(options, io.env), {
        dryRun: options.dryRun,
        progressFile: options.progressFile,
        logLevel: toLogLevel(options.logLevel),
      });
      const engine = new MilestoneEngine(config, io.engine);
      const report = await engine.run({ workflows: options.workflow, signal: io.signal });
      printReport(report, io);
      exitCode = report.cancelled ? EXIT_CANCELLED : report.failed ? EXIT_FAILED : EXIT_OK;
    });

  program
    .command('status')
    .description('Show counter, thresholds and last error of every workflow')
    .option('-c, --config <file>', 'YAML configuration file')
    .action(async (options: ConfigOptions) => {
      const engine = new MilestoneEngine(await resolveConfig(options, io.env), io.engine);
      for (const line of await engine.status()) {
        io.out(formatStatusLine(line));
      }
    });

  program
    .command('validate')
    .description('Load and validate the configuration')
    .option('-c, --config <file>', 'YAML configuration file')
    .action(async (options: ConfigOptions) => {
      const config = await resolveConfig(options, io.env);
      const engine = new MilestoneEngine(config, io.engine);
      const workflows = engine.resolveWorkflows();
      io.out(`Configuration valid: ${workflows.map((w) => `${w.name} (${w.kind})`).join(', ')}`);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (isCommanderExit(error)) {
      return error.exitCode;
    }
    if (error instanceof ConfigError) {
      io.err(error.message);
      return EXIT_FAILED;
    }
    throw error;
  }
  return exitCode;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * -c wins; otherwise milestones.yaml in the working directory;
 * otherwise environment variables alone.
 */
async function resolveConfig(options: ConfigOptions, env: Environment): Promise<EngineConfig> {
  if (options.config) {
    return loadConfigFile(options.config, env);
  }
  if (await exists(DEFAULT_CONFIG_FILE)) {
    return loadConfigFile(DEFAULT_CONFIG_FILE, env);
  }
  return loadConfigFromEnv(env);
}

function printReport(report: RunReport, io: CliIO): void {
  io.out(`Run ${report.runId}${report.dryRun ? ' (dry run)' : ''}`);
  for (const workflow of report.workflows) {
    const parts = [
      `  ${workflow.workflow}: ${workflow.status}`,
      `counter=${workflow.counter}`,
      `crossed=[${workflow.crossedThresholds.join(',')}]`,
    ];
    if (workflow.newlyCrossed.length > 0) {
      parts.push(`new=[${workflow.newlyCrossed.join(',')}]`);
    }
    if (workflow.reason) {
      parts.push(`reason="${workflow.reason}"`);
    }
    if (workflow.error) {
      parts.push(`step=${workflow.stepId ?? '-'}`, `error=${workflow.error.category}:${workflow.error.code}`);
      parts.push(workflow.disposition === 'unachievable' ? 'unachievable this run' : 'resumable');
    }
    io.out(parts.join(' '));
  }
}

function toLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function isCommanderExit(error: unknown): error is { exitCode: number; code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('commander.') &&
    'exitCode' in error &&
    typeof error.exitCode === 'number'
  );
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals) => {
    console.error(`Received ${signal}; stopping at the next safe point`);
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  process.exitCode = await runCli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    env: process.env,
    signal: controller.signal,
  });
}

async function isMainModule(): Promise<boolean> {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return (await realpath(entry)) === (await realpath(fileURLToPath(import.meta.url)));
  } catch {
    return false;
  }
}

if (await isMainModule()) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
