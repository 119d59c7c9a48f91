#!/usr/bin/env node
/**
 * req-sync CLI - Reconcile a requirements model with tracker snapshots
 *
 * Commands:
 * - diff: Calculate the change set that brings the model in line with the snapshots
 * - check: Report which modules are out of sync
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext } from './types.js';
import { diffCommand, checkCommand } from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { formatError } from './changeset/errors.js';
import { DEFAULT_CONFIG_PATH } from './config/index.js';

const VERSION = '0.1.0';

interface DiffCliOptions {
  snapshot: string;
  model?: string;
  output?: string;
}

interface CheckCliOptions {
  snapshot: string;
  model?: string;
}

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
  };
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('req-sync')
  .description('Reconcile a requirements model with tracker snapshots')
  .version(VERSION)
  // Global options available to all commands
  .addOption(
    new Option('-c, --config <path>', 'Configuration file')
      .env('REQ_SYNC_CONFIG')
      .default(DEFAULT_CONFIG_PATH)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * diff command - Calculate the change set
 */
program
  .command('diff')
  .description('Calculate the change actions for every configured module')
  .requiredOption('-s, --snapshot <path>', 'Tracker snapshot file (YAML)')
  .option('-m, --model <path>', 'Model dump file (YAML), overrides model.path')
  .option('-o, --output <path>', 'Write the change set to a file')
  .action(async (cmdOpts: DiffCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await diffCommand(ctx, {
        snapshot: cmdOpts.snapshot,
        model: cmdOpts.model,
        output: cmdOpts.output,
      });

      if (ctx.outputFormat === 'json' || !result.success) {
        printResult(result, ctx.outputFormat);
      }

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Diff failed: ${formatError(err)}`);
      process.exit(1);
    }
  });

/**
 * check command - Report modules that are out of sync
 */
program
  .command('check')
  .description('Exit non-zero when any configured module is out of sync')
  .requiredOption('-s, --snapshot <path>', 'Tracker snapshot file (YAML)')
  .option('-m, --model <path>', 'Model dump file (YAML), overrides model.path')
  .action(async (cmdOpts: CheckCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await checkCommand(ctx, {
        snapshot: cmdOpts.snapshot,
        model: cmdOpts.model,
      });

      printResult(result, ctx.outputFormat);

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Check failed: ${formatError(err)}`);
      process.exit(1);
    }
  });

// Parse and execute
program.parse();
