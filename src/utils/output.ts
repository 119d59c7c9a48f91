/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, ModuleReport, OutputFormat } from '../types.js';
import type { ChangeSetSummary } from '../changeset/summary.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  // Human-readable format
  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print per-module change set reports
 */
export function printModuleReports(reports: ModuleReport[], format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(reports, null, 2));
    return;
  }

  if (reports.length === 0) {
    console.log(chalk.gray('No modules configured'));
    return;
  }

  for (const report of reports) {
    const color = getStatusColor(report.status);
    const label = report.snapshotId ?? '(no snapshot)';
    console.log(color(`${getStatusIcon(report.status)} ${label}`), chalk.gray(report.uuid ?? '(no uuid)'));

    if (report.summary) {
      console.log(`  ${formatSummary(report.summary)}`);
    }
    if (report.error) {
      console.log(chalk.red(`  ${report.error}`));
    }
  }
}

/**
 * One-line summary of a change set, e.g. "3 actions: +5 ~2 -1 >1"
 */
export function formatSummary(summary: ChangeSetSummary): string {
  if (summary.actions === 0) {
    return chalk.gray('no changes');
  }
  return [
    `${summary.actions} action(s):`,
    chalk.green(`+${summary.created}`),
    chalk.yellow(`~${summary.modified}`),
    chalk.red(`-${summary.deleted}`),
    chalk.cyan(`>${summary.moved}`),
  ].join(' ');
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep change set output clean: verbose/debug output never goes to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

// Helper functions

function getStatusIcon(status: ModuleReport['status']): string {
  switch (status) {
    case 'changed':
      return '~';
    case 'up-to-date':
      return '=';
    case 'failed':
      return '✗';
  }
}

function getStatusColor(status: ModuleReport['status']): typeof chalk.green {
  switch (status) {
    case 'changed':
      return chalk.yellow;
    case 'up-to-date':
      return chalk.green;
    case 'failed':
      return chalk.red;
  }
}
