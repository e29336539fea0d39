/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { Delta } from '../reconcilers/fleet/types.js';
import { formatDeltaSummary } from '../reconcilers/fleet/diff.js';
import type { RunOutcome, RunReport } from '../orchestrator/orchestrator.js';

/**
 * One row of `status`
 */
export interface NodeStatusRow {
  name: string;
  address: string;
  configured: boolean;
  /** Only with `--live` */
  backend?: 'present' | 'missing' | 'address-changed';
  liveAddress?: string;
}

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
 * Print a fleet delta in a human-readable format
 */
export function printDelta(delta: Delta, format: OutputFormat, fleet?: string): void {
  if (format === 'json') {
    console.log(JSON.stringify(delta, null, 2));
    return;
  }

  for (const line of formatDeltaSummary(delta, fleet).split('\n')) {
    console.log(colorDeltaLine(line));
  }
}

/**
 * Print the outcome of a reconciliation pass
 */
export function printReport(report: RunReport): void {
  const color = outcomeColor(report.outcome);
  console.log(color.bold(`\n${report.mode} ${report.fleet ?? ''}: ${report.outcome}`.replace(/\s+:/, ':')));

  const path = report.transitions.map(t => t.to).join(' → ');
  if (path) {
    console.log(chalk.gray(`  ${report.transitions[0]?.from ?? 'Init'} → ${path}`));
  }

  for (const [label, names] of [
    ['Created', report.created],
    ['Replaced', report.replaced],
    ['Destroyed', report.destroyed],
    ['Configured', report.configured],
  ] as const) {
    if (names.length > 0) {
      console.log(`  ${chalk.gray(label + ':')} ${names.join(', ')}`);
    }
  }

  if (report.error) {
    console.log(chalk.red(`  ${report.error.code ?? report.error.name}: ${report.error.message}`));
  }

  if (report.hosts.length > 0) {
    console.log(chalk.bold('\nHosts:'));
    for (const host of report.hosts) {
      console.log(`  ${host.name.padEnd(24)} ${host.address}`);
    }
  }
}

/**
 * Print recorded nodes as a table
 */
export function printFleetStatus(fleet: string, rows: NodeStatusRow[], updatedAt: string | null): void {
  console.log(chalk.bold(`\nFleet ${fleet}:\n`));
  if (rows.length === 0) {
    console.log(chalk.gray('  No nodes recorded'));
    return;
  }

  for (const row of rows) {
    const configured = row.configured ? chalk.green('configured') : chalk.yellow('pending');
    const parts = [`  ${row.name.padEnd(24)}`, row.address.padEnd(16), configured];
    if (row.backend === 'missing') {
      parts.push(chalk.red('missing from backend'));
    } else if (row.backend === 'address-changed') {
      parts.push(chalk.yellow(`backend reports ${row.liveAddress ?? '?'}`));
    } else if (row.backend === 'present') {
      parts.push(chalk.gray('present'));
    }
    console.log(parts.join(' '));
  }

  if (updatedAt) {
    console.log(chalk.gray(`\n  Last written: ${formatTimestamp(updatedAt)}`));
  }
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
  console.error(chalk.red('✗'), message);
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
    // Keep JSON output clean: verbose/debug output should never go to stdout.
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

function colorDeltaLine(line: string): string {
  const marker = line.trimStart().charAt(0);
  switch (marker) {
    case '+':
      return chalk.green(line);
    case '~':
      return chalk.yellow(line);
    case '>':
      return chalk.cyan(line);
    case '-':
      return chalk.red(line);
    case '=':
      return chalk.gray(line);
    default:
      return line.startsWith('Status:') ? chalk.bold(line) : line;
  }
}

function outcomeColor(outcome: RunOutcome): typeof chalk.green {
  switch (outcome) {
    case 'success':
      return chalk.green;
    case 'no-changes':
      return chalk.gray;
    case 'cancelled':
      return chalk.yellow;
    case 'failed':
      return chalk.red;
  }
}

function formatTimestamp(isoTimestamp: string): string {
  const date = new Date(isoTimestamp);
  return Number.isNaN(date.getTime()) ? isoTimestamp : date.toLocaleString();
}
