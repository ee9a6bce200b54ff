/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { BatchSummary, JobReport, JobStatus } from '@reeldrop/core';

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printTable(data: Record<string, unknown>[]): void {
  if (data.length === 0) {
    printInfo('No data to display');
    return;
  }
  console.table(data);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

const statusColors: Record<JobStatus, (text: string) => string> = {
  PENDING: chalk.gray,
  RUNNING: chalk.blue,
  DONE: chalk.green,
  FAILED: chalk.red,
  PAUSED: chalk.yellow,
  SKIPPED: chalk.gray,
};

export function formatStatus(status: JobStatus): string {
  return statusColors[status](status);
}

function formatReport(report: JobReport): string {
  const reason = report.reason ? chalk.gray(` (${report.reason})`) : '';
  return `${formatStatus(report.status)} ${report.filename}${reason}`;
}

export function printSummary(summary: BatchSummary): void {
  printHeader('Batch Summary');
  printKeyValue('Total', summary.total);
  for (const status of ['DONE', 'SKIPPED', 'FAILED', 'PAUSED'] as const) {
    printKeyValue(status.toLowerCase(), summary.counts[status]);
  }

  if (summary.halted) {
    console.log();
    printWarning(`Admissions halted: ${summary.haltReason ?? 'rate limited'}`);
  }

  if (summary.notDone.length > 0) {
    printHeader('Not downloaded');
    for (const report of summary.notDone) {
      console.log(`  ${formatReport(report)}`);
    }
  }
  console.log();
}
