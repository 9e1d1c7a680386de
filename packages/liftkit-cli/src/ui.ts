import chalk from 'chalk';
import type { ProjectDiffSummary } from '@liftkit/diff-engine';
import type { BatchReport } from './types.js';

export function success(msg: string): void {
  console.log(chalk.green('  ✓') + ' ' + msg);
}

export function warn(msg: string): void {
  console.log(chalk.yellow('  ✗') + ' ' + msg);
}

export function info(msg: string): void {
  console.log(chalk.dim('  ~') + ' ' + msg);
}

export function step(msg: string): void {
  console.log(chalk.cyan('  →') + ' ' + msg);
}

export function fail(msg: string): void {
  console.error(chalk.red('Error:') + ' ' + msg);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

export function scanSummary(summary: ProjectDiffSummary): void {
  const totals = summary.summary;
  console.log();
  console.log(chalk.bold('  Scan Summary'));
  console.log(chalk.dim('  ─────────────────────────────────────'));
  console.log(`  Files:    ${totals.total_files_analyzed} analyzed, ${totals.total_files_modified} modified`);
  console.log(
    chalk.green(`  Added:    ${plural(totals.total_lines_added, 'line')}`)
  );
  console.log(
    chalk.red(`  Removed:  ${plural(totals.total_lines_removed, 'line')}`)
  );
  console.log(chalk.dim(`  Average similarity: ${totals.average_diff_ratio}%`));

  if (summary.most_modified_files.length > 0) {
    console.log();
    console.log(chalk.dim('  Most modified:'));
    for (const file of summary.most_modified_files) {
      console.log(`    ${file.filename} ${chalk.dim(`(+${file.added} -${file.removed})`)}`);
    }
  }

  if (summary.failed_files.length > 0) {
    console.log();
    console.log(chalk.yellow(`  ${plural(summary.failed_files.length, 'file')} could not be compared:`));
    for (const failure of summary.failed_files.slice(0, 20)) {
      console.log(chalk.yellow(`    ! ${failure.filename}: ${failure.error}`));
    }
    if (summary.failed_files.length > 20) {
      console.log(chalk.dim(`    ... and ${summary.failed_files.length - 20} more`));
    }
  }
  console.log();
}

export function batchSummary(report: BatchReport): void {
  console.log();
  console.log(chalk.bold('  Batch Summary'));
  console.log(chalk.dim('  ─────────────────────────────────────'));
  console.log(chalk.green(`  Succeeded: ${report.successful}`));
  console.log(
    report.failed > 0 ? chalk.red(`  Failed:    ${report.failed}`) : chalk.dim(`  Failed:    ${report.failed}`)
  );
  console.log(chalk.dim(`  Duration:  ${(report.durationMs / 1000).toFixed(2)}s`));
  console.log();
}
