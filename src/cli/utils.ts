import chalk from 'chalk';

import type { Report } from '../types/detection.types.js';

/** Width of divider lines and headers */
const LINE_WIDTH = 60;

// Styling helpers
export const styles = {
  header: (text: string) => chalk.bold.cyan(`\n${'═'.repeat(LINE_WIDTH)}\n  ${text}\n${'═'.repeat(LINE_WIDTH)}\n`),
  success: (text: string) => chalk.green(`✓ ${text}`),
  error: (text: string) => chalk.red(`✗ ${text}`),
  info: (text: string) => chalk.blue(`ℹ ${text}`),
  warn: (text: string) => chalk.yellow(`⚠ ${text}`),
  dim: (text: string) => chalk.dim(text),
  label: (label: string, value: string) => `${chalk.gray(label + ':')} ${chalk.white(value)}`,
};

export function printHeader(title: string): void {
  console.log(styles.header(title));
}

export function printError(message: string): void {
  console.error(styles.error(message));
}

export function printInfo(message: string): void {
  console.log(styles.info(message));
}

export function printWarn(message: string): void {
  console.log(styles.warn(message));
}

export function printLabel(label: string, value: string | number): void {
  console.log(styles.label(label, String(value)));
}

export function printDivider(): void {
  console.log(chalk.gray('─'.repeat(LINE_WIDTH)));
}

/**
 * Format file size in human readable format
 */
export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(2)} ${units[unitIndex]}`;
}

/**
 * One line per frame, e.g. "frame_00002.jpg  @1s  3" or the error kind
 */
export function formatOutcomeLine(outcome: Report['outcomes'][number]): string {
  const head = `${outcome.name}  @${outcome.timestamp}s`;
  if (outcome.status === 'success') {
    return `${head}  ${outcome.count}`;
  }
  const retries = outcome.attempts > 1 ? ` after ${outcome.attempts} attempts` : '';
  return `${head}  ${outcome.error.kind}${retries}: ${outcome.error.message}`;
}

/**
 * Print a human-readable report summary
 */
export function printReport(report: Report): void {
  printHeader(report.partial ? 'Partial Report (cancelled)' : 'Report');

  for (const outcome of report.outcomes) {
    const line = formatOutcomeLine(outcome);
    console.log(outcome.status === 'success' ? styles.success(line) : styles.error(line));
  }

  printDivider();
  printLabel('Frames', `${report.framesProcessed}/${report.totalFrames} processed`);
  printLabel('Failed', report.failedFrameCount);
  printLabel('Total detections', report.totalDetections);
  printLabel('Average per frame', report.averagePerFrame.toFixed(2));
}
