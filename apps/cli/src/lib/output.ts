/**
 * Output Formatter
 *
 * Console helpers shared by the commands. Colors come from chalk and are
 * dropped automatically when stdout is not a TTY.
 */

import chalk from 'chalk';

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

/**
 * Bold label followed by indented lines and a blank line
 */
export function printSection(title: string, lines: string[]): void {
  console.log(chalk.bold(`${title}:`));
  for (const line of lines) {
    console.log(`  ${line}`);
  }
  console.log();
}

export function printKeyValue(key: string, value: string | number): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

/**
 * Green for a clean verdict, yellow for a warning, red for a failed analysis
 */
export function colorSyncStatus(status: string): string {
  if (status === 'analysis failed') return chalk.red(status);
  if (status.startsWith('warning') || status === 'noticeable difference') return chalk.yellow(status);
  return chalk.green(status);
}
