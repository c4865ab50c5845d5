import chalk from 'chalk';
import ora, { type Ora } from 'ora';

// Everything here writes to stderr: stdout belongs to the wrapped toolchain.

export function printError(message: string): void {
  console.error(chalk.red('✗'), chalk.red(message));
}

export function printWarning(message: string): void {
  console.error(chalk.yellow('⚠'), chalk.yellow(message));
}

export function printInfo(message: string): void {
  console.error(chalk.blue('ℹ'), chalk.white(message));
}

export function printStep(message: string): void {
  // Only color the arrow; allow caller to color message segments.
  console.error(chalk.blue('→'), message);
}

export function printCommand(command: string[]): void {
  console.error(chalk.gray('  $'), chalk.cyan(formatCommandLine(command)));
}

export function createSpinner(text: string): Ora {
  return ora({
    text,
    spinner: 'dots',
    color: 'cyan',
    stream: process.stderr,
  });
}

/**
 * Shell-escape a string for safe embedding in single-quoted contexts.
 * Plain words are left bare so printed commands stay readable.
 */
export function shellEscape(value: string): string {
  if (/^[A-Za-z0-9_\-./:=@%+,]+$/.test(value)) return value;
  // Replace single quotes by closing, escaping, and reopening the quote.
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function formatCommandLine(command: string[]): string {
  return command.map(shellEscape).join(' ');
}
