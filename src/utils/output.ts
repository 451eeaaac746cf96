import chalk from 'chalk';

export const icons = {
  success: chalk.green('✔'),
  error: chalk.red('✖'),
  warning: chalk.yellow('⚠'),
  info: chalk.blue('ℹ'),
};

export function label(text: string): string {
  return chalk.dim(text);
}

export function value(text: string): string {
  return chalk.cyan(text);
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
