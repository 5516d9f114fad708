/**
 * Terminal output helpers for the CLI.
 */

import chalk from 'chalk';

/**
 * Print the querygate banner.
 */
export function printBanner(): void {
  console.log(`
${chalk.cyan.bold('  querygate')}
${chalk.gray('  safe, read-only SQL from natural language')}
`);
}

export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message, with an optional hint underneath.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

/**
 * Print a statement between rules.
 */
export function code(content: string, language?: string): void {
  const border = chalk.gray('─'.repeat(50));
  console.log(border);
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(border);
}

export function section(title: string): void {
  console.log('');
  console.log(chalk.cyan(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

export function link(text: string, url: string): void {
  console.log(`  ${chalk.blue('→')} ${text}: ${chalk.cyan.underline(url)}`);
}
