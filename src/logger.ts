import chalk from 'chalk';

const DROP_PATTERN = /\b(DROP TABLE IF EXISTS)\b/;

export const log = {
  info: (msg: string) => {
    console.log(chalk.blue('ℹ') + ' ' + msg);
  },

  success: (msg: string) => {
    console.log(chalk.green('  ✓ ') + msg);
  },

  warn: (msg: string) => {
    console.log(chalk.yellow('⚠ ' + msg));
  },

  error: (msg: string) => {
    console.log(chalk.red('  ✗ ' + msg));
  },

  dim: (msg: string) => {
    console.log(chalk.gray('  ' + msg));
  },

  statement: (statement: string) => {
    console.log('  ' + statement.replace(DROP_PATTERN, chalk.magentaBright.bold('$1')));
  },

  banner: (title: string, subtitle: string) => {
    console.log(chalk.cyan.bold('\n═══════════════════════════════════════════════'));
    console.log(chalk.cyan.bold(`  ${title}`));
    console.log(chalk.cyan.bold(`  ${subtitle}`));
    console.log(chalk.cyan.bold('═══════════════════════════════════════════════\n'));
  },

  blank: () => {
    console.log();
  },
};
