#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { version as pkgVersion } from '../package.json';
import { createFindCommand } from './cli/find';
import { createListCommand } from './cli/list';
import { handleError } from './errors/handler';
import { logger, LogLevel } from './utils/logger';

// Handle unhandled rejections
process.on('unhandledRejection', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

program
  .name('host-auth')
  .description(
    chalk.blue.bold('host-auth') +
    '\n\nResolve HTTP Basic credentials for a host from ~/.git-credentials and ~/.netrc.'
  )
  .version(pkgVersion, '-v, --version', 'Display version')
  .option('-d, --debug', 'Enable debug output')
  .option('-q, --quiet', 'Suppress all non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();

    if (opts.debug) {
      process.env.DEBUG = 'true';
      logger.setLevel(LogLevel.DEBUG);
    }

    if (opts.quiet) {
      process.env.QUIET = 'true';
      logger.setLevel(LogLevel.ERROR);
    }
  });

program.addCommand(createFindCommand());
program.addCommand(createListCommand());

program.on('--help', () => {
  console.log('');
  console.log(chalk.bold('Lookup order:'));
  console.log(`  1. ${chalk.cyan('~/.git-credentials')}  (or $GIT_CREDENTIALS)`);
  console.log(`  2. ${chalk.cyan('~/.netrc')}            (or $NETRC), including its default entry`);
  console.log('');
  console.log(chalk.bold('Examples:'));
  console.log('  $ host-auth find https://git.example.com/org/repo.git');
  console.log('  $ host-auth find example.com --header');
  console.log('  $ host-auth list --json');
  console.log('');
});

program.parseAsync().catch((error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});
