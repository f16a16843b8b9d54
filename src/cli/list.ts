/**
 * `host-auth list` subcommand.
 *
 * Lists the records of both stores in match order, passwords masked.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { resolveStorePaths } from '../config';
import { loadStoreCredentials, maskPassword } from '../credentials';
import type { Credential } from '../credentials';
import { handleError } from '../errors/handler';
import { isDebug, normalLog, outputJson, outputResult } from '../utils/output';

export interface ListOptions {
  gitCredentials?: string;
  netrc?: string;
  json?: boolean;
}

function masked(credential: Credential): Credential {
  return { ...credential, password: maskPassword(credential.password) };
}

function printSection(title: string, filePath: string, credentials: Credential[]): void {
  normalLog(chalk.bold(title), chalk.dim(filePath));
  if (credentials.length === 0) {
    normalLog(chalk.dim('  (no entries)'));
    return;
  }
  for (const credential of credentials) {
    const scope = credential.scope || chalk.italic('(default)');
    outputResult(`  ${scope}\t${credential.username}\t${maskPassword(credential.password)}`);
  }
}

export async function runList(options: ListOptions): Promise<void> {
  const paths = resolveStorePaths({
    gitCredentialsPath: options.gitCredentials,
    netrcPath: options.netrc,
  });
  const stores = await loadStoreCredentials(paths);

  if (options.json) {
    outputJson({
      gitCredentials: stores.gitCredentials.map(masked),
      netrc: stores.netrc.map(masked),
    });
    return;
  }

  printSection('git-credentials', paths.gitCredentials, stores.gitCredentials);
  normalLog('');
  printSection('netrc', paths.netrc, stores.netrc);
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List entries from the git-credentials and netrc files')
    .option('--git-credentials <path>', 'Path to the git-credentials file')
    .option('--netrc <path>', 'Path to the netrc file')
    .option('--json', 'Output as JSON')
    .action(async (options: ListOptions) => {
      try {
        await runList(options);
      } catch (error) {
        handleError(error, isDebug());
        process.exit(1);
      }
    });
}
