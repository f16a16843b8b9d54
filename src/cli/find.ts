/**
 * `host-auth find <target>` subcommand.
 *
 * Prints the credential that would be used for a URL or host:
 *   --header         print the Authorization header value instead
 *   --json           print the record as JSON
 *   --require        exit 1 when nothing matches
 */

import { Command } from 'commander';
import chalk from 'chalk';

import {
  findAuthForHost,
  isEmptyCredential,
  maskPassword,
  toBasicAuthHeader,
} from '../credentials';
import type { Credential } from '../credentials';
import { AppError, ErrorCode } from '../errors/types';
import { handleError } from '../errors/handler';
import { logger } from '../utils/logger';
import { isDebug, isQuiet, outputJson, outputResult } from '../utils/output';

export interface FindOptions {
  gitCredentials?: string;
  netrc?: string;
  showPassword?: boolean;
  header?: boolean;
  json?: boolean;
  require?: boolean;
}

function formatCredential(credential: Credential, showPassword: boolean): string[] {
  const password = showPassword ? credential.password : maskPassword(credential.password);
  return [
    `${chalk.dim('Scope:')}    ${credential.scope || chalk.italic('(default)')}`,
    `${chalk.dim('Username:')} ${credential.username}`,
    `${chalk.dim('Password:')} ${password}`,
  ];
}

export async function runFind(target: string, options: FindOptions): Promise<void> {
  if (!target.trim()) {
    throw new AppError('Target is empty', ErrorCode.INVALID_TARGET, { target }, false);
  }

  const credential = await findAuthForHost(target, {
    gitCredentialsPath: options.gitCredentials,
    netrcPath: options.netrc,
  });

  if (isEmptyCredential(credential)) {
    if (options.require) {
      throw new AppError(`No credentials found for ${target}`, ErrorCode.NO_CREDENTIAL_FOUND, { target }, false);
    }
    if (options.json) {
      outputJson(null);
    } else if (!isQuiet()) {
      logger.warn(`No credentials found for ${target}`);
    }
    return;
  }

  if (options.header) {
    outputResult(toBasicAuthHeader(credential) ?? '');
    return;
  }

  if (options.json) {
    outputJson({
      scope: credential.scope,
      username: credential.username,
      password: options.showPassword ? credential.password : maskPassword(credential.password),
    });
    return;
  }

  for (const line of formatCredential(credential, options.showPassword ?? false)) {
    outputResult(line);
  }
}

export function createFindCommand(): Command {
  return new Command('find')
    .description('Find Basic auth credentials for a URL or host')
    .argument('<target>', 'URL or host to look up')
    .option('--git-credentials <path>', 'Path to the git-credentials file')
    .option('--netrc <path>', 'Path to the netrc file')
    .option('--show-password', 'Print the password in clear text')
    .option('--header', 'Print the Authorization header value')
    .option('--json', 'Output as JSON')
    .option('--require', 'Exit with an error when no credentials match')
    .action(async (target: string, options: FindOptions) => {
      try {
        await runFind(target, options);
      } catch (error) {
        handleError(error, isDebug());
        process.exit(1);
      }
    });
}
