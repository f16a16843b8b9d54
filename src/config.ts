/**
 * Credential store locations.
 *
 * Resolution order per store:
 *   1. Explicit path (CLI flag or resolver option)
 *   2. Environment (NETRC / GIT_CREDENTIALS)
 *   3. File in the user's home directory
 */

import * as os from 'os';
import * as path from 'path';

import type { StorePaths } from './credentials/types';

export const GIT_CREDENTIALS_FILENAME = '.git-credentials';
export const NETRC_FILENAME = '.netrc';

export const GIT_CREDENTIALS_ENV = 'GIT_CREDENTIALS';
export const NETRC_ENV = 'NETRC';

export interface StorePathOptions {
  gitCredentialsPath?: string;
  netrcPath?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '');
}

export function resolveStorePaths(options: StorePathOptions = {}): StorePaths {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();

  return {
    gitCredentials:
      firstNonEmpty(options.gitCredentialsPath, env[GIT_CREDENTIALS_ENV]) ??
      path.join(homeDir, GIT_CREDENTIALS_FILENAME),
    netrc: firstNonEmpty(options.netrcPath, env[NETRC_ENV]) ?? path.join(homeDir, NETRC_FILENAME),
  };
}
