/**
 * Credential store loading.
 *
 * A store that cannot be opened or read counts as empty: the failure is
 * logged at debug level and never propagated.
 */

import * as fs from 'fs/promises';

import { toAppError } from '../errors/handler';
import { logger } from '../utils/logger';
import { parseGitCredentials } from './git-credentials';
import { parseNetrc } from './netrc';
import type { StoreCredentials, StoreName, StorePaths } from './types';

/**
 * Read a store file, returning '' when it is missing or unreadable.
 * The file handle is always closed before returning.
 */
export async function readStore(filePath: string, store?: StoreName): Promise<string> {
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(filePath, 'r');
    return await handle.readFile({ encoding: 'utf8' });
  } catch (error) {
    const appError = toAppError(error);
    logger.debug(`Unable to load ${store ?? 'credential'} file ${filePath}: ${appError.toUserMessage()}`);
    return '';
  } finally {
    if (handle) {
      await handle.close().catch((error: unknown) => {
        logger.debug(`Unable to close ${filePath}: ${toAppError(error).message}`);
      });
    }
  }
}

export async function loadStoreCredentials(paths: StorePaths): Promise<StoreCredentials> {
  const [gitCredentials, netrc] = await Promise.all([
    readStore(paths.gitCredentials, 'git-credentials'),
    readStore(paths.netrc, 'netrc'),
  ]);

  return {
    gitCredentials: parseGitCredentials(gitCredentials),
    netrc: parseNetrc(netrc),
  };
}
