/**
 * Host credential resolution.
 *
 * Every call re-reads ~/.git-credentials and ~/.netrc (or the injected
 * paths), so edits to either file take effect on the next lookup.
 */

import { resolveStorePaths } from '../config';
import type { StorePathOptions } from '../config';
import { AppError, ErrorCode } from '../errors/types';
import { toAppError } from '../errors/handler';
import { logger } from '../utils/logger';
import { combineCredentials, matchCredential } from './matcher';
import { loadStoreCredentials } from './store';
import { EMPTY_CREDENTIAL, isEmptyCredential } from './types';
import type { Credential } from './types';

export type ResolveOptions = StorePathOptions;

/**
 * Find Basic auth credentials for a URL or host, trying git-credentials
 * entries first and netrc entries second.
 *
 * Never rejects: returns EMPTY_CREDENTIAL when nothing applies.
 */
export async function findAuthForHost(target: string, options: ResolveOptions = {}): Promise<Credential> {
  try {
    const paths = resolveStorePaths(options);
    const stores = await loadStoreCredentials(paths);
    const credential = matchCredential(target, combineCredentials(stores));
    logger.debug(
      isEmptyCredential(credential)
        ? `No credentials matched ${target}`
        : `Matched ${target} to scope "${credential.scope}"`,
    );
    return credential;
  } catch (error) {
    logger.debug(`Credential lookup for ${target} failed: ${toAppError(error).message}`);
    return EMPTY_CREDENTIAL;
  }
}

/**
 * Credentials for a single target, for callers that require a match.
 */
export class HostCredentialProvider {
  constructor(
    private readonly target: string,
    private readonly options: ResolveOptions = {},
  ) {}

  async isAvailable(): Promise<boolean> {
    const credential = await findAuthForHost(this.target, this.options);
    return !isEmptyCredential(credential);
  }

  async resolve(): Promise<Credential> {
    const credential = await findAuthForHost(this.target, this.options);
    if (isEmptyCredential(credential)) {
      throw new AppError(
        `No credentials found for ${this.target}`,
        ErrorCode.NO_CREDENTIAL_FOUND,
        { target: this.target },
        false,
      );
    }
    return credential;
  }
}
