import { EMPTY_CREDENTIAL } from './types';
import type { Credential, StoreCredentials } from './types';

/**
 * Concatenate store records in precedence order: git-credentials first,
 * netrc second (netrc may end with a `default` entry).
 */
export function combineCredentials(stores: StoreCredentials): Credential[] {
  return [...stores.gitCredentials, ...stores.netrc];
}

/**
 * Return the first record whose scope is empty or appears in `target`.
 *
 * First applicable wins, so a `default` record placed before a more specific
 * one shadows it. Returns EMPTY_CREDENTIAL when nothing applies.
 */
export function matchCredential(target: string, credentials: readonly Credential[]): Credential {
  const match = credentials.find((cred) => cred.scope === '' || target.includes(cred.scope));
  return match ?? EMPTY_CREDENTIAL;
}
