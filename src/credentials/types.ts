/**
 * Credential record types shared by the store parsers and the matcher.
 *
 * A record's `scope` is the host (or host substring) it applies to. An empty
 * scope is the netrc `default` entry and applies to every target.
 */

export interface Credential {
  readonly scope: string;
  readonly username: string;
  readonly password: string;
}

export type StoreName = 'git-credentials' | 'netrc';

export interface StorePaths {
  gitCredentials: string;
  netrc: string;
}

/** Parsed records of each store, in file order. */
export interface StoreCredentials {
  gitCredentials: Credential[];
  netrc: Credential[];
}

export const EMPTY_CREDENTIAL: Credential = Object.freeze({
  scope: '',
  username: '',
  password: '',
});

export function createCredential(fields: Partial<Credential> = {}): Credential {
  return Object.freeze({
    scope: fields.scope ?? '',
    username: fields.username ?? '',
    password: fields.password ?? '',
  });
}

/**
 * True for the zero record returned when nothing matched. A default entry
 * that carries a login is not empty.
 */
export function isEmptyCredential(credential: Credential): boolean {
  return credential.scope === '' && credential.username === '' && credential.password === '';
}
