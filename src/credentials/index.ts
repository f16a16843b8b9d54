/**
 * Host credential module.
 *
 * Barrel export for record types, store parsers, matching and resolution.
 */

export type { Credential, StoreCredentials, StoreName, StorePaths } from './types';
export { EMPTY_CREDENTIAL, createCredential, isEmptyCredential } from './types';

export { parseGitCredentials } from './git-credentials';
export { NetrcParser, parseNetrc } from './netrc';
export type { NetrcCommand, NetrcState } from './netrc';

export { combineCredentials, matchCredential } from './matcher';
export { loadStoreCredentials, readStore } from './store';
export { findAuthForHost, HostCredentialProvider } from './resolver';
export type { ResolveOptions } from './resolver';
export { maskPassword, toBasicAuthHeader } from './basic-auth';
