import { isEmptyCredential } from './types';
import type { Credential } from './types';

/**
 * Build an `Authorization` header value for a resolved credential.
 * Returns undefined for the empty record.
 */
export function toBasicAuthHeader(credential: Credential): string | undefined {
  if (isEmptyCredential(credential)) return undefined;
  const encoded = Buffer.from(`${credential.username}:${credential.password}`, 'utf8').toString('base64');
  return `Basic ${encoded}`;
}

export function maskPassword(password: string): string {
  return password ? '*'.repeat(8) : '';
}
