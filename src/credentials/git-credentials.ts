/**
 * Parser for the git-credential-store file (~/.git-credentials).
 *
 * Each line: <protocol>://[<username>[:<password>]@]<host>[/<path>]
 * Only the host is kept as scope; the path is ignored.
 */

import { createCredential } from './types';
import type { Credential } from './types';

/**
 * Split file content into lines, dropping the `\r` of CRLF endings.
 */
export function splitLines(content: string): string[] {
  return content.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Host (and port) exactly as written in the line. `URL.host` would
 * lowercase it and drop default ports, which the matcher never does to
 * the target.
 */
function rawHost(line: string): string {
  const schemeEnd = line.indexOf('://');
  if (schemeEnd < 0) return '';
  const rest = line.slice(schemeEnd + 3);
  const authorityEnd = rest.search(/[/?#]/);
  const authority = authorityEnd < 0 ? rest : rest.slice(0, authorityEnd);
  return authority.slice(authority.lastIndexOf('@') + 1);
}

function parseLine(line: string): Credential | undefined {
  // Padded lines are malformed; URL would otherwise strip the padding
  if (line !== line.trim()) return undefined;

  let url: URL;
  try {
    url = new URL(line);
  } catch {
    return undefined;
  }
  const host = rawHost(line);
  if (!url.host || !host) return undefined;

  try {
    return createCredential({
      scope: host,
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password),
    });
  } catch {
    // Invalid percent escape in the userinfo
    return undefined;
  }
}

/**
 * Parse a git-credentials file into records, preserving line order.
 * Blank lines and lines that are not URLs with a host are skipped.
 */
export function parseGitCredentials(content: string): Credential[] {
  const credentials: Credential[] = [];
  for (const line of splitLines(content)) {
    if (!line) continue;
    const credential = parseLine(line);
    if (credential) credentials.push(credential);
  }
  return credentials;
}
