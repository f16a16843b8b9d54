/**
 * Parser for ~/.netrc, following the tokenizer curl used before 7.84.0:
 * whitespace-separated tokens, no quoting, `#` comments to end of line and
 * `macdef` bodies terminated by an empty line.
 *
 * Runs of spaces or tabs count as one separator, so `machine  foo.com`
 * scopes to `foo.com`. A blank line ends a pending `login`/`password`/...
 * with an empty value.
 */

import { splitLines } from './git-credentials';
import { createCredential } from './types';
import type { Credential } from './types';

export type NetrcCommand = 'machine' | 'login' | 'password' | 'account';

export type NetrcState =
  | { kind: 'scanning' }
  | { kind: 'awaiting-value'; command: NetrcCommand }
  | { kind: 'macro-skip' };

interface MachineDraft {
  scope: string;
  username: string;
  password: string;
  account: string;
}

const SCANNING: NetrcState = { kind: 'scanning' };

export class NetrcParser {
  private state: NetrcState = SCANNING;
  private draft: MachineDraft | undefined;
  private readonly credentials: Credential[] = [];

  getState(): NetrcState {
    return this.state;
  }

  /**
   * Feed one line of the file (without its line terminator).
   */
  feedLine(line: string): void {
    if (this.state.kind === 'macro-skip') {
      if (line === '') this.state = SCANNING;
      return;
    }

    const tokens = line.replace(/\t/g, ' ').trim().split(' ').filter((token) => token !== '');
    if (tokens.length === 0 && this.state.kind === 'awaiting-value') {
      this.assign(this.state.command, '');
      this.state = SCANNING;
      return;
    }
    for (const token of tokens) {
      if (this.state.kind === 'awaiting-value') {
        this.assign(this.state.command, token);
        this.state = SCANNING;
        continue;
      }

      if (token.startsWith('#')) break;

      switch (token) {
        case 'machine':
          this.flush();
          this.draft = { scope: '', username: '', password: '', account: '' };
          this.state = { kind: 'awaiting-value', command: 'machine' };
          break;
        case 'default':
          this.flush();
          this.draft = { scope: '', username: '', password: '', account: '' };
          break;
        case 'login':
        case 'password':
        case 'account':
          this.state = { kind: 'awaiting-value', command: token };
          break;
        case 'macdef':
          // Macro name and the rest of the line belong to the macro
          this.state = { kind: 'macro-skip' };
          return;
        default:
          break;
      }
    }
  }

  /**
   * Flush the in-progress record and return every record in file order.
   */
  finish(): Credential[] {
    this.flush();
    this.state = SCANNING;
    return [...this.credentials];
  }

  private assign(command: NetrcCommand, value: string): void {
    if (!this.draft) return;
    switch (command) {
      case 'machine':
        this.draft.scope = value;
        break;
      case 'login':
        this.draft.username = value;
        break;
      case 'password':
        this.draft.password = value;
        break;
      case 'account':
        this.draft.account = value;
        break;
    }
  }

  private flush(): void {
    if (!this.draft) return;
    this.credentials.push(
      createCredential({
        scope: this.draft.scope,
        username: this.draft.username,
        password: this.draft.password,
      }),
    );
    this.draft = undefined;
  }
}

/**
 * Parse netrc content into one record per `machine`/`default` block.
 */
export function parseNetrc(content: string): Credential[] {
  const parser = new NetrcParser();
  for (const line of splitLines(content)) {
    parser.feedLine(line);
  }
  return parser.finish();
}
