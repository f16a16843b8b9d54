import { maskPassword, toBasicAuthHeader } from './basic-auth';
import { EMPTY_CREDENTIAL, createCredential } from './types';

describe('toBasicAuthHeader', () => {
  it('encodes username and password', () => {
    const cred = createCredential({ scope: 'foo.com', username: 'bob', password: 'hunter2' });
    expect(toBasicAuthHeader(cred)).toBe('Basic Ym9iOmh1bnRlcjI=');
  });

  it('encodes a default record with an empty password', () => {
    expect(toBasicAuthHeader(createCredential({ username: 'anon' }))).toBe('Basic YW5vbjo=');
  });

  it('returns undefined for the empty record', () => {
    expect(toBasicAuthHeader(EMPTY_CREDENTIAL)).toBeUndefined();
  });
});

describe('maskPassword', () => {
  it('masks non-empty passwords with a fixed width', () => {
    expect(maskPassword('x')).toBe('********');
    expect(maskPassword('a-much-longer-password')).toBe('********');
  });

  it('leaves empty passwords empty', () => {
    expect(maskPassword('')).toBe('');
  });
});
