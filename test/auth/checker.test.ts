import { describe, it, expect } from 'vitest';
import { AllowAll, StaticCredentialStore, credentials } from '../../src/auth/checker.js';

describe('credentials', () => {
  const store = {
    alice: 'shhhh',
    bob: '',
  };

  it.each([
    { username: '', password: '', valid: false, label: 'empty, invalid' },
    { username: 'cecil', password: '', valid: false, label: 'unknown user' },
    { username: 'alice', password: 'bob', valid: false, label: 'alice, wrong password' },
    { username: 'alice', password: 'shhhh', valid: true, label: 'alice, correct password' },
    { username: 'bob', password: '', valid: true, label: 'bob, correct (empty) password' },
    { username: 'Alice', password: 'shhhh', valid: false, label: 'username is case-sensitive' },
    { username: 'alice', password: 'shhhh ', valid: false, label: 'password is not trimmed' },
  ])('$label', ({ username, password, valid }) => {
    expect(credentials(store).check(username, password)).toBe(valid);
  });

  it('should reject everything when the store is absent', () => {
    expect(credentials(undefined).check('alice', '')).toBe(false);
    expect(credentials(null).check('', '')).toBe(false);
    expect(credentials().check('alice', 'shhhh')).toBe(false);
  });

  it('should reject everything when the store is empty', () => {
    const checker = credentials({});
    expect(checker.check('', '')).toBe(false);
    expect(checker.check('alice', 'shhhh')).toBe(false);
  });

  it('should accept an empty username when it is explicitly present', () => {
    const checker = credentials({ '': 'anonymous' });
    expect(checker.check('', 'anonymous')).toBe(true);
    expect(checker.check('', '')).toBe(false);
  });

  it('should not treat inherited object properties as users', () => {
    const checker = credentials({ alice: 'shhhh' });
    expect(checker.check('toString', Object.prototype.toString.toString())).toBe(false);
    expect(checker.check('__proto__', '[object Object]')).toBe(false);
    expect(checker.check('constructor', '')).toBe(false);
  });

  it('should accept a Map as the store', () => {
    const checker = credentials(new Map([['carol', 'p:a:s:s']]));
    expect(checker.check('carol', 'p:a:s:s')).toBe(true);
    expect(checker.check('carol', 'p')).toBe(false);
  });

  it('should observe changes the owner makes to the store', () => {
    const users = new Map<string, string>();
    const checker = new StaticCredentialStore(users);
    expect(checker.check('dave', 'test-secret')).toBe(false);

    users.set('dave', 'test-secret');
    expect(checker.check('dave', 'test-secret')).toBe(true);

    users.delete('dave');
    expect(checker.check('dave', 'test-secret')).toBe(false);
  });

  it('should return the same answer for repeated checks', () => {
    const checker = credentials(store);
    const results = Array.from({ length: 20 }, () => checker.check('alice', 'shhhh'));
    expect(new Set(results)).toEqual(new Set([true]));

    const rejections = Array.from({ length: 20 }, () => checker.check('alice', 'nope'));
    expect(new Set(rejections)).toEqual(new Set([false]));
  });
});

describe('AllowAll', () => {
  it('should accept every pair, including empty strings', () => {
    const checker = new AllowAll();
    expect(checker.check('', '')).toBe(true);
    expect(checker.check('anyone', 'anything')).toBe(true);
  });
});
