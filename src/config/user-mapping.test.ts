import { describe, it, expect } from 'vitest';
import { UserMapping, normalizeHandle } from './user-mapping.js';
import { ConfigError } from './config.js';

describe('normalizeHandle', () => {
  it('adds a leading @ once', () => {
    expect(normalizeHandle('alice_tg')).toBe('@alice_tg');
    expect(normalizeHandle(' @alice_tg ')).toBe('@alice_tg');
  });
});

describe('UserMapping', () => {
  const mapping = new UserMapping({ alice: '@alice_tg', Bob: 'bob_tg' });

  it('resolves board users to chat handles case-insensitively', () => {
    expect(mapping.toChatHandle('alice')).toBe('@alice_tg');
    expect(mapping.toChatHandle('BOB')).toBe('@bob_tg');
    expect(mapping.toChatHandle('carol')).toBeNull();
  });

  it('resolves chat handles back to board users with or without @', () => {
    expect(mapping.toBoardUsername('alice_tg')).toBe('alice');
    expect(mapping.toBoardUsername('@Bob_TG')).toBe('Bob');
    expect(mapping.toBoardUsername('@nobody')).toBeNull();
  });

  it('exposes its entries with normalised handles', () => {
    expect(mapping.size).toBe(2);
    expect(mapping.toRecord()).toEqual({ alice: '@alice_tg', Bob: '@bob_tg' });
  });

  it('rejects two board users sharing one chat handle', () => {
    expect(() => new UserMapping({ alice: '@shared', bob: 'shared' })).toThrow(
      'Chat handle "shared" is mapped to both "alice" and "bob"'
    );
  });

  it('rejects the same board user listed twice in different case', () => {
    expect(() => new UserMapping({ alice: '@a1', ALICE: '@a2' })).toThrow(ConfigError);
  });

  it('rejects empty handles', () => {
    expect(() => new UserMapping({ alice: '@' })).toThrow('Empty entry in user mapping');
  });
});
