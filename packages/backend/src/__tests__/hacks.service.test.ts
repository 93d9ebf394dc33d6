import { describe, expect, it } from 'vitest';
import { findHacksForProtocol } from '../services/hacks.service.js';
import { HACKS } from './fixtures.js';

describe('findHacksForProtocol', () => {
  it('matches the protocol name case-insensitively', () => {
    expect(findHacksForProtocol(HACKS, 'lido').map(h => h.name)).toEqual(['Lido']);
  });

  it('includes incidents recorded against children', () => {
    const found = findHacksForProtocol(HACKS, 'Foo Bar', ['Zeta Lend V1', 'Zeta Swap']);
    expect(found.map(h => h.name)).toEqual(['Zeta Lend V1', 'FOO BAR']);
  });

  it('returns nothing for an unknown protocol', () => {
    expect(findHacksForProtocol(HACKS, 'Pendle')).toEqual([]);
  });
});
