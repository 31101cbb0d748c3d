import { describe, expect, it } from 'vitest';
import { authorityRank, authorityWeight, isAuthorityLevel, isHigherAuthority } from '../../src/domain/authority.js';

describe('authority', () => {
  it('ranks binding authority highest and informational sources lowest', () => {
    expect(authorityRank('binding_legal_authority')).toBe(6);
    expect(authorityRank('practical_self_help')).toBe(2);
    expect(authorityRank('informational_only')).toBe(1);
  });

  it('normalizes weights to (0, 1]', () => {
    expect(authorityWeight('binding_legal_authority')).toBe(1);
    expect(authorityWeight('informational_only')).toBeCloseTo(1 / 6);
  });

  it('compares strictly', () => {
    expect(isHigherAuthority('binding_legal_authority', 'persuasive_authority')).toBe(true);
    expect(isHigherAuthority('persuasive_authority', 'persuasive_authority')).toBe(false);
  });

  it('recognizes authority levels', () => {
    expect(isAuthorityLevel('official_interpretive')).toBe(true);
    expect(isAuthorityLevel('gospel')).toBe(false);
  });
});
