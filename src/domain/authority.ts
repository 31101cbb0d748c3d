import { AUTHORITY_LEVELS, AuthorityLevel } from './types.js';

/**
 * Rank of an authority level: 6 for binding legal authority down to 1 for
 * informational-only sources.
 */
export function authorityRank(level: AuthorityLevel): number {
  return AUTHORITY_LEVELS.length - AUTHORITY_LEVELS.indexOf(level);
}

/**
 * Authority rank normalized to (0, 1]
 */
export function authorityWeight(level: AuthorityLevel): number {
  return authorityRank(level) / AUTHORITY_LEVELS.length;
}

export function isHigherAuthority(candidate: AuthorityLevel, current: AuthorityLevel): boolean {
  return authorityRank(candidate) > authorityRank(current);
}

export function isAuthorityLevel(value: string): value is AuthorityLevel {
  return (AUTHORITY_LEVELS as readonly string[]).includes(value);
}
