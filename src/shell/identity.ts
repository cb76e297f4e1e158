/**
 * Lazily resolved, cached local identity (the account name submissions default to).
 */

import { userInfo } from 'node:os';

/** Resolves the local account name. Resolution happens at most once. */
export type IdentityResolver = () => Promise<string>;

/**
 * Create an identity resolver. `lookup` runs on first use only; its result (or failure) is cached.
 */
export function createIdentityResolver(
  lookup: () => string | Promise<string> = () => userInfo().username,
): IdentityResolver {
  let cached: Promise<string> | null = null;
  return () => {
    cached ??= Promise.resolve().then(lookup);
    return cached;
  };
}

/** Resolver that always answers `name`, for callers that already know the identity. */
export function fixedIdentity(name: string): IdentityResolver {
  return () => Promise.resolve(name);
}
