import { DEFAULT_BASE_SCOPES, DEFAULT_SCOPE_GROUP } from '#constants/defaults';

/** maps a scope group name to its scopes */
export type ResolveScopeGroup = (name: string) => string[];

/**
 * creates a resolver over operator-configured scope groups
 * the default group falls back to the basic identity scopes when not configured
 * @param groups scope lists keyed by group name
 * @returns scope group resolver; unknown groups resolve to no scopes
 */
export function createScopeResolver(
  groups: Record<string, string[]> = {},
): ResolveScopeGroup {
  return (name) =>
    groups[name] ?? (name === DEFAULT_SCOPE_GROUP ? [...DEFAULT_BASE_SCOPES] : []);
}
