import { isPublishable } from './status-resolver.js';
import type { GroupRef, ResolvedStatus } from './types.js';

const TOKEN_PREFIX = 'publishaction';
const SEPARATOR = ';';

/** Key values containing the separator cannot be carried by a token */
export function isTokenSafeKey(groupKey: GroupRef['groupKey']): boolean {
  return groupKey.every((value) => !value.includes(SEPARATOR));
}

/**
 * Publish-action token consumed downstream. The format is fixed:
 * `publishaction;<key 1>;...;<key n>;<trackId>`, or "" when the group
 * cannot be published or its key cannot be written unambiguously.
 */
export function publishActionToken(group: GroupRef & { resolvedStatus: ResolvedStatus }): string {
  if (!isPublishable(group.resolvedStatus) || !isTokenSafeKey(group.groupKey)) {
    return '';
  }
  return [TOKEN_PREFIX, ...group.groupKey, String(group.trackId)].join(SEPARATOR);
}

/**
 * Parse a token back into a group reference. Returns null for anything
 * that is not a well-formed token.
 */
export function parsePublishActionToken(token: string): GroupRef | null {
  const parts = token.split(SEPARATOR);
  if (parts.length < 2 || parts[0] !== TOKEN_PREFIX) {
    return null;
  }

  const trackPart = parts[parts.length - 1];
  if (!/^\d+$/.test(trackPart)) {
    return null;
  }

  return {
    trackId: Number(trackPart),
    groupKey: parts.slice(1, -1),
  };
}
