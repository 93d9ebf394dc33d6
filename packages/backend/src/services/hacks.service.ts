import type { HackRecord } from '@protocol-scout/shared';

/**
 * Incidents recorded against the protocol itself or any of its children.
 * Names are compared case-insensitively; source order is kept.
 */
export function findHacksForProtocol(
  hacks: readonly HackRecord[],
  protocolName: string,
  childNames: readonly string[] = [],
): HackRecord[] {
  const names = new Set([protocolName, ...childNames].map(n => n.toLowerCase()));
  return hacks.filter(h => names.has((h.name ?? '').toLowerCase()));
}
