import type { ProtocolRecord, ResolutionResult } from '@protocol-scout/shared';
import { baseName, slugToWords, titleCase } from './names.js';

/** Most frequent non-empty category; the first one seen wins ties. */
export function majorityCategory(members: readonly ProtocolRecord[]): string | undefined {
  const counts = new Map<string, number>();
  for (const { category } of members) {
    if (category) counts.set(category, (counts.get(category) ?? 0) + 1);
  }

  let winner: string | undefined;
  let winnerCount = 0;
  for (const [category, count] of counts) {
    if (count > winnerCount) {
      winner = category;
      winnerCount = count;
    }
  }
  return winner;
}

/**
 * Parent groups have no record of their own, so the display name comes from
 * the slug unless a member's unversioned name spells the same words.
 */
export function parentDisplayName(parentSlug: string, members: readonly ProtocolRecord[]): string {
  const words = slugToWords(parentSlug);
  for (const member of members) {
    const base = baseName(member.name);
    if (base.toLowerCase() === words) return base;
  }
  return titleCase(words);
}

export function aggregateParent(
  parentSlug: string,
  members: readonly ProtocolRecord[],
): ResolutionResult {
  const result: ResolutionResult = {
    slug: parentSlug,
    name: parentDisplayName(parentSlug, members),
    isParent: true,
    children: members.map(m => ({ name: m.name, slug: m.slug })),
  };
  const category = majorityCategory(members);
  if (category !== undefined) result.category = category;
  return result;
}
