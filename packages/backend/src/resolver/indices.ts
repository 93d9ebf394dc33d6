import type { MatchKind, ProtocolRecord } from '@protocol-scout/shared';
import { baseName } from './names.js';

const PARENT_PREFIX = 'parent#';

export interface ParentGroup {
  parentSlug: string;
  /** Snapshot order. */
  members: ProtocolRecord[];
}

export interface MatchCandidate {
  kind: MatchKind;
  /** Key into slugIndex, nameIndex, or a parent slug, depending on `kind`. */
  target: string;
}

/**
 * Lookup structures derived from one registry snapshot. Every map preserves
 * insertion order; later records overwrite earlier ones on key collisions.
 */
export interface ProtocolIndices {
  records: readonly ProtocolRecord[];
  slugIndex: Map<string, ProtocolRecord>;
  nameIndex: Map<string, ProtocolRecord>;
  parentSlugs: Set<string>;
  /** Parent groups in first-reference order; addressed through `groupIndex`. */
  groups: ParentGroup[];
  groupIndex: Map<string, number>;
  /** Lowercased member base name → parent slug. */
  parentNameIndex: Map<string, string>;
  /** Every lookup key, for fuzzy matching. See `candidateSpace`. */
  candidates: Map<string, MatchCandidate>;
  /** Lowercased display name → first casing seen. */
  displayNames: Map<string, string>;
}

export function parseParentRef(ref: string | undefined): string | undefined {
  if (!ref || !ref.startsWith(PARENT_PREFIX)) return undefined;
  return ref.slice(PARENT_PREFIX.length).toLowerCase();
}

export function buildIndices(records: readonly ProtocolRecord[]): ProtocolIndices {
  const slugIndex = new Map<string, ProtocolRecord>();
  const nameIndex = new Map<string, ProtocolRecord>();
  const parentSlugs = new Set<string>();
  const groups: ParentGroup[] = [];
  const groupIndex = new Map<string, number>();

  for (const record of records) {
    slugIndex.set(record.slug.toLowerCase(), record);
    nameIndex.set(record.name.toLowerCase(), record);

    const parentSlug = parseParentRef(record.parentProtocol);
    if (parentSlug === undefined) continue;

    parentSlugs.add(parentSlug);
    const at = groupIndex.get(parentSlug);
    if (at === undefined) {
      groupIndex.set(parentSlug, groups.length);
      groups.push({ parentSlug, members: [record] });
    } else {
      groups[at]?.members.push(record);
    }
  }

  const parentNameIndex = new Map<string, string>();
  for (const group of groups) {
    for (const member of group.members) {
      parentNameIndex.set(baseName(member.name).toLowerCase(), group.parentSlug);
    }
  }

  const displayNames = new Map<string, string>();
  for (const { name } of records) {
    const key = name.toLowerCase();
    if (!displayNames.has(key)) displayNames.set(key, name);
  }

  const candidates = candidateSpace(slugIndex, nameIndex, parentSlugs, parentNameIndex);

  return {
    records,
    slugIndex,
    nameIndex,
    parentSlugs,
    groups,
    groupIndex,
    parentNameIndex,
    candidates,
    displayNames,
  };
}

/**
 * Every lookup key in one insertion-ordered space: slug keys, then name keys,
 * then parent slugs, then parent base names. A key seen again keeps its
 * original position but takes the later tag.
 */
function candidateSpace(
  slugIndex: Map<string, ProtocolRecord>,
  nameIndex: Map<string, ProtocolRecord>,
  parentSlugs: Set<string>,
  parentNameIndex: Map<string, string>,
): Map<string, MatchCandidate> {
  const space = new Map<string, MatchCandidate>();
  for (const key of slugIndex.keys()) space.set(key, { kind: 'slug', target: key });
  for (const key of nameIndex.keys()) space.set(key, { kind: 'name', target: key });
  for (const slug of parentSlugs) space.set(slug, { kind: 'parent', target: slug });
  for (const [key, slug] of parentNameIndex) space.set(key, { kind: 'parent', target: slug });
  return space;
}

export function parentChildren(indices: ProtocolIndices, parentSlug: string): ProtocolRecord[] {
  const at = indices.groupIndex.get(parentSlug);
  if (at === undefined) return [];
  return indices.groups[at]?.members ?? [];
}
