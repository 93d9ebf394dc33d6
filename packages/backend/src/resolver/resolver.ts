import type { ProtocolRecord, ResolutionResult } from '@protocol-scout/shared';
import { ProtocolNotFoundError } from '../errors.js';
import { aggregateParent } from './aggregate.js';
import { parentChildren, type MatchCandidate, type ProtocolIndices } from './indices.js';
import { slugToWords } from './names.js';
import { closeMatches } from './similarity.js';

export interface MatchOptions {
  /** Minimum similarity for a fuzzy match to resolve. */
  fuzzyCutoff: number;
  /** How many fuzzy candidates are ranked before the best is taken. */
  fuzzyLimit: number;
  /** Minimum similarity for a display name to be suggested. */
  suggestionCutoff: number;
  suggestionLimit: number;
}

export const DEFAULT_MATCH_OPTIONS: Readonly<MatchOptions> = {
  fuzzyCutoff: 0.85,
  fuzzyLimit: 5,
  suggestionCutoff: 0.4,
  suggestionLimit: 3,
};

function recordResult(record: ProtocolRecord): ResolutionResult {
  const result: ResolutionResult = {
    slug: record.slug,
    name: record.name,
    isParent: false,
    children: [],
  };
  if (record.category !== undefined) result.category = record.category;
  return result;
}

function parentResult(indices: ProtocolIndices, parentSlug: string): ResolutionResult {
  return aggregateParent(parentSlug, parentChildren(indices, parentSlug));
}

function fromCandidate(indices: ProtocolIndices, candidate: MatchCandidate): ResolutionResult | undefined {
  switch (candidate.kind) {
    case 'parent':
      return parentResult(indices, candidate.target);
    case 'slug': {
      const record = indices.slugIndex.get(candidate.target);
      return record && recordResult(record);
    }
    case 'name': {
      const record = indices.nameIndex.get(candidate.target);
      return record && recordResult(record);
    }
  }
}

/** Display names close to `normalized`, best first, in their original casing. */
export function suggestNames(
  normalized: string,
  indices: ProtocolIndices,
  options: Pick<MatchOptions, 'suggestionCutoff' | 'suggestionLimit'>,
): string[] {
  const names = indices.displayNames;
  return closeMatches(normalized, names.keys(), options.suggestionLimit, options.suggestionCutoff)
    .map(({ key }) => names.get(key) ?? key);
}

/**
 * Resolve free-text input to a protocol or parent group. Tiers run in order
 * and the first hit wins: exact slug, exact name, parent slug (also with
 * hyphens read as spaces), parent base name, then fuzzy over every key.
 *
 * @throws ProtocolNotFoundError with ranked suggestions when nothing matches.
 */
export function resolveProtocol(
  input: string,
  indices: ProtocolIndices,
  options: Readonly<MatchOptions> = DEFAULT_MATCH_OPTIONS,
): ResolutionResult {
  const normalized = input.trim().toLowerCase();

  const bySlug = indices.slugIndex.get(normalized);
  if (bySlug) return recordResult(bySlug);

  const byName = indices.nameIndex.get(normalized);
  if (byName) return recordResult(byName);

  if (indices.parentSlugs.has(normalized)) return parentResult(indices, normalized);
  for (const parentSlug of indices.parentSlugs) {
    if (slugToWords(parentSlug) === normalized) return parentResult(indices, parentSlug);
  }

  const byParentName = indices.parentNameIndex.get(normalized);
  if (byParentName !== undefined) return parentResult(indices, byParentName);

  const space = indices.candidates;
  const [best] = closeMatches(normalized, space.keys(), options.fuzzyLimit, options.fuzzyCutoff);
  const candidate = best && space.get(best.key);
  const fuzzy = candidate && fromCandidate(indices, candidate);
  if (fuzzy) return fuzzy;

  throw new ProtocolNotFoundError(input, suggestNames(normalized, indices, options));
}
