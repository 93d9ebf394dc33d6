import type { HackRecord, ProtocolRecord, ResolutionResult } from '@protocol-scout/shared';
import { config } from '../config.js';
import { buildIndices, type ProtocolIndices } from '../resolver/indices.js';
import { resolveProtocol } from '../resolver/resolver.js';
import { cacheForProcess } from './cache.service.js';
import { fetchHacks, fetchProtocols } from './defillama.service.js';

const protocolsCache = cacheForProcess(fetchProtocols);
const hacksCache = cacheForProcess(fetchHacks);

// Indices live exactly as long as the snapshot they were built from
const indexCache = new WeakMap<readonly ProtocolRecord[], ProtocolIndices>();

export function indicesFor(records: readonly ProtocolRecord[]): ProtocolIndices {
  let indices = indexCache.get(records);
  if (!indices) {
    indices = buildIndices(records);
    indexCache.set(records, indices);
  }
  return indices;
}

export function getProtocolsList(): Promise<ProtocolRecord[]> {
  return protocolsCache.get();
}

export function getAllHacks(): Promise<HackRecord[]> {
  return hacksCache.get();
}

export async function resolveProtocolName(input: string): Promise<ResolutionResult> {
  const indices = indicesFor(await getProtocolsList());
  return resolveProtocol(input, indices, config.resolver);
}

export function clearRegistryCache(): void {
  protocolsCache.clear();
  hacksCache.clear();
}
