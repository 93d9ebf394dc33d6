import { z } from 'zod';
import type { HackRecord, ProtocolDetail, ProtocolRecord } from '@protocol-scout/shared';
import { config } from '../config.js';
import { DefiLlamaApiError } from '../errors.js';
import { log } from '../logger.js';

// Records missing a slug or name stay in the snapshot with empty strings
const ProtocolRecordSchema = z
  .preprocess(
    value => (typeof value === 'object' && value !== null ? value : {}),
    z.object({
      slug: z.string().catch(''),
      name: z.string().catch(''),
      category: z.string().nullish().catch(undefined),
      parentProtocol: z.string().nullish().catch(undefined),
    }),
  )
  .transform(({ slug, name, category, parentProtocol }) => {
    const record: ProtocolRecord = { slug, name };
    if (category) record.category = category;
    if (parentProtocol) record.parentProtocol = parentProtocol;
    return record;
  });

const ProtocolListSchema = z.array(ProtocolRecordSchema);

/** Array whose malformed elements are dropped instead of failing the payload. */
function lenientArray<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>, label: string) {
  return z.array(z.unknown()).transform(values => {
    const kept: T[] = [];
    for (const value of values) {
      const parsed = item.safeParse(value);
      if (parsed.success) kept.push(parsed.data);
    }
    const skipped = values.length - kept.length;
    if (skipped > 0) log.warn('defillama', `Skipped ${skipped} malformed ${label}`);
    return kept;
  });
}

const TvlPointSchema = z.object({ date: z.number(), totalLiquidityUSD: z.number() });

const RaiseSchema = z.object({
  date: z.number(),
  round: z.string().nullish(),
  amount: z.number().nullish(),
  leadInvestors: z.array(z.string()).nullish(),
  otherInvestors: z.array(z.string()).nullish(),
  valuation: z.union([z.number(), z.string()]).nullish(),
  source: z.string().nullish(),
});

const ProtocolDetailSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  logo: z.string().nullish(),
  category: z.string().nullish(),
  tvl: lenientArray(TvlPointSchema, 'TVL points').optional(),
  currentChainTvls: z.record(z.number()).optional(),
  raises: lenientArray(RaiseSchema, 'raises').nullish(),
  hallmarks: z.array(z.unknown()).nullish(),
});

const HackSchema = z.object({
  name: z.string().nullish(),
  date: z.number(),
  amount: z.number().nullish(),
  chain: z.array(z.string()).nullish(),
  classification: z.string().nullish(),
  technique: z.string().nullish(),
  returnedFunds: z.number().nullish(),
  source: z.string().nullish(),
});

const HackListSchema = lenientArray(HackSchema, 'hack records');

function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}

async function getJson(path: string): Promise<unknown> {
  const url = `${config.defillama.baseURL}${path}`;

  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(config.defillama.timeoutMs) });
  } catch (err) {
    if (isTimeout(err)) throw new DefiLlamaApiError(`Request timed out for ${url}`, url);
    const reason = err instanceof Error ? err.message : String(err);
    throw new DefiLlamaApiError(`Connection failed for ${url}: ${reason}`, url);
  }

  if (!response.ok) {
    throw new DefiLlamaApiError(`HTTP ${response.status} for ${url}`, url);
  }

  try {
    return (await response.json()) as unknown;
  } catch (err) {
    if (isTimeout(err)) throw new DefiLlamaApiError(`Request timed out for ${url}`, url);
    throw new DefiLlamaApiError(`Invalid JSON response from ${url}`, url);
  }
}

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, path: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const url = `${config.defillama.baseURL}${path}`;
    const issue = result.error.issues[0];
    const where = issue ? ` (${issue.path.join('.') || 'root'}: ${issue.message})` : '';
    throw new DefiLlamaApiError(`Unexpected response shape from ${url}${where}`, url);
  }
  return result.data;
}

export async function fetchProtocols(): Promise<ProtocolRecord[]> {
  log.info('defillama', 'Fetching protocol registry...');
  const records = parsePayload(ProtocolListSchema, await getJson('/protocols'), '/protocols');
  log.info('defillama', `Loaded ${records.length} protocols`);
  return records;
}

export async function fetchProtocolDetail(slug: string): Promise<ProtocolDetail> {
  const path = `/protocol/${encodeURIComponent(slug)}`;
  return parsePayload(ProtocolDetailSchema, await getJson(path), path);
}

export async function fetchHacks(): Promise<HackRecord[]> {
  log.info('defillama', 'Fetching hack records...');
  return parsePayload(HackListSchema, await getJson('/hacks'), '/hacks');
}
