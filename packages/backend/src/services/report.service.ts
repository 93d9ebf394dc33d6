import type {
  ChainsSection,
  FundingSection,
  HackRecord,
  HacksSection,
  HallmarkEntry,
  ProtocolDetail,
  ProtocolReport,
  ReportMetadata,
  ResolutionResult,
  TvlSection,
} from '@protocol-scout/shared';

// currentChainTvls keys that are breakdowns rather than chains
export const AGGREGATE_TVL_KEYS = new Set(['borrowed', 'staking', 'pool2', 'vesting', 'offers']);

export interface ReportOptions {
  tvlHistoryDays?: number;
  now?: Date;
}

/** Unix seconds → `YYYY-MM-DD` (UTC). */
export function unixToIsoDate(ts: number): string {
  return new Date(ts * 1000).toISOString().slice(0, 10);
}

function buildMetadata(detail: ProtocolDetail, meta: ResolutionResult, now: Date): ReportMetadata {
  return {
    protocolName: meta.name,
    slug: meta.slug,
    description: detail.description ?? '',
    url: detail.url ?? '',
    logo: detail.logo ?? '',
    category: meta.category || detail.category || 'Unknown',
    isParentProtocol: meta.isParent,
    childProtocols: meta.children.map(c => c.name),
    queriedAt: now.toISOString().replace(/\.\d{3}Z$/, 'Z'),
  };
}

function buildTvlSection(detail: ProtocolDetail, historyDays: number): TvlSection {
  const history = detail.tvl ?? [];
  const recent = historyDays > 0 ? history.slice(-historyDays) : [];

  return {
    currentTvlUsd: history.at(-1)?.totalLiquidityUSD ?? 0,
    tvlHistory: recent.map(point => ({
      date: unixToIsoDate(point.date),
      tvlUsd: point.totalLiquidityUSD,
    })),
  };
}

function buildChainsSection(detail: ProtocolDetail): ChainsSection {
  const chains = Object.entries(detail.currentChainTvls ?? {})
    // "ethereum-staking" style keys are per-chain breakdowns
    .filter(([key]) => !key.includes('-') && !AGGREGATE_TVL_KEYS.has(key.toLowerCase()))
    .sort(([, a], [, b]) => b - a);

  return {
    deployedChains: chains.map(([key]) => key),
    chainTvl: Object.fromEntries(chains),
  };
}

function buildFundingSection(detail: ProtocolDetail): FundingSection {
  const rounds = (detail.raises ?? [])
    .map(r => ({
      date: unixToIsoDate(r.date),
      roundType: r.round ?? null,
      amountUsdMillions: r.amount ?? null,
      leadInvestors: r.leadInvestors ?? [],
      otherInvestors: r.otherInvestors ?? [],
      valuation: r.valuation ?? null,
      sourceUrl: r.source ?? '',
    }))
    .sort((a, b) => a.date.localeCompare(b.date));

  return {
    totalRaisedUsdMillions: rounds.reduce((sum, r) => sum + (r.amountUsdMillions ?? 0), 0),
    rounds,
  };
}

function buildHacksSection(hacks: readonly HackRecord[]): HacksSection {
  const incidents = hacks
    .map(h => ({
      date: unixToIsoDate(h.date),
      amountLostUsd: h.amount ?? 0,
      chain: h.chain ?? [],
      classification: h.classification ?? '',
      technique: h.technique ?? '',
      returnedFundsUsd: h.returnedFunds ?? 0,
      sourceUrl: h.source ?? '',
    }))
    .sort((a, b) => b.date.localeCompare(a.date));

  return {
    totalHacks: incidents.length,
    totalAmountLostUsd: incidents.reduce((sum, i) => sum + i.amountLostUsd, 0),
    totalAmountReturnedUsd: incidents.reduce((sum, i) => sum + i.returnedFundsUsd, 0),
    incidents,
  };
}

function buildHallmarks(detail: ProtocolDetail): HallmarkEntry[] {
  const entries: HallmarkEntry[] = [];
  for (const entry of detail.hallmarks ?? []) {
    if (!Array.isArray(entry) || entry.length < 2) continue;
    const ts: unknown = entry[0];
    const event: unknown = entry[1];
    if (typeof ts !== 'number') continue;
    entries.push({ date: unixToIsoDate(ts), event: String(event) });
  }
  return entries;
}

/**
 * Reshape a protocol's DeFiLlama detail, its resolution metadata and its
 * matching hack records into a report.
 */
export function buildReport(
  detail: ProtocolDetail,
  meta: ResolutionResult,
  hacks: readonly HackRecord[],
  { tvlHistoryDays = 30, now = new Date() }: ReportOptions = {},
): ProtocolReport {
  return {
    metadata: buildMetadata(detail, meta, now),
    tvl: buildTvlSection(detail, tvlHistoryDays),
    chains: buildChainsSection(detail),
    funding: buildFundingSection(detail),
    hacks: buildHacksSection(hacks),
    hallmarks: buildHallmarks(detail),
  };
}
