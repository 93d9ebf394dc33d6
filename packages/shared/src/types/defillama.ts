// Raw DeFiLlama payloads (only the fields the report reads)

export interface TvlPoint {
  date: number;
  totalLiquidityUSD: number;
}

export interface RaiseRecord {
  date: number;
  round?: string | null;
  amount?: number | null;
  leadInvestors?: string[] | null;
  otherInvestors?: string[] | null;
  valuation?: number | string | null;
  source?: string | null;
}

export interface ProtocolDetail {
  name?: string;
  description?: string | null;
  url?: string | null;
  logo?: string | null;
  category?: string | null;
  tvl?: TvlPoint[];
  currentChainTvls?: Record<string, number>;
  raises?: RaiseRecord[] | null;
  hallmarks?: unknown[] | null;
}

export interface HackRecord {
  name?: string | null;
  date: number;
  amount?: number | null;
  chain?: string[] | null;
  classification?: string | null;
  technique?: string | null;
  returnedFunds?: number | null;
  source?: string | null;
}
