export interface ReportMetadata {
  protocolName: string;
  slug: string;
  description: string;
  url: string;
  logo: string;
  category: string;
  isParentProtocol: boolean;
  childProtocols: string[];
  queriedAt: string;
}

export interface TvlSection {
  currentTvlUsd: number;
  tvlHistory: Array<{ date: string; tvlUsd: number }>;
}

export interface ChainsSection {
  deployedChains: string[];
  chainTvl: Record<string, number>;
}

export interface FundingRound {
  date: string;
  roundType: string | null;
  amountUsdMillions: number | null;
  leadInvestors: string[];
  otherInvestors: string[];
  valuation: number | string | null;
  sourceUrl: string;
}

export interface FundingSection {
  totalRaisedUsdMillions: number;
  rounds: FundingRound[];
}

export interface HackIncident {
  date: string;
  amountLostUsd: number;
  chain: string[];
  classification: string;
  technique: string;
  returnedFundsUsd: number;
  sourceUrl: string;
}

export interface HacksSection {
  totalHacks: number;
  totalAmountLostUsd: number;
  totalAmountReturnedUsd: number;
  incidents: HackIncident[];
}

export interface HallmarkEntry {
  date: string;
  event: string;
}

export interface ProtocolReport {
  metadata: ReportMetadata;
  tvl: TvlSection;
  chains: ChainsSection;
  funding: FundingSection;
  hacks: HacksSection;
  hallmarks: HallmarkEntry[];
}
