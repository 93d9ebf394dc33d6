import type { HackRecord, ProtocolDetail, ProtocolRecord } from '@protocol-scout/shared';

export const REGISTRY: ProtocolRecord[] = [
  { slug: 'lido', name: 'Lido', category: 'Liquid Staking' },
  { slug: 'curve-dex', name: 'Curve DEX', category: 'Dexes' },
  { slug: 'makerdao', name: 'MakerDAO', category: 'CDP' },
  { slug: 'pendle', name: 'Pendle' },
  { slug: 'sushiswap-v2', name: 'SushiSwap V2', category: 'Dexes', parentProtocol: 'parent#sushiswap' },
  { slug: 'sushi-bentobox', name: 'Sushi BentoBox', category: 'Lending', parentProtocol: 'parent#sushiswap' },
  { slug: 'sushiswap-v3', name: 'SushiSwap V3', category: 'Dexes', parentProtocol: 'parent#sushiswap' },
  { slug: 'zeta-lend-v1', name: 'Zeta Lend V1', category: 'Lending', parentProtocol: 'parent#foo-bar' },
  { slug: 'zeta-swap', name: 'Zeta Swap', category: 'Dexes', parentProtocol: 'parent#foo-bar' },
  { slug: 'bare-one', name: 'Bare One', parentProtocol: 'parent#Bare' },
];

export const SUSHISWAP_CHILDREN = [
  { name: 'SushiSwap V2', slug: 'sushiswap-v2' },
  { name: 'Sushi BentoBox', slug: 'sushi-bentobox' },
  { name: 'SushiSwap V3', slug: 'sushiswap-v3' },
];

// 2024-01-01, 2024-01-02, 2024-01-03 and 2023-01-01 / 2021-01-01 at 00:00 UTC
export const TS = {
  jan1: 1704067200,
  jan2: 1704153600,
  jan3: 1704240000,
  y2023: 1672531200,
  y2021: 1609459200,
};

export const DETAIL: ProtocolDetail = {
  description: 'Lending market',
  url: 'https://example.org',
  category: 'Lending',
  tvl: [
    { date: TS.jan1, totalLiquidityUSD: 100 },
    { date: TS.jan2, totalLiquidityUSD: 150 },
    { date: TS.jan3, totalLiquidityUSD: 125 },
  ],
  currentChainTvls: {
    Ethereum: 500,
    'Ethereum-borrowed': 50,
    borrowed: 70,
    Arbitrum: 800,
    Staking: 10,
    Base: 500,
  },
  raises: [
    {
      date: TS.y2023,
      round: 'Series A',
      amount: 20,
      leadInvestors: ['Fund A'],
      otherInvestors: null,
      valuation: null,
      source: 'https://example.org/a',
    },
    { date: TS.y2021, round: 'Seed', amount: null },
  ],
  hallmarks: [[TS.jan1, 'V3 launch'], [TS.jan2], 'bad', [TS.jan3, 'Exploit']],
};

export const HACKS: HackRecord[] = [
  {
    name: 'Zeta Lend V1',
    date: TS.y2023,
    amount: 1000,
    chain: ['Ethereum'],
    classification: 'Protocol Logic',
    technique: 'Reentrancy',
    returnedFunds: null,
    source: 'https://example.org/h1',
  },
  { name: 'Lido', date: TS.jan2, amount: 5 },
  { name: 'FOO BAR', date: TS.jan1, amount: null },
  { name: null, date: TS.jan3, amount: 1 },
];
