import type { Server } from 'node:http';
import type { ProtocolRecord, ReportResponse } from '@protocol-scout/shared';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app.js';
import { DefiLlamaApiError } from '../errors.js';
import { fetchHacks, fetchProtocolDetail, fetchProtocols } from '../services/defillama.service.js';
import { TS } from './fixtures.js';

vi.mock('../services/defillama.service.js', () => ({
  fetchProtocols: vi.fn(),
  fetchProtocolDetail: vi.fn(),
  fetchHacks: vi.fn(),
}));

const REGISTRY: ProtocolRecord[] = [
  { slug: 'lido', name: 'Lido', category: 'Liquid Staking' },
  { slug: 'aave-v3', name: 'Aave V3', category: 'Lending', parentProtocol: 'parent#aave' },
  { slug: 'aave-v2', name: 'Aave V2', category: 'Lending', parentProtocol: 'parent#aave' },
];

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    server = createApp().listen(0);
    await new Promise<void>(resolve => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    vi.restoreAllMocks();
  });

  beforeEach(() => {
    vi.mocked(fetchProtocols).mockResolvedValue(REGISTRY);
    vi.mocked(fetchHacks).mockResolvedValue([{ name: 'Lido', date: TS.jan2, amount: 5 }]);
    vi.mocked(fetchProtocolDetail).mockResolvedValue({
      description: 'Liquid staking',
      tvl: [
        { date: TS.jan1, totalLiquidityUSD: 10 },
        { date: TS.jan2, totalLiquidityUSD: 20 },
      ],
    });
  });

  function postReport(body: unknown) {
    return fetch(`${baseUrl}/api/report`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('resolves a parent protocol', async () => {
    const res = await fetch(`${baseUrl}/api/protocols/resolve?q=Aave`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      result: {
        slug: 'aave',
        name: 'Aave',
        isParent: true,
        children: [
          { name: 'Aave V3', slug: 'aave-v3' },
          { name: 'Aave V2', slug: 'aave-v2' },
        ],
        category: 'Lending',
      },
    });
  });

  it('answers 404 with suggestions for an unknown protocol', async () => {
    const res = await fetch(`${baseUrl}/api/protocols/resolve?q=lidx`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "Protocol 'lidx' not found. Did you mean: Lido?",
      suggestions: ['Lido'],
    });
  });

  it('requires a query', async () => {
    const res = await fetch(`${baseUrl}/api/protocols/resolve`);
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Invalid query parameters' });
  });

  it('builds a report for a resolved protocol', async () => {
    const res = await postReport({ protocol: 'LIDO', days: 1 });
    expect(res.status).toBe(200);

    const { report } = (await res.json()) as ReportResponse;
    expect(report.metadata).toMatchObject({
      protocolName: 'Lido',
      slug: 'lido',
      description: 'Liquid staking',
      category: 'Liquid Staking',
      isParentProtocol: false,
      childProtocols: [],
    });
    expect(report.tvl).toEqual({ currentTvlUsd: 20, tvlHistory: [{ date: '2024-01-02', tvlUsd: 20 }] });
    expect(report.hacks).toMatchObject({ totalHacks: 1, totalAmountLostUsd: 5 });
    expect(fetchProtocolDetail).toHaveBeenCalledWith('lido');
  });

  it('validates the report request', async () => {
    const empty = await postReport({ protocol: '  ' });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({
      error: 'Invalid request body',
      details: 'protocol: protocol name is required',
    });

    expect((await postReport({ protocol: 'lido', days: 0 })).status).toBe(400);
  });

  it('rejects a malformed JSON body', async () => {
    const res = await fetch(`${baseUrl}/api/report`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"protocol":',
    });
    expect(res.status).toBe(400);
  });

  it('answers 502 when DeFiLlama fails', async () => {
    vi.mocked(fetchProtocolDetail).mockRejectedValueOnce(
      new DefiLlamaApiError('HTTP 500 for https://api.llama.fi/protocol/lido', 'https://api.llama.fi/protocol/lido'),
    );
    const res = await postReport({ protocol: 'lido' });
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'HTTP 500 for https://api.llama.fi/protocol/lido' });
  });
});
