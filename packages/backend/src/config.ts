import dotenv from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_MATCH_OPTIONS, type MatchOptions } from './resolver/resolver.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Load .env from packages/backend/ first, then fall back to monorepo root
dotenv.config({ path: resolve(__dirname, '../.env') });
dotenv.config({ path: resolve(__dirname, '../../../.env') });

function number_env(name: string, fallback: number, check: (n: number) => boolean): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const val = Number(raw);
  if (!Number.isFinite(val) || !check(val)) {
    throw new Error(`Invalid value for environment variable ${name}: ${raw}`);
  }
  return val;
}

const ratio = (n: number) => n >= 0 && n <= 1;
const count = (n: number) => Number.isInteger(n) && n >= 0;

export const config = {
  defillama: {
    baseURL: process.env['DEFILLAMA_BASE_URL'] ?? 'https://api.llama.fi',
    timeoutMs: number_env('DEFILLAMA_TIMEOUT_MS', 30_000, n => n > 0),
  },
  resolver: {
    fuzzyCutoff: number_env('RESOLVER_FUZZY_CUTOFF', DEFAULT_MATCH_OPTIONS.fuzzyCutoff, ratio),
    fuzzyLimit: number_env('RESOLVER_FUZZY_LIMIT', DEFAULT_MATCH_OPTIONS.fuzzyLimit, count),
    suggestionCutoff: number_env('RESOLVER_SUGGESTION_CUTOFF', DEFAULT_MATCH_OPTIONS.suggestionCutoff, ratio),
    suggestionLimit: number_env('RESOLVER_SUGGESTION_LIMIT', DEFAULT_MATCH_OPTIONS.suggestionLimit, count),
  } satisfies MatchOptions,
  report: {
    defaultDays: 30,
    maxDays: 365,
  },
  corsOrigin: process.env['CORS_ORIGIN'] ?? 'http://localhost:5173',
  port: parseInt(process.env['PORT'] ?? '3001', 10),
};
