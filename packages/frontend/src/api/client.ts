import type {
  ErrorResponse,
  ReportRequest,
  ReportResponse,
} from '@protocol-scout/shared';

// In dev, VITE_API_URL is unset so relative paths are used (proxied by Vite to localhost:3001).
const API_BASE = (import.meta.env.VITE_API_URL as string | undefined) ?? '';

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly suggestions: string[] = [],
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function readErrorBody(data: unknown): ErrorResponse | undefined {
  if (typeof data !== 'object' || data === null || !('error' in data) || typeof data.error !== 'string') {
    return undefined;
  }
  const suggestions = 'suggestions' in data && Array.isArray(data.suggestions)
    ? data.suggestions.filter((s): s is string => typeof s === 'string')
    : [];
  return { error: data.error, suggestions };
}

async function apiFetch<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`, init);

  let data: unknown;
  try {
    data = await res.json();
  } catch {
    throw new ApiError(`HTTP ${res.status}: invalid JSON response`, res.status);
  }

  if (!res.ok) {
    const body = readErrorBody(data);
    throw new ApiError(body?.error ?? `HTTP ${res.status}`, res.status, body?.suggestions);
  }
  return data as T;
}

export async function fetchReport(req: ReportRequest): Promise<ReportResponse> {
  return apiFetch<ReportResponse>('/api/report', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(req),
  });
}
