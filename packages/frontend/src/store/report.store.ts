import { createContext, useContext, useReducer, type Dispatch } from 'react';
import type { ProtocolReport } from '@protocol-scout/shared';
import { ApiError, fetchReport } from '../api/client.js';

export interface ReportState {
  loading: boolean;
  query: string;
  days: number;
  error: string | null;
  suggestions: string[];
  report: ProtocolReport | null;
}

export type ReportAction =
  | { type: 'FETCH_START'; payload: { query: string; days: number } }
  | { type: 'FETCH_SUCCESS'; payload: ProtocolReport }
  | { type: 'FETCH_ERROR'; payload: { message: string; suggestions: string[] } }
  | { type: 'RESET' };

export const initialState: ReportState = {
  loading: false,
  query: '',
  days: 30,
  error: null,
  suggestions: [],
  report: null,
};

export function reportReducer(state: ReportState, action: ReportAction): ReportState {
  switch (action.type) {
    case 'FETCH_START':
      return {
        ...state,
        loading: true,
        query: action.payload.query,
        days: action.payload.days,
        error: null,
        suggestions: [],
        report: null,
      };
    case 'FETCH_SUCCESS':
      return { ...state, loading: false, report: action.payload };
    case 'FETCH_ERROR':
      return {
        ...state,
        loading: false,
        error: action.payload.message,
        suggestions: action.payload.suggestions,
      };
    case 'RESET':
      return initialState;
    default:
      return state;
  }
}

/** Fetch a report and feed every state transition to `dispatch`. */
export async function loadReport(
  dispatch: Dispatch<ReportAction>,
  query: string,
  days: number,
): Promise<void> {
  dispatch({ type: 'FETCH_START', payload: { query, days } });
  try {
    const { report } = await fetchReport({ protocol: query, days });
    dispatch({ type: 'FETCH_SUCCESS', payload: report });
  } catch (err) {
    dispatch({
      type: 'FETCH_ERROR',
      payload: {
        message: err instanceof Error ? err.message : String(err),
        suggestions: err instanceof ApiError ? err.suggestions : [],
      },
    });
  }
}

export const ReportContext = createContext<{
  state: ReportState;
  dispatch: Dispatch<ReportAction>;
} | null>(null);

export function useReport() {
  const ctx = useContext(ReportContext);
  if (!ctx) throw new Error('useReport must be used within ReportContext.Provider');
  return ctx;
}

export function useReportReducer() {
  return useReducer(reportReducer, initialState);
}
