// HTTP request/response DTOs

import type { ResolutionResult } from './protocol.js';
import type { ProtocolReport } from './report.js';

export interface ResolveResponse {
  result: ResolutionResult;
}

export interface ReportRequest {
  protocol: string;
  days?: number;
}

export interface ReportResponse {
  report: ProtocolReport;
}

export interface ErrorResponse {
  error: string;
  details?: string;
  suggestions?: string[];
}
