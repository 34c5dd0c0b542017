import type { AppBoundaryErrorCode } from "./appError";
import type { DividendTimeline } from "./timeline";

export type CompanyRunStatus = "success" | "no_data" | "no_dividends" | "error";

/**
 * Outcome of one company in a multi-company run. `timeline` is set whenever the
 * pipeline ran, `error` only for failed fetches.
 */
export type CompanyRunReport = {
  symbol: string;
  status: CompanyRunStatus;
  cik?: string;
  entityName?: string;
  dividendCount: number;
  flaggedCount: number;
  timeline?: DividendTimeline;
  error?: { code: AppBoundaryErrorCode | "unexpected"; message: string };
};

export type BatchRunTotals = {
  companies: number;
  success: number;
  noData: number;
  noDividends: number;
  errors: number;
  dividends: number;
  flagged: number;
};

export type BatchRunReport = {
  companies: CompanyRunReport[];
  totals: BatchRunTotals;
};
