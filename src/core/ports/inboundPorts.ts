import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyFactsPayload } from "../entities/companyFacts";

export type CompanyFactsRequest = {
  symbol: string;
};

export type CompanyFactsResult = {
  cik: string;
  payload: CompanyFactsPayload;
};

export interface CompanyFactsProviderPort {
  /**
   * Resolves to `ok(null)` when the symbol is unknown or the entity has no facts.
   */
  fetchCompanyFacts(
    request: CompanyFactsRequest,
  ): Promise<Result<CompanyFactsResult | null, AppBoundaryError>>;
}
