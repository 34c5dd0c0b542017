import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  CompanyFactsProviderPort,
  CompanyFactsRequest,
  CompanyFactsResult,
} from "../../../core/ports/inboundPorts";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { normalizeCik, parseCompanyFactsPayload } from "./companyFactsPayload";

const tickerMapSchema = z.record(
  z.string(),
  z.object({
    ticker: z.string().optional(),
    cik_str: z.union([z.number(), z.string()]).optional(),
  }),
);

type SecCompanyFactsError =
  | {
      code: "http_failure";
      message: string;
      httpStatus?: number;
      retryable: boolean;
      cause?: unknown;
    }
  | { code: "malformed_response"; message: string; cause?: unknown };

const provider = "sec-edgar";

/**
 * Fetches XBRL company facts from EDGAR, resolving tickers through the SEC ticker map.
 */
export class SecCompanyFactsProvider implements CompanyFactsProviderPort {
  private readonly symbolToCik = new Map<string, string>();

  constructor(
    private readonly baseUrl: string,
    private readonly tickersUrl: string,
    private readonly userAgent: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpJsonClient({ minIntervalMs: 100 }),
  ) {
    if (!this.userAgent.trim()) {
      throw new Error(
        "SEC_EDGAR_USER_AGENT is required when the SEC company facts provider is enabled.",
      );
    }
  }

  /**
   * Accepts either a ticker or a bare CIK.
   */
  async fetchCompanyFacts(
    request: CompanyFactsRequest,
  ): Promise<Result<CompanyFactsResult | null, AppBoundaryError>> {
    const symbol = request.symbol.trim().toUpperCase();
    const cikResult = await this.resolveCik(symbol);
    if (cikResult.isErr()) {
      return err(this.mapToBoundaryError(cikResult.error));
    }

    const cik = cikResult.value;
    if (!cik) {
      return ok(null);
    }

    const url = new URL(
      `/api/xbrl/companyfacts/CIK${cik}.json`,
      this.baseUrl,
    ).toString();
    const bodyResult = await this.fetchJson(url);
    if (bodyResult.isErr()) {
      return err(this.mapToBoundaryError(bodyResult.error));
    }

    if (bodyResult.value === null) {
      return ok(null);
    }

    return parseCompanyFactsPayload(bodyResult.value, provider).map(
      (payload) => ({ cik, payload: { ...payload, cik: payload.cik ?? cik } }),
    );
  }

  /**
   * Caches the whole ticker map on first use; later lookups stay in memory.
   */
  private async resolveCik(
    symbol: string,
  ): Promise<Result<string | null, SecCompanyFactsError>> {
    const direct = normalizeCik(symbol);
    if (direct) {
      return ok(direct);
    }

    const cached = this.symbolToCik.get(symbol);
    if (cached) {
      return ok(cached);
    }

    const responseResult = await this.fetchJson(this.tickersUrl);
    if (responseResult.isErr()) {
      return err(responseResult.error);
    }

    const parsed = tickerMapSchema.safeParse(responseResult.value);
    if (!parsed.success) {
      return err({
        code: "malformed_response",
        message: "SEC ticker mapping payload was malformed.",
        cause: parsed.error,
      });
    }

    for (const record of Object.values(parsed.data)) {
      const ticker = record.ticker?.trim().toUpperCase();
      const cik =
        record.cik_str === undefined ? undefined : normalizeCik(record.cik_str);
      if (ticker && cik) {
        this.symbolToCik.set(ticker, cik);
      }
    }

    return ok(this.symbolToCik.get(symbol) ?? null);
  }

  private async fetchJson(
    url: string,
  ): Promise<Result<unknown, SecCompanyFactsError>> {
    const response = await this.httpClient.getJson({
      url,
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "application/json",
      },
    });

    if (response.isErr()) {
      if (response.error.httpStatus === 404) {
        return ok(null);
      }

      if (response.error.code === "invalid_json") {
        return err({
          code: "malformed_response",
          message: response.error.message,
          cause: response.error.cause,
        });
      }

      return err({
        code: "http_failure",
        message: response.error.message,
        httpStatus: response.error.httpStatus,
        retryable: response.error.retryable,
        cause: response.error.cause,
      });
    }

    return ok(response.value);
  }

  private mapToBoundaryError(failure: SecCompanyFactsError): AppBoundaryError {
    if (failure.code === "malformed_response") {
      return {
        source: "facts",
        code: "malformed_response",
        provider,
        message: failure.message,
        retryable: false,
        cause: failure.cause,
      };
    }

    return {
      source: "facts",
      code: this.mapHttpCode(failure.httpStatus, failure.message),
      provider,
      message: failure.message,
      retryable: failure.retryable,
      httpStatus: failure.httpStatus,
      cause: failure.cause,
    };
  }

  private mapHttpCode(
    httpStatus: number | undefined,
    message: string,
  ): AppBoundaryError["code"] {
    if (httpStatus === 429) {
      return "rate_limited";
    }

    if (httpStatus === 401 || httpStatus === 403) {
      return "auth_invalid";
    }

    if (/timed out/i.test(message)) {
      return "timeout";
    }

    return httpStatus === undefined ? "transport_error" : "provider_error";
  }
}
