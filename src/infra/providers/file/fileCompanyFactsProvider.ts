import { readFile } from "node:fs/promises";
import { err, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  CompanyFactsProviderPort,
  CompanyFactsRequest,
  CompanyFactsResult,
} from "../../../core/ports/inboundPorts";
import { parseCompanyFactsPayload } from "../sec/companyFactsPayload";

/**
 * Bundled company-facts document used when no live provider is configured.
 */
export const sampleCompanyFactsUrl = new URL(
  "./fixtures/sampleCompanyFacts.json",
  import.meta.url,
);

/**
 * Reads a saved company-facts JSON document (the body EDGAR's companyfacts
 * endpoint returns). The requested symbol only labels errors.
 */
export class FileCompanyFactsProvider implements CompanyFactsProviderPort {
  constructor(
    private readonly path: URL | string,
    private readonly provider = "file",
  ) {}

  async fetchCompanyFacts(
    request: CompanyFactsRequest,
  ): Promise<Result<CompanyFactsResult | null, AppBoundaryError>> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      return err({
        source: "facts",
        code: "config_invalid",
        provider: this.provider,
        message: `Company facts file for ${request.symbol} could not be read: ${String(this.path)}`,
        retryable: false,
        cause: error,
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (error) {
      return err({
        source: "facts",
        code: "invalid_json",
        provider: this.provider,
        message: `Company facts file is not valid JSON: ${String(this.path)}`,
        retryable: false,
        cause: error,
      });
    }

    return parseCompanyFactsPayload(body, this.provider).map((payload) => ({
      cik: payload.cik ?? "0000000000",
      payload,
    }));
  }
}
