import type {
  BatchRunReport,
  BatchRunTotals,
  CompanyRunReport,
} from "../../core/entities/batch";
import type { CompanyFactsProviderPort } from "../../core/ports/inboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";
import type { DividendPipelineService } from "./dividendPipelineService";

const tally = (companies: readonly CompanyRunReport[]): BatchRunTotals => ({
  companies: companies.length,
  success: companies.filter((company) => company.status === "success").length,
  noData: companies.filter((company) => company.status === "no_data").length,
  noDividends: companies.filter((company) => company.status === "no_dividends")
    .length,
  errors: companies.filter((company) => company.status === "error").length,
  dividends: companies.reduce((total, company) => total + company.dividendCount, 0),
  flagged: companies.reduce((total, company) => total + company.flaggedCount, 0),
});

/**
 * Runs the pipeline for a list of companies one after another, so requests go
 * through the provider's spacing in order. A failed company is recorded and the
 * run moves on.
 */
export class DividendBatchService {
  constructor(
    private readonly factsProvider: CompanyFactsProviderPort,
    private readonly pipeline: DividendPipelineService,
    private readonly log: Logger = defaultLogger,
  ) {}

  async run(symbols: readonly string[]): Promise<BatchRunReport> {
    const companies: CompanyRunReport[] = [];

    for (const symbol of symbols) {
      const report = await this.runCompany(symbol);
      this.log.info(
        {
          symbol,
          status: report.status,
          dividendCount: report.dividendCount,
          flaggedCount: report.flaggedCount,
          error: report.error,
        },
        "Company dividend run finished",
      );
      companies.push(report);
    }

    const totals = tally(companies);
    this.log.info({ totals }, "Dividend batch finished");
    return { companies, totals };
  }

  private async runCompany(symbol: string): Promise<CompanyRunReport> {
    const empty = { symbol, dividendCount: 0, flaggedCount: 0 };

    try {
      const factsResult = await this.factsProvider.fetchCompanyFacts({ symbol });
      if (factsResult.isErr()) {
        return {
          ...empty,
          status: "error",
          error: {
            code: factsResult.error.code,
            message: factsResult.error.message,
          },
        };
      }

      if (!factsResult.value) {
        return { ...empty, status: "no_data" };
      }

      const { cik, payload } = factsResult.value;
      const timeline = this.pipeline.run(payload, cik);
      const flaggedCount = timeline.dividends.filter(
        (dividend) => dividend.needsReview,
      ).length;

      return {
        symbol,
        status: timeline.dividends.length > 0 ? "success" : "no_dividends",
        cik,
        entityName: timeline.entityName,
        dividendCount: timeline.dividends.length,
        flaggedCount,
        timeline,
      };
    } catch (error) {
      return {
        ...empty,
        status: "error",
        error: {
          code: "unexpected",
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }
}
