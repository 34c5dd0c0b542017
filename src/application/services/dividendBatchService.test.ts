import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  CompanyFactsProviderPort,
  CompanyFactsRequest,
  CompanyFactsResult,
} from "../../core/ports/inboundPorts";
import { factsPayload } from "../../__tests__/support/candidates";
import { createDividendPipeline } from "../bootstrap/pipelineFactory";
import { DividendBatchService } from "./dividendBatchService";

class StubFactsProvider implements CompanyFactsProviderPort {
  readonly requested: string[] = [];

  async fetchCompanyFacts(
    request: CompanyFactsRequest,
  ): Promise<Result<CompanyFactsResult | null, AppBoundaryError>> {
    this.requested.push(request.symbol);

    switch (request.symbol) {
      case "DIV":
        return ok({
          cik: "0000000001",
          payload: factsPayload({
            CommonStockDividendsPerShareDeclared: {
              "USD/shares": [
                { end: "2024-03-31", val: 0.25, fp: "Q1", form: "10-Q" },
                { end: "2024-06-30", val: 0.25, fp: "Q2", form: "10-Q" },
                { end: "2024-09-30", val: 0.55, form: "10-Q" },
              ],
            },
          }),
        });
      case "EMPTY":
        return ok({ cik: "0000000003", payload: { facts: {} } });
      case "BAD":
        return err({
          source: "facts",
          code: "rate_limited",
          provider: "stub",
          message: "SEC rate limit hit",
          retryable: true,
          httpStatus: 429,
        });
      case "BOOM":
        throw new Error("socket closed");
      default:
        return ok(null);
    }
  }
}

describe("DividendBatchService", () => {
  it("records a status per company and keeps going after failures", async () => {
    const provider = new StubFactsProvider();
    const service = new DividendBatchService(
      provider,
      createDividendPipeline(),
    );

    const report = await service.run(["BAD", "DIV", "NONE", "EMPTY", "BOOM"]);

    expect(provider.requested).toEqual(["BAD", "DIV", "NONE", "EMPTY", "BOOM"]);
    expect(
      report.companies.map((company) => [company.symbol, company.status]),
    ).toEqual([
      ["BAD", "error"],
      ["DIV", "success"],
      ["NONE", "no_data"],
      ["EMPTY", "no_dividends"],
      ["BOOM", "error"],
    ]);
    expect(report.companies[0]?.error).toEqual({
      code: "rate_limited",
      message: "SEC rate limit hit",
    });
    expect(report.companies[1]).toMatchObject({
      cik: "0000000001",
      entityName: "Test Co",
      dividendCount: 3,
      flaggedCount: 1,
    });
    expect(report.companies[1]?.timeline?.dividends).toHaveLength(3);
    expect(report.companies[4]?.error).toEqual({
      code: "unexpected",
      message: "socket closed",
    });
    expect(report.totals).toEqual({
      companies: 5,
      success: 1,
      noData: 1,
      noDividends: 1,
      errors: 2,
      dividends: 3,
      flagged: 1,
    });
  });

  it("reports empty totals for an empty symbol list", async () => {
    const service = new DividendBatchService(
      new StubFactsProvider(),
      createDividendPipeline(),
    );

    expect((await service.run([])).totals).toEqual({
      companies: 0,
      success: 0,
      noData: 0,
      noDividends: 0,
      errors: 0,
      dividends: 0,
      flagged: 0,
    });
  });
});
