import { describe, expect, it } from "vitest";
import type { DividendTimeline } from "../core/entities/timeline";
import { makeCandidate } from "../__tests__/support/candidates";
import {
  describePenalty,
  formatBatchReport,
  formatTimelineReport,
} from "./main";

describe("describePenalty", () => {
  it("renders the factor and the measured quantity", () => {
    expect(
      describePenalty({
        kind: "amount_above_ceiling",
        factor: 0.5,
        amount: 60,
        ceiling: 50,
      }),
    ).toBe("amount_above_ceiling x0.5 (amount=60, ceiling=50)");
    expect(
      describePenalty({ kind: "annual_period", factor: 0.3, periodDays: 364 }),
    ).toBe("annual_period x0.3 (days=364)");
    expect(
      describePenalty({
        kind: "entity_ceiling_exceeded",
        factor: 0.7,
        entityId: "0000018230",
        amount: 12,
        ceiling: 10,
      }),
    ).toBe("entity_ceiling_exceeded x0.7 (entity=0000018230, ceiling=10)");
    expect(
      describePenalty({ kind: "missing_fiscal_quarter", factor: 0.9 }),
    ).toBe("missing_fiscal_quarter x0.9");
  });
});

describe("formatTimelineReport", () => {
  it("lists dividends, summary and pending review decisions", () => {
    const regular = makeCandidate();
    const flagged = makeCandidate({
      amount: 0.55,
      exDate: "2024-09-30",
      fiscalPeriod: undefined,
      fiscalQuarter: undefined,
      confidence: 0.72,
      needsReview: true,
      confidenceReasons: [
        { kind: "above_median", factor: 0.8, ratio: 2.12 },
        { kind: "missing_fiscal_quarter", factor: 0.9 },
      ],
    });
    const timeline: DividendTimeline = {
      entityId: "0000000001",
      entityName: "Test Co",
      dividends: [regular, flagged],
      summary: {
        status: "ok",
        count: 2,
        amountMin: 0.25,
        amountMax: 0.55,
        amountMean: 0.4,
        amountMedian: 0.4,
        confidenceMean: 0.86,
        needsReviewCount: 1,
        dateRange: { from: "2024-03-31", to: "2024-09-30" },
        amountStdev: 0.212,
        coefficientOfVariation: 0.53,
        pattern: "highly variable",
      },
      review: [
        { candidate: regular, verdict: "accepted", rule: "not_flagged" },
        { candidate: flagged, verdict: "auto_approve", rule: "modest_ratio" },
      ],
    };

    expect(formatTimelineReport(timeline).split("\n")).toEqual([
      "Dividend timeline for Test Co (CIK 0000000001)",
      "Dividends: 2 (1 flagged for review)",
      "",
      "2024-03-31  0.2500  1.000  quarterly  CommonStockDividendsPerShareDeclared [10-Q Q1]",
      "2024-09-30  0.5500  0.720  quarterly  CommonStockDividendsPerShareDeclared [10-Q]",
      "",
      "Summary:",
      "- amount: min=0.2500, max=0.5500, mean=0.4000, median=0.4000",
      "- confidence: mean=0.860, needsReview=1",
      "- dates: 2024-03-31 to 2024-09-30",
      "- pattern: highly variable (cv=0.530)",
      "",
      "Review:",
      "- 2024-09-30 0.5500 auto_approve (modest_ratio): above_median x0.8 (ratio=2.12); missing_fiscal_quarter x0.9",
    ]);
  });

  it("renders placeholders for an empty timeline", () => {
    expect(
      formatTimelineReport({
        dividends: [],
        summary: { status: "empty", count: 0 },
        review: [],
      }).split("\n"),
    ).toEqual([
      "Dividend timeline for unknown entity",
      "Dividends: 0 (0 flagged for review)",
      "",
      "- none",
      "",
      "Summary:",
      "- no dividends found",
      "",
      "Review:",
      "- none",
    ]);
  });
});

describe("formatBatchReport", () => {
  it("prints totals and one line per company", () => {
    expect(
      formatBatchReport({
        companies: [
          {
            symbol: "DIV",
            status: "success",
            cik: "0000000001",
            dividendCount: 3,
            flaggedCount: 1,
          },
          {
            symbol: "BAD",
            status: "error",
            dividendCount: 0,
            flaggedCount: 0,
            error: { code: "rate_limited", message: "SEC rate limit hit" },
          },
          { symbol: "NONE", status: "no_data", dividendCount: 0, flaggedCount: 0 },
        ],
        totals: {
          companies: 3,
          success: 1,
          noData: 1,
          noDividends: 0,
          errors: 1,
          dividends: 3,
          flagged: 1,
        },
      }).split("\n"),
    ).toEqual([
      "Batch: 3 companies (1 success, 1 no data, 0 no dividends, 1 errors)",
      "Dividends: 3 (1 flagged for review)",
      "- DIV success dividends=3 flagged=1",
      "- BAD error (rate_limited): SEC rate limit hit",
      "- NONE no_data dividends=0 flagged=0",
    ]);
  });
});
