import { describe, expect, it } from "vitest";
import { defaultPipelineConfig } from "../../core/entities/pipelineConfig";
import { makeCandidate } from "../../__tests__/support/candidates";
import { AnnualTotalFilterService } from "./annualTotalFilterService";

const quarterEnds = ["03-31", "06-30", "09-30", "12-31"];

const yearOf = (year: number, amounts: number[]) =>
  amounts.map((amount, index) =>
    makeCandidate({
      amount,
      exDate: `${year}-${quarterEnds[index % 4]}`,
      fiscalPeriod: `Q${(index % 4) + 1}`,
    }),
  );

describe("AnnualTotalFilterService", () => {
  const service = new AnnualTotalFilterService(defaultPipelineConfig);

  it("skips entities with fewer than four candidates", () => {
    const candidates = [
      makeCandidate({ exDate: "2024-01-15", amount: 0.25 }),
      makeCandidate({ exDate: "2024-02-15", amount: 10 }),
      makeCandidate({ exDate: "2024-03-15", amount: 0.25 }),
    ];

    expect(service.filter(candidates)).toEqual({
      kept: candidates,
      removed: [],
    });
  });

  it("leaves a year with exactly four candidates untouched", () => {
    const candidates = yearOf(2024, [0.25, 0.25, 0.25, 1]);

    const result = service.filter(candidates);

    expect(result.kept).toEqual(candidates);
    expect(result.removed).toEqual([]);
  });

  it("removes an interquartile outlier from a crowded year", () => {
    const candidates = [
      ...yearOf(2023, [0.2, 0.21, 0.19, 0.2]),
      makeCandidate({
        amount: 0.8,
        exDate: "2023-12-15",
        fiscalPeriod: undefined,
        fiscalQuarter: undefined,
      }),
    ];

    const result = service.filter(candidates);

    expect(result.kept.map((candidate) => candidate.amount)).toEqual([
      0.2, 0.21, 0.19, 0.2,
    ]);
    expect(result.removed).toEqual([
      { candidate: candidates[4], year: 2023, rule: "iqr_outlier" },
    ]);
  });

  it("keeps an amount exactly at the upper interquartile fence", () => {
    const atFence = yearOf(2024, [0.25, 0.25, 0.5, 0.5, 0.875]);
    const pastFence = yearOf(2024, [0.25, 0.25, 0.5, 0.5, 0.876]);

    expect(service.filter(atFence).removed).toEqual([]);
    expect(service.filter(pastFence).removed).toEqual([
      { candidate: pastFence[4], year: 2024, rule: "iqr_outlier" },
    ]);
  });

  it.each([
    [0.875, undefined, true],
    [1.125, undefined, true],
    [1.125, "Q4", true],
    [0.87, undefined, false],
    [1.13, undefined, false],
    [1.25, "Q2", false],
    [1.26, "Q2", true],
  ] as const)(
    "treats %s against a 0.25 median (label %s) as removable: %s",
    (amount, fiscalPeriod, removable) => {
      const extra = makeCandidate({
        amount,
        exDate: "2024-11-15",
        fiscalPeriod,
        fiscalQuarter: undefined,
      });

      const result = service.filter([
        ...yearOf(2024, [0.25, 0.25, 0.25, 0.25]),
        extra,
      ]);

      expect(result.kept.includes(extra)).toBe(!removable);
    },
  );

  it("falls back to the ratio rule when the interquartile range is zero", () => {
    const unlabelledTotal = makeCandidate({
      amount: 1,
      exDate: "2024-12-20",
      fiscalPeriod: undefined,
      fiscalQuarter: undefined,
    });
    const candidates = [...yearOf(2024, [0.25, 0.25, 0.25, 0.25]), unlabelledTotal];

    const result = service.filter(candidates);

    expect(result.kept).toHaveLength(4);
    expect(result.removed).toEqual([
      { candidate: unlabelledTotal, year: 2024, rule: "ratio_to_median" },
    ]);
  });

  it("keeps a ratio-window figure carrying a non-fourth-quarter label", () => {
    const labelled = makeCandidate({
      amount: 1,
      exDate: "2024-05-20",
      fiscalPeriod: "Q2",
      fiscalQuarter: 2,
    });
    const candidates = [...yearOf(2024, [0.25, 0.25, 0.25, 0.25]), labelled];

    expect(service.filter(candidates).kept).toContain(labelled);
  });

  it("removes a fourth-quarter figure inside the ratio window", () => {
    const q4Total = makeCandidate({
      amount: 0.9,
      exDate: "2024-12-20",
      fiscalPeriod: "Q4",
      fiscalQuarter: 4,
    });
    const candidates = [...yearOf(2024, [0.25, 0.25, 0.25, 0.25]), q4Total];

    expect(service.filter(candidates).kept).not.toContain(q4Total);
  });

  it("removes any extreme ratio regardless of label", () => {
    const extreme = makeCandidate({
      amount: 1.5,
      exDate: "2024-05-20",
      fiscalPeriod: "Q2",
      fiscalQuarter: 2,
    });
    const candidates = [
      ...yearOf(2024, [0.25, 0.25, 0.25, 0.25, 0.25]),
      extreme,
    ];

    const result = service.filter(candidates);

    expect(result.kept).toHaveLength(5);
    expect(result.removed.map((removal) => removal.candidate)).toEqual([
      extreme,
    ]);
  });

  it("judges each calendar year on its own", () => {
    const crowded = [
      ...yearOf(2023, [0.2, 0.2, 0.2, 0.2]),
      makeCandidate({
        amount: 0.8,
        exDate: "2023-12-15",
        fiscalPeriod: undefined,
        fiscalQuarter: undefined,
      }),
    ];
    const regular = yearOf(2024, [0.2, 0.2, 0.2, 0.8]);

    const result = service.filter([...crowded, ...regular]);

    expect(result.kept).toEqual([...crowded.slice(0, 4), ...regular]);
  });

  it("evaluates its rules in a fixed order", () => {
    expect(service.ruleOrder).toEqual([
      "regular_cadence",
      "iqr_outlier",
      "ratio_to_median",
    ]);
  });
});
