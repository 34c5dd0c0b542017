export type DividendPeriodType =
  | "instant"
  | "quarterly"
  | "semi_annual"
  | "annual"
  | "other";

export type FiscalQuarter = 1 | 2 | 3 | 4;

/**
 * Tag families in the dividend catalog. Deduplication ranks them by priority.
 */
export type DividendTagFamily = "declared" | "paid" | "total";

/**
 * Closed set of reasons a candidate lost confidence. `factor` is the multiplier
 * that was applied; the other fields record what tripped the rule.
 */
export type ConfidencePenalty =
  | {
      kind: "amount_above_ceiling";
      factor: number;
      amount: number;
      ceiling: number;
    }
  | {
      kind: "amount_below_floor";
      factor: number;
      amount: number;
      floor: number;
    }
  | { kind: "far_above_median"; factor: number; ratio: number }
  | { kind: "above_median"; factor: number; ratio: number }
  | { kind: "below_median"; factor: number; ratio: number }
  | { kind: "annual_period"; factor: number; periodDays: number }
  | { kind: "semi_annual_period"; factor: number; periodDays: number }
  | { kind: "missing_fiscal_quarter"; factor: number }
  | { kind: "annual_report_without_quarter"; factor: number; form: string }
  | {
      kind: "entity_ceiling_exceeded";
      factor: number;
      entityId: string;
      amount: number;
      ceiling: number;
    };

export type ConfidencePenaltyKind = ConfidencePenalty["kind"];

export type DividendCandidate = {
  amount: number;
  exDate: string;
  periodStart?: string;
  fiscalYear?: number;
  fiscalPeriod?: string;
  fiscalQuarter?: FiscalQuarter;
  frequency?: "quarterly";
  dividendType: "cash";
  periodType: DividendPeriodType;
  periodDays: number;
  sourceTag: string;
  sourceForm?: string;
  sourceAccession?: string;
  filedDate?: string;
  confidence: number;
  confidenceReasons: ConfidencePenalty[];
  needsReview: boolean;
};
