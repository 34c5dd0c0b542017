export type PaymentPattern =
  | "very stable"
  | "stable"
  | "variable"
  | "highly variable";

export type EmptyDividendSummary = { status: "empty"; count: 0 };

export type PopulatedDividendSummary = {
  status: "ok";
  count: number;
  amountMin: number;
  amountMax: number;
  amountMean: number;
  amountMedian: number;
  confidenceMean: number;
  needsReviewCount: number;
  dateRange: { from: string; to: string };
  /** Present only with at least two amounts, as are the two fields below. */
  amountStdev?: number;
  coefficientOfVariation?: number;
  pattern?: PaymentPattern;
};

export type DividendSummary = EmptyDividendSummary | PopulatedDividendSummary;
