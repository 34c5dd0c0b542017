import type { DividendCandidate } from "./dividend";

export type ReviewVerdict =
  | "accepted"
  | "auto_approve"
  | "discard_annual_total"
  | "manual_review";

export type ReviewDecision = {
  candidate: DividendCandidate;
  verdict: ReviewVerdict;
  rule: string;
};
