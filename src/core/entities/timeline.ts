import type { DividendCandidate } from "./dividend";
import type { ReviewDecision } from "./review";
import type { DividendSummary } from "./summary";

/**
 * Everything one pipeline run produces for a single entity.
 */
export type DividendTimeline = {
  entityId?: string;
  entityName?: string;
  dividends: DividendCandidate[];
  summary: DividendSummary;
  review: ReviewDecision[];
};
