import type {
  ConfidencePenaltyKind,
  DividendCandidate,
} from "../../core/entities/dividend";
import type { DividendPipelineConfig } from "../../core/entities/pipelineConfig";
import type {
  ReviewDecision,
  ReviewVerdict,
} from "../../core/entities/review";

type TriageRule = {
  name: string;
  verdict: ReviewVerdict;
  matches: (candidate: DividendCandidate, kinds: Set<ConfidencePenaltyKind>) => boolean;
};

/**
 * Sorts scored candidates into review buckets so only genuine anomalies reach a
 * human. Rules run top to bottom and the first match wins.
 */
export class ReviewTriageService {
  private readonly rules: TriageRule[];

  constructor(config: DividendPipelineConfig) {
    const withinReasonableRange = (candidate: DividendCandidate): boolean =>
      candidate.amount > config.minReasonableAmount &&
      candidate.amount < config.maxReasonableAmount;

    this.rules = [
      {
        name: "not_flagged",
        verdict: "accepted",
        matches: (candidate) => !candidate.needsReview,
      },
      {
        name: "semi_annual_cadence",
        verdict: "auto_approve",
        // Alone, or with a modest ratio regardless of any other flag.
        matches: (_candidate, kinds) =>
          kinds.has("semi_annual_period") &&
          (kinds.size === 1 || kinds.has("above_median")),
      },
      {
        name: "annual_period_modest_ratio",
        verdict: "auto_approve",
        matches: (candidate, kinds) =>
          kinds.has("annual_period") &&
          kinds.has("above_median") &&
          withinReasonableRange(candidate),
      },
      {
        name: "modest_ratio",
        verdict: "auto_approve",
        matches: (candidate, kinds) =>
          kinds.has("above_median") &&
          !kinds.has("far_above_median") &&
          withinReasonableRange(candidate),
      },
      {
        name: "annual_period_total",
        verdict: "discard_annual_total",
        matches: (_candidate, kinds) => kinds.has("annual_period"),
      },
      {
        name: "unresolved",
        verdict: "manual_review",
        matches: () => true,
      },
    ];
  }

  get ruleOrder(): string[] {
    return this.rules.map((rule) => rule.name);
  }

  triage(candidates: readonly DividendCandidate[]): ReviewDecision[] {
    return candidates.map((candidate) => this.decide(candidate));
  }

  private decide(candidate: DividendCandidate): ReviewDecision {
    const kinds = new Set(
      candidate.confidenceReasons.map((penalty) => penalty.kind),
    );

    for (const rule of this.rules) {
      if (rule.matches(candidate, kinds)) {
        return { candidate, verdict: rule.verdict, rule: rule.name };
      }
    }

    return { candidate, verdict: "manual_review", rule: "unresolved" };
  }
}
