import type {
  ConfidencePenalty,
  DividendCandidate,
} from "../../core/entities/dividend";
import type { DividendPipelineConfig } from "../../core/entities/pipelineConfig";
import {
  mean,
  median,
  roundTo,
  sampleStdDev,
} from "../../shared/utils/statistics";

export const penaltyFactors = {
  amountAboveCeiling: 0.5,
  amountBelowFloor: 0.7,
  farAboveMedian: 0.6,
  aboveMedian: 0.8,
  belowMedian: 0.8,
  annualPeriod: 0.3,
  semiAnnualPeriod: 0.5,
  missingFiscalQuarter: 0.9,
  annualReportWithoutQuarter: 0.8,
  entityCeilingExceeded: 0.7,
} as const;

/**
 * Entity-wide figures each candidate is scored against.
 */
export type ScoringBaseline = {
  median: number;
  mean: number;
  /** Present only with at least four amounts. */
  stdev?: number;
  coefficientOfVariation?: number;
};

export type ConfidenceScoringResult = {
  candidates: DividendCandidate[];
  baseline: ScoringBaseline | null;
};

type ScoringContext = {
  baseline: ScoringBaseline;
  ceiling: number;
  entityId?: string;
  entityCeiling?: number;
};

type PenaltyRule = (
  candidate: DividendCandidate,
  context: ScoringContext,
) => ConfidencePenalty | null;

/**
 * Applies independent multiplicative penalties to each candidate. Every rule reads
 * the candidate as extracted, so the product does not depend on rule order.
 */
export class ConfidenceScoringService {
  private readonly rules: PenaltyRule[];

  constructor(private readonly config: DividendPipelineConfig) {
    const annualReportForms = new Set(config.annualReportForms);

    this.rules = [
      (candidate, { ceiling }) =>
        candidate.amount > ceiling
          ? {
              kind: "amount_above_ceiling",
              factor: penaltyFactors.amountAboveCeiling,
              amount: candidate.amount,
              ceiling,
            }
          : null,
      (candidate) =>
        candidate.amount < config.minReasonableAmount
          ? {
              kind: "amount_below_floor",
              factor: penaltyFactors.amountBelowFloor,
              amount: candidate.amount,
              floor: config.minReasonableAmount,
            }
          : null,
      (candidate, { baseline }) => {
        if (baseline.median <= 0) {
          return null;
        }

        const ratio = candidate.amount / baseline.median;
        if (ratio > 3) {
          return {
            kind: "far_above_median",
            factor: penaltyFactors.farAboveMedian,
            ratio: roundTo(ratio, 2),
          };
        }
        if (ratio > 2) {
          return {
            kind: "above_median",
            factor: penaltyFactors.aboveMedian,
            ratio: roundTo(ratio, 2),
          };
        }
        if (ratio < 0.5) {
          return {
            kind: "below_median",
            factor: penaltyFactors.belowMedian,
            ratio: roundTo(ratio, 2),
          };
        }
        return null;
      },
      (candidate) => {
        if (candidate.periodType === "annual") {
          return {
            kind: "annual_period",
            factor: penaltyFactors.annualPeriod,
            periodDays: candidate.periodDays,
          };
        }
        if (candidate.periodType === "semi_annual") {
          return {
            kind: "semi_annual_period",
            factor: penaltyFactors.semiAnnualPeriod,
            periodDays: candidate.periodDays,
          };
        }
        return null;
      },
      (candidate) =>
        candidate.fiscalQuarter === undefined
          ? {
              kind: "missing_fiscal_quarter",
              factor: penaltyFactors.missingFiscalQuarter,
            }
          : null,
      (candidate) =>
        candidate.fiscalQuarter === undefined &&
        candidate.sourceForm !== undefined &&
        annualReportForms.has(candidate.sourceForm)
          ? {
              kind: "annual_report_without_quarter",
              factor: penaltyFactors.annualReportWithoutQuarter,
              form: candidate.sourceForm,
            }
          : null,
      (candidate, { entityId, entityCeiling }) =>
        entityId !== undefined &&
        entityCeiling !== undefined &&
        candidate.amount > entityCeiling
          ? {
              kind: "entity_ceiling_exceeded",
              factor: penaltyFactors.entityCeilingExceeded,
              entityId,
              amount: candidate.amount,
              ceiling: entityCeiling,
            }
          : null,
    ];
  }

  score(
    candidates: readonly DividendCandidate[],
    entityId?: string,
  ): ConfidenceScoringResult {
    if (candidates.length === 0) {
      return { candidates: [], baseline: null };
    }

    const baseline = this.computeBaseline(
      candidates.map((candidate) => candidate.amount),
    );
    const overrides = this.config.entityCeilingOverrides;
    const entityCeiling =
      entityId !== undefined && Object.hasOwn(overrides, entityId)
        ? overrides[entityId]
        : undefined;
    const context: ScoringContext = {
      baseline,
      ceiling: entityCeiling ?? this.config.maxReasonableAmount,
      entityId,
      entityCeiling,
    };

    const scored = candidates.map((candidate) => {
      const reasons = this.rules
        .map((rule) => rule(candidate, context))
        .filter((penalty): penalty is ConfidencePenalty => penalty !== null);
      const confidence = roundTo(
        reasons.reduce((product, penalty) => product * penalty.factor, 1),
        3,
      );

      return {
        ...candidate,
        confidence,
        confidenceReasons: reasons,
        needsReview: confidence < this.config.reviewThreshold,
      };
    });

    scored.sort((left, right) =>
      left.exDate < right.exDate ? -1 : left.exDate > right.exDate ? 1 : 0,
    );

    return { candidates: scored, baseline };
  }

  private computeBaseline(amounts: number[]): ScoringBaseline {
    const baseline: ScoringBaseline = {
      median: median(amounts),
      mean: mean(amounts),
    };

    if (amounts.length >= 4) {
      const stdev = sampleStdDev(amounts);
      baseline.stdev = stdev;
      baseline.coefficientOfVariation =
        baseline.mean > 0 ? stdev / baseline.mean : 0;
    }

    return baseline;
  }
}
