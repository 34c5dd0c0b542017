import type { DividendCandidate } from "../../core/entities/dividend";
import type { DividendPipelineConfig } from "../../core/entities/pipelineConfig";
import { calendarYear } from "../../shared/utils/dateUtils";
import { median } from "../../shared/utils/statistics";

export type AnnualTotalRuleName =
  | "regular_cadence"
  | "iqr_outlier"
  | "ratio_to_median";

type YearBucket = {
  year: number;
  candidates: DividendCandidate[];
};

type AnnualTotalRule = {
  name: AnnualTotalRuleName;
  appliesTo: (bucket: YearBucket) => boolean;
  removals: (bucket: YearBucket) => DividendCandidate[];
};

export type AnnualTotalRemoval = {
  candidate: DividendCandidate;
  year: number;
  rule: AnnualTotalRuleName;
};

export type AnnualTotalFilterResult = {
  kept: DividendCandidate[];
  removed: AnnualTotalRemoval[];
};

const fourthQuarterLabel = "Q4";

const interquartileBounds = (
  bucket: YearBucket,
): { q3: number; iqr: number } => {
  const amounts = bucket.candidates
    .map((candidate) => candidate.amount)
    .sort((left, right) => left - right);
  const q1 = amounts[Math.floor(amounts.length / 4)] ?? 0;
  const q3 = amounts[Math.floor((3 * amounts.length) / 4)] ?? 0;
  return { q3, iqr: q3 - q1 };
};

/**
 * Drops cumulative annual figures that slipped through extraction, one calendar
 * year at a time. Each year is handled by the first rule whose predicate matches.
 */
export class AnnualTotalFilterService {
  private readonly rules: AnnualTotalRule[];

  constructor(private readonly config: DividendPipelineConfig) {
    this.rules = [
      {
        name: "regular_cadence",
        appliesTo: (bucket) =>
          bucket.candidates.length <= config.maxEventsPerYear,
        removals: () => [],
      },
      {
        name: "iqr_outlier",
        appliesTo: (bucket) => interquartileBounds(bucket).iqr > 0,
        removals: (bucket) => {
          const { q3, iqr } = interquartileBounds(bucket);
          const upperBound = q3 + 1.5 * iqr;
          return bucket.candidates.filter(
            (candidate) => candidate.amount > upperBound,
          );
        },
      },
      {
        name: "ratio_to_median",
        appliesTo: () => true,
        removals: (bucket) => {
          const yearMedian = median(
            bucket.candidates.map((candidate) => candidate.amount),
          );
          if (yearMedian <= 0) {
            return [];
          }

          return bucket.candidates.filter((candidate) => {
            const ratio = candidate.amount / yearMedian;
            const looksLikeAnnualTotal =
              ratio >= config.annualTotalRatioMin &&
              ratio <= config.annualTotalRatioMax &&
              (candidate.fiscalPeriod === undefined ||
                candidate.fiscalPeriod === fourthQuarterLabel);
            return looksLikeAnnualTotal || ratio > config.extremeRatioCutoff;
          });
        },
      },
    ];
  }

  get ruleOrder(): AnnualTotalRuleName[] {
    return this.rules.map((rule) => rule.name);
  }

  filter(candidates: readonly DividendCandidate[]): AnnualTotalFilterResult {
    if (candidates.length < this.config.minEventsForAnnualFilter) {
      return { kept: [...candidates], removed: [] };
    }

    const buckets = new Map<number, YearBucket>();
    for (const candidate of candidates) {
      const year = calendarYear(candidate.exDate);
      const bucket = buckets.get(year);
      if (bucket) {
        bucket.candidates.push(candidate);
      } else {
        buckets.set(year, { year, candidates: [candidate] });
      }
    }

    const removed: AnnualTotalRemoval[] = [];
    for (const bucket of buckets.values()) {
      const rule = this.rules.find((candidateRule) =>
        candidateRule.appliesTo(bucket),
      );
      if (!rule) {
        continue;
      }

      for (const candidate of rule.removals(bucket)) {
        removed.push({ candidate, year: bucket.year, rule: rule.name });
      }
    }

    const removedSet = new Set(removed.map((removal) => removal.candidate));
    return {
      kept: candidates.filter((candidate) => !removedSet.has(candidate)),
      removed,
    };
  }
}
