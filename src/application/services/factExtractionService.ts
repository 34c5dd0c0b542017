import { z } from "zod";
import {
  factUnitPreference,
  type CompanyFactsPayload,
  type FactUnit,
  type RawFact,
} from "../../core/entities/companyFacts";
import type {
  DividendCandidate,
  DividendPeriodType,
  FiscalQuarter,
} from "../../core/entities/dividend";
import {
  dividendTagCatalog,
  type DividendTagDefinition,
} from "../../core/entities/dividendTags";
import type { DividendPipelineConfig } from "../../core/entities/pipelineConfig";
import { daysBetween, parseIsoDate } from "../../shared/utils/dateUtils";
import { roundTo } from "../../shared/utils/statistics";

const tagFactsSchema = z.object({
  label: z.string().optional(),
  units: z.record(z.string(), z.array(z.unknown())),
});

const optionalText = z.string().nullish().catch(undefined);

// Only `val` and `end` can reject a fact; other fields fall back to undefined.
const rawFactSchema = z.object({
  val: z.number().finite(),
  end: z.string(),
  start: optionalText,
  fy: z.coerce.number().int().positive().nullish().catch(undefined),
  fp: optionalText,
  form: optionalText,
  filed: optionalText,
  accn: optionalText,
});

export type FactRejectionReason =
  | "malformed"
  | "non_positive_value"
  | "total_without_per_share"
  | "full_year_label"
  | "unlabeled_annual_or_event_form";

type FactRejectionRule = {
  reason: Exclude<FactRejectionReason, "malformed">;
  rejects: (fact: RawFact, tag: DividendTagDefinition) => boolean;
};

export type FactExtractionResult = {
  candidates: DividendCandidate[];
  rejected: Record<FactRejectionReason, number>;
};

const quarterLabels: Record<string, FiscalQuarter | undefined> = {
  Q1: 1,
  Q2: 2,
  Q3: 3,
  Q4: 4,
};

const fullYearLabel = "FY";

export const classifyPeriod = (
  periodStart: string | undefined,
  periodEnd: string,
): { periodType: DividendPeriodType; periodDays: number } => {
  const end = parseIsoDate(periodEnd);
  const start = periodStart ? parseIsoDate(periodStart) : null;
  if (!start || !end) {
    return { periodType: "instant", periodDays: 0 };
  }

  const periodDays = daysBetween(start, end);
  if (periodDays >= 80 && periodDays <= 100) {
    return { periodType: "quarterly", periodDays };
  }
  if (periodDays >= 165 && periodDays <= 185) {
    return { periodType: "semi_annual", periodDays };
  }
  if (periodDays >= 355 && periodDays <= 375) {
    return { periodType: "annual", periodDays };
  }

  return { periodType: "other", periodDays };
};

/**
 * Turns allow-listed XBRL facts into dividend candidates, one fact at a time.
 */
export class FactExtractionService {
  private readonly rules: FactRejectionRule[];

  constructor(
    config: DividendPipelineConfig,
    private readonly catalog: readonly DividendTagDefinition[] = dividendTagCatalog,
  ) {
    const unlabeledForms = new Set([
      ...config.annualReportForms,
      ...config.eventReportForms,
    ]);

    this.rules = [
      {
        reason: "non_positive_value",
        rejects: (fact) => roundTo(fact.value, 4) <= 0,
      },
      {
        reason: "total_without_per_share",
        rejects: (fact, tag) => fact.unit === "USD" && !tag.perShare,
      },
      {
        reason: "full_year_label",
        rejects: (fact) => fact.fiscalPeriod === fullYearLabel,
      },
      {
        reason: "unlabeled_annual_or_event_form",
        rejects: (fact) =>
          !fact.fiscalPeriod &&
          fact.form !== undefined &&
          unlabeledForms.has(fact.form),
      },
    ];
  }

  /**
   * Rejection rules in evaluation order; the first match decides the reason.
   */
  get ruleOrder(): FactRejectionReason[] {
    return this.rules.map((rule) => rule.reason);
  }

  extract(payload: CompanyFactsPayload): FactExtractionResult {
    const rejected: Record<FactRejectionReason, number> = {
      malformed: 0,
      non_positive_value: 0,
      total_without_per_share: 0,
      full_year_label: 0,
      unlabeled_annual_or_event_form: 0,
    };
    const candidates: DividendCandidate[] = [];

    for (const tag of this.catalog) {
      const tagBody = payload.facts[tag.namespace]?.[tag.tag];
      if (tagBody === undefined) {
        continue;
      }

      const parsedTag = tagFactsSchema.safeParse(tagBody);
      if (!parsedTag.success) {
        rejected.malformed += 1;
        continue;
      }

      const unit = factUnitPreference.find(
        (candidateUnit) => (parsedTag.data.units[candidateUnit]?.length ?? 0) > 0,
      );
      if (!unit) {
        continue;
      }

      for (const entry of parsedTag.data.units[unit] ?? []) {
        const fact = this.toRawFact(entry, unit);
        if (!fact) {
          rejected.malformed += 1;
          continue;
        }

        const rule = this.rules.find((candidateRule) =>
          candidateRule.rejects(fact, tag),
        );
        if (rule) {
          rejected[rule.reason] += 1;
          continue;
        }

        candidates.push(this.toCandidate(fact, tag));
      }
    }

    return { candidates, rejected };
  }

  private toRawFact(entry: unknown, unit: FactUnit): RawFact | null {
    const parsed = rawFactSchema.safeParse(entry);
    if (!parsed.success) {
      return null;
    }

    const { val, end, start, fy, fp, form, filed, accn } = parsed.data;
    if (!parseIsoDate(end)) {
      return null;
    }
    const periodStart =
      start && parseIsoDate(start) ? start.trim() : undefined;

    return {
      value: val,
      unit,
      periodEnd: end.trim(),
      periodStart,
      fiscalYear: fy ?? undefined,
      fiscalPeriod: fp?.trim() || undefined,
      form: form?.trim() || undefined,
      filedDate: filed?.trim() || undefined,
      accession: accn?.trim() || undefined,
    };
  }

  private toCandidate(
    fact: RawFact,
    tag: DividendTagDefinition,
  ): DividendCandidate {
    const { periodType, periodDays } = classifyPeriod(
      fact.periodStart,
      fact.periodEnd,
    );
    const fiscalQuarter = fact.fiscalPeriod
      ? quarterLabels[fact.fiscalPeriod]
      : undefined;

    return {
      amount: roundTo(fact.value, 4),
      exDate: fact.periodEnd,
      periodStart: fact.periodStart,
      fiscalYear: fact.fiscalYear,
      fiscalPeriod: fact.fiscalPeriod,
      fiscalQuarter,
      frequency: fiscalQuarter ? "quarterly" : undefined,
      dividendType: "cash",
      periodType,
      periodDays,
      sourceTag: tag.tag,
      sourceForm: fact.form,
      sourceAccession: fact.accession,
      filedDate: fact.filedDate,
      confidence: 1,
      confidenceReasons: [],
      needsReview: false,
    };
  }
}
