import type { CompanyFactsPayload } from "../../core/entities/companyFacts";
import type { DividendTimeline } from "../../core/entities/timeline";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";
import type { AnnualTotalFilterService } from "./annualTotalFilterService";
import type { ConfidenceScoringService } from "./confidenceScoringService";
import type { DeduplicationService } from "./deduplicationService";
import type { FactExtractionService } from "./factExtractionService";
import type { ReviewTriageService } from "./reviewTriageService";
import type { SummaryStatisticsService } from "./summaryStatisticsService";

/**
 * Runs one entity's facts through extraction, deduplication, annual-total filtering
 * and scoring. Synchronous and stateless between calls.
 */
export class DividendPipelineService {
  constructor(
    private readonly extractor: FactExtractionService,
    private readonly deduplicator: DeduplicationService,
    private readonly annualTotalFilter: AnnualTotalFilterService,
    private readonly scorer: ConfidenceScoringService,
    private readonly summarizer: SummaryStatisticsService,
    private readonly triage: ReviewTriageService,
    private readonly log: Logger = defaultLogger,
  ) {}

  /**
   * `entityId` keys the per-entity overrides; falls back to the payload's CIK.
   */
  run(payload: CompanyFactsPayload, entityId?: string): DividendTimeline {
    const resolvedEntityId = entityId ?? payload.cik;
    const context = { entityId: resolvedEntityId };

    const extraction = this.extractor.extract(payload);
    const unique = this.deduplicator.deduplicate(extraction.candidates);
    const filtered = this.annualTotalFilter.filter(unique);
    const scored = this.scorer.score(filtered.kept, resolvedEntityId);

    this.log.debug(
      {
        ...context,
        extracted: extraction.candidates.length,
        rejected: extraction.rejected,
        deduplicated: unique.length,
      },
      "Extracted dividend candidates",
    );

    for (const removal of filtered.removed) {
      this.log.info(
        {
          ...context,
          exDate: removal.candidate.exDate,
          amount: removal.candidate.amount,
          year: removal.year,
          rule: removal.rule,
        },
        "Removed likely annual total",
      );
    }

    const dividends = scored.candidates;
    const flagged = dividends.filter((dividend) => dividend.needsReview).length;
    this.log.info(
      {
        ...context,
        dividendCount: dividends.length,
        needsReview: flagged,
        baseline: scored.baseline,
      },
      "Scored dividend timeline",
    );

    return {
      entityId: resolvedEntityId,
      entityName: payload.entityName,
      dividends,
      summary: this.summarizer.summarize(dividends),
      review: this.triage.triage(dividends),
    };
  }
}
