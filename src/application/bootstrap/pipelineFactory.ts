import {
  defaultPipelineConfig,
  type DividendPipelineConfig,
} from "../../core/entities/pipelineConfig";
import type { Logger } from "../../shared/logger/logger";
import { AnnualTotalFilterService } from "../services/annualTotalFilterService";
import { ConfidenceScoringService } from "../services/confidenceScoringService";
import { DeduplicationService } from "../services/deduplicationService";
import { DividendPipelineService } from "../services/dividendPipelineService";
import { FactExtractionService } from "../services/factExtractionService";
import { ReviewTriageService } from "../services/reviewTriageService";
import { SummaryStatisticsService } from "../services/summaryStatisticsService";

/**
 * Wires every stage against one config object so a run never mixes thresholds.
 */
export const createDividendPipeline = (
  config: DividendPipelineConfig = defaultPipelineConfig,
  log?: Logger,
): DividendPipelineService =>
  new DividendPipelineService(
    new FactExtractionService(config),
    new DeduplicationService(config),
    new AnnualTotalFilterService(config),
    new ConfidenceScoringService(config),
    new SummaryStatisticsService(),
    new ReviewTriageService(config),
    log,
  );
