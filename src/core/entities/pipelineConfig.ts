/**
 * Tunables for one pipeline instance. Built once by the composition root and
 * passed to each stage; stages never read the environment.
 */
export type DividendPipelineConfig = {
  maxReasonableAmount: number;
  minReasonableAmount: number;
  reviewThreshold: number;
  dedupeToleranceMultiple: number;
  annualTotalRatioMin: number;
  annualTotalRatioMax: number;
  extremeRatioCutoff: number;
  maxEventsPerYear: number;
  minEventsForAnnualFilter: number;
  /** Entity id (10-digit CIK) to replacement amount ceiling. */
  entityCeilingOverrides: Readonly<Record<string, number>>;
  annualReportForms: readonly string[];
  eventReportForms: readonly string[];
};

export const defaultPipelineConfig: DividendPipelineConfig = {
  maxReasonableAmount: 50,
  minReasonableAmount: 0.01,
  reviewThreshold: 0.8,
  dedupeToleranceMultiple: 2.5,
  annualTotalRatioMin: 3.5,
  annualTotalRatioMax: 4.5,
  extremeRatioCutoff: 5,
  maxEventsPerYear: 4,
  minEventsForAnnualFilter: 4,
  entityCeilingOverrides: { "0000018230": 10 },
  annualReportForms: ["10-K", "10-K/A"],
  eventReportForms: ["8-K", "8-K/A"],
};
