/**
 * Unit keys as they appear under an XBRL tag's `units` map.
 */
export type FactUnit = "USD/shares" | "USD" | "pure";

/**
 * Scan order for unit keys; extraction uses the first one that carries data.
 */
export const factUnitPreference: readonly FactUnit[] = [
  "USD/shares",
  "USD",
  "pure",
];

/**
 * One disclosed data point, after field-level validation.
 */
export type RawFact = {
  value: number;
  unit: FactUnit;
  periodEnd: string;
  periodStart?: string;
  fiscalYear?: number;
  fiscalPeriod?: string;
  form?: string;
  filedDate?: string;
  accession?: string;
};

export type TagFacts = {
  label?: string;
  units: Record<string, unknown[]>;
};

/**
 * Company-facts payload with a validated top level; tag bodies stay unchecked
 * until extraction reaches them.
 */
export type CompanyFactsPayload = {
  cik?: string;
  entityName?: string;
  facts: Record<string, Record<string, unknown>>;
};
