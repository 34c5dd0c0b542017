import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyFactsPayload } from "../../../core/entities/companyFacts";

const companyFactsSchema = z.object({
  cik: z.union([z.number().int().nonnegative(), z.string()]).optional(),
  entityName: z.string().optional(),
  facts: z
    .record(z.string(), z.record(z.string(), z.unknown()))
    .default({}),
});

/**
 * Zero-pads a CIK to the 10-digit form EDGAR uses in URLs and override tables.
 */
export const normalizeCik = (raw: string | number): string | undefined => {
  const digits = String(raw).trim();
  if (!/^\d{1,10}$/.test(digits)) {
    return undefined;
  }

  return digits.padStart(10, "0");
};

/**
 * Validates the top level of a company-facts document. Individual facts are left
 * for extraction, which skips the malformed ones.
 */
export const parseCompanyFactsPayload = (
  input: unknown,
  provider = "sec-edgar",
): Result<CompanyFactsPayload, AppBoundaryError> => {
  const parsed = companyFactsSchema.safeParse(input);
  if (!parsed.success) {
    return err({
      source: "payload",
      code: "validation_error",
      provider,
      message: `Company facts payload was malformed: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
        .join("; ")}`,
      retryable: false,
      cause: parsed.error,
    });
  }

  const { cik, entityName, facts } = parsed.data;
  return ok({
    cik: cik === undefined ? undefined : normalizeCik(cik),
    entityName: entityName?.trim() || undefined,
    facts,
  });
};
