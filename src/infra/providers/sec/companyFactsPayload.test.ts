import { describe, expect, it } from "vitest";
import { normalizeCik, parseCompanyFactsPayload } from "./companyFactsPayload";

describe("normalizeCik", () => {
  it("zero-pads numeric and string CIKs", () => {
    expect(normalizeCik(320193)).toBe("0000320193");
    expect(normalizeCik(" 18230 ")).toBe("0000018230");
    expect(normalizeCik("0000018230")).toBe("0000018230");
  });

  it("rejects tickers and over-long values", () => {
    expect(normalizeCik("AAPL")).toBeUndefined();
    expect(normalizeCik("12345678901")).toBeUndefined();
    expect(normalizeCik("")).toBeUndefined();
  });
});

describe("parseCompanyFactsPayload", () => {
  it("normalizes the CIK and trims the entity name", () => {
    const result = parseCompanyFactsPayload({
      cik: 66740,
      entityName: " Example Corp ",
      facts: { "us-gaap": { Revenues: {} } },
    });

    expect(result._unsafeUnwrap()).toEqual({
      cik: "0000066740",
      entityName: "Example Corp",
      facts: { "us-gaap": { Revenues: {} } },
    });
  });

  it("defaults missing facts to an empty document", () => {
    expect(parseCompanyFactsPayload({})._unsafeUnwrap()).toEqual({
      cik: undefined,
      entityName: undefined,
      facts: {},
    });
  });

  it("reports shape errors with their path", () => {
    const result = parseCompanyFactsPayload(
      { facts: { "us-gaap": 3 } },
      "file",
    );

    const error = result._unsafeUnwrapErr();
    expect(error).toMatchObject({
      source: "payload",
      code: "validation_error",
      provider: "file",
      retryable: false,
    });
    expect(error.message).toContain("facts.us-gaap");
  });

  it("rejects a document that is not an object", () => {
    expect(parseCompanyFactsPayload(null).isErr()).toBe(true);
  });
});
