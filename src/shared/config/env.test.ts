import { describe, expect, it } from "vitest";
import {
  dividendSymbols,
  env,
  parseCeilingOverrides,
  pipelineConfigFromEnv,
} from "./env";

describe("parseCeilingOverrides", () => {
  it("pads CIKs and reads ceilings", () => {
    expect(parseCeilingOverrides("18230=10, 0000320193 = 7.5")).toEqual({
      "0000018230": 10,
      "0000320193": 7.5,
    });
  });

  it("ignores malformed entries", () => {
    expect(
      parseCeilingOverrides("AAPL=10,18230=,=5,18230=abc,66740=-1,,1=2"),
    ).toEqual({ "0000000001": 2 });
  });

  it("returns no overrides for an empty value", () => {
    expect(parseCeilingOverrides("")).toEqual({});
  });
});

describe("pipelineConfigFromEnv", () => {
  it("maps environment knobs onto the pipeline config", () => {
    const config = pipelineConfigFromEnv({
      ...env,
      DIVIDEND_MAX_REASONABLE: 25,
      DIVIDEND_REVIEW_THRESHOLD: 0.7,
      DIVIDEND_ANNUAL_RATIO_MIN: 3,
      DIVIDEND_CEILING_OVERRIDES: "66740=4",
    });

    expect(config.maxReasonableAmount).toBe(25);
    expect(config.reviewThreshold).toBe(0.7);
    expect(config.annualTotalRatioMin).toBe(3);
    expect(config.entityCeilingOverrides).toEqual({ "0000066740": 4 });
    expect(config.annualReportForms).toEqual(["10-K", "10-K/A"]);
  });
});

describe("dividendSymbols", () => {
  it("splits, trims and upper-cases the configured list", () => {
    expect(
      dividendSymbols({ ...env, DIVIDEND_SYMBOLS: " aapl, ko,,18230 " }),
    ).toEqual(["AAPL", "KO", "18230"]);
  });
});
