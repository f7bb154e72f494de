import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors";
import { resolveSummarizerOptions } from "./SummarizerConfig";

describe("resolveSummarizerOptions", () => {
  it("fills in every default", () => {
    expect(resolveSummarizerOptions()).toEqual({
      minFanoutSize: 5,
      maxDepth: 3,
      concurrencyLimit: 8,
      retryCount: 2,
      callTimeoutMs: 60_000,
      retryBaseDelayMs: 1000,
    });
  });

  it("keeps supplied values", () => {
    const options = resolveSummarizerOptions({ maxDepth: 1, retryCount: 0 });
    expect(options.maxDepth).toBe(1);
    expect(options.retryCount).toBe(0);
    expect(options.minFanoutSize).toBe(5);
  });

  it("rejects a depth below one", () => {
    expect(() => resolveSummarizerOptions({ maxDepth: 0 })).toThrow(ConfigurationError);
    expect(() => resolveSummarizerOptions({ maxDepth: 0 })).toThrow(
      /^Invalid summarizer options: maxDepth: /,
    );
  });

  it("rejects a fractional concurrency limit", () => {
    expect(() => resolveSummarizerOptions({ concurrencyLimit: 2.5 })).toThrow(
      /concurrencyLimit/,
    );
  });
});
