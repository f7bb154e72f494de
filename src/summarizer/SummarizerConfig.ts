import { z } from "zod";
import {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_CONCURRENCY_LIMIT,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MIN_FANOUT_SIZE,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_COUNT,
} from "../utils/config";
import { ConfigurationError } from "./errors";
import type { SummarizerOptions } from "./types";

const summarizerOptionsSchema = z.object({
  minFanoutSize: z.number().int().min(1).default(DEFAULT_MIN_FANOUT_SIZE),
  maxDepth: z.number().int().min(1).default(DEFAULT_MAX_DEPTH),
  concurrencyLimit: z.number().int().min(1).default(DEFAULT_CONCURRENCY_LIMIT),
  retryCount: z.number().int().min(0).default(DEFAULT_RETRY_COUNT),
  callTimeoutMs: z.number().int().positive().default(DEFAULT_CALL_TIMEOUT_MS),
  retryBaseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_BASE_DELAY_MS),
});

/**
 * Fills in defaults and validates summarizer options.
 * @throws {ConfigurationError} If any option is out of range.
 */
export function resolveSummarizerOptions(
  options: Partial<SummarizerOptions> = {},
): SummarizerOptions {
  const result = summarizerOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid summarizer options: ${issues}`);
  }
  return result.data;
}
