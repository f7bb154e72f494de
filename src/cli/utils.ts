/**
 * Shared CLI utilities and helper functions.
 */

import { LogLevel, setLogLevel } from "../utils/logger";
import type { GlobalOptions } from "./types";

/**
 * Sets up logging based on global options
 */
export function setupLogging(options: GlobalOptions): void {
  if (options.silent) {
    setLogLevel(LogLevel.ERROR);
  } else if (options.verbose) {
    setLogLevel(LogLevel.DEBUG);
  }
}

/**
 * Parses an integer CLI option and checks its lower bound.
 */
export function parseIntegerOption(value: string, name: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`Invalid value for ${name}: '${value}' (expected an integer >= ${min})`);
  }
  return parsed;
}
