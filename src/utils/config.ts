/**
 * Default configuration values for the summarizer and the CLI
 */

/** Below this many chunks a node is written directly instead of being expanded */
export const DEFAULT_MIN_FANOUT_SIZE = 5;

/** Path length at which a node is always written directly */
export const DEFAULT_MAX_DEPTH = 3;

/**
 * Maximum number of language service calls in flight at once,
 * shared by every level of the recursion.
 */
export const DEFAULT_CONCURRENCY_LIMIT = 8;

/**
 * Number of retries after the first failed language service call.
 */
export const DEFAULT_RETRY_COUNT = 2;

/**
 * Base delay in milliseconds for the exponential retry backoff.
 */
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

/**
 * Timeout in milliseconds for a single language service call.
 */
export const DEFAULT_CALL_TIMEOUT_MS = 60_000;

/**
 * Window size in characters used by the CLI to cut input text into chunks.
 */
export const DEFAULT_CHUNK_SIZE = 1000;

/** Chat model used when none is configured */
export const DEFAULT_CHAT_MODEL = "openai:gpt-4o-mini";

/** Body text of a section that produced nothing */
export const NO_CONTENT_SENTINEL = "No content generated for this section.";

/** Heading of the group holding chunks that matched none of the proposed labels */
export const UNCLASSIFIED_HEADING = "Unclassified";
