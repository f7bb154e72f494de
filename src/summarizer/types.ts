/**
 * Heading trail from the document root to a node of the hierarchy.
 * Never empty: the first element is the document title.
 */
export type Path = readonly string[];

/** Opaque unit of source text. */
export type Chunk = string;

/** Short per-chunk summary used only to drive header proposal. */
export type Gist = string;

/** Proposed topic string, unique within one proposal. */
export type Label = string;

/**
 * Output of one node of the hierarchy.
 */
export interface Section {
  /** Route from the document root to this section. */
  path: Path;
  /** Last element of `path`. */
  heading: string;
  /** Section text, or the no-content sentinel. */
  body: string;
  /** Merged child sections; empty for sections written directly. */
  children: Section[];
}

/**
 * Capabilities the summarizer consumes. Any backing implementation works:
 * a chat model, a rule engine or a deterministic stub.
 *
 * Every operation receives the signal of the surrounding run and should stop
 * work once it fires.
 */
export interface LanguageService {
  /** Summarizes one chunk. Must return a non-empty string or throw. */
  gist(path: Path, chunk: Chunk, signal?: AbortSignal): Promise<Gist>;
  /** Proposes the ordered topic labels for a set of gists. May be empty. */
  proposeHeaders(path: Path, gists: Gist[], signal?: AbortSignal): Promise<Label[]>;
  /** Assigns one chunk to a label. Any string is accepted. */
  classify(
    path: Path,
    chunk: Chunk,
    labels: readonly Label[],
    signal?: AbortSignal,
  ): Promise<Label>;
  /** Writes the text of a section from its chunks. */
  writeSection(
    path: Path,
    chunks: readonly Chunk[],
    signal?: AbortSignal,
  ): Promise<string | null | undefined>;
}

/**
 * Recursion and failure policy of a summarizer instance.
 */
export interface SummarizerOptions {
  /** Below this chunk count a node is written directly. */
  minFanoutSize: number;
  /** At or beyond this path length a node is written directly. */
  maxDepth: number;
  /** Ceiling on language service calls in flight across the whole tree. */
  concurrencyLimit: number;
  /** Retries after the first failed call. */
  retryCount: number;
  /** Time budget of a single call, in milliseconds. */
  callTimeoutMs: number;
  /** Base delay of the exponential retry backoff, in milliseconds. */
  retryBaseDelayMs: number;
}

/**
 * Result of partitioning the chunks of one node.
 */
export interface PartitionResult {
  /** One entry per proposed label, in proposal order. Groups may be empty. */
  groups: Map<Label, Chunk[]>;
  /** Chunks whose classification matched no proposed label. */
  unclassified: Chunk[];
}
