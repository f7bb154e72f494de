import { UNCLASSIFIED_HEADING } from "../utils/config";
import { logger } from "../utils/logger";
import { ConcurrencyLimiter } from "./ConcurrencyLimiter";
import { CancellationError, ConfigurationError } from "./errors";
import { type Assignment, partition, resolveLabel } from "./Partitioner";
import { createEmptySection, createLeafSection, SectionMerger } from "./SectionMerger";
import { ServiceCallRunner } from "./ServiceCallRunner";
import { resolveSummarizerOptions } from "./SummarizerConfig";
import type {
  Chunk,
  Gist,
  Label,
  LanguageService,
  Path,
  Section,
  SummarizerOptions,
} from "./types";

const describePath = (path: Path): string => path.join(" > ");

/**
 * Turns an unordered set of chunks into a nested document.
 *
 * At each node the summarizer either writes the section directly or discovers
 * topic labels for the node, classifies the chunks under them and recurses
 * into every non-empty group. Gists, classifications and sibling subtrees run
 * concurrently; every language service call shares one limiter, so the total
 * number of calls in flight stays bounded however wide the tree gets.
 *
 * Failures of individual calls degrade the affected chunk or subtree. Only
 * cancellation of the run aborts it.
 */
export class HierarchicalSummarizer {
  readonly options: SummarizerOptions;
  private readonly runner: ServiceCallRunner;
  private readonly merger = new SectionMerger();

  constructor(service: LanguageService, options: Partial<SummarizerOptions> = {}) {
    this.options = resolveSummarizerOptions(options);
    this.runner = new ServiceCallRunner(
      service,
      new ConcurrencyLimiter(this.options.concurrencyLimit),
      this.options,
    );
  }

  /**
   * Summarizes the chunks into a section headed by the last element of `path`.
   * @throws {ConfigurationError} If the path is empty.
   * @throws {CancellationError} If the signal fires before the run completes.
   */
  async summarize(path: Path, chunks: readonly Chunk[], signal?: AbortSignal): Promise<Section> {
    if (path.length === 0) {
      throw new ConfigurationError("Path must contain at least the root heading");
    }

    logger.info(`📝 Summarizing ${chunks.length} chunks under "${describePath(path)}"`);
    const section = await this.summarizeNode([...path], chunks, signal);
    logger.info(`✅ Finished summarizing "${describePath(path)}"`);
    return section;
  }

  /**
   * True when a node must be written directly rather than expanded.
   */
  isBaseCase(path: Path, chunkCount: number): boolean {
    return chunkCount < this.options.minFanoutSize || path.length >= this.options.maxDepth;
  }

  private async summarizeNode(
    path: Path,
    chunks: readonly Chunk[],
    signal?: AbortSignal,
  ): Promise<Section> {
    if (signal?.aborted) {
      throw new CancellationError();
    }
    if (chunks.length === 0) {
      return createEmptySection(path);
    }
    if (this.isBaseCase(path, chunks.length)) {
      return this.writeDirectly(path, chunks, signal);
    }

    const gists = await this.generateGists(path, chunks, signal);
    if (gists.length === 0) {
      logger.warn(`⚠️  No gists for "${describePath(path)}", writing it directly`);
      return this.writeDirectly(path, chunks, signal);
    }

    const labels = await this.proposeLabels(path, gists, signal);
    if (labels.length === 0) {
      logger.debug(`No headers proposed for "${describePath(path)}", writing it directly`);
      return this.writeDirectly(path, chunks, signal);
    }

    const { groups, unclassified } = await partition(chunks, labels, (chunk) =>
      this.classifyChunk(path, chunk, labels, signal),
    );

    if (unclassified.length > 0) {
      logger.debug(
        `${unclassified.length} chunks under "${describePath(path)}" matched no header`,
      );
    }
    const branches = this.collectBranches(groups, unclassified);
    logger.debug(
      `Expanding "${describePath(path)}" into ${branches.map(([label]) => label).join(", ")}`,
    );

    const children = await Promise.all(
      branches.map(([label, group]) => this.summarizeNode([...path, label], group, signal)),
    );
    return this.merger.merge(path, children);
  }

  /**
   * Lists the non-empty groups in label order, with unmatched chunks last. A
   * proposed label that already reads "Unclassified" takes them in, so no two
   * siblings share a heading.
   */
  private collectBranches(
    groups: ReadonlyMap<Label, Chunk[]>,
    unclassified: readonly Chunk[],
  ): Array<[Label, Chunk[]]> {
    const existing =
      unclassified.length > 0 ? resolveLabel(UNCLASSIFIED_HEADING, [...groups.keys()]) : null;

    const branches: Array<[Label, Chunk[]]> = [];
    for (const [label, group] of groups) {
      const members = label === existing ? [...group, ...unclassified] : group;
      if (members.length > 0) {
        branches.push([label, members]);
      }
    }
    if (existing === null && unclassified.length > 0) {
      branches.push([UNCLASSIFIED_HEADING, [...unclassified]]);
    }
    return branches;
  }

  private async writeDirectly(
    path: Path,
    chunks: readonly Chunk[],
    signal?: AbortSignal,
  ): Promise<Section> {
    try {
      const text = await this.runner.writeSection(path, chunks, signal);
      return createLeafSection(path, text);
    } catch (error) {
      this.recover(error, `writing "${describePath(path)}"`);
      return createEmptySection(path);
    }
  }

  private async generateGists(
    path: Path,
    chunks: readonly Chunk[],
    signal?: AbortSignal,
  ): Promise<Gist[]> {
    const gists = await Promise.all(
      chunks.map(async (chunk, index) => {
        try {
          return await this.runner.gist(path, chunk, signal);
        } catch (error) {
          this.recover(error, `gist of chunk ${index + 1} under "${describePath(path)}"`);
          return null;
        }
      }),
    );
    return gists.filter((gist): gist is Gist => gist !== null);
  }

  private async proposeLabels(path: Path, gists: Gist[], signal?: AbortSignal): Promise<Label[]> {
    try {
      return await this.runner.proposeHeaders(path, gists, signal);
    } catch (error) {
      this.recover(error, `header proposal for "${describePath(path)}"`);
      return [];
    }
  }

  private async classifyChunk(
    path: Path,
    chunk: Chunk,
    labels: readonly Label[],
    signal?: AbortSignal,
  ): Promise<Assignment> {
    try {
      return await this.runner.classify(path, chunk, labels, signal);
    } catch (error) {
      this.recover(error, `classification under "${describePath(path)}"`);
      return null;
    }
  }

  /**
   * Rethrows cancellation; logs anything else so the caller can degrade.
   */
  private recover(error: unknown, what: string): void {
    if (error instanceof CancellationError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`⚠️  Giving up on ${what}: ${message}`);
  }
}
