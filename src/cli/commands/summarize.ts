/**
 * Summarize command - Turns a text file into a nested Markdown document.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { Command } from "commander";
import { Option } from "commander";
import { ChatLanguageService, createChatModel } from "../../llm";
import { FixedWindowSplitter } from "../../splitter/FixedWindowSplitter";
import { HierarchicalSummarizer, renderDocument } from "../../summarizer";
import {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_CHAT_MODEL,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CONCURRENCY_LIMIT,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MIN_FANOUT_SIZE,
  DEFAULT_RETRY_COUNT,
} from "../../utils/config";
import { logger } from "../../utils/logger";
import { parseIntegerOption } from "../utils";

export interface SummarizeCommandOptions {
  title?: string;
  output?: string;
  chunkSize: string;
  model: string;
  minFanout: string;
  maxDepth: string;
  concurrency: string;
  retries: string;
  timeout: string;
}

export async function summarizeAction(file: string, options: SummarizeCommandOptions) {
  const chunkSize = parseIntegerOption(options.chunkSize, "--chunk-size", 1);
  const callTimeoutMs = parseIntegerOption(options.timeout, "--timeout", 1);
  const summarizerOptions = {
    minFanoutSize: parseIntegerOption(options.minFanout, "--min-fanout", 1),
    maxDepth: parseIntegerOption(options.maxDepth, "--max-depth", 1),
    concurrencyLimit: parseIntegerOption(options.concurrency, "--concurrency", 1),
    retryCount: parseIntegerOption(options.retries, "--retries", 0),
    callTimeoutMs,
  };

  const text = await fs.readFile(file, "utf-8");
  const chunks = new FixedWindowSplitter(chunkSize).split(text);
  const title = options.title?.trim() || path.parse(file).name;
  logger.info(`📄 Read ${file}: ${text.length} characters in ${chunks.length} chunks`);

  const model = createChatModel(options.model);
  const summarizer = new HierarchicalSummarizer(
    new ChatLanguageService(model, { timeoutMs: callTimeoutMs }),
    summarizerOptions,
  );

  const abortController = new AbortController();
  const onInterrupt = () => {
    logger.warn("🛑 Interrupted, cancelling summarization...");
    abortController.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const section = await summarizer.summarize([title], chunks, abortController.signal);
    const markdown = renderDocument(section);

    if (options.output) {
      await fs.writeFile(options.output, markdown, "utf-8");
      logger.info(`💾 Wrote summary to ${options.output}`);
    } else {
      process.stdout.write(markdown);
    }
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

export function createSummarizeCommand(program: Command): Command {
  return program
    .command("summarize <file>")
    .description(
      "Summarize a text file into a nested Markdown document whose headings are discovered from the content",
    )
    .option("-t, --title <heading>", "Root heading (default: file name without extension)")
    .option("-o, --output <file>", "Write the document to a file instead of stdout")
    .option(
      "--chunk-size <number>",
      "Number of characters per input chunk",
      String(DEFAULT_CHUNK_SIZE),
    )
    .addOption(
      new Option(
        "--model <provider:model>",
        "Chat model (e.g., 'openai:gpt-4o-mini', 'gemini:gemini-1.5-flash')",
      )
        .env("SUMMARIZER_MODEL")
        .default(DEFAULT_CHAT_MODEL),
    )
    .addOption(
      new Option("--min-fanout <number>", "Below this many chunks a section is written directly")
        .env("SUMMARIZER_MIN_FANOUT")
        .default(String(DEFAULT_MIN_FANOUT_SIZE)),
    )
    .addOption(
      new Option("--max-depth <number>", "Maximum heading depth, root included")
        .env("SUMMARIZER_MAX_DEPTH")
        .default(String(DEFAULT_MAX_DEPTH)),
    )
    .addOption(
      new Option("--concurrency <number>", "Maximum number of model calls in flight")
        .env("SUMMARIZER_CONCURRENCY")
        .default(String(DEFAULT_CONCURRENCY_LIMIT)),
    )
    .addOption(
      new Option("--retries <number>", "Retries per failed model call")
        .env("SUMMARIZER_RETRIES")
        .default(String(DEFAULT_RETRY_COUNT)),
    )
    .addOption(
      new Option("--timeout <ms>", "Timeout per model call in milliseconds")
        .env("SUMMARIZER_TIMEOUT")
        .default(String(DEFAULT_CALL_TIMEOUT_MS)),
    )
    .action(summarizeAction);
}
