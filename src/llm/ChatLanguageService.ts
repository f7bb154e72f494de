import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { MessageContent } from "@langchain/core/messages";
import type { ChatPromptTemplate } from "@langchain/core/prompts";
import { z } from "zod";
import { MalformedResponseError } from "../summarizer/errors";
import type { Chunk, Gist, Label, LanguageService, Path } from "../summarizer/types";
import { logger } from "../utils/logger";
import { classifyPrompt, gistPrompt, proposeHeadersPrompt, writeSectionPrompt } from "./prompts";

const headersResponseSchema = z.union([
  z.array(z.string()),
  z.object({ headers: z.array(z.string()) }).transform((value) => value.headers),
]);

/**
 * Flattens message content into plain text, ignoring non-text parts.
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => {
      if (typeof part === "string") {
        return part;
      }
      return "text" in part && typeof part.text === "string" ? part.text : "";
    })
    .join("");
}

/**
 * Removes a surrounding Markdown code fence, if any.
 */
export function stripCodeFence(text: string): string {
  const match = /^```[\w-]*\s*\n?([\s\S]*?)\n?```$/.exec(text.trim());
  return match?.[1] !== undefined ? match[1].trim() : text.trim();
}

/**
 * Parses a header proposal: a JSON array of strings, or an object with a `headers` array.
 * @throws {MalformedResponseError} If the text is not such a value.
 */
export function parseHeaders(text: string): Label[] {
  let value: unknown;
  try {
    value = JSON.parse(stripCodeFence(text));
  } catch {
    throw new MalformedResponseError(`Header proposal is not valid JSON: ${text}`);
  }
  const parsed = headersResponseSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedResponseError(`Header proposal is not a list of strings: ${text}`);
  }
  return parsed.data;
}

const formatPath = (path: Path): string => path.join(" > ");

const numbered = (items: readonly string[]): string =>
  items.map((item, index) => `[${index + 1}] ${item}`).join("\n\n");

/**
 * Language service backed by a LangChain chat model.
 */
export interface ChatLanguageServiceOptions {
  /** Timeout for each model request, applied whatever the provider. */
  timeoutMs?: number;
}

export class ChatLanguageService implements LanguageService {
  constructor(
    private readonly model: BaseChatModel,
    private readonly options: ChatLanguageServiceOptions = {},
  ) {}

  async gist(path: Path, chunk: Chunk, signal?: AbortSignal): Promise<Gist> {
    return this.complete(gistPrompt, { path: formatPath(path), chunk }, signal);
  }

  async proposeHeaders(path: Path, gists: Gist[], signal?: AbortSignal): Promise<Label[]> {
    const text = await this.complete(
      proposeHeadersPrompt,
      { path: formatPath(path), gists: numbered(gists) },
      signal,
    );
    const headers = parseHeaders(text);
    logger.debug(`Proposed headers for "${formatPath(path)}": ${headers.join(", ")}`);
    return headers;
  }

  async classify(
    path: Path,
    chunk: Chunk,
    labels: readonly Label[],
    signal?: AbortSignal,
  ): Promise<Label> {
    const text = await this.complete(
      classifyPrompt,
      {
        path: formatPath(path),
        labels: labels.map((label) => `- ${label}`).join("\n"),
        chunk,
      },
      signal,
    );
    // Models like to quote or bullet the heading they pick
    return text.replace(/^[-*\s]+/, "").replace(/^["'`]+|["'`]+$/g, "");
  }

  async writeSection(
    path: Path,
    chunks: readonly Chunk[],
    signal?: AbortSignal,
  ): Promise<string | null> {
    const text = await this.complete(
      writeSectionPrompt,
      { path: formatPath(path), chunks: numbered(chunks) },
      signal,
    );
    return text || null;
  }

  private async complete(
    prompt: ChatPromptTemplate,
    values: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<string> {
    const messages = await prompt.formatMessages(values);
    const response = await this.model.invoke(messages, {
      signal,
      timeout: this.options.timeoutMs,
    });
    return contentToText(response.content).trim();
  }
}
