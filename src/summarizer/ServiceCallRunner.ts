import { z } from "zod";
import { logger } from "../utils/logger";
import { ConcurrencyLimiter } from "./ConcurrencyLimiter";
import {
  CancellationError,
  MalformedResponseError,
  ServiceCallError,
  ServiceTimeoutError,
  SummarizerError,
  toError,
} from "./errors";
import type { Chunk, Gist, Label, LanguageService, Path, SummarizerOptions } from "./types";

type CallPolicy = Pick<SummarizerOptions, "retryCount" | "callTimeoutMs" | "retryBaseDelayMs">;

const headersSchema = z.array(z.string());

/**
 * Resolves after the given delay, or rejects with a CancellationError once the signal fires.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Trims labels, drops blanks and keeps the first occurrence of each label.
 */
export function normalizeHeaders(headers: readonly string[]): Label[] {
  const seen = new Set<string>();
  const result: Label[] = [];
  for (const header of headers) {
    const label = header.trim();
    if (label && !seen.has(label)) {
      seen.add(label);
      result.push(label);
    }
  }
  return result;
}

/**
 * Calls the language service on behalf of the summarizer.
 *
 * Each call waits for a slot of the shared limiter, runs under its own timeout,
 * has its response checked against the operation contract and is retried with
 * exponential backoff. Cancellation of the run is never retried.
 */
export class ServiceCallRunner {
  constructor(
    private readonly service: LanguageService,
    private readonly limiter: ConcurrencyLimiter,
    private readonly policy: CallPolicy,
  ) {}

  async gist(path: Path, chunk: Chunk, signal?: AbortSignal): Promise<Gist> {
    return this.call(
      "gist",
      async (callSignal) => {
        const gist: unknown = await this.service.gist(path, chunk, callSignal);
        if (typeof gist !== "string" || !gist.trim()) {
          throw new MalformedResponseError("gist returned an empty summary");
        }
        return gist.trim();
      },
      signal,
    );
  }

  async proposeHeaders(path: Path, gists: Gist[], signal?: AbortSignal): Promise<Label[]> {
    return this.call(
      "proposeHeaders",
      async (callSignal) => {
        const parsed = headersSchema.safeParse(
          await this.service.proposeHeaders(path, gists, callSignal),
        );
        if (!parsed.success) {
          throw new MalformedResponseError(
            `proposeHeaders returned something other than a list of labels: ${parsed.error.message}`,
          );
        }
        return normalizeHeaders(parsed.data);
      },
      signal,
    );
  }

  async classify(
    path: Path,
    chunk: Chunk,
    labels: readonly Label[],
    signal?: AbortSignal,
  ): Promise<Label> {
    return this.call(
      "classify",
      async (callSignal) => {
        const label: unknown = await this.service.classify(path, chunk, labels, callSignal);
        if (typeof label !== "string") {
          throw new MalformedResponseError("classify did not return a label");
        }
        return label;
      },
      signal,
    );
  }

  async writeSection(
    path: Path,
    chunks: readonly Chunk[],
    signal?: AbortSignal,
  ): Promise<string | null> {
    return this.call(
      "writeSection",
      async (callSignal) => {
        const text: unknown = await this.service.writeSection(path, chunks, callSignal);
        if (text === null || text === undefined) {
          return null;
        }
        if (typeof text !== "string") {
          throw new MalformedResponseError("writeSection returned a non-text body");
        }
        return text;
      },
      signal,
    );
  }

  private async call<T>(
    operation: string,
    invoke: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const attempts = this.policy.retryCount + 1;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new CancellationError();
      }
      try {
        return await this.invokeWithTimeout(operation, invoke, signal);
      } catch (error) {
        if (error instanceof CancellationError || signal?.aborted) {
          throw error instanceof CancellationError ? error : new CancellationError();
        }
        const cause = toError(error);
        const failure =
          cause instanceof SummarizerError
            ? cause
            : new ServiceCallError(operation, cause.message, cause);
        if (attempt >= attempts) {
          throw failure;
        }

        const delay = this.policy.retryBaseDelayMs * 2 ** (attempt - 1);
        logger.warn(
          `⚠️  ${operation} failed (attempt ${attempt}/${attempts}), retrying in ${delay}ms: ${failure.message}`,
        );
        await sleep(delay, signal);
      }
    }
  }

  /**
   * Runs one attempt under the limiter. The caller gives up once the timeout
   * fires, but the slot stays taken until the service call itself settles, so
   * a backend that ignores the abort still counts against the limit.
   */
  private invokeWithTimeout<T>(
    operation: string,
    invoke: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new CancellationError());
    }

    const controller = new AbortController();
    const timeoutMs = this.policy.callTimeoutMs;

    return new Promise<T>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = () => {
        clearTimeout(timer);
        controller.abort();
        reject(new CancellationError());
      };
      const settle = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.limiter
        .run(async () => {
          if (signal?.aborted) {
            throw new CancellationError();
          }
          // The timeout covers the call, not the wait for a slot
          timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            controller.abort();
            reject(new ServiceTimeoutError(operation, timeoutMs));
          }, timeoutMs);
          return invoke(controller.signal);
        }, signal)
        .then(
          (value) => {
            settle();
            resolve(value);
          },
          (error: unknown) => {
            settle();
            reject(error);
          },
        );
    });
  }
}
