import { beforeEach, describe, expect, it, vi } from "vitest";
import { createStubService, delay } from "../../test/stubs/StubLanguageService";
import { logger } from "../utils/logger";
import { ConcurrencyLimiter } from "./ConcurrencyLimiter";
import {
  CancellationError,
  MalformedResponseError,
  ServiceCallError,
  ServiceTimeoutError,
} from "./errors";
import { normalizeHeaders, ServiceCallRunner } from "./ServiceCallRunner";
import type { LanguageService } from "./types";

const policy = { retryCount: 1, callTimeoutMs: 1000, retryBaseDelayMs: 0 };

function createRunner(service: LanguageService, overrides: Partial<typeof policy> = {}) {
  return new ServiceCallRunner(service, new ConcurrencyLimiter(4), {
    ...policy,
    ...overrides,
  });
}

beforeEach(() => vi.clearAllMocks());

describe("normalizeHeaders", () => {
  it("trims labels and drops blanks and duplicates, keeping order", () => {
    expect(normalizeHeaders([" Setup ", "", "Usage", "Setup", "  "])).toEqual([
      "Setup",
      "Usage",
    ]);
  });
});

describe("ServiceCallRunner", () => {
  it("retries a failed call and returns the later result", async () => {
    const service = createStubService();
    service.gist.mockRejectedValueOnce(new Error("boom"));
    const runner = createRunner(service);

    await expect(runner.gist(["Doc"], "alpha text")).resolves.toBe("alpha");
    expect(service.gist).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("wraps the last failure in a ServiceCallError", async () => {
    const service = createStubService();
    service.classify.mockRejectedValue(new Error("service down"));
    const runner = createRunner(service);

    const call = runner.classify(["Doc"], "chunk", ["A"]);
    await expect(call).rejects.toBeInstanceOf(ServiceCallError);
    await expect(call).rejects.toThrow("classify failed: service down");
    expect(service.classify).toHaveBeenCalledTimes(2);
  });

  it("gives up after a single attempt when retries are disabled", async () => {
    const service = createStubService();
    service.writeSection.mockRejectedValue(new Error("nope"));
    const runner = createRunner(service, { retryCount: 0 });

    await expect(runner.writeSection(["Doc"], ["c1"])).rejects.toThrow(
      "writeSection failed: nope",
    );
    expect(service.writeSection).toHaveBeenCalledTimes(1);
  });

  it("times out calls that never settle", async () => {
    const service = createStubService();
    service.gist.mockImplementation(() => new Promise<string>(() => {}));
    const runner = createRunner(service, { callTimeoutMs: 20 });

    const call = runner.gist(["Doc"], "chunk");
    await expect(call).rejects.toBeInstanceOf(ServiceTimeoutError);
    await expect(call).rejects.toThrow("gist failed: timed out after 20ms");
    expect(service.gist).toHaveBeenCalledTimes(2);
  });

  it("aborts the signal handed to a timed-out call", async () => {
    const service = createStubService();
    let callSignal: AbortSignal | undefined;
    service.gist.mockImplementation((_path, _chunk, signal) => {
      callSignal = signal;
      return new Promise<string>(() => {});
    });
    const runner = createRunner(service, { callTimeoutMs: 10, retryCount: 0 });

    await expect(runner.gist(["Doc"], "chunk")).rejects.toBeInstanceOf(ServiceTimeoutError);
    expect(callSignal?.aborted).toBe(true);
  });

  it("keeps the slot of a timed-out call until the service settles", async () => {
    let inFlight = 0;
    let peak = 0;
    const service = createStubService({
      // Ignores the abort signal it is given
      writeSection: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(200);
        inFlight--;
        return "late";
      },
    });
    const limiter = new ConcurrencyLimiter(1);
    const runner = new ServiceCallRunner(service, limiter, {
      retryCount: 2,
      callTimeoutMs: 10,
      retryBaseDelayMs: 0,
    });

    await expect(runner.writeSection(["Doc"], ["c1"])).rejects.toBeInstanceOf(
      ServiceTimeoutError,
    );
    expect(service.writeSection).toHaveBeenCalledTimes(3);
    expect(peak).toBe(1);
    expect(limiter.activeCount).toBe(1);
  });

  it("cancels a call whose run is aborted as it receives its slot", async () => {
    const controller = new AbortController();
    class AbortOnGrant extends ConcurrencyLimiter {
      run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        return super.run(() => {
          controller.abort();
          return task();
        }, signal);
      }
    }
    const service = createStubService();
    const runner = new ServiceCallRunner(service, new AbortOnGrant(1), {
      ...policy,
      callTimeoutMs: 60_000,
    });

    await expect(runner.gist(["Doc"], "chunk", controller.signal)).rejects.toBeInstanceOf(
      CancellationError,
    );
    expect(service.gist).not.toHaveBeenCalled();
  });

  it("treats an empty gist as malformed", async () => {
    const service = createStubService({ gist: () => "   " });
    const runner = createRunner(service);

    const call = runner.gist(["Doc"], "chunk");
    await expect(call).rejects.toBeInstanceOf(MalformedResponseError);
    await expect(call).rejects.toThrow("gist returned an empty summary");
    expect(service.gist).toHaveBeenCalledTimes(2);
  });

  it("normalizes proposed headers", async () => {
    const service = createStubService({ proposeHeaders: () => ["A", " B ", "A", ""] });
    const runner = createRunner(service);

    await expect(runner.proposeHeaders(["Doc"], ["g1"])).resolves.toEqual(["A", "B"]);
  });

  it("rejects a header proposal that is not a list of strings", async () => {
    const service = createStubService();
    service.proposeHeaders.mockImplementation(async () => JSON.parse('"not a list"'));
    const runner = createRunner(service, { retryCount: 0 });

    await expect(runner.proposeHeaders(["Doc"], ["g1"])).rejects.toBeInstanceOf(
      MalformedResponseError,
    );
  });

  it("maps a missing section body to null", async () => {
    const service = createStubService({ writeSection: () => undefined });
    const runner = createRunner(service);

    await expect(runner.writeSection(["Doc"], ["c1"])).resolves.toBeNull();
  });

  it("does not call the service once the run is cancelled", async () => {
    const service = createStubService();
    const runner = createRunner(service);
    const controller = new AbortController();
    controller.abort();

    await expect(runner.gist(["Doc"], "chunk", controller.signal)).rejects.toBeInstanceOf(
      CancellationError,
    );
    expect(service.gist).not.toHaveBeenCalled();
  });

  it("stops waiting for an in-flight call when the run is cancelled", async () => {
    const service = createStubService();
    service.writeSection.mockImplementation(() => new Promise<string>(() => {}));
    const runner = createRunner(service);
    const controller = new AbortController();

    const call = runner.writeSection(["Doc"], ["c1"], controller.signal);
    await delay(5);
    controller.abort();

    await expect(call).rejects.toBeInstanceOf(CancellationError);
    expect(service.writeSection).toHaveBeenCalledTimes(1);
  });

  it("does not retry once the run is cancelled during backoff", async () => {
    const service = createStubService();
    service.gist.mockRejectedValue(new Error("flaky"));
    const runner = createRunner(service, { retryCount: 3, retryBaseDelayMs: 1000 });
    const controller = new AbortController();

    const call = runner.gist(["Doc"], "chunk", controller.signal);
    await delay(10);
    controller.abort();

    await expect(call).rejects.toBeInstanceOf(CancellationError);
    expect(service.gist).toHaveBeenCalledTimes(1);
  });
});
