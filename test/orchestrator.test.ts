import { describe, expect, it, vi } from "vitest";
import { ErrorCode, IngestionError } from "../lib/errors";
import { runIngestion } from "../lib/ingestion/orchestrator";
import { failedBatches } from "../lib/ingestion/types";
import {
  FakeIngestionService,
  FakeObjectStore,
  asObjects,
  capturingLogger,
  documentKeys,
  makeConfig,
  namedError,
  recordingSleep,
  silentLogger,
} from "./fakes";

function setup(keys: string[], pageSize?: number) {
  const objectStore = new FakeObjectStore(asObjects(keys), pageSize);
  const ingestionService = new FakeIngestionService();
  const timer = recordingSleep();
  return {
    objectStore,
    ingestionService,
    timer,
    deps: { objectStore, ingestionService, logger: silentLogger, sleep: timer.sleep },
  };
}

describe("runIngestion batching", () => {
  it("submits nothing and succeeds for an empty listing", async () => {
    const { ingestionService, deps } = setup([]);

    const summary = await runIngestion(makeConfig(), deps);

    expect(summary.batches).toEqual([]);
    expect(summary.listedCount).toBe(0);
    expect(ingestionService.events).toEqual([]);
    expect(failedBatches(summary)).toEqual([]);
  });

  it("submits exactly one batch for 25 documents", async () => {
    const keys = documentKeys(25);
    const { ingestionService, deps } = setup(keys);

    await runIngestion(makeConfig(), deps);

    expect(ingestionService.submitted).toEqual([keys]);
  });

  it("submits 25 and 1 for 26 documents", async () => {
    const keys = documentKeys(26);
    const { ingestionService, deps } = setup(keys);

    await runIngestion(makeConfig(), deps);

    expect(ingestionService.submitted.map((batch) => batch.length)).toEqual([25, 1]);
    expect(ingestionService.submitted[1]).toEqual(["docs/doc-025.pdf"]);
  });

  it("follows continuation tokens and keeps listing order across batches", async () => {
    const keys = documentKeys(60);
    const { objectStore, ingestionService, deps } = setup(keys, 7);

    const summary = await runIngestion(makeConfig({ prefix: "docs/" }), deps);

    expect(objectStore.requests).toHaveLength(9);
    expect(objectStore.requests[0]).toEqual({ bucket: "test-bucket", prefix: "docs/", continuationToken: undefined });
    expect(objectStore.requests[1].continuationToken).toBe("7");
    expect(ingestionService.submitted.map((batch) => batch.length)).toEqual([25, 25, 10]);
    expect(ingestionService.submitted.flat()).toEqual(keys);
    expect(summary.batches.map((batch) => batch.batchNumber)).toEqual([1, 2, 3]);
  });

  it("never submits zero-byte folder markers", async () => {
    const objectStore = new FakeObjectStore([
      { key: "docs/", size: 0 },
      { key: "docs/a.pdf", size: 10 },
      { key: "docs/sub/" },
      { key: "docs/b.pdf", size: 20 },
      { key: "docs/odd/", size: 12 },
    ]);
    const ingestionService = new FakeIngestionService();

    const summary = await runIngestion(makeConfig(), {
      objectStore,
      ingestionService,
      logger: silentLogger,
      sleep: recordingSleep().sleep,
    });

    expect(ingestionService.submitted).toEqual([["docs/a.pdf", "docs/b.pdf", "docs/odd/"]]);
    expect(summary.listedCount).toBe(3);
  });

  it("drops metadata sidecar files when asked to", async () => {
    const { ingestionService, deps } = setup(["a.pdf", "a.pdf.metadata.json", "b.pdf"]);

    const summary = await runIngestion(makeConfig({ skipMetadata: true }), deps);

    expect(ingestionService.submitted).toEqual([["a.pdf", "b.pdf"]]);
    expect(summary.metadataFilteredCount).toBe(1);
    expect(summary.listedCount).toBe(2);
  });

  it("clamps the batch size to the API limit", async () => {
    const { ingestionService, deps } = setup(documentKeys(30));

    await runIngestion(makeConfig({ batchSize: "40" }), deps);

    expect(ingestionService.submitted.map((batch) => batch.length)).toEqual([25, 5]);
  });

  it("honours a smaller batch size", async () => {
    const { ingestionService, deps } = setup(documentKeys(25));

    await runIngestion(makeConfig({ batchSize: "10" }), deps);

    expect(ingestionService.submitted.map((batch) => batch.length)).toEqual([10, 10, 5]);
  });

  it("passes the knowledge base and data source to the service", async () => {
    const { ingestionService, deps } = setup(documentKeys(1));

    await runIngestion(makeConfig(), deps);

    expect(ingestionService.targets).toEqual([{ knowledgeBaseId: "kb-test", dataSourceId: "ds-test" }]);
  });
});

describe("runIngestion without waiting", () => {
  it("submits back-to-back with a delay between batches only", async () => {
    const { timer, deps } = setup(documentKeys(60));

    const summary = await runIngestion(makeConfig(), deps);

    expect(summary.batches.map((batch) => batch.result)).toEqual(["SUBMITTED", "SUBMITTED", "SUBMITTED"]);
    expect(timer.calls).toEqual([2000, 2000]);
  });

  it("logs a failed submission and continues with the next batch", async () => {
    const { ingestionService, deps } = setup(documentKeys(30));
    ingestionService.failingBatches.set(1, new Error("bad batch"));

    const summary = await runIngestion(makeConfig(), deps);

    expect(summary.batches[0]).toEqual({
      batchNumber: 1,
      keys: documentKeys(30).slice(0, 25),
      result: "SUBMIT_FAILED",
      error: "Failed to submit batch 1: bad batch",
    });
    expect(summary.batches[1]).toMatchObject({ batchNumber: 2, result: "SUBMITTED", jobId: "job-2" });
    expect(failedBatches(summary).map((batch) => batch.batchNumber)).toEqual([1]);
  });

  it("retries a throttled submission with backoff", async () => {
    const { ingestionService, timer, deps } = setup(documentKeys(3));
    const start = vi
      .spyOn(ingestionService, "startIngestionJob")
      .mockRejectedValueOnce(namedError("ThrottlingException", "Rate exceeded"));

    const summary = await runIngestion(makeConfig(), deps);

    expect(start).toHaveBeenCalledTimes(2);
    expect(timer.calls).toEqual([1000]);
    expect(summary.batches[0]).toMatchObject({ result: "SUBMITTED", jobId: "job-1" });
  });

  it("does not retry a validation error", async () => {
    const { ingestionService, deps } = setup(documentKeys(3));
    const start = vi
      .spyOn(ingestionService, "startIngestionJob")
      .mockRejectedValueOnce(namedError("ValidationException", "Invalid document"));

    const summary = await runIngestion(makeConfig(), deps);

    expect(start).toHaveBeenCalledTimes(1);
    expect(summary.batches[0]).toMatchObject({ result: "SUBMIT_FAILED", error: "Failed to submit batch 1: Invalid document" });
  });

  it("gives up after the configured number of attempts", async () => {
    const { ingestionService, timer, deps } = setup(documentKeys(3));
    const start = vi
      .spyOn(ingestionService, "startIngestionJob")
      .mockRejectedValue(namedError("ThrottlingException", "Rate exceeded"));

    const summary = await runIngestion(makeConfig({ maxRetries: "2" }), deps);

    expect(start).toHaveBeenCalledTimes(2);
    expect(timer.calls).toEqual([1000]);
    expect(summary.batches[0].result).toBe("SUBMIT_FAILED");
  });

  it("starts the backoff at the configured retry delay", async () => {
    const { ingestionService, timer, deps } = setup(documentKeys(3));
    vi.spyOn(ingestionService, "startIngestionJob")
      .mockRejectedValueOnce(namedError("ThrottlingException", "Rate exceeded"))
      .mockRejectedValueOnce(namedError("ThrottlingException", "Rate exceeded"));

    await runIngestion(makeConfig({ retryDelaySeconds: "3" }), deps);

    expect(timer.calls).toEqual([3000, 6000]);
  });
});

describe("runIngestion with --wait", () => {
  it("submits the next batch only after the previous job is terminal", async () => {
    const { ingestionService, timer, deps } = setup(documentKeys(30));
    ingestionService.pollsUntilComplete = 3;

    const summary = await runIngestion(makeConfig({ wait: true }), deps);

    expect(ingestionService.events).toEqual([
      "start:1",
      "status:job-1:IN_PROGRESS",
      "status:job-1:IN_PROGRESS",
      "status:job-1:COMPLETE",
      "start:2",
      "status:job-2:IN_PROGRESS",
      "status:job-2:IN_PROGRESS",
      "status:job-2:COMPLETE",
    ]);
    expect(timer.calls).toEqual([5000, 5000, 5000, 5000, 5000, 5000]);
    expect(summary.batches.map((batch) => batch.result)).toEqual(["COMPLETE", "COMPLETE"]);
  });

  it("uses the configured poll interval", async () => {
    const { timer, deps } = setup(documentKeys(1));

    await runIngestion(makeConfig({ wait: true, pollIntervalSeconds: "30" }), deps);

    expect(timer.calls).toEqual([30000]);
  });

  it("reports a job that ends FAILED as a failed batch", async () => {
    const { ingestionService, deps } = setup(documentKeys(5));
    ingestionService.finalStatus = "FAILED";

    const summary = await runIngestion(makeConfig({ wait: true }), deps);

    expect(summary.batches[0]).toEqual({
      batchNumber: 1,
      keys: documentKeys(5),
      result: "FAILED",
      jobId: "job-1",
    });
    expect(failedBatches(summary)).toHaveLength(1);
  });

  it("moves on when the job status cannot be read", async () => {
    const { ingestionService, deps } = setup(documentKeys(30));
    ingestionService.statusError = new Error("Access denied");

    const summary = await runIngestion(makeConfig({ wait: true, maxRetries: "1" }), deps);

    expect(ingestionService.events).toEqual(["start:1", "status-error:job-1", "start:2", "status-error:job-2"]);
    expect(summary.batches[0]).toMatchObject({
      result: "UNCONFIRMED",
      jobId: "job-1",
      error: "Could not confirm completion of batch 1: Access denied",
    });
    expect(failedBatches(summary)).toEqual([]);
  });
});

describe("runIngestion listing errors", () => {
  it("aborts before submitting anything", async () => {
    const { objectStore, ingestionService, deps } = setup(documentKeys(3));
    objectStore.failWith = namedError("AccessDenied", "Access Denied");

    const run = runIngestion(makeConfig(), deps);

    await expect(run).rejects.toBeInstanceOf(IngestionError);
    await expect(run).rejects.toMatchObject({
      code: ErrorCode.LISTING_FAILED,
      message: "Failed to list s3://test-bucket/: Access Denied",
    });
    expect(ingestionService.events).toEqual([]);
  });
});

describe("runIngestion error logging", () => {
  it("logs the backend error of a failed submission with its batch context", async () => {
    const keys = documentKeys(2);
    const { logger, lines } = capturingLogger();
    const ingestionService = new FakeIngestionService();
    ingestionService.failingBatches.set(
      1,
      Object.assign(namedError("AccessDeniedException", "Access denied"), { $metadata: { requestId: "req-123" } }),
    );

    await runIngestion(makeConfig(), {
      objectStore: new FakeObjectStore(asObjects(keys)),
      ingestionService,
      logger,
      sleep: recordingSleep().sleep,
    });

    const errorLine = lines.find((line) => line.msg === "Failed to submit batch 1: Access denied");
    expect(errorLine).toMatchObject({
      level: 50,
      batchNumber: 1,
      errorCode: "SUBMIT_FAILED",
      err: {
        type: "IngestionError",
        code: "SUBMIT_FAILED",
        batchNumber: 1,
        keys,
        cause: { message: "Access denied", $metadata: { requestId: "req-123" } },
      },
    });
  });

  it("logs the backend error when a status check fails", async () => {
    const { logger, lines } = capturingLogger();
    const ingestionService = new FakeIngestionService();
    ingestionService.statusError = namedError("InternalServerException", "Service unavailable");

    await runIngestion(makeConfig({ wait: true, maxRetries: "1" }), {
      objectStore: new FakeObjectStore(asObjects(documentKeys(1))),
      ingestionService,
      logger,
      sleep: recordingSleep().sleep,
    });

    const errorLine = lines.find((line) => line.errorCode === "STATUS_CHECK_FAILED");
    expect(errorLine).toMatchObject({
      jobId: "job-1",
      err: { code: "STATUS_CHECK_FAILED", cause: { message: "Service unavailable" } },
    });
  });
});
