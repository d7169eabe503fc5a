import { MAX_BATCH_SIZE, type IngestionConfig } from "../config/environmental_config";
import { ErrorCode, IngestionError, describeError } from "../errors";
import { createBatchLogger, type Logger } from "../logger";
import { listDocuments } from "./list-documents";
import { partition } from "./partition";
import { withRetry, type Sleep } from "./retry";
import type { ProcessedFileTracker } from "./tracking";
import type {
  Batch,
  BatchOutcome,
  IngestionService,
  IngestionSummary,
  IngestionTarget,
  ObjectStore,
} from "./types";
import { waitForJob } from "./wait-for-job";

export interface OrchestratorDependencies {
  objectStore: ObjectStore;
  ingestionService: IngestionService;
  logger: Logger;
  sleep: Sleep;
  /** 指定時のみ取り込み済みファイルをスキップ・記録する */
  tracker?: ProcessedFileTracker;
}

/**
 * バケット配下のドキュメントを一覧し、バッチに分けて Knowledge Base に投入する
 *
 * 一覧取得の失敗は投入前に IngestionError として投げる。
 * バッチ単位の失敗はログに出して次のバッチへ進み、結果は summary にまとめて返す。
 */
export async function runIngestion(
  config: IngestionConfig,
  deps: OrchestratorDependencies,
): Promise<IngestionSummary> {
  const { objectStore, logger, tracker } = deps;
  const target: IngestionTarget = {
    knowledgeBaseId: config.knowledgeBaseId,
    dataSourceId: config.dataSourceId,
  };

  logger.info({ bucket: config.bucket, prefix: config.prefix }, `Listing objects in s3://${config.bucket}/${config.prefix}`);
  const listing = await listDocuments(objectStore, {
    bucket: config.bucket,
    prefix: config.prefix,
    skipMetadata: config.skipMetadata,
  });
  if (config.skipMetadata) {
    logger.info({ count: listing.metadataFilteredCount }, "Filtered out metadata files");
  }
  logger.info({ count: listing.documents.length }, "Found documents in S3");

  const pending = tracker ? listing.documents.filter((document) => !tracker.has(document.key)) : listing.documents;
  const alreadyProcessedCount = listing.documents.length - pending.length;
  if (tracker) {
    logger.info({ count: alreadyProcessedCount, trackingFile: tracker.filePath }, "Skipped already processed files");
  }

  let batchSize = config.batchSize;
  if (batchSize > MAX_BATCH_SIZE) {
    logger.warn({ requested: batchSize, max: MAX_BATCH_SIZE }, "Requested batch size exceeds API limit, using the maximum");
    batchSize = MAX_BATCH_SIZE;
  }

  const batches = partition(pending, batchSize);
  logger.info({ batchCount: batches.length, batchSize }, "Created document batches");

  const summary: IngestionSummary = {
    listedCount: listing.documents.length,
    metadataFilteredCount: listing.metadataFilteredCount,
    alreadyProcessedCount,
    batches: [],
  };
  if (batches.length === 0) {
    logger.info("No documents to ingest");
    return summary;
  }

  const submittedKeys: string[] = [];
  for (const [index, batch] of batches.entries()) {
    const batchNumber = index + 1;
    const log = createBatchLogger(logger, batchNumber, batches.length);
    const outcome = await processBatch(batch, batchNumber, target, config, { ...deps, logger: log });
    summary.batches.push(outcome);

    if (outcome.result === "COMPLETE" && tracker) {
      await recordProcessed(tracker, outcome.keys, log);
    } else if (outcome.result === "SUBMITTED") {
      submittedKeys.push(...outcome.keys);
    }

    if (!config.wait && batchNumber < batches.length) {
      await deps.sleep(config.submitDelaySeconds * 1000);
    }
  }

  if (tracker && submittedKeys.length > 0) {
    await recordProcessed(tracker, submittedKeys, logger);
  }

  return summary;
}

async function processBatch(
  batch: Batch,
  batchNumber: number,
  target: IngestionTarget,
  config: IngestionConfig,
  deps: OrchestratorDependencies,
): Promise<BatchOutcome> {
  const { ingestionService, logger, sleep } = deps;
  const keys = batch.map((object) => object.key);
  const retryDelayMs = config.retryDelaySeconds * 1000;

  logger.info({ count: batch.length }, `Processing batch ${batchNumber} with ${batch.length} documents`);
  logger.debug({ keys }, "Batch contents");

  let jobId: string;
  try {
    jobId = await withRetry(() => ingestionService.startIngestionJob(target, batch), {
      maxAttempts: config.maxRetries,
      initialDelayMs: retryDelayMs,
      sleep,
      logger,
    });
  } catch (cause) {
    const error = new IngestionError(
      ErrorCode.SUBMIT_FAILED,
      `Failed to submit batch ${batchNumber}: ${describeError(cause)}`,
      { batchNumber, keys, cause },
    );
    logger.error({ err: error, errorCode: error.code }, error.message);
    return { batchNumber, keys, result: "SUBMIT_FAILED", error: error.message };
  }
  logger.info({ jobId }, `Started ingestion job ${jobId} for batch ${batchNumber}`);

  if (!config.wait) {
    return { batchNumber, keys, result: "SUBMITTED", jobId };
  }

  logger.info({ jobId }, `Waiting for batch ${batchNumber} to complete`);
  try {
    const status = await waitForJob(ingestionService, target, jobId, {
      pollIntervalMs: config.pollIntervalSeconds * 1000,
      maxAttempts: config.maxRetries,
      retryDelayMs,
      sleep,
      logger,
    });
    if (status === "FAILED") {
      logger.warn({ jobId, status }, `Batch ${batchNumber} finished with status ${status}`);
      return { batchNumber, keys, result: "FAILED", jobId };
    }
    logger.info({ jobId, status }, `Batch ${batchNumber} finished with status ${status}`);
    return { batchNumber, keys, result: "COMPLETE", jobId };
  } catch (cause) {
    const error = new IngestionError(
      ErrorCode.STATUS_CHECK_FAILED,
      `Could not confirm completion of batch ${batchNumber}: ${describeError(cause)}`,
      { batchNumber, keys, cause },
    );
    logger.error({ err: error, errorCode: error.code, jobId }, error.message);
    return { batchNumber, keys, result: "UNCONFIRMED", jobId, error: error.message };
  }
}

/**
 * 記録の失敗はログのみ。バッチの結果には影響しない
 */
async function recordProcessed(tracker: ProcessedFileTracker, keys: string[], logger: Logger): Promise<void> {
  try {
    await tracker.record(keys);
    logger.info({ count: keys.length, trackingFile: tracker.filePath }, "Updated tracking file");
  } catch (error) {
    logger.error({ err: error, trackingFile: tracker.filePath }, "Processed files may not be tracked");
  }
}
