import type { Logger } from "../logger";
import { withRetry, type Sleep } from "./retry";
import { isTerminalStatus, type IngestionService, type IngestionTarget, type JobStatus } from "./types";

export interface WaitForJobOptions {
  pollIntervalMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  sleep: Sleep;
  logger: Logger;
}

/**
 * ジョブが COMPLETE か FAILED になるまで一定間隔で状態を確認する
 *
 * 状態取得のエラーは再試行後もそのまま投げる
 */
export async function waitForJob(
  service: IngestionService,
  target: IngestionTarget,
  jobId: string,
  options: WaitForJobOptions,
): Promise<JobStatus> {
  let status: JobStatus = "STARTING";

  while (!isTerminalStatus(status)) {
    await options.sleep(options.pollIntervalMs);
    status = await withRetry(() => service.getJobStatus(target, jobId), {
      maxAttempts: options.maxAttempts,
      initialDelayMs: options.retryDelayMs,
      sleep: options.sleep,
      logger: options.logger,
    });
    options.logger.info({ jobId, status }, "Polled ingestion job status");
  }

  return status;
}
