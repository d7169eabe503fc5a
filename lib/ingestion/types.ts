/**
 * S3 上のドキュメント 1 件を指す参照
 */
export interface ObjectReference {
  readonly bucket: string;
  readonly key: string;
}

export interface ListedObject {
  key: string;
  /** S3 が Size を返さない場合は undefined */
  size?: number;
}

export interface ListObjectsRequest {
  bucket: string;
  prefix: string;
  continuationToken?: string;
}

export interface ObjectListingPage {
  objects: ListedObject[];
  nextContinuationToken?: string;
}

/**
 * オブジェクトストアの一覧取得
 */
export interface ObjectStore {
  listObjects(request: ListObjectsRequest): Promise<ObjectListingPage>;
}

export const JOB_STATUSES = ["STARTING", "IN_PROGRESS", "COMPLETE", "FAILED"] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export function isTerminalStatus(status: JobStatus): boolean {
  return status === "COMPLETE" || status === "FAILED";
}

export interface IngestionTarget {
  knowledgeBaseId: string;
  dataSourceId: string;
}

/**
 * Knowledge Base への取り込みジョブの開始と状態取得
 */
export interface IngestionService {
  startIngestionJob(target: IngestionTarget, objects: readonly ObjectReference[]): Promise<string>;
  getJobStatus(target: IngestionTarget, jobId: string): Promise<JobStatus>;
}

export type Batch = readonly ObjectReference[];

interface BatchOutcomeBase {
  batchNumber: number;
  keys: string[];
}

export type BatchOutcome =
  | (BatchOutcomeBase & { result: "SUBMITTED"; jobId: string })
  | (BatchOutcomeBase & { result: "COMPLETE"; jobId: string })
  | (BatchOutcomeBase & { result: "FAILED"; jobId: string })
  | (BatchOutcomeBase & { result: "UNCONFIRMED"; jobId: string; error: string })
  | (BatchOutcomeBase & { result: "SUBMIT_FAILED"; error: string });

export interface IngestionSummary {
  /** フォルダマーカー除外後の件数 */
  listedCount: number;
  metadataFilteredCount: number;
  alreadyProcessedCount: number;
  batches: BatchOutcome[];
}

export function failedBatches(summary: IngestionSummary): BatchOutcome[] {
  return summary.batches.filter(
    (batch) => batch.result === "SUBMIT_FAILED" || batch.result === "FAILED",
  );
}
