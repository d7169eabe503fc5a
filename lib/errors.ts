export const ErrorCode = {
  LISTING_FAILED: "LISTING_FAILED",
  SUBMIT_FAILED: "SUBMIT_FAILED",
  STATUS_CHECK_FAILED: "STATUS_CHECK_FAILED",
  UNKNOWN_JOB: "UNKNOWN_JOB",
  INVALID_CONFIG: "INVALID_CONFIG",
  TRACKING_IO_FAILED: "TRACKING_IO_FAILED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface IngestionErrorContext {
  batchNumber?: number;
  keys?: readonly string[];
  cause?: unknown;
}

/**
 * バックエンドのエラーにバッチ番号・キーなどの文脈を付与して投げ直すためのエラー
 */
export class IngestionError extends Error {
  readonly code: ErrorCode;
  readonly batchNumber?: number;
  readonly keys?: readonly string[];

  constructor(code: ErrorCode, message: string, context: IngestionErrorContext = {}) {
    super(message, { cause: context.cause });
    this.name = "IngestionError";
    this.code = code;
    this.batchNumber = context.batchNumber;
    this.keys = context.keys;
  }
}

const THROTTLING_ERROR_NAMES = new Set([
  "ThrottlingException",
  "TooManyRequestsException",
  "ServiceQuotaExceededException",
]);

/**
 * リトライ対象のエラーか判定する
 *
 * Bedrock は同時実行数の上限を ValidationException で返すため、メッセージも見る
 */
export function isThrottlingError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (THROTTLING_ERROR_NAMES.has(error.name)) {
    return true;
  }
  return error.name === "ValidationException" && /concurren/i.test(error.message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
