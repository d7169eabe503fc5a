import {
  applyEnvironmentDefaults,
  resolveConfig,
  type IngestionConfig,
} from "../config/environmental_config";
import { ErrorCode, IngestionError, describeError } from "../errors";
import { runIngestion } from "../ingestion/orchestrator";
import type { Sleep } from "../ingestion/retry";
import { ProcessedFileTracker, defaultTrackingFilePath } from "../ingestion/tracking";
import { failedBatches, type IngestionService, type IngestionSummary, type ObjectStore } from "../ingestion/types";
import { resolveLogLevel, type Logger } from "../logger";
import { USAGE, parseCliArguments } from "./parse-args";

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  INVALID_USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface Backends {
  objectStore: ObjectStore;
  ingestionService: IngestionService;
}

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  sleep: Sleep;
  /** 設定（リージョンなど）が確定してから SDK クライアントを作る */
  createBackends: (config: IngestionConfig) => Backends;
  print: (message: string) => void;
}

/**
 * --skip-processed 指定時のみトラッカーを作る。--force-reupload では既存の記録を読まない
 */
export async function createTracker(
  config: IngestionConfig,
  logger: Logger,
): Promise<ProcessedFileTracker | undefined> {
  if (!config.skipProcessed) {
    return undefined;
  }
  const tracker = new ProcessedFileTracker(config.trackingFile ?? defaultTrackingFilePath(config), logger);
  if (config.forceReupload) {
    logger.info({ trackingFile: tracker.filePath }, "Force reupload requested, ignoring previously processed files");
  } else {
    await tracker.load();
    logger.info({ count: tracker.size, trackingFile: tracker.filePath }, "Loaded previously processed files");
  }
  return tracker;
}

export function exitCodeForSummary(summary: IngestionSummary): ExitCode {
  return failedBatches(summary).length > 0 ? ExitCode.FAILURE : ExitCode.SUCCESS;
}

/**
 * 設定・引数の誤りは 2、それ以外（一覧取得の失敗など）は 1
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof IngestionError && error.code === ErrorCode.INVALID_CONFIG) {
    return ExitCode.INVALID_USAGE;
  }
  // util.parseArgs は ERR_PARSE_ARGS_* の TypeError を投げる
  if (
    error instanceof TypeError &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("ERR_PARSE_ARGS")
  ) {
    return ExitCode.INVALID_USAGE;
  }
  return ExitCode.FAILURE;
}

function logSummary(summary: IngestionSummary, logger: Logger): void {
  const started = summary.batches.filter((batch) => batch.result !== "SUBMIT_FAILED");
  logger.info({ count: started.length }, `Started ${started.length} ingestion jobs`);
  for (const batch of summary.batches) {
    if (batch.result !== "SUBMIT_FAILED") {
      logger.info(
        { batchNumber: batch.batchNumber, jobId: batch.jobId, result: batch.result },
        `Batch ${batch.batchNumber}: Job ID ${batch.jobId}`,
      );
    }
  }

  const failures = failedBatches(summary);
  if (failures.length > 0) {
    logger.error(
      { failedBatches: failures.map((batch) => batch.batchNumber) },
      `${failures.length} of ${summary.batches.length} batches failed`,
    );
  } else {
    logger.info("Document ingestion process initiated successfully");
  }
}

/**
 * 引数の解釈から取り込みの実行までを行い、プロセスの終了コードを返す
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<ExitCode> {
  const { logger } = deps;

  let config: IngestionConfig;
  try {
    const args = parseCliArguments(argv);
    if (args.help) {
      deps.print(USAGE);
      return ExitCode.SUCCESS;
    }
    config = resolveConfig(applyEnvironmentDefaults(args.input, deps.env));
  } catch (error) {
    const exitCode = exitCodeForError(error);
    if (exitCode !== ExitCode.INVALID_USAGE) {
      throw error;
    }
    deps.print(`${describeError(error)}\n\n${USAGE}`);
    return exitCode;
  }

  if (config.debug) {
    logger.level = "debug";
  } else if (deps.env.LOG_LEVEL) {
    logger.level = resolveLogLevel(deps.env.LOG_LEVEL);
  }

  try {
    const summary = await runIngestion(config, {
      ...deps.createBackends(config),
      logger,
      sleep: deps.sleep,
      tracker: await createTracker(config, logger),
    });
    logSummary(summary, logger);
    return exitCodeForSummary(summary);
  } catch (error) {
    const errorCode = error instanceof IngestionError ? error.code : undefined;
    logger.error({ err: error, errorCode }, "Document ingestion failed");
    return exitCodeForError(error);
  }
}
