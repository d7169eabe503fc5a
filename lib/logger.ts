import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type { Logger };

/**
 * pino が知らないレベル名は info に落とす（不正な値だと pino 生成時に例外になる）
 */
export function resolveLogLevel(level: string | undefined): string {
  if (level === undefined || level === "") {
    return "info";
  }
  return level === "silent" || level in pino.levels.values ? level : "info";
}

/**
 * err に渡したエラーは cause を辿ってシリアライズする
 */
export function createLogger(level: string | undefined, destination?: DestinationStream): Logger {
  const options = {
    name: "kb-ingest",
    level: resolveLogLevel(level),
    serializers: { err: pino.stdSerializers.errWithCause },
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger(process.env.LOG_LEVEL);

export function createBatchLogger(parent: Logger, batchNumber: number, batchCount: number): Logger {
  return parent.child({ batchNumber, batchCount });
}
