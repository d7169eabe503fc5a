import { createHash } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { ErrorCode, IngestionError, describeError } from "../errors";
import type { Logger } from "../logger";

export interface TrackingScope {
  knowledgeBaseId: string;
  dataSourceId: string;
  bucket: string;
  prefix: string;
}

export function defaultTrackingFilePath(scope: TrackingScope, baseDir = join(homedir(), ".kb-ingest")): string {
  const uniqueId = createHash("md5")
    .update(`${scope.knowledgeBaseId}_${scope.dataSourceId}_${scope.bucket}_${scope.prefix}`)
    .digest("hex");
  return join(baseDir, `processed_files_${uniqueId}.json`);
}

/**
 * 取り込み済みのキーを JSON ファイルに記録し、再実行時の二重登録を避ける
 */
export class ProcessedFileTracker {
  private readonly processed = new Set<string>();

  constructor(
    readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  get size(): number {
    return this.processed.size;
  }

  has(key: string): boolean {
    return this.processed.has(key);
  }

  /**
   * ファイルが存在しない・壊れている場合は空の状態から始める
   */
  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      this.logger.warn({ filePath: this.filePath, error: describeError(error) }, "Could not read tracking file, starting empty");
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ filePath: this.filePath, error: describeError(error) }, "Tracking file is not valid JSON, starting empty");
      return;
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn({ filePath: this.filePath }, "Tracking file does not contain a key list, starting empty");
      return;
    }
    for (const key of parsed) {
      if (typeof key === "string") {
        this.processed.add(key);
      }
    }
  }

  async record(keys: Iterable<string>): Promise<void> {
    for (const key of keys) {
      this.processed.add(key);
    }
    await this.save();
  }

  private async save(): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify([...this.processed]), "utf8");
    } catch (error) {
      throw new IngestionError(
        ErrorCode.TRACKING_IO_FAILED,
        `Failed to write tracking file ${this.filePath}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
