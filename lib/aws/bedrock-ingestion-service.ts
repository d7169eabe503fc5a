import { randomUUID } from "node:crypto";
import {
  BedrockAgentClient,
  GetKnowledgeBaseDocumentsCommand,
  IngestKnowledgeBaseDocumentsCommand,
  type DocumentIdentifier,
  type KnowledgeBaseDocument,
} from "@aws-sdk/client-bedrock-agent";
import { ErrorCode, IngestionError } from "../errors";
import type { Logger } from "../logger";
import { partition } from "../ingestion/partition";
import type {
  IngestionService,
  IngestionTarget,
  JobStatus,
  ObjectReference,
} from "../ingestion/types";

/**
 * GetKnowledgeBaseDocuments が 1 回で受け付ける識別子数の上限
 */
const STATUS_LOOKUP_CHUNK_SIZE = 10;

const PENDING_DOCUMENT_STATUSES = new Set(["STARTING", "PENDING", "IN_PROGRESS"]);
const FAILED_DOCUMENT_STATUSES = new Set([
  "FAILED",
  "METADATA_UPDATE_FAILED",
  "NOT_FOUND",
  "DELETING",
  "DELETE_IN_PROGRESS",
]);

export function toS3Uri(object: ObjectReference): string {
  return `s3://${object.bucket}/${object.key}`;
}

export function toKnowledgeBaseDocument(object: ObjectReference): KnowledgeBaseDocument {
  return {
    content: {
      dataSourceType: "S3",
      s3: { s3Location: { uri: toS3Uri(object) } },
    },
  };
}

export function toDocumentIdentifier(object: ObjectReference): DocumentIdentifier {
  return { dataSourceType: "S3", s3: { uri: toS3Uri(object) } };
}

/**
 * ドキュメントごとの状態をジョブ全体の状態にまとめる
 *
 * 処理中のものが 1 件でもあれば未完了、失敗が 1 件でもあれば FAILED
 */
export function summarizeDocumentStatuses(statuses: readonly (string | undefined)[]): JobStatus {
  const pending = statuses.filter((status) => status === undefined || PENDING_DOCUMENT_STATUSES.has(status));
  if (pending.length > 0) {
    return pending.length === statuses.length && pending.every((status) => status === "STARTING")
      ? "STARTING"
      : "IN_PROGRESS";
  }
  if (statuses.some((status) => status !== undefined && FAILED_DOCUMENT_STATUSES.has(status))) {
    return "FAILED";
  }
  return "COMPLETE";
}

/**
 * IngestKnowledgeBaseDocuments によるバッチ投入
 *
 * API はジョブ ID を返さないため、リクエストの clientToken をジョブ ID として扱い、
 * 投入したドキュメントをプロセス内で保持して状態確認に使う。
 */
export class BedrockIngestionService implements IngestionService {
  private readonly jobs = new Map<string, ObjectReference[]>();

  constructor(
    private readonly client: BedrockAgentClient,
    private readonly logger: Logger,
    private readonly generateToken: () => string = randomUUID,
  ) {}

  async startIngestionJob(target: IngestionTarget, objects: readonly ObjectReference[]): Promise<string> {
    const clientToken = this.generateToken();
    const response = await this.client.send(
      new IngestKnowledgeBaseDocumentsCommand({
        knowledgeBaseId: target.knowledgeBaseId,
        dataSourceId: target.dataSourceId,
        clientToken,
        documents: objects.map(toKnowledgeBaseDocument),
      }),
    );
    this.logger.debug({ jobId: clientToken, documentDetails: response.documentDetails }, "IngestKnowledgeBaseDocuments response");

    this.jobs.set(clientToken, [...objects]);
    return clientToken;
  }

  async getJobStatus(target: IngestionTarget, jobId: string): Promise<JobStatus> {
    const objects = this.jobs.get(jobId);
    if (!objects) {
      throw new IngestionError(ErrorCode.UNKNOWN_JOB, `Unknown ingestion job: ${jobId}`);
    }

    const statuses: (string | undefined)[] = [];
    for (const chunk of partition(objects, STATUS_LOOKUP_CHUNK_SIZE)) {
      const response = await this.client.send(
        new GetKnowledgeBaseDocumentsCommand({
          knowledgeBaseId: target.knowledgeBaseId,
          dataSourceId: target.dataSourceId,
          documentIdentifiers: chunk.map(toDocumentIdentifier),
        }),
      );
      const details = response.documentDetails ?? [];
      statuses.push(...details.map((detail) => detail.status));
      // 返ってこなかった識別子は NOT_FOUND 扱い
      for (let i = details.length; i < chunk.length; i += 1) {
        statuses.push("NOT_FOUND");
      }
    }

    return summarizeDocumentStatuses(statuses);
  }
}
