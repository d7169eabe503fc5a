import { z } from "zod";
import { ErrorCode, IngestionError } from "../errors";

/**
 * IngestKnowledgeBaseDocuments が 1 回で受け付けるドキュメント数の上限
 */
export const MAX_BATCH_SIZE = 25;

export const DEFAULT_REGION = "us-east-1";

const requiredString = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const seconds = (fallback: number) => z.coerce.number().positive().default(fallback);

export const ingestionConfigSchema = z.object({
  knowledgeBaseId: requiredString("--knowledge-base-id"),
  dataSourceId: requiredString("--data-source-id"),
  bucket: requiredString("--bucket"),
  prefix: z.string().default(""),
  region: z.string().trim().min(1).default(DEFAULT_REGION),
  wait: z.boolean().default(false),
  batchSize: z.coerce.number().int().positive().default(MAX_BATCH_SIZE),
  pollIntervalSeconds: seconds(5),
  submitDelaySeconds: z.coerce.number().min(0).default(2),
  retryDelaySeconds: seconds(1),
  maxRetries: z.coerce.number().int().positive().default(5),
  skipMetadata: z.boolean().default(false),
  skipProcessed: z.boolean().default(false),
  forceReupload: z.boolean().default(false),
  trackingFile: z.string().trim().min(1).optional(),
  debug: z.boolean().default(false),
});

/**
 * 取り込み処理の設定
 *
 * コア処理は環境変数を直接読まず、この値だけを受け取る
 */
export type IngestionConfig = z.output<typeof ingestionConfigSchema>;

/**
 * CLI・環境変数から集めた未検証の値
 */
export type RawConfigInput = {
  [K in keyof IngestionConfig]?: string | number | boolean;
};

/**
 * CLI 引数で指定されなかった値を環境変数から補う
 */
export function applyEnvironmentDefaults(
  input: RawConfigInput,
  env: NodeJS.ProcessEnv,
): RawConfigInput {
  return {
    ...input,
    knowledgeBaseId: input.knowledgeBaseId ?? env.KNOWLEDGE_BASE_ID,
    dataSourceId: input.dataSourceId ?? env.DATA_SOURCE_ID,
    bucket: input.bucket ?? env.INGEST_BUCKET,
    prefix: input.prefix ?? env.INGEST_PREFIX,
    region: input.region ?? env.AWS_REGION,
  };
}

/**
 * @throws IngestionError (INVALID_CONFIG) 値が不正な場合
 */
export function resolveConfig(input: RawConfigInput): IngestionConfig {
  const result = ingestionConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new IngestionError(ErrorCode.INVALID_CONFIG, `Invalid configuration: ${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}
