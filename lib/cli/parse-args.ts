import { parseArgs } from "node:util";
import { DEFAULT_REGION, MAX_BATCH_SIZE, type RawConfigInput } from "../config/environmental_config";

export const USAGE = `Usage: kb-ingest --knowledge-base-id <id> --data-source-id <id> --bucket <name> [options]

Options:
  --knowledge-base-id <id>  Knowledge Base ID (env: KNOWLEDGE_BASE_ID)
  --data-source-id <id>     Data Source ID (env: DATA_SOURCE_ID)
  --bucket <name>           S3 bucket containing documents (env: INGEST_BUCKET)
  --prefix <prefix>         S3 prefix (folder) containing documents (env: INGEST_PREFIX)
  --region <region>         AWS region (env: AWS_REGION, default: ${DEFAULT_REGION})
  --wait                    Wait for each batch to complete before starting the next
  --batch-size <n>          Documents per batch (max ${MAX_BATCH_SIZE})
  --poll-interval <sec>     Seconds between status checks while waiting (default: 5)
  --submit-delay <sec>      Seconds between batches when not waiting (default: 2)
  --max-retries <n>         Attempts for a throttled request (default: 5)
  --retry-delay <sec>       First backoff delay after throttling, doubled per attempt (default: 1)
  --skip-metadata           Skip .metadata.json files
  --skip-processed          Skip files recorded as ingested by a previous run
  --force-reupload          With --skip-processed, ingest every file again
  --tracking-file <path>    Where processed files are recorded
  --debug                   Print debug information
  -h, --help                Show this message`;

export type CliArguments =
  | { help: true }
  | { help: false; input: RawConfigInput };

/**
 * @throws TypeError 未知のオプションや値の欠けたオプションがある場合
 */
export function parseCliArguments(argv: string[]): CliArguments {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      "knowledge-base-id": { type: "string" },
      "data-source-id": { type: "string" },
      bucket: { type: "string" },
      prefix: { type: "string" },
      region: { type: "string" },
      wait: { type: "boolean" },
      "batch-size": { type: "string" },
      "poll-interval": { type: "string" },
      "submit-delay": { type: "string" },
      "max-retries": { type: "string" },
      "retry-delay": { type: "string" },
      "skip-metadata": { type: "boolean" },
      "skip-processed": { type: "boolean" },
      "force-reupload": { type: "boolean" },
      "tracking-file": { type: "string" },
      debug: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    return { help: true };
  }

  return {
    help: false,
    input: {
      knowledgeBaseId: values["knowledge-base-id"],
      dataSourceId: values["data-source-id"],
      bucket: values.bucket,
      prefix: values.prefix,
      region: values.region,
      wait: values.wait,
      batchSize: values["batch-size"],
      pollIntervalSeconds: values["poll-interval"],
      submitDelaySeconds: values["submit-delay"],
      maxRetries: values["max-retries"],
      retryDelaySeconds: values["retry-delay"],
      skipMetadata: values["skip-metadata"],
      skipProcessed: values["skip-processed"],
      forceReupload: values["force-reupload"],
      trackingFile: values["tracking-file"],
      debug: values.debug,
    },
  };
}
