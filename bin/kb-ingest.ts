#!/usr/bin/env node
import { BedrockAgentClient } from "@aws-sdk/client-bedrock-agent";
import { S3Client } from "@aws-sdk/client-s3";
import * as dotenv from "dotenv";
import { BedrockIngestionService } from "../lib/aws/bedrock-ingestion-service";
import { S3ObjectStore } from "../lib/aws/s3-object-store";
import { ExitCode, runCli } from "../lib/cli/run-cli";
import { sleep } from "../lib/ingestion/retry";
import { logger } from "../lib/logger";

dotenv.config();

runCli(process.argv.slice(2), {
  env: process.env,
  logger,
  sleep,
  createBackends: (config) => ({
    objectStore: new S3ObjectStore(new S3Client({ region: config.region })),
    ingestionService: new BedrockIngestionService(new BedrockAgentClient({ region: config.region }), logger),
  }),
  print: (message) => console.log(message),
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, "Document ingestion failed");
    process.exitCode = ExitCode.FAILURE;
  });
