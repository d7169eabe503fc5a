import { ListObjectsV2Command, S3Client, type ListObjectsV2CommandOutput } from "@aws-sdk/client-s3";
import type { ListObjectsRequest, ListedObject, ObjectListingPage, ObjectStore } from "../ingestion/types";

export function toListingPage(response: Pick<ListObjectsV2CommandOutput, "Contents" | "NextContinuationToken">): ObjectListingPage {
  const objects: ListedObject[] = [];
  for (const item of response.Contents ?? []) {
    if (!item.Key) {
      continue;
    }
    objects.push({ key: item.Key, size: item.Size });
  }
  return { objects, nextContinuationToken: response.NextContinuationToken };
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly s3: S3Client) {}

  async listObjects(request: ListObjectsRequest): Promise<ObjectListingPage> {
    const response = await this.s3.send(
      new ListObjectsV2Command({
        Bucket: request.bucket,
        Prefix: request.prefix || undefined,
        ContinuationToken: request.continuationToken,
      }),
    );
    return toListingPage(response);
  }
}
