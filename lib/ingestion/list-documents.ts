import { ErrorCode, IngestionError, describeError } from "../errors";
import type { ListedObject, ObjectReference, ObjectStore } from "./types";

const METADATA_SUFFIX = ".metadata.json";

export interface ListDocumentsOptions {
  bucket: string;
  prefix: string;
  skipMetadata?: boolean;
}

export interface DocumentListing {
  documents: ObjectReference[];
  metadataFilteredCount: number;
}

/**
 * フォルダのプレースホルダ（"/" で終わるサイズ 0 のキー）か判定する
 */
export function isFolderMarker(object: ListedObject): boolean {
  return object.key.endsWith("/") && (object.size ?? 0) === 0;
}

export function isMetadataFile(key: string): boolean {
  return key.endsWith(METADATA_SUFFIX);
}

/**
 * continuation token がなくなるまでページを辿り、ドキュメントのキーを順に返す
 */
export async function* enumerateDocuments(
  store: ObjectStore,
  bucket: string,
  prefix: string,
): AsyncGenerator<ObjectReference> {
  let continuationToken: string | undefined;

  do {
    const page = await store
      .listObjects({ bucket, prefix, continuationToken })
      .catch((error: unknown) => {
        throw new IngestionError(
          ErrorCode.LISTING_FAILED,
          `Failed to list s3://${bucket}/${prefix}: ${describeError(error)}`,
          { cause: error },
        );
      });

    for (const object of page.objects) {
      if (isFolderMarker(object)) {
        continue;
      }
      yield { bucket, key: object.key };
    }

    continuationToken = page.nextContinuationToken;
  } while (continuationToken);
}

export async function listDocuments(
  store: ObjectStore,
  options: ListDocumentsOptions,
): Promise<DocumentListing> {
  const documents: ObjectReference[] = [];
  let metadataFilteredCount = 0;

  for await (const document of enumerateDocuments(store, options.bucket, options.prefix)) {
    if (options.skipMetadata && isMetadataFile(document.key)) {
      metadataFilteredCount += 1;
      continue;
    }
    documents.push(document);
  }

  return { documents, metadataFilteredCount };
}
