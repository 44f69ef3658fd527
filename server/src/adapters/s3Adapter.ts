import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { err, errorMessage, NotFoundError, ok, Result, StorageError } from '../errors';

export interface StorageObject {
  key: string;
  size: number;
  lastModified: Date;
}

export interface ObjectStorage {
  readonly bucket: string;
  readonly region: string;
  put: (key: string, body: Buffer, contentType: string, metadata: Record<string, string>) => Promise<Result<void, StorageError>>;
  presignedGet: (key: string, ttlSeconds: number) => Promise<Result<string, NotFoundError | StorageError>>;
  /** Lazily pages through the bucket. Throws `StorageError` when a page cannot be fetched. */
  list: (prefix: string) => AsyncIterable<StorageObject>;
  headBucket: () => Promise<Result<void, StorageError>>;
}

export interface S3AdapterOptions {
  client: S3Client;
  bucket: string;
  region: string;
}

const toStorageError = (action: string, error: unknown) => {
  const code = error instanceof S3ServiceException ? error.name : undefined;
  return new StorageError(`${action} failed: ${errorMessage(error)}`, code, { cause: error });
};

const isMissing = (error: unknown) =>
  error instanceof S3ServiceException &&
  (error.name === 'NotFound' || error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404);

export const createS3Client = (region: string) => new S3Client({ region });

export const createS3Adapter = ({ client, bucket, region }: S3AdapterOptions): ObjectStorage => ({
  bucket,
  region,

  async put(key, body, contentType, metadata) {
    try {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
          Metadata: metadata,
        })
      );
      return ok(undefined);
    } catch (error) {
      return err(toStorageError(`PutObject ${key}`, error));
    }
  },

  async presignedGet(key, ttlSeconds) {
    try {
      await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
    } catch (error) {
      if (isMissing(error)) {
        return err(new NotFoundError(`Object ${key} does not exist in ${bucket}`, { cause: error }));
      }
      return err(toStorageError(`HeadObject ${key}`, error));
    }
    try {
      const url = await getSignedUrl(client, new GetObjectCommand({ Bucket: bucket, Key: key }), {
        expiresIn: ttlSeconds,
      });
      return ok(url);
    } catch (error) {
      return err(toStorageError(`Presign ${key}`, error));
    }
  },

  async *list(prefix) {
    let continuationToken: string | undefined;
    do {
      let page: ListObjectsV2CommandOutput;
      try {
        page = await client.send(
          new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: continuationToken })
        );
      } catch (error) {
        throw toStorageError(`ListObjectsV2 ${prefix}`, error);
      }
      for (const entry of page.Contents ?? []) {
        if (!entry.Key) continue;
        yield { key: entry.Key, size: entry.Size ?? 0, lastModified: entry.LastModified ?? new Date(0) };
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
  },

  async headBucket() {
    try {
      await client.send(new HeadBucketCommand({ Bucket: bucket }));
      return ok(undefined);
    } catch (error) {
      return err(toStorageError(`HeadBucket ${bucket}`, error));
    }
  },
});
