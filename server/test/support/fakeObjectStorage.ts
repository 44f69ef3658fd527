import { ObjectStorage, StorageObject } from '../../src/adapters/s3Adapter';
import { err, NotFoundError, ok, StorageError } from '../../src/errors';

export interface StoredObject {
  body: Buffer;
  contentType: string;
  metadata: Record<string, string>;
  lastModified: Date;
}

export class FakeObjectStorage implements ObjectStorage {
  readonly bucket = 'test-bucket';
  readonly region = 'us-west-2';
  readonly objects = new Map<string, StoredObject>();
  /** Uploads whose `original-name` metadata matches are rejected. */
  readonly rejectedNames = new Set<string>();
  /** Keys whose presigning fails with a storage error. */
  readonly unsignableKeys = new Set<string>();
  listFails = false;
  bucketMissing = false;
  putCalls = 0;

  async put(key: string, body: Buffer, contentType: string, metadata: Record<string, string>) {
    this.putCalls += 1;
    if (this.rejectedNames.has(metadata['original-name'])) {
      return err(new StorageError('PutObject failed: Access Denied', 'AccessDenied'));
    }
    this.objects.set(key, { body, contentType, metadata, lastModified: new Date('2026-01-01T00:00:00.000Z') });
    return ok(undefined);
  }

  async presignedGet(key: string, ttlSeconds: number) {
    if (this.unsignableKeys.has(key)) {
      return err(new StorageError(`Presign ${key} failed: credentials expired`));
    }
    if (!this.objects.has(key)) {
      return err(new NotFoundError(`Object ${key} does not exist in ${this.bucket}`));
    }
    return ok(`https://${this.bucket}.s3.test/${key}?X-Amz-Expires=${ttlSeconds}`);
  }

  async *list(prefix: string): AsyncIterable<StorageObject> {
    if (this.listFails) {
      throw new StorageError('ListObjectsV2 uploads/ failed: Access Denied', 'AccessDenied');
    }
    for (const [key, object] of this.objects) {
      if (key.startsWith(prefix)) {
        yield { key, size: object.body.length, lastModified: object.lastModified };
      }
    }
  }

  async headBucket() {
    if (this.bucketMissing) {
      return err(new StorageError('HeadBucket test-bucket failed: The specified bucket does not exist', 'NoSuchBucket'));
    }
    return ok(undefined);
  }

  seed(key: string, body = 'image-bytes', lastModified = new Date('2026-01-01T00:00:00.000Z')) {
    this.objects.set(key, { body: Buffer.from(body), contentType: 'image/jpeg', metadata: {}, lastModified });
  }
}
