import { AppContext, PROCESSING_MODE } from '../context';
import { err, errorMessage, NotFoundError, ok, Result, StorageError, StoreError } from '../errors';
import { ApiImage, toApiImage } from '../models/annotations';
import { ImageWithDetections, ProcessingStatus, ProcessingStatusInfo } from '../models/records';
import { RequestedImageId } from '../models/schemas';
import { logger } from '../utils/logger';

export type ImageSource = 'database' | 's3_fallback' | 's3_error';

export interface ImageListing {
  success: boolean;
  images: ApiImage[];
  source: ImageSource;
  processing_mode: typeof PROCESSING_MODE.listing;
  count: number;
  message?: string;
  error?: string;
}

export interface StatusView {
  processing_status: ProcessingStatus;
  processed_at: string | null;
  upload_time: string | null;
  has_results: boolean;
}

export class DatabaseDisabledError extends StoreError {
  readonly status = 503;

  constructor() {
    super('Database not available');
  }
}

export const toStatusView = (info: ProcessingStatusInfo): StatusView => ({
  processing_status: info.status,
  processed_at: info.processedAt ? info.processedAt.toISOString() : null,
  upload_time: info.uploadTime ? info.uploadTime.toISOString() : null,
  has_results: info.status === 'completed',
});

export class ImageService {
  constructor(private readonly context: AppContext) {}

  get databaseEnabled() {
    return this.context.metadata !== null;
  }

  /** Reads from the metadata store; drops to a raw storage listing when that is unavailable. */
  async listImages(): Promise<ImageListing> {
    const { metadata } = this.context;
    if (metadata) {
      const probe = await metadata.testConnection();
      const loaded = probe.ok ? await metadata.getAllImagesWithDetections() : probe;
      if (loaded.ok) {
        const images = await this.translateRecords(loaded.value);
        return { success: true, images, source: 'database', processing_mode: PROCESSING_MODE.listing, count: images.length };
      }
      logger.warn({ err: loaded.error }, 'metadata query failed, falling back to storage listing');
    }
    return this.listFromStorage();
  }

  async getImageUrl(key: string): Promise<Result<string, NotFoundError | StorageError>> {
    return this.context.storage.presignedGet(key, this.context.config.presignedUrlTtl);
  }

  async getStatus(imageId: number): Promise<Result<StatusView, DatabaseDisabledError | StoreError | NotFoundError>> {
    const { metadata } = this.context;
    if (!metadata) return err(new DatabaseDisabledError());
    const found = await metadata.getProcessingStatus(imageId);
    if (!found.ok) return found;
    if (!found.value) return err(new NotFoundError('Image not found'));
    return ok(toStatusView(found.value));
  }

  /** Unknown ids, and ids whose lookup fails, are left out of the result. */
  async getStatuses(
    requested: RequestedImageId[]
  ): Promise<Result<Record<string, Omit<StatusView, 'upload_time'>>, DatabaseDisabledError>> {
    const { metadata } = this.context;
    if (!metadata) return err(new DatabaseDisabledError());
    const statuses: Record<string, Omit<StatusView, 'upload_time'>> = {};
    for (const { key, id } of requested) {
      const found = await metadata.getProcessingStatus(id);
      if (!found.ok) {
        logger.warn({ imageId: id, err: found.error.message }, 'status lookup failed, leaving id out of the batch');
        continue;
      }
      if (!found.value) continue;
      const { upload_time: _uploadTime, ...view } = toStatusView(found.value);
      statuses[key] = view;
    }
    return ok(statuses);
  }

  /** A record that cannot be presigned or translated is logged and left out. */
  private async translateRecords(records: ImageWithDetections[]) {
    const { storage, config } = this.context;
    const images: ApiImage[] = [];
    for (const record of records) {
      const url = await storage.presignedGet(record.s3Key, config.presignedUrlTtl);
      if (!url.ok) {
        logger.error({ s3Key: record.s3Key, err: url.error.message }, 'skipping image without a presigned url');
        continue;
      }
      try {
        images.push(toApiImage(record, url.value));
      } catch (error) {
        logger.error({ s3Key: record.s3Key, err: errorMessage(error) }, 'skipping image that could not be translated');
      }
    }
    return images;
  }

  private async listFromStorage(): Promise<ImageListing> {
    const { storage, config, metadata } = this.context;
    // Storage alone cannot tell whether the worker has run.
    const status: ProcessingStatus = 'unknown';
    const images: ApiImage[] = [];
    try {
      for await (const object of storage.list(config.uploadPrefix)) {
        const url = await storage.presignedGet(object.key, config.presignedUrlTtl);
        if (!url.ok) {
          logger.error({ key: object.key, err: url.error.message }, 'skipping storage object');
          continue;
        }
        images.push({
          fileName: object.key,
          originalName: object.key.split('/').pop() || object.key,
          uploadTime: object.lastModified.toISOString(),
          size: object.size,
          url: url.value,
          rekognition: {
            status,
            message: metadata ? 'Database query failed - processing status unknown' : 'Database not available - processing status unknown',
            labels: [],
            boundingBoxes: [],
            faceBoxes: [],
          },
          processing_status: status,
        });
      }
    } catch (error) {
      logger.error({ err: errorMessage(error) }, 'storage listing failed');
      return {
        success: false,
        error: `S3 Error: ${errorMessage(error)}`,
        images: [],
        source: 's3_error',
        processing_mode: PROCESSING_MODE.listing,
        count: 0,
      };
    }

    return {
      success: true,
      images,
      source: 's3_fallback',
      processing_mode: PROCESSING_MODE.listing,
      count: images.length,
      message: metadata ? 'Database query failed, using S3 fallback' : 'Using S3 fallback - database unavailable',
    };
  }
}
