import { randomUUID } from 'crypto';
import mime from 'mime-types';
import path from 'path';
import { AppContext } from '../context';
import { errorMessage } from '../errors';
import { pendingRecognition, RecognitionPayload } from '../models/annotations';
import { logger } from '../utils/logger';

export interface IncomingFile {
  originalName: string;
  mimeType?: string;
  buffer: Buffer;
}

export interface UploadedFileResult {
  fileName: string;
  originalName: string;
  s3Key: string;
  bucket: string;
  status: 'uploaded';
  processing_status: 'pending';
  message: string;
  uploadTime: string;
  imageId: number | null;
  fileSize: number;
  rekognition: RecognitionPayload;
}

export interface FailedFileResult {
  fileName: string;
  originalName: string;
  status: 'failed';
  error: string;
}

export type FileResult = UploadedFileResult | FailedFileResult;

export const UPLOADED_BY = 'image-recognition-system';

export const buildStorageKey = (prefix: string, originalName: string) =>
  `${prefix}${randomUUID()}${path.extname(originalName)}`;

export const resolveContentType = (originalName: string, mimeType?: string) =>
  mimeType || mime.lookup(originalName) || 'application/octet-stream';

export class UploadService {
  constructor(private readonly context: AppContext) {}

  get bucket() {
    return this.context.storage.bucket;
  }

  get databaseEnabled() {
    return this.context.metadata !== null;
  }

  /** Files are handled one after another so results line up with the request order. */
  async uploadAll(files: IncomingFile[]) {
    const results: FileResult[] = [];
    for (const file of files) {
      if (file.originalName === '') {
        logger.debug('skipping file part without a filename');
        continue;
      }
      results.push(await this.uploadOne(file));
    }
    return results;
  }

  async uploadOne(file: IncomingFile): Promise<FileResult> {
    const { storage, config } = this.context;
    if (file.buffer.length > config.maxUploadBytes) {
      logger.warn({ originalName: file.originalName, limit: config.maxUploadBytes }, 'file over the upload limit');
      return {
        fileName: file.originalName,
        originalName: file.originalName,
        status: 'failed',
        error: `File exceeds the ${config.maxUploadBytes} byte upload limit`,
      };
    }
    const key = buildStorageKey(config.uploadPrefix, file.originalName);
    const uploadTime = new Date().toISOString();

    const written = await storage.put(key, file.buffer, resolveContentType(file.originalName, file.mimeType), {
      // object metadata travels as HTTP headers, which only carry ASCII
      'original-name': encodeURIComponent(file.originalName),
      'upload-time': uploadTime,
      'uploaded-by': UPLOADED_BY,
    });
    if (!written.ok) {
      logger.error({ err: written.error, originalName: file.originalName }, 'storage upload failed');
      return { fileName: file.originalName, originalName: file.originalName, status: 'failed', error: written.error.message };
    }
    logger.info({ key, size: file.buffer.length }, 'uploaded to storage');

    const imageId = await this.recordPending(key, file);

    return {
      fileName: key,
      originalName: file.originalName,
      s3Key: key,
      bucket: storage.bucket,
      status: 'uploaded',
      processing_status: 'pending',
      message: 'Image uploaded successfully. Processing will complete shortly.',
      uploadTime,
      imageId,
      fileSize: file.buffer.length,
      rekognition: pendingRecognition('AI analysis in progress via Lambda...'),
    };
  }

  /**
   * Creates the pending metadata record. Any failure leaves the upload as storage-only and
   * yields a null id; the upload itself is never failed because of the metadata store.
   */
  private async recordPending(key: string, file: IncomingFile) {
    const { metadata } = this.context;
    if (!metadata) return null;

    try {
      const created = await metadata.createImageRecord(key, file.originalName, file.buffer.length);
      if (!created.ok) {
        logger.warn({ key, err: created.error }, 'continuing without metadata record');
        return null;
      }
      const imageId = created.value;

      const logged = await metadata.logProcessingEvent(imageId, {
        processType: 'upload',
        status: 'completed',
        message: `Uploaded to S3: ${key}`,
      });
      if (!logged.ok) {
        logger.warn({ imageId, err: logged.error }, 'upload event not logged');
      }

      const pending = await metadata.updateStatus(imageId, 'pending');
      if (!pending.ok) {
        logger.warn({ imageId, err: pending.error }, 'pending status not recorded');
      }

      logger.info({ imageId, key }, 'image record created, processing status pending');
      return imageId;
    } catch (error) {
      logger.error({ key, err: errorMessage(error) }, 'metadata store error during upload');
      return null;
    }
  }
}
