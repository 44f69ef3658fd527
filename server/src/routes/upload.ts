import { Router } from 'express';
import { PROCESSING_MODE } from '../context';
import { UploadService } from '../services/uploadService';
import { logger } from '../utils/logger';
import { isMultipart, MultipartBody, readMultipart } from '../utils/multipart';

const UPLOAD_FIELDS = ['files', 'file'];

/**
 * `files` wins over `file` when a request carries both. A field whose parts all came without
 * a filename still counts as present; those parts are skipped by the service.
 */
const pickFileParts = (body: MultipartBody) => {
  const fieldName = UPLOAD_FIELDS.find((name) => body.fieldNames.has(name));
  return fieldName ? body.files.filter((part) => part.fieldName === fieldName) : null;
};

export const createUploadRouter = (service: UploadService, maxUploadBytes: number) => {
  const router = Router();

  router.post('/upload', async (req, res, next) => {
    try {
      const parts = isMultipart(req) ? pickFileParts(await readMultipart(req, maxUploadBytes)) : null;
      if (!parts) {
        res.status(400).json({ success: false, error: 'No files provided' });
        return;
      }
      logger.info({ count: parts.length }, 'received files for upload');

      const files = await service.uploadAll(
        parts.map((part) => ({ originalName: part.originalName, mimeType: part.mimeType, buffer: part.buffer }))
      );
      res.json({
        success: true,
        files,
        bucket: service.bucket,
        database_enabled: service.databaseEnabled,
        processing_mode: PROCESSING_MODE.upload,
        message: 'Images uploaded successfully. AI processing will complete in the background via Lambda.',
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
