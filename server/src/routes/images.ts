import { Router } from 'express';
import { ImageService } from '../services/imageService';
import { logger } from '../utils/logger';

export const createImageRouter = (service: ImageService, bucket: string) => {
  const router = Router();

  router.get('/images', async (_req, res) => {
    try {
      const listing = await service.listImages();
      logger.info({ source: listing.source, count: listing.count }, 'images listed');
      res.status(listing.success ? 200 : 500).json(listing);
    } catch (error) {
      logger.error({ err: error }, 'image listing failed');
      res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : String(error),
        images: [],
        source: 'critical_error',
      });
    }
  });

  // Keys contain slashes (`uploads/<id>.jpg`), so the rest of the path is the key.
  router.get(/^\/image\/(.+)$/, async (req, res, next) => {
    try {
      const key = req.params[0];
      const url = await service.getImageUrl(key);
      if (!url.ok) {
        logger.warn({ key, err: url.error.message }, 'presigned url not generated');
        res.status(url.error.status).json({ success: false, error: `S3 Error: ${url.error.message}`, s3_key: key });
        return;
      }
      res.json({ success: true, url: url.value, s3_key: key, bucket });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
