import { Router } from 'express';
import { BatchStatusRequestSchema, parseImageId, parseRequestedIds } from '../models/schemas';
import { ImageService } from '../services/imageService';

export const createProcessingStatusRouter = (service: ImageService) => {
  const router = Router();

  router.post('/processing-status/batch', async (req, res, next) => {
    try {
      if (!service.databaseEnabled) {
        res.status(503).json({ error: 'Database not available' });
        return;
      }
      const parsed = BatchStatusRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: 'image_ids must be a list of image ids' });
        return;
      }
      const rawIds = parsed.data.image_ids;
      if (rawIds.length === 0) {
        res.status(400).json({ error: 'No image IDs provided' });
        return;
      }
      const statuses = await service.getStatuses(parseRequestedIds(rawIds));
      if (!statuses.ok) {
        res.status(statuses.error.status).json({ error: statuses.error.message });
        return;
      }
      res.json({ success: true, statuses: statuses.value });
    } catch (error) {
      next(error);
    }
  });

  router.get('/processing-status/:imageId', async (req, res, next) => {
    try {
      if (!service.databaseEnabled) {
        res.status(503).json({ error: 'Database not available' });
        return;
      }
      const imageId = parseImageId(req.params.imageId);
      if (imageId === null) {
        res.status(400).json({ error: 'Image id must be a positive integer' });
        return;
      }
      const status = await service.getStatus(imageId);
      if (!status.ok) {
        res.status(status.error.status).json({ error: status.error.message });
        return;
      }
      res.json({ success: true, image_id: imageId, ...status.value });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
