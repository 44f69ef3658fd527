import { Router } from 'express';
import { HealthService } from '../services/healthService';
import { logger } from '../utils/logger';

export const createHealthRouter = (service: HealthService) => {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      const report = await service.check();
      if (report.status !== 'healthy') {
        logger.warn({ components: report.components }, 'health check degraded');
      }
      res.json(report);
    } catch (error) {
      logger.error({ err: error }, 'health check error');
      res.status(500).json({
        status: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  router.get('/status/infrastructure', async (_req, res) => {
    try {
      res.json(await service.infrastructure());
    } catch (error) {
      logger.error({ err: error }, 'infrastructure status error');
      res.status(500).json({
        overall: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  router.get('/config', (_req, res) => {
    res.json(service.publicConfig());
  });

  return router;
};
