import express from 'express';
import morgan from 'morgan';
import { AppContext } from './context';
import { AppError, errorMessage } from './errors';
import { createHealthRouter } from './routes/health';
import { createImageRouter } from './routes/images';
import { createProcessingStatusRouter } from './routes/processingStatus';
import { createUploadRouter } from './routes/upload';
import { HealthService } from './services/healthService';
import { ImageService } from './services/imageService';
import { UploadService } from './services/uploadService';
import { logger } from './utils/logger';

const statusOf = (error: unknown) => {
  if (error instanceof AppError) return error.status;
  // body-parser attaches the HTTP status it wants (400 for malformed JSON, 413 for oversize bodies)
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
};

export const createApp = (context: AppContext) => {
  const app = express();
  const imageService = new ImageService(context);

  app.disable('x-powered-by');
  app.use(morgan('tiny', { skip: () => process.env.NODE_ENV === 'test' }));
  app.use(express.json({ limit: '1mb' }));

  app.use('/api', createUploadRouter(new UploadService(context), context.config.maxUploadBytes));
  app.use('/api', createImageRouter(imageService, context.storage.bucket));
  app.use('/api', createProcessingStatusRouter(imageService));
  app.use('/api', createHealthRouter(new HealthService(context)));

  app.get('/favicon.ico', (_req, res) => {
    res.status(204).send();
  });
  app.use(express.static(context.config.staticRoot));

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = statusOf(error);
    if (status >= 500) {
      logger.error({ err: error }, 'Unhandled error');
    } else {
      logger.warn({ err: errorMessage(error) }, 'Request rejected');
    }
    res.status(status).json({ success: false, error: status >= 500 ? 'Internal Server Error' : errorMessage(error) });
  });

  return app;
};
