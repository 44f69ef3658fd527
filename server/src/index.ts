import 'dotenv/config';
import { createMysqlAdapter, createMysqlPool } from './adapters/mysqlAdapter';
import { createS3Adapter, createS3Client } from './adapters/s3Adapter';
import { createApp } from './app';
import { DEFAULT_DEPLOYMENT_INFO_PATH, loadConfig, readDeploymentInfo } from './config';
import { AppContext } from './context';
import { logger } from './utils/logger';

async function bootstrap() {
  const deploymentInfoPath = process.env.DEPLOYMENT_INFO_PATH ?? DEFAULT_DEPLOYMENT_INFO_PATH;
  const { info, error: infoError } = readDeploymentInfo(deploymentInfoPath);
  if (infoError) {
    logger.warn({ path: deploymentInfoPath, reason: infoError }, 'deployment info not loaded, using environment and defaults');
  }
  const config = loadConfig(process.env, info);

  const storage = createS3Adapter({ client: createS3Client(config.region), bucket: config.bucket, region: config.region });
  const metadata = config.database
    ? createMysqlAdapter({ pool: createMysqlPool(config.database), schemaPath: config.schemaPath })
    : null;

  if (metadata && config.autoMigrate) {
    const migrated = await metadata.ensureSchema();
    if (!migrated.ok) {
      logger.error({ err: migrated.error }, 'schema not applied; continuing');
    }
  }

  const context: AppContext = { config, storage, metadata };
  const app = createApp(context);

  const server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        bucket: config.bucket,
        region: config.region,
        database: config.database ? `${config.database.host}:${config.database.port}` : 'disabled',
      },
      'server listening'
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down');
    server.close(() => {
      const closing = metadata ? metadata.close() : Promise.resolve();
      void closing
        .catch((error: unknown) => logger.error({ err: error }, 'failed to close database pool'))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((error) => {
  logger.error(error, 'Failed to start server');
  process.exit(1);
});
