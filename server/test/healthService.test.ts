import { HealthService } from '../src/services/healthService';
import { buildContext } from './support/context';

const now = () => new Date('2026-07-01T12:00:00.000Z');

describe('HealthService', () => {
  it('is healthy when storage and database answer', async () => {
    const { context } = buildContext();

    await expect(new HealthService(context, now).check()).resolves.toEqual({
      status: 'healthy',
      timestamp: '2026-07-01T12:00:00.000Z',
      processing_mode: 'lambda_async',
      components: {
        s3: { status: 'healthy', bucket: 'test-bucket', message: 'S3 bucket accessible' },
        database: { status: 'healthy', message: 'Database connection successful' },
        rekognition: { status: 'lambda_managed', message: 'Image processing handled by Lambda function' },
      },
    });
  });

  it('is degraded with the error code when the bucket is missing', async () => {
    const { context, storage } = buildContext();
    storage.bucketMissing = true;

    const report = await new HealthService(context, now).check();

    expect(report.status).toBe('degraded');
    expect(report.components.s3).toEqual({
      status: 'unhealthy',
      bucket: 'test-bucket',
      message: 'S3 Error: HeadBucket test-bucket failed: The specified bucket does not exist',
      error_code: 'NoSuchBucket',
    });
    expect(report.components.database.status).toBe('healthy');
  });

  it('is degraded when the database probe fails', async () => {
    const { context, metadata } = buildContext();
    metadata?.failing.add('testConnection');

    const report = await new HealthService(context, now).check();

    expect(report.status).toBe('degraded');
    expect(report.components.database).toEqual({
      status: 'unhealthy',
      message: 'Database Error: testConnection failed: connect ECONNREFUSED',
    });
  });

  it('marks a disabled database as unavailable without degrading', async () => {
    const { context } = buildContext({ withDatabase: false });

    const report = await new HealthService(context, now).check();

    expect(report.status).toBe('healthy');
    expect(report.components.database).toEqual({ status: 'unavailable', message: 'Database not configured' });
  });

  it('reshapes the report into named services', async () => {
    const { context, storage } = buildContext();
    storage.bucketMissing = true;

    const report = await new HealthService(context, now).infrastructure();

    expect(report.overall).toBe('degraded');
    expect(Object.keys(report.services)).toEqual(['s3', 'database', 'lambda']);
    expect(report.services.lambda.status).toBe('lambda_managed');
  });

  it('derives feature flags from the database setting', () => {
    const { context } = buildContext({ withDatabase: false });

    expect(new HealthService(context).publicConfig()).toEqual({
      bucket: 'test-bucket',
      region: 'us-west-2',
      database_enabled: false,
      processing_mode: 'lambda_async',
      features: {
        async_processing: true,
        lambda_rekognition: true,
        database_storage: false,
        real_time_status: false,
      },
    });
  });
});
