import { AppContext, PROCESSING_MODE } from '../context';

export type ComponentState = 'healthy' | 'unhealthy' | 'unavailable' | 'lambda_managed' | 'unknown';

export interface ComponentHealth {
  status: ComponentState;
  message: string;
  bucket?: string;
  error_code?: string;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  processing_mode: typeof PROCESSING_MODE.listing;
  components: {
    s3: ComponentHealth;
    database: ComponentHealth;
    rekognition: ComponentHealth;
  };
}

export interface InfrastructureReport {
  overall: HealthReport['status'];
  timestamp: string;
  processing_mode: HealthReport['processing_mode'];
  services: {
    s3: ComponentHealth;
    database: ComponentHealth;
    lambda: ComponentHealth;
  };
}

export interface PublicConfig {
  bucket: string;
  region: string;
  database_enabled: boolean;
  processing_mode: typeof PROCESSING_MODE.listing;
  features: {
    async_processing: boolean;
    lambda_rekognition: boolean;
    database_storage: boolean;
    real_time_status: boolean;
  };
}

export class HealthService {
  constructor(
    private readonly context: AppContext,
    private readonly now: () => Date = () => new Date()
  ) {}

  async check(): Promise<HealthReport> {
    const { storage, metadata } = this.context;

    const bucketProbe = await storage.headBucket();
    const s3: ComponentHealth = bucketProbe.ok
      ? { status: 'healthy', bucket: storage.bucket, message: 'S3 bucket accessible' }
      : {
          status: 'unhealthy',
          bucket: storage.bucket,
          message: `S3 Error: ${bucketProbe.error.message}`,
          ...(bucketProbe.error.code ? { error_code: bucketProbe.error.code } : {}),
        };

    let database: ComponentHealth = { status: 'unavailable', message: 'Database not configured' };
    if (metadata) {
      const databaseProbe = await metadata.testConnection();
      database = databaseProbe.ok
        ? { status: 'healthy', message: 'Database connection successful' }
        : { status: 'unhealthy', message: `Database Error: ${databaseProbe.error.message}` };
    }

    return {
      status: s3.status === 'unhealthy' || database.status === 'unhealthy' ? 'degraded' : 'healthy',
      timestamp: this.now().toISOString(),
      processing_mode: PROCESSING_MODE.listing,
      components: {
        s3,
        database,
        rekognition: { status: 'lambda_managed', message: 'Image processing handled by Lambda function' },
      },
    };
  }

  async infrastructure(): Promise<InfrastructureReport> {
    const report = await this.check();
    return {
      overall: report.status,
      timestamp: report.timestamp,
      processing_mode: report.processing_mode,
      services: {
        s3: report.components.s3,
        database: report.components.database,
        lambda: report.components.rekognition,
      },
    };
  }

  publicConfig(): PublicConfig {
    const { config, metadata } = this.context;
    const databaseEnabled = metadata !== null;
    return {
      bucket: config.bucket,
      region: config.region,
      database_enabled: databaseEnabled,
      processing_mode: PROCESSING_MODE.listing,
      features: {
        async_processing: true,
        lambda_rekognition: true,
        database_storage: databaseEnabled,
        real_time_status: databaseEnabled,
      },
    };
  }
}
