import { ObjectStorage } from './adapters/s3Adapter';
import { MetadataStore } from './adapters/mysqlAdapter';
import { AppConfig } from './config';

/** Everything a request handler may touch. Built once at start-up. */
export interface AppContext {
  config: AppConfig;
  storage: ObjectStorage;
  /** null when the metadata database is not configured. */
  metadata: MetadataStore | null;
}

export const PROCESSING_MODE = {
  upload: 'async_lambda',
  listing: 'lambda_async',
} as const;
