import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { errorMessage } from './errors';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface AppConfig {
  port: number;
  bucket: string;
  region: string;
  uploadPrefix: string;
  presignedUrlTtl: number;
  maxUploadBytes: number;
  staticRoot: string;
  schemaPath: string;
  autoMigrate: boolean;
  /** null when no database host is configured or the database is switched off. */
  database: DatabaseConfig | null;
}

export type Env = Record<string, string | undefined>;

/** Shape of the JSON file the deployment scripts drop next to the app. */
const DeploymentInfoSchema = z.object({
  s3Bucket: z.string().optional(),
  region: z.string().optional(),
  rds_endpoint: z.string().optional(),
  rds_port: z.union([z.number(), z.string()]).optional(),
  rds_database: z.string().optional(),
  rds_username: z.string().optional(),
  rds_password: z.string().optional(),
});

export type DeploymentInfo = z.infer<typeof DeploymentInfoSchema>;

export const DEFAULT_DEPLOYMENT_INFO_PATH = '/var/www/html/deployment-info.json';
const DEFAULT_BUCKET = 'my-app-image-bucket';
const DEFAULT_REGION = 'us-west-2';

const resolveUserPath = (inputPath: string) => {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (path.isAbsolute(inputPath)) {
    return inputPath;
  }
  return path.resolve(process.cwd(), inputPath);
};

const readString = (value: string | undefined) => (typeof value === 'string' && value.trim() ? value.trim() : undefined);

const readInt = (name: string, value: string | number | undefined, defaultValue: number) => {
  if (value === undefined || value === '') return defaultValue;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
};

/**
 * Reads the deployment info file. A missing or unparsable file yields an empty object;
 * the caller falls back to defaults.
 */
export const readDeploymentInfo = (
  filePath: string,
  readFile: (filePath: string) => string = (target) => fs.readFileSync(target, 'utf-8')
): { info: DeploymentInfo; error?: string } => {
  try {
    const parsed = DeploymentInfoSchema.safeParse(JSON.parse(readFile(filePath)));
    if (!parsed.success) {
      return { info: {}, error: `${filePath} is not a valid deployment info file: ${parsed.error.message}` };
    }
    return { info: parsed.data };
  } catch (error) {
    return { info: {}, error: errorMessage(error) };
  }
};

export const loadConfig = (env: Env, info: DeploymentInfo = {}): AppConfig => {
  const host = readString(env.RDS_HOSTNAME) ?? readString(info.rds_endpoint);
  const fromEnv = readString(env.RDS_HOSTNAME) !== undefined;

  const database: DatabaseConfig | null =
    env.DATABASE_ENABLED !== 'false' && host !== undefined
      ? {
          host,
          port: readInt('RDS_PORT', fromEnv ? env.RDS_PORT : info.rds_port, 3306),
          database: (fromEnv ? readString(env.RDS_DB_NAME) : readString(info.rds_database)) ?? 'image_recognition',
          user: (fromEnv ? readString(env.RDS_USERNAME) : readString(info.rds_username)) ?? 'admin',
          password: (fromEnv ? env.RDS_PASSWORD : info.rds_password) ?? '',
        }
      : null;

  return Object.freeze({
    port: readInt('PORT', env.PORT, 5000),
    bucket: readString(env.S3_BUCKET) ?? readString(info.s3Bucket) ?? DEFAULT_BUCKET,
    region: readString(env.AWS_REGION) ?? readString(info.region) ?? DEFAULT_REGION,
    uploadPrefix: readString(env.UPLOAD_PREFIX) ?? 'uploads/',
    presignedUrlTtl: readInt('PRESIGNED_URL_TTL', env.PRESIGNED_URL_TTL, 3600),
    maxUploadBytes: readInt('MAX_UPLOAD_BYTES', env.MAX_UPLOAD_BYTES, 50 * 1024 * 1024),
    staticRoot: resolveUserPath(env.STATIC_ROOT ?? 'public'),
    schemaPath: resolveUserPath(env.SCHEMA_PATH ?? 'server/sql/schema.sql'),
    autoMigrate: env.DB_AUTO_MIGRATE === 'true',
    database,
  });
};
