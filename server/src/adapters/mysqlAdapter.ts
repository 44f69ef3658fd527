import fs from 'fs/promises';
import { createPool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { DatabaseConfig } from '../config';
import { err, errorMessage, NotFoundError, ok, Result, StoreError, ValidationError } from '../errors';
import {
  ALLOWED_PREDECESSORS,
  DetectionResults,
  EmotionRecord,
  FaceDetectionRecord,
  ImageRecord,
  ImageWithDetections,
  isProcessingStatus,
  LabelRecord,
  PersonDetectionRecord,
  pickPrimaryEmotion,
  ProcessingLogEntry,
  ProcessingStatus,
  ProcessingStatusInfo,
} from '../models/records';
import { DetectionResultsSchema } from '../models/schemas';
import { logger } from '../utils/logger';

export type SqlValue = string | number | boolean | Date | null | SqlValue[];
export type SqlRow = Record<string, unknown>;

/** The slice of a pooled connection the store relies on. */
export interface SqlConnection {
  select: (sql: string, values?: SqlValue[]) => Promise<SqlRow[]>;
  execute: (sql: string, values?: SqlValue[]) => Promise<{ insertId: number; affectedRows: number }>;
  beginTransaction: () => Promise<void>;
  commit: () => Promise<void>;
  rollback: () => Promise<void>;
  release: () => void;
}

export interface SqlPool {
  getConnection: () => Promise<SqlConnection>;
  end: () => Promise<void>;
}

export interface MetadataStore {
  createImageRecord: (s3Key: string, originalName: string, fileSize: number) => Promise<Result<number, StoreError>>;
  updateStatus: (
    imageId: number,
    status: ProcessingStatus,
    processedAt?: Date | null
  ) => Promise<Result<boolean, StoreError | ValidationError>>;
  saveDetectionResults: (
    imageId: number,
    results: DetectionResults
  ) => Promise<Result<void, StoreError | ValidationError | NotFoundError>>;
  getImageByKey: (s3Key: string) => Promise<Result<ImageRecord | null, StoreError>>;
  getAllImagesWithDetections: () => Promise<Result<ImageWithDetections[], StoreError>>;
  getProcessingStatus: (imageId: number) => Promise<Result<ProcessingStatusInfo | null, StoreError>>;
  logProcessingEvent: (imageId: number, entry: ProcessingLogEntry) => Promise<Result<void, StoreError>>;
  testConnection: () => Promise<Result<void, StoreError>>;
  ensureSchema: () => Promise<Result<void, StoreError>>;
  close: () => Promise<void>;
}

export interface MysqlAdapterOptions {
  pool: SqlPool;
  schemaPath?: string;
  readSchema?: (schemaPath: string) => Promise<string>;
}

export const createMysqlPool = (config: DatabaseConfig): SqlPool => {
  const pool = createPool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    charset: 'utf8mb4',
    timezone: 'Z',
    waitForConnections: true,
    connectionLimit: 10,
  });

  return {
    async getConnection() {
      const connection = await pool.getConnection();
      return {
        async select(sql, values) {
          const [rows] = await connection.query<RowDataPacket[]>(sql, values);
          return rows;
        },
        async execute(sql, values) {
          const [header] = await connection.query<ResultSetHeader>(sql, values);
          return { insertId: header.insertId, affectedRows: header.affectedRows };
        },
        beginTransaction: () => connection.beginTransaction(),
        commit: () => connection.commit(),
        rollback: () => connection.rollback(),
        release: () => connection.release(),
      };
    },
    end: () => pool.end(),
  };
};

// mysql2 hands DECIMAL columns back as strings; non-numeric values surface as NaN and are rejected
// when the record is translated for the API.
const toNumber = (value: unknown) => (typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN);

const toNullableNumber = (value: unknown) => (value === null || value === undefined ? null : toNumber(value));

const toDate = (value: unknown) => (value instanceof Date ? value : new Date(typeof value === 'string' ? value : NaN));

const toNullableDate = (value: unknown) => (value === null || value === undefined ? null : toDate(value));

const toText = (value: unknown) => (typeof value === 'string' ? value : value == null ? '' : String(value));

const toStatus = (value: unknown): ProcessingStatus => (isProcessingStatus(value) ? value : 'unknown');

const IMAGE_COLUMNS = 'id, s3_key, original_name, file_size, upload_time, processing_status, processed_at';

const toImageRecord = (row: SqlRow): ImageRecord => ({
  id: toNumber(row.id),
  s3Key: toText(row.s3_key),
  originalName: toText(row.original_name),
  fileSize: toNumber(row.file_size),
  uploadTime: toDate(row.upload_time),
  processingStatus: toStatus(row.processing_status),
  processedAt: toNullableDate(row.processed_at),
});

const toBoundingBox = (row: SqlRow) => ({
  left: toNumber(row.bbox_left),
  top: toNumber(row.bbox_top),
  width: toNumber(row.bbox_width),
  height: toNumber(row.bbox_height),
});

const toFaceRecord = (row: SqlRow, emotions: EmotionRecord[]): FaceDetectionRecord => {
  const ageLow = toNullableNumber(row.age_low);
  const ageHigh = toNullableNumber(row.age_high);
  const gender = row.gender == null || row.gender === '' ? null : toText(row.gender);
  const primaryEmotion = row.primary_emotion == null || row.primary_emotion === '' ? null : toText(row.primary_emotion);
  return {
    confidence: toNumber(row.confidence),
    boundingBox: toBoundingBox(row),
    ageRange: ageLow !== null && ageHigh !== null ? { low: ageLow, high: ageHigh } : null,
    gender: gender ? { value: gender, confidence: toNullableNumber(row.gender_confidence) ?? 0 } : null,
    primaryEmotion: primaryEmotion
      ? { type: primaryEmotion, confidence: toNullableNumber(row.emotion_confidence) ?? 0 }
      : null,
    emotions,
  };
};

const groupBy = <T>(rows: SqlRow[], column: string, map: (row: SqlRow) => T) => {
  const groups = new Map<number, T[]>();
  for (const row of rows) {
    const key = toNumber(row[column]);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(map(row));
    } else {
      groups.set(key, [map(row)]);
    }
  }
  return groups;
};

export const createMysqlAdapter = ({
  pool,
  schemaPath,
  readSchema = (target) => fs.readFile(target, 'utf-8'),
}: MysqlAdapterOptions): MetadataStore => {
  const withConnection = async <T>(action: string, work: (connection: SqlConnection) => Promise<T>) => {
    let connection: SqlConnection | undefined;
    try {
      connection = await pool.getConnection();
      return ok(await work(connection));
    } catch (error) {
      logger.error({ err: error, action }, 'metadata store operation failed');
      return err(new StoreError(`${action} failed: ${errorMessage(error)}`, { cause: error }));
    } finally {
      connection?.release();
    }
  };

  const inTransaction = async <T>(connection: SqlConnection, work: () => Promise<T>) => {
    await connection.beginTransaction();
    try {
      const result = await work();
      await connection.commit();
      return result;
    } catch (error) {
      try {
        await connection.rollback();
      } catch (rollbackError) {
        logger.error({ err: rollbackError }, 'rollback failed');
      }
      throw error;
    }
  };

  return {
    createImageRecord(s3Key, originalName, fileSize) {
      return withConnection('createImageRecord', async (connection) => {
        const { insertId } = await connection.execute(
          "INSERT INTO images (s3_key, original_name, file_size, processing_status) VALUES (?, ?, ?, 'pending')",
          [s3Key, originalName, fileSize]
        );
        logger.info({ imageId: insertId, s3Key }, 'image record created');
        return insertId;
      });
    },

    async updateStatus(imageId, status, processedAt) {
      if (status === 'unknown') {
        return err(new ValidationError('unknown is not a status an image can be moved to'));
      }
      const predecessors = ALLOWED_PREDECESSORS[status];
      return withConnection('updateStatus', async (connection) => {
        const { affectedRows } =
          processedAt && status !== 'pending'
            ? await connection.execute(
                'UPDATE images SET processing_status = ?, processed_at = ? WHERE id = ? AND processing_status IN (?)',
                [status, processedAt, imageId, predecessors]
              )
            : await connection.execute(
                'UPDATE images SET processing_status = ? WHERE id = ? AND processing_status IN (?)',
                [status, imageId, predecessors]
              );
        if (affectedRows === 0) {
          logger.warn({ imageId, status }, 'status update matched no image in an allowed state');
          return false;
        }
        logger.info({ imageId, status }, 'processing status updated');
        return true;
      });
    },

    async saveDetectionResults(imageId, results) {
      const parsed = DetectionResultsSchema.safeParse(results);
      if (!parsed.success) {
        return err(new ValidationError(`invalid detection results: ${parsed.error.message}`));
      }
      const { labels, persons, faces } = parsed.data;
      const saved = await withConnection('saveDetectionResults', (connection) =>
        inTransaction(connection, async () => {
          const existing = await connection.select('SELECT id FROM images WHERE id = ? FOR UPDATE', [imageId]);
          if (existing.length === 0) {
            return false;
          }
          for (const label of labels) {
            await connection.execute('INSERT INTO detection_labels (image_id, label_name, confidence) VALUES (?, ?, ?)', [
              imageId,
              label.name,
              label.confidence,
            ]);
          }
          for (const person of persons) {
            const box = person.boundingBox;
            await connection.execute(
              'INSERT INTO person_detections (image_id, confidence, bbox_left, bbox_top, bbox_width, bbox_height) VALUES (?, ?, ?, ?, ?, ?)',
              [imageId, person.confidence, box.left, box.top, box.width, box.height]
            );
          }
          for (const face of faces) {
            const box = face.boundingBox;
            const primary = pickPrimaryEmotion(face.emotions);
            const { insertId: faceId } = await connection.execute(
              `INSERT INTO face_detections
                (image_id, confidence, bbox_left, bbox_top, bbox_width, bbox_height,
                 age_low, age_high, gender, gender_confidence, primary_emotion, emotion_confidence)
               VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
              [
                imageId,
                face.confidence,
                box.left,
                box.top,
                box.width,
                box.height,
                face.ageRange?.low ?? null,
                face.ageRange?.high ?? null,
                face.gender?.value ?? null,
                face.gender?.confidence ?? null,
                primary?.type ?? null,
                primary?.confidence ?? null,
              ]
            );
            for (const emotion of face.emotions ?? []) {
              await connection.execute(
                'INSERT INTO face_emotions (face_detection_id, emotion_type, confidence) VALUES (?, ?, ?)',
                [faceId, emotion.type, emotion.confidence]
              );
            }
          }
          return true;
        })
      );
      if (!saved.ok) return saved;
      if (!saved.value) {
        return err(new NotFoundError(`image ${imageId} does not exist`));
      }
      logger.info({ imageId, labels: labels.length, persons: persons.length, faces: faces.length }, 'detection results saved');
      return ok(undefined);
    },

    getImageByKey(s3Key) {
      return withConnection('getImageByKey', async (connection) => {
        const rows = await connection.select(`SELECT ${IMAGE_COLUMNS} FROM images WHERE s3_key = ?`, [s3Key]);
        return rows.length > 0 ? toImageRecord(rows[0]) : null;
      });
    },

    getAllImagesWithDetections() {
      return withConnection('getAllImagesWithDetections', async (connection) => {
        const imageRows = await connection.select(`SELECT ${IMAGE_COLUMNS} FROM images ORDER BY upload_time DESC, id DESC`);
        if (imageRows.length === 0) return [];

        const labelRows = await connection.select(
          'SELECT image_id, label_name, confidence FROM detection_labels ORDER BY id'
        );
        const personRows = await connection.select(
          'SELECT image_id, confidence, bbox_left, bbox_top, bbox_width, bbox_height FROM person_detections ORDER BY id'
        );
        const faceRows = await connection.select(
          `SELECT id, image_id, confidence, bbox_left, bbox_top, bbox_width, bbox_height,
                  age_low, age_high, gender, gender_confidence, primary_emotion, emotion_confidence
           FROM face_detections ORDER BY id`
        );
        const emotionRows = await connection.select(
          'SELECT face_detection_id, emotion_type, confidence FROM face_emotions ORDER BY id'
        );

        const labels = groupBy<LabelRecord>(labelRows, 'image_id', (row) => ({
          name: toText(row.label_name),
          confidence: toNumber(row.confidence),
        }));
        const persons = groupBy<PersonDetectionRecord>(personRows, 'image_id', (row) => ({
          confidence: toNumber(row.confidence),
          boundingBox: toBoundingBox(row),
        }));
        const emotions = groupBy<EmotionRecord>(emotionRows, 'face_detection_id', (row) => ({
          type: toText(row.emotion_type),
          confidence: toNumber(row.confidence),
        }));
        const faces = groupBy<FaceDetectionRecord>(faceRows, 'image_id', (row) =>
          toFaceRecord(row, emotions.get(toNumber(row.id)) ?? [])
        );

        return imageRows.map((row) => {
          const image = toImageRecord(row);
          return {
            ...image,
            labels: labels.get(image.id) ?? [],
            persons: persons.get(image.id) ?? [],
            faces: faces.get(image.id) ?? [],
          };
        });
      });
    },

    getProcessingStatus(imageId) {
      return withConnection('getProcessingStatus', async (connection) => {
        const rows = await connection.select(
          'SELECT processing_status, processed_at, upload_time FROM images WHERE id = ?',
          [imageId]
        );
        if (rows.length === 0) return null;
        const [row] = rows;
        return {
          status: toStatus(row.processing_status),
          processedAt: toNullableDate(row.processed_at),
          uploadTime: toDate(row.upload_time),
        };
      });
    },

    logProcessingEvent(imageId, entry) {
      return withConnection('logProcessingEvent', async (connection) => {
        await connection.execute(
          'INSERT INTO processing_logs (image_id, process_type, status, message, processing_time_ms) VALUES (?, ?, ?, ?, ?)',
          [imageId, entry.processType, entry.status, entry.message ?? null, entry.processingTimeMs ?? null]
        );
      });
    },

    testConnection() {
      return withConnection('testConnection', async (connection) => {
        const rows = await connection.select('SELECT 1 AS ok');
        if (rows.length === 0) {
          throw new Error('SELECT 1 returned no rows');
        }
      });
    },

    async ensureSchema() {
      if (!schemaPath) {
        return err(new StoreError('no schema path configured'));
      }
      let script: string;
      try {
        script = await readSchema(schemaPath);
      } catch (error) {
        return err(new StoreError(`cannot read ${schemaPath}: ${errorMessage(error)}`, { cause: error }));
      }
      const statements = script
        .split(';')
        .map((statement) => statement.trim())
        .filter((statement) => statement.length > 0);
      return withConnection('ensureSchema', async (connection) => {
        for (const statement of statements) {
          await connection.execute(statement);
        }
        logger.info({ statements: statements.length, schemaPath }, 'schema applied');
      });
    },

    close: () => pool.end(),
  };
};
