export const PROCESSING_STATUSES = ['pending', 'processing', 'completed', 'failed', 'unknown'] as const;

export type ProcessingStatus = (typeof PROCESSING_STATUSES)[number];

export const isProcessingStatus = (value: unknown): value is ProcessingStatus =>
  typeof value === 'string' && (PROCESSING_STATUSES as readonly string[]).includes(value);

/**
 * Statuses an image may move to from each status. Repeating the current status is always allowed
 * so the worker can retry an update without it being rejected.
 */
export const ALLOWED_PREDECESSORS: Record<Exclude<ProcessingStatus, 'unknown'>, ProcessingStatus[]> = {
  pending: ['pending'],
  processing: ['pending', 'processing'],
  completed: ['pending', 'processing', 'completed'],
  failed: ['pending', 'processing', 'failed'],
};

export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface ImageRecord {
  id: number;
  s3Key: string;
  originalName: string;
  fileSize: number;
  uploadTime: Date;
  processingStatus: ProcessingStatus;
  processedAt: Date | null;
}

export interface LabelRecord {
  name: string;
  confidence: number;
}

export interface PersonDetectionRecord {
  confidence: number;
  boundingBox: BoundingBox;
}

export interface EmotionRecord {
  type: string;
  confidence: number;
}

export interface FaceDetectionRecord {
  confidence: number;
  boundingBox: BoundingBox;
  ageRange: { low: number; high: number } | null;
  gender: { value: string; confidence: number } | null;
  primaryEmotion: EmotionRecord | null;
  emotions: EmotionRecord[];
}

export interface ImageWithDetections extends ImageRecord {
  labels: LabelRecord[];
  persons: PersonDetectionRecord[];
  faces: FaceDetectionRecord[];
}

export interface ProcessingStatusInfo {
  status: ProcessingStatus;
  processedAt: Date | null;
  uploadTime: Date;
}

export interface ProcessingLogEntry {
  processType: string;
  status: string;
  message?: string;
  processingTimeMs?: number;
}

export interface FaceDetectionInput {
  confidence: number;
  boundingBox: BoundingBox;
  ageRange?: { low: number; high: number };
  gender?: { value: string; confidence: number };
  emotions?: EmotionRecord[];
}

export interface DetectionResults {
  labels: LabelRecord[];
  persons: PersonDetectionRecord[];
  faces: FaceDetectionInput[];
}

/** Highest-confidence emotion, or null when the face carries none. Ties keep the earlier entry. */
export const pickPrimaryEmotion = (emotions: EmotionRecord[] | undefined): EmotionRecord | null => {
  if (!emotions || emotions.length === 0) return null;
  return emotions.reduce((best, candidate) => (candidate.confidence > best.confidence ? candidate : best));
};
