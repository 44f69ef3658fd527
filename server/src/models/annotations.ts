import {
  FaceDetectionRecord,
  ImageWithDetections,
  LabelRecord,
  PersonDetectionRecord,
  ProcessingStatus,
} from './records';

// Response shapes keep the field casing the frontend already consumes.

export interface ApiLabel {
  Name: string;
  Confidence: number;
}

export interface ApiBox {
  Left: number;
  Top: number;
  Width: number;
  Height: number;
  confidence: number;
}

export interface ApiFaceBox extends ApiBox {
  ageRange?: { Low: number; High: number };
  gender?: { Value: string; Confidence: number };
  emotions?: { Type: string; Confidence: number }[];
}

export interface RecognitionPayload {
  status: ProcessingStatus;
  message?: string;
  labels: ApiLabel[];
  boundingBoxes: ApiBox[];
  faceBoxes: ApiFaceBox[];
}

export interface ApiImage {
  fileName: string;
  originalName: string;
  uploadTime: string | null;
  size: number;
  url: string;
  rekognition: RecognitionPayload;
  processing_status: ProcessingStatus;
  processed_at?: string | null;
  imageId?: number;
}

const finite = (value: number, field: string) => {
  if (!Number.isFinite(value)) {
    throw new Error(`${field} is not a finite number`);
  }
  return value;
};

const toIso = (value: Date | null) => {
  if (!value) return null;
  if (Number.isNaN(value.getTime())) {
    throw new Error('invalid timestamp');
  }
  return value.toISOString();
};

export const toApiLabel = (label: LabelRecord): ApiLabel => ({
  Name: label.name,
  Confidence: finite(label.confidence, 'label confidence'),
});

export const toApiBox = (person: PersonDetectionRecord): ApiBox => ({
  Left: finite(person.boundingBox.left, 'bbox left'),
  Top: finite(person.boundingBox.top, 'bbox top'),
  Width: finite(person.boundingBox.width, 'bbox width'),
  Height: finite(person.boundingBox.height, 'bbox height'),
  confidence: finite(person.confidence, 'detection confidence'),
});

/** Only the stored primary emotion is exposed, as a single-element list. */
export const toApiFaceBox = (face: FaceDetectionRecord): ApiFaceBox => {
  const box: ApiFaceBox = toApiBox(face);
  if (face.ageRange) {
    box.ageRange = { Low: Math.trunc(face.ageRange.low), High: Math.trunc(face.ageRange.high) };
  }
  if (face.gender) {
    box.gender = { Value: face.gender.value, Confidence: finite(face.gender.confidence, 'gender confidence') };
  }
  if (face.primaryEmotion) {
    box.emotions = [
      { Type: face.primaryEmotion.type, Confidence: finite(face.primaryEmotion.confidence, 'emotion confidence') },
    ];
  }
  return box;
};

export const toRecognitionPayload = (image: ImageWithDetections): RecognitionPayload => ({
  status: image.processingStatus,
  labels: image.labels.map(toApiLabel),
  boundingBoxes: image.persons.map(toApiBox),
  faceBoxes: image.faces.map(toApiFaceBox),
});

export const toApiImage = (image: ImageWithDetections, url: string): ApiImage => ({
  fileName: image.s3Key,
  originalName: image.originalName || image.s3Key,
  uploadTime: toIso(image.uploadTime),
  size: image.fileSize,
  url,
  rekognition: toRecognitionPayload(image),
  processing_status: image.processingStatus,
  processed_at: toIso(image.processedAt),
  imageId: image.id,
});

export const pendingRecognition = (message: string): RecognitionPayload => ({
  status: 'processing',
  message,
  labels: [],
  boundingBoxes: [],
  faceBoxes: [],
});
