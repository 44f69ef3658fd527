import { toApiFaceBox, toApiImage } from '../src/models/annotations';
import { FaceDetectionRecord, ImageWithDetections, pickPrimaryEmotion } from '../src/models/records';

const face = (overrides: Partial<FaceDetectionRecord> = {}): FaceDetectionRecord => ({
  confidence: 99.1,
  boundingBox: { left: 0.1, top: 0.2, width: 0.3, height: 0.4 },
  ageRange: null,
  gender: null,
  primaryEmotion: null,
  emotions: [],
  ...overrides,
});

const image = (overrides: Partial<ImageWithDetections> = {}): ImageWithDetections => ({
  id: 3,
  s3Key: 'uploads/abc.jpg',
  originalName: 'beach.jpg',
  fileSize: 2048,
  uploadTime: new Date('2026-03-01T10:00:00.000Z'),
  processingStatus: 'completed',
  processedAt: new Date('2026-03-01T10:00:05.000Z'),
  labels: [{ name: 'Beach', confidence: 97.5 }],
  persons: [{ confidence: 88, boundingBox: { left: 0.5, top: 0.25, width: 0.125, height: 0.5 } }],
  faces: [],
  ...overrides,
});

describe('pickPrimaryEmotion', () => {
  it('picks the highest-confidence emotion', () => {
    expect(
      pickPrimaryEmotion([
        { type: 'CALM', confidence: 20 },
        { type: 'HAPPY', confidence: 75 },
        { type: 'SAD', confidence: 5 },
      ])
    ).toEqual({ type: 'HAPPY', confidence: 75 });
  });

  it('keeps the first entry on ties', () => {
    expect(
      pickPrimaryEmotion([
        { type: 'CALM', confidence: 50 },
        { type: 'HAPPY', confidence: 50 },
      ])
    ).toEqual({ type: 'CALM', confidence: 50 });
  });

  it('returns null without emotions', () => {
    expect(pickPrimaryEmotion([])).toBeNull();
    expect(pickPrimaryEmotion(undefined)).toBeNull();
  });
});

describe('toApiFaceBox', () => {
  it('exposes only the primary emotion', () => {
    const box = toApiFaceBox(
      face({
        ageRange: { low: 25, high: 35 },
        gender: { value: 'Female', confidence: 99.5 },
        primaryEmotion: { type: 'HAPPY', confidence: 90 },
        emotions: [
          { type: 'CALM', confidence: 8 },
          { type: 'HAPPY', confidence: 90 },
        ],
      })
    );

    expect(box).toEqual({
      Left: 0.1,
      Top: 0.2,
      Width: 0.3,
      Height: 0.4,
      confidence: 99.1,
      ageRange: { Low: 25, High: 35 },
      gender: { Value: 'Female', Confidence: 99.5 },
      emotions: [{ Type: 'HAPPY', Confidence: 90 }],
    });
  });

  it('omits optional attributes that were not detected', () => {
    expect(toApiFaceBox(face())).toEqual({ Left: 0.1, Top: 0.2, Width: 0.3, Height: 0.4, confidence: 99.1 });
  });

  it('throws on a corrupt gender or emotion confidence', () => {
    expect(() => toApiFaceBox(face({ gender: { value: 'Male', confidence: NaN } }))).toThrow(
      'gender confidence is not a finite number'
    );
    expect(() => toApiFaceBox(face({ primaryEmotion: { type: 'CALM', confidence: NaN } }))).toThrow(
      'emotion confidence is not a finite number'
    );
  });
});

describe('toApiImage', () => {
  it('maps a stored record to the listing shape', () => {
    expect(toApiImage(image(), 'https://signed.test/abc')).toEqual({
      fileName: 'uploads/abc.jpg',
      originalName: 'beach.jpg',
      uploadTime: '2026-03-01T10:00:00.000Z',
      size: 2048,
      url: 'https://signed.test/abc',
      rekognition: {
        status: 'completed',
        labels: [{ Name: 'Beach', Confidence: 97.5 }],
        boundingBoxes: [{ Left: 0.5, Top: 0.25, Width: 0.125, Height: 0.5, confidence: 88 }],
        faceBoxes: [],
      },
      processing_status: 'completed',
      processed_at: '2026-03-01T10:00:05.000Z',
      imageId: 3,
    });
  });

  it('falls back to the key when the original name is empty', () => {
    expect(toApiImage(image({ originalName: '' }), 'u').originalName).toBe('uploads/abc.jpg');
  });

  it('throws on a corrupt numeric column', () => {
    expect(() => toApiImage(image({ labels: [{ name: 'Beach', confidence: NaN }] }), 'u')).toThrow(
      'label confidence is not a finite number'
    );
  });

  it('throws on an invalid upload timestamp', () => {
    expect(() => toApiImage(image({ uploadTime: new Date('not a date') }), 'u')).toThrow('invalid timestamp');
  });
});
