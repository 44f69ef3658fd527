import { z } from 'zod';

const fraction = z.number().min(0).max(1);
const confidence = z.number().min(0).max(100);

const BoundingBoxSchema = z.object({
  left: fraction,
  top: fraction,
  width: fraction,
  height: fraction,
});

const EmotionSchema = z.object({
  type: z.string().min(1),
  confidence,
});

export const DetectionResultsSchema = z.object({
  labels: z.array(z.object({ name: z.string().min(1), confidence })).default([]),
  persons: z.array(z.object({ confidence, boundingBox: BoundingBoxSchema })).default([]),
  faces: z
    .array(
      z.object({
        confidence,
        boundingBox: BoundingBoxSchema,
        ageRange: z.object({ low: z.number().int().min(0), high: z.number().int().min(0) }).optional(),
        gender: z.object({ value: z.string().min(1), confidence }).optional(),
        emotions: z.array(EmotionSchema).optional(),
      })
    )
    .default([]),
});

const ImageIdSchema = z.union([
  z.number().int().positive(),
  z
    .string()
    .regex(/^\d+$/)
    .transform((value) => Number(value)),
]);

// elements are checked one at a time so a bad id only drops itself
export const BatchStatusRequestSchema = z.object({
  image_ids: z.array(z.unknown()).optional().default([]),
});

export interface RequestedImageId {
  /** The id as the client wrote it, used as the response key. */
  key: string;
  id: number;
}

export const parseImageId = (raw: unknown) => {
  const parsed = ImageIdSchema.safeParse(raw);
  return parsed.success && parsed.data > 0 ? parsed.data : null;
};

export const parseRequestedIds = (rawIds: unknown[]): RequestedImageId[] =>
  rawIds.flatMap((raw) => {
    const id = parseImageId(raw);
    return id === null ? [] : [{ key: String(raw), id }];
  });
