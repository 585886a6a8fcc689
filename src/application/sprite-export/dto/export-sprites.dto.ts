import { z } from 'zod';

import { MAX_FRAME_DIMENSION, MIN_FRAME_DIMENSION } from '../../../domain/sprite-export/index.js';

const directionSchema = z.tuple([z.number(), z.number(), z.number()]);

export const cameraAngleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('front') }),
  z.object({ kind: z.literal('isometric') }),
  z.object({ kind: z.literal('side') }),
  z.object({ kind: z.literal('custom'), direction: directionSchema }),
]);

export const projectionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('orthographic') }),
  z.object({ kind: z.literal('perspective'), fovDegrees: z.number().gt(0).lt(180).default(35) }),
]);

const frameDimensionSchema = z.number().int().min(MIN_FRAME_DIMENSION).max(MAX_FRAME_DIMENSION);

export const frameRangeSchema = z
  .object({
    start: z.number().int(),
    end: z.number().int(),
  })
  .refine((range) => range.end >= range.start, {
    message: 'Frame range end must not precede its start',
    path: ['end'],
  });

export const exportSpritesCommandSchema = z.object({
  id: z.string().min(1),
  name: z.string().max(200),
  outputDir: z.string().min(1),
  frameSize: z.object({
    width: frameDimensionSchema,
    height: frameDimensionSchema,
  }),
  frameRange: frameRangeSchema,
  frameLimit: z.number().int().positive().optional(),
  angle: cameraAngleSchema.default({ kind: 'side' }),
  projection: projectionSchema.default({ kind: 'orthographic' }),
  // Range is enforced by the framing planner so it fails as InvalidPadding.
  padding: z.number().default(0.2),
  mirror: z.boolean().default(false),
  format: z.enum(['png', 'webp']).default('png'),
  mode: z.enum(['sheet', 'frames']).default('sheet'),
  grid: z
    .object({
      rows: z.number().int().positive(),
      columns: z.number().int().positive(),
    })
    .optional(),
  samplingStride: z.union([z.number().int().positive(), z.literal('auto')]).default(1),
});

export type ExportSpritesPayload = z.input<typeof exportSpritesCommandSchema>;

export type ValidatedExportSpritesPayload = z.output<typeof exportSpritesCommandSchema>;
