/**
 * Messages exchanged with the normalization worker thread.
 * Both sides validate what they receive: structured clone keeps the shape
 * but not the static types.
 */

import { z } from 'zod';

const documentImageSchema = z.object({
  data: z.instanceof(Uint8Array),
  width: z.number(),
  height: z.number(),
  channels: z.union([z.literal(1), z.literal(3), z.literal(4)]),
});

const normalizerConfigSchema = z.object({
  denoise: z
    .object({
      templateWindowSize: z.number().optional(),
      searchWindowSize: z.number().optional(),
      h: z.number().optional(),
    })
    .optional(),
  clahe: z
    .object({
      clipLimit: z.number().optional(),
      tileGridSize: z.number().optional(),
    })
    .optional(),
  deskew: z
    .object({
      lowThreshold: z.number().optional(),
      highThreshold: z.number().optional(),
      houghThreshold: z.number().optional(),
      maxAngle: z.number().optional(),
      minAngle: z.number().optional(),
    })
    .optional(),
});

export const normalizeJobSchema = z.object({
  image: documentImageSchema,
  highContrast: z.boolean(),
  config: normalizerConfigSchema,
});

const stageReportSchema = z.object({
  stage: z.enum(['grayscale', 'denoise', 'contrast', 'deskew', 'expand']),
  status: z.enum(['applied', 'skipped', 'failed']),
  detail: z.string().optional(),
});

export const normalizeReplySchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    result: z.object({
      image: documentImageSchema,
      skewAngle: z.number(),
      deskewed: z.boolean(),
      stages: z.array(stageReportSchema),
    }),
  }),
  z.object({ ok: z.literal(false), message: z.string() }),
]);

export type NormalizeJob = z.infer<typeof normalizeJobSchema>;
export type NormalizeReply = z.infer<typeof normalizeReplySchema>;
