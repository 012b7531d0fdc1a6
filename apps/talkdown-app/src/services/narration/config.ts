import { z } from 'zod';
import { InvalidNarrationConfigError } from './errors';

const voiceSchema = (volume: number, rateMultiplier: number) =>
  z
    .object({
      voiceId: z.string().min(1).optional(),
      pitch: z.number().min(0.5).max(2).default(1),
      volume: z.number().min(0).max(1).default(volume),
      rateMultiplier: z.number().positive().max(4).default(rateMultiplier),
    })
    .default({});

export const NarrationConfigSchema = z
  .object({
    chunking: z
      .object({
        targetChunkSize: z.number().int().min(20).default(200),
        maxChunkSize: z.number().int().min(20).default(300),
      })
      .default({}),
    lookaheadThreshold: z.number().int().min(1).default(2),
    chunkBatchSize: z.number().int().min(1).default(4),
    recycleCapacity: z.number().int().min(1).default(10),
    contextReplayDepth: z.number().int().min(1).default(3),
    speed: z
      .object({
        initial: z.number().positive().default(1),
        min: z.number().positive().default(0.5),
        max: z.number().positive().default(2),
      })
      .default({}),
    fallbackWordsPerMinute: z.number().positive().default(150),
    averageWordLength: z.number().positive().default(5),
    errorRecoveryMs: z.number().int().min(0).default(1500),
    fadeInMs: z.number().int().min(0).default(0),
    interjections: z
      .object({
        style: z.enum(['smartDetection', 'voiceOnly', 'tonesOnly', 'both']).default('smartDetection'),
        announceLanguage: z.boolean().default(true),
      })
      .default({}),
    voices: z
      .object({
        main: voiceSchema(1, 1),
        announcement: voiceSchema(0.8, 1.1),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.chunking.maxChunkSize < config.chunking.targetChunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunking', 'maxChunkSize'],
        message: 'must be at least targetChunkSize',
      });
    }
    if (config.speed.min > config.speed.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['speed', 'min'],
        message: 'must not exceed speed.max',
      });
    }
  });

export type NarrationConfig = z.output<typeof NarrationConfigSchema>;
export type NarrationConfigInput = z.input<typeof NarrationConfigSchema>;
export type InterjectionStyle = NarrationConfig['interjections']['style'];
export type VoiceSettings = NarrationConfig['voices']['main'];

export const parseNarrationConfig = (input: NarrationConfigInput = {}): NarrationConfig => {
  const result = NarrationConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidNarrationConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
};

export const DEFAULT_NARRATION_CONFIG: NarrationConfig = parseNarrationConfig();
