/**
 * Zod schemas for runtime validation
 */

import { z } from 'zod';

// ============================================
// Mode Schemas
// ============================================

export const ModeSchema = z.enum(['serial', 'parallel', 'distributed']);

const PositiveIntSchema = z.number().int().positive();

const ModeSettingsOverrideSchema = z
  .object({
    enabled: z.boolean().optional(),
    degrees: z.array(PositiveIntSchema).min(1).optional(),
  })
  .strict();

// ============================================
// Config File Schema
// ============================================

/**
 * Shape of a YAML config file. Every key is optional; omitted keys keep defaults.
 */
export const RecorderConfigFileSchema = z
  .object({
    inputRoot: z.string().min(1).optional(),
    outputRoot: z.string().min(1).optional(),
    sequenceLengths: z.array(PositiveIntSchema).min(1).optional(),
    runs: PositiveIntSchema.optional(),
    modes: z
      .object({
        serial: ModeSettingsOverrideSchema.optional(),
        parallel: ModeSettingsOverrideSchema.optional(),
        distributed: ModeSettingsOverrideSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type RecorderConfigFile = z.infer<typeof RecorderConfigFileSchema>;
