import { z } from 'zod';
import {
  TRAINING_GOALS,
  EXPERIENCE_LEVELS,
  PROGRAM_STATUSES,
  PERIODIZATION_MODELS,
} from '../types/program.js';

export const MAX_LIMITATIONS = 10;
export const MAX_LIMITATION_LENGTH = 100;

/**
 * Strip control characters and collapse whitespace so free text can be
 * embedded in prompts and log lines.
 */
export function sanitizeUserInput(value: string, maxLength: number = MAX_LIMITATION_LENGTH): string {
  // eslint-disable-next-line no-control-regex
  const stripped = value.replace(/[\u0000-\u001f\u007f-\u009f]/g, ' ');
  return stripped.replace(/ +/g, ' ').trim().slice(0, maxLength);
}

export const trainingGoalSchema = z.enum(TRAINING_GOALS);
export const experienceLevelSchema = z.enum(EXPERIENCE_LEVELS);
export const programStatusSchema = z.enum(PROGRAM_STATUSES);
export const periodizationModelSchema = z.enum(PERIODIZATION_MODELS);

const limitationsSchema = z
  .array(z.string().max(1000))
  .max(MAX_LIMITATIONS)
  .transform((items) =>
    items.map((item) => sanitizeUserInput(item)).filter((item) => item.length > 0)
  );

export const generateProgramRequestSchema = z.object({
  goal: trainingGoalSchema,
  duration_weeks: z.number().int().min(1).max(52),
  sessions_per_week: z.number().int().min(1).max(7),
  experience_level: experienceLevelSchema,
  equipment_available: z.array(z.string().min(1).max(50)).max(50).default([]),
  limitations: limitationsSchema.default([]),
  focus_areas: z.array(z.string().min(1).max(50)).max(20).default([]),
  preferences: z.string().max(500).nullable().optional(),
}).strict();

export const updateProgramStatusSchema = z.object({
  status: programStatusSchema,
}).strict();

export type GenerateProgramRequestInput = z.input<typeof generateProgramRequestSchema>;
export type GenerateProgramRequest = z.output<typeof generateProgramRequestSchema>;
export type UpdateProgramStatusDTO = z.infer<typeof updateProgramStatusSchema>;
