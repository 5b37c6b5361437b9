import { z } from 'zod';

export const exerciseSelectionSchema = z.object({
  exercise_id: z.string().min(1),
  exercise_name: z.string().min(1),
  sets: z.number().int().min(1).max(10),
  reps: z.string().min(1),
  rest_seconds: z.number().int().min(30).max(300),
  notes: z.string().nullable().optional(),
  order: z.number().int().min(1),
  superset_group: z.string().nullable().optional(),
});

export const exerciseSelectionResponseSchema = z.object({
  exercises: z.array(exerciseSelectionSchema).min(1),
  workout_notes: z.string().nullable().optional(),
  estimated_duration_minutes: z.number().int().min(20).max(120).optional(),
});

export type ExerciseSelection = z.infer<typeof exerciseSelectionSchema>;
export type ExerciseSelectionResponse = z.infer<typeof exerciseSelectionResponseSchema>;
