import { describe, it, expect } from 'vitest';
import { exerciseSelectionResponseSchema } from './exercise-selection.schema.js';

const selection = {
  exercise_id: 'push-up',
  exercise_name: 'Push-Up',
  sets: 3,
  reps: '10-12',
  rest_seconds: 60,
  order: 1,
};

describe('exerciseSelectionResponseSchema', () => {
  it('should accept a response with optional fields omitted', () => {
    const result = exerciseSelectionResponseSchema.safeParse({ exercises: [selection] });

    expect(result.success).toBe(true);
  });

  it('should accept null notes and superset groups', () => {
    const result = exerciseSelectionResponseSchema.safeParse({
      exercises: [{ ...selection, notes: null, superset_group: null }],
      workout_notes: null,
      estimated_duration_minutes: 45,
    });

    expect(result.success).toBe(true);
  });

  it('should reject an empty exercise list', () => {
    expect(exerciseSelectionResponseSchema.safeParse({ exercises: [] }).success).toBe(false);
  });

  it('should reject sets and rest outside their ranges', () => {
    expect(
      exerciseSelectionResponseSchema.safeParse({ exercises: [{ ...selection, sets: 11 }] }).success
    ).toBe(false);
    expect(
      exerciseSelectionResponseSchema.safeParse({ exercises: [{ ...selection, rest_seconds: 10 }] }).success
    ).toBe(false);
  });

  it('should reject an implausible duration', () => {
    const result = exerciseSelectionResponseSchema.safeParse({
      exercises: [selection],
      estimated_duration_minutes: 300,
    });

    expect(result.success).toBe(false);
  });
});
