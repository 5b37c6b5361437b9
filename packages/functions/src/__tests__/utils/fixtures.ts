/**
 * Test data fixtures and factory functions.
 *
 * These functions create properly typed test data with sensible defaults
 * that can be overridden for specific test scenarios.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { EXERCISE_CATEGORIES, MOVEMENT_PATTERNS } from '../../types/program.js';
import type {
  Exercise,
  ExerciseAssignment,
  ProgramDraft,
  ProgramTemplate,
  TemplateStructure,
  WeekDraft,
  WeekParameters,
  WorkoutBlueprint,
  WorkoutDraft,
} from '../../types/program.js';
import type { GenerateProgramRequest } from '../../schemas/program.schema.js';

// ============ Counter for unique IDs ============

let idCounter = 0;

function generateId(prefix: string = 'test'): string {
  idCounter++;
  return `${prefix}-${idCounter}`;
}

/**
 * Reset the ID counter between test runs.
 * Call this in beforeEach to ensure deterministic IDs.
 */
export function resetIdCounter(): void {
  idCounter = 0;
}

// ============ Exercise catalog ============

export function createExercise(overrides: Partial<Exercise> = {}): Exercise {
  return {
    id: generateId('exercise'),
    name: 'Test Exercise',
    category: 'compound',
    movement_pattern: 'push',
    primary_muscles: ['chest'],
    secondary_muscles: [],
    equipment: ['barbell'],
    supports_1rm: false,
    is_placeholder: false,
    ...overrides,
  };
}

const catalogEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  category: z.enum(EXERCISE_CATEGORIES),
  movement_pattern: z.enum(MOVEMENT_PATTERNS).nullable(),
  primary_muscles: z.array(z.string()),
  secondary_muscles: z.array(z.string()),
  equipment: z.array(z.string()),
  supports_1rm: z.boolean(),
});

const CATALOG_PATH = fileURLToPath(new URL('../fixtures/exercise-catalog.json', import.meta.url));

/**
 * Load the shared exercise catalog used by generator and selector tests.
 */
export function loadExerciseCatalog(): Exercise[] {
  const parsed = z.array(catalogEntrySchema).parse(JSON.parse(readFileSync(CATALOG_PATH, 'utf8')));
  return parsed.map((entry) => ({ ...entry, is_placeholder: false }));
}

// ============ Templates ============

export function createBlueprint(overrides: Partial<WorkoutBlueprint> = {}): WorkoutBlueprint {
  return {
    day_of_week: 1,
    name: 'Upper A',
    workout_type: 'upper',
    muscle_groups: ['chest', 'lats', 'triceps'],
    exercise_slots: 4,
    target_duration_minutes: 60,
    ...overrides,
  };
}

export function createTemplateStructure(overrides: Partial<TemplateStructure> = {}): TemplateStructure {
  return {
    split_type: 'upper_lower',
    mesocycle_length: 4,
    deload_frequency: 4,
    weeks: [
      {
        week_pattern: 1,
        workouts: [
          createBlueprint({ day_of_week: 1, name: 'Upper A' }),
          createBlueprint({
            day_of_week: 2,
            name: 'Lower A',
            workout_type: 'lower',
            muscle_groups: ['quadriceps', 'hamstrings', 'glutes'],
          }),
        ],
      },
    ],
    ...overrides,
  };
}

export function createTemplate(overrides: Partial<ProgramTemplate> = {}): ProgramTemplate {
  return {
    id: generateId('template'),
    name: 'Test Template',
    goal: 'hypertrophy',
    experience_level: 'intermediate',
    duration_weeks: 8,
    structure: createTemplateStructure(),
    usage_count: 0,
    is_system: true,
    ...overrides,
  };
}

// ============ Periodization ============

export function createWeekParameters(overrides: Partial<WeekParameters> = {}): WeekParameters {
  return {
    week_number: 1,
    intensity_percent: 70,
    volume_modifier: 1,
    is_deload: false,
    focus: 'hypertrophy',
    ...overrides,
  };
}

// ============ Generated program ============

export function createAssignment(overrides: Partial<ExerciseAssignment> = {}): ExerciseAssignment {
  return {
    exercise_id: generateId('exercise'),
    exercise_name: 'Test Exercise',
    sets: 3,
    reps: '8-12',
    rest_seconds: 90,
    order: 1,
    primary_muscles: ['chest'],
    equipment: ['barbell'],
    notes: null,
    is_placeholder: false,
    ...overrides,
  };
}

export function createWorkoutDraft(overrides: Partial<WorkoutDraft> = {}): WorkoutDraft {
  return {
    day_of_week: 1,
    name: 'Upper A',
    workout_type: 'upper',
    target_duration_minutes: 60,
    sort_order: 0,
    notes: null,
    exercises: [createAssignment()],
    ...overrides,
  };
}

export function createWeekDraft(overrides: Partial<WeekDraft> = {}): WeekDraft {
  return {
    week_number: 1,
    focus: 'Muscle Building',
    is_deload: false,
    intensity_percent: 70,
    volume_modifier: 1,
    notes: null,
    workouts: [createWorkoutDraft()],
    ...overrides,
  };
}

export function createProgramDraft(overrides: Partial<ProgramDraft> = {}): ProgramDraft {
  return {
    user_id: 'user-1',
    name: '8-Week Hypertrophy Program',
    description: 'A test program',
    goal: 'hypertrophy',
    periodization_model: 'undulating',
    duration_weeks: 8,
    sessions_per_week: 4,
    experience_level: 'intermediate',
    equipment_available: ['barbell', 'dumbbells'],
    status: 'draft',
    generation_metadata: {
      template_id: null,
      template_name: null,
      used_default_structure: true,
      periodization_model: 'undulating',
      generation_time_seconds: 0.5,
      llm_used: false,
      llm_fallback_count: 0,
      placeholder_count: 0,
      validation_passed: true,
      warning_count: 0,
    },
    ...overrides,
  };
}

export function createGenerateRequest(
  overrides: Partial<GenerateProgramRequest> = {}
): GenerateProgramRequest {
  return {
    goal: 'hypertrophy',
    duration_weeks: 8,
    sessions_per_week: 4,
    experience_level: 'intermediate',
    equipment_available: ['barbell', 'dumbbells', 'cables', 'bench', 'squat_rack'],
    limitations: [],
    focus_areas: [],
    ...overrides,
  };
}
