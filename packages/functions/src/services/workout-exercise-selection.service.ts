/**
 * Workout Exercise Selection
 *
 * Turns one workout blueprint into exercise assignments. The language-model
 * selector is tried first when configured; any failure falls back to the
 * rule-based selector for the same slot count.
 */

import { warn } from 'firebase-functions/logger';
import type {
  Exercise,
  ExerciseAssignment,
  ExperienceLevel,
  MovementPattern,
  SlotRequirements,
  TrainingGoal,
  WeekParameters,
  WorkoutBlueprint,
  WorkoutType,
} from '../types/program.js';
import type { ExerciseSelectionProvider } from '../types/exercise-selection.js';
import { ExerciseSelectionError } from '../types/errors.js';
import type { BoundedExecutor } from './bounded-executor.js';
import type { ExerciseSelector } from './exercise-selector.service.js';

export interface WorkoutSelectionContext {
  blueprint: WorkoutBlueprint;
  week: WeekParameters;
  slotCount: number;
  goal: TrainingGoal;
  experienceLevel: ExperienceLevel;
  equipment: readonly string[];
  limitations: readonly string[];
  // Already filtered to the available equipment.
  candidates: readonly Exercise[];
}

export interface WorkoutExerciseSelector {
  select(context: WorkoutSelectionContext): Promise<ExerciseAssignment[]>;
}

interface RepScheme {
  reps: string;
  sets: number;
  rest_seconds: number;
}

export const REP_SCHEMES: Record<TrainingGoal, RepScheme> = {
  strength: { reps: '3-5', sets: 4, rest_seconds: 150 },
  hypertrophy: { reps: '8-12', sets: 4, rest_seconds: 90 },
  endurance: { reps: '15-20', sets: 3, rest_seconds: 60 },
  weight_loss: { reps: '12-15', sets: 3, rest_seconds: 45 },
  general_fitness: { reps: '10-15', sets: 3, rest_seconds: 60 },
  sport_specific: { reps: '6-10', sets: 4, rest_seconds: 90 },
};

const COMPOUND_PATTERNS: Record<WorkoutType, readonly MovementPattern[]> = {
  push: ['push'],
  pull: ['pull'],
  legs: ['squat', 'hinge'],
  upper: ['push', 'pull'],
  lower: ['squat', 'hinge'],
  full_body: ['push', 'pull', 'squat', 'hinge'],
  arms: [],
};

const COMPOUND_FIRST_GOALS: ReadonlySet<TrainingGoal> = new Set([
  'strength',
  'hypertrophy',
  'general_fitness',
]);

export function repSchemeFor(goal: TrainingGoal, isDeload: boolean): RepScheme {
  const scheme = REP_SCHEMES[goal];
  return isDeload ? { ...scheme, sets: Math.max(2, scheme.sets - 1) } : { ...scheme };
}

function toAssignment(exercise: Exercise, scheme: RepScheme, order: number): ExerciseAssignment {
  return {
    exercise_id: exercise.id,
    exercise_name: exercise.name,
    sets: scheme.sets,
    reps: scheme.reps,
    rest_seconds: scheme.rest_seconds,
    order,
    primary_muscles: [...exercise.primary_muscles],
    equipment: [...exercise.equipment],
    notes: null,
    is_placeholder: exercise.is_placeholder,
  };
}

/**
 * Rule-based selection: compounds for the workout's movement patterns, then
 * isolation work for the target muscles, then whatever candidates remain,
 * then placeholders.
 */
export class DeterministicWorkoutExerciseSelector implements WorkoutExerciseSelector {
  constructor(private readonly exerciseSelector: ExerciseSelector) {}

  async select(context: WorkoutSelectionContext): Promise<ExerciseAssignment[]> {
    const { blueprint, slotCount, goal } = context;
    const preferCompound = COMPOUND_FIRST_GOALS.has(goal);
    const compoundCount = preferCompound ? Math.max(2, Math.floor(slotCount / 2)) : 1;

    const chosen: Exercise[] = [];
    const used = new Set<string>();
    const take = (exercise: Exercise | null): boolean => {
      if (exercise === null || used.has(exercise.id)) {
        return false;
      }
      chosen.push(exercise);
      used.add(exercise.id);
      return true;
    };

    for (const pattern of COMPOUND_PATTERNS[blueprint.workout_type].slice(0, compoundCount)) {
      if (chosen.length >= slotCount) break;
      const requirements: SlotRequirements = {
        movement_pattern: pattern,
        target_muscles: blueprint.muscle_groups,
      };
      if (preferCompound) {
        requirements.category = 'compound';
      }
      if (goal === 'strength') {
        requirements.supports_1rm = true;
      }
      take(await this.exerciseSelector.fillExerciseSlot(requirements, context.equipment, used));
    }

    const isolation: SlotRequirements = { target_muscles: blueprint.muscle_groups };
    if (preferCompound) {
      isolation.category = 'isolation';
    }
    while (chosen.length < slotCount) {
      const found = await this.exerciseSelector.findBestMatch(isolation, context.equipment, used);
      if (!take(found)) break;
    }

    const remaining = context.candidates
      .filter((exercise) => !used.has(exercise.id))
      .sort((a, b) => {
        const aRank = a.category === 'compound' ? 0 : 1;
        const bRank = b.category === 'compound' ? 0 : 1;
        return aRank - bRank || a.name.localeCompare(b.name);
      });
    for (const exercise of remaining) {
      if (chosen.length >= slotCount) break;
      take(exercise);
    }

    // Catalog exhausted: top up with placeholders.
    while (chosen.length < slotCount) {
      if (!take(this.exerciseSelector.placeholderFor(isolation))) break;
    }

    const scheme = repSchemeFor(goal, context.week.is_deload);
    return chosen.map((exercise, index) => toAssignment(exercise, scheme, index + 1));
  }
}

/**
 * Delegates the choice to a language model. Throws whenever the model cannot
 * supply `slotCount` distinct exercises from the candidate list.
 */
export class LlmWorkoutExerciseSelector implements WorkoutExerciseSelector {
  constructor(
    private readonly provider: ExerciseSelectionProvider,
    private readonly executor: BoundedExecutor
  ) {}

  async select(context: WorkoutSelectionContext): Promise<ExerciseAssignment[]> {
    if (context.candidates.length === 0) {
      throw new ExerciseSelectionError('No candidate exercises to choose from');
    }

    const byId = new Map(context.candidates.map((exercise) => [exercise.id, exercise]));
    const response = await this.executor.run(() =>
      this.provider.selectExercises({
        workout_type: context.blueprint.workout_type,
        muscle_groups: [...context.blueprint.muscle_groups],
        equipment: [...context.equipment],
        exercise_count: context.slotCount,
        intensity_percent: context.week.intensity_percent,
        volume_modifier: context.week.volume_modifier,
        available_exercises: context.candidates.map((exercise) => ({
          id: exercise.id,
          name: exercise.name,
          primary_muscles: [...exercise.primary_muscles],
          equipment: [...exercise.equipment],
        })),
        user_limitations: [...context.limitations],
        experience_level: context.experienceLevel,
        goal: context.goal,
        is_deload: context.week.is_deload,
      })
    );

    const seen = new Set<string>();
    const assignments: ExerciseAssignment[] = [];
    const ordered = [...response.exercises].sort((a, b) => a.order - b.order);
    for (const selection of ordered) {
      const exercise = byId.get(selection.exercise_id);
      if (exercise === undefined || seen.has(exercise.id)) {
        continue;
      }
      seen.add(exercise.id);
      assignments.push({
        exercise_id: exercise.id,
        exercise_name: exercise.name,
        sets: selection.sets,
        reps: selection.reps,
        rest_seconds: selection.rest_seconds,
        order: assignments.length + 1,
        primary_muscles: [...exercise.primary_muscles],
        equipment: [...exercise.equipment],
        notes: selection.notes ?? null,
        is_placeholder: false,
      });
    }

    if (assignments.length < context.slotCount) {
      throw new ExerciseSelectionError(
        `Model returned ${assignments.length} usable exercises, ${context.slotCount} requested`
      );
    }
    return assignments.slice(0, context.slotCount);
  }
}

export interface ChainResult {
  exercises: ExerciseAssignment[];
  llmUsed: boolean;
  fellBack: boolean;
}

export class ExerciseSelectionChain {
  constructor(
    private readonly fallback: WorkoutExerciseSelector,
    private readonly primary: WorkoutExerciseSelector | null = null
  ) {}

  get hasPrimary(): boolean {
    return this.primary !== null;
  }

  async select(context: WorkoutSelectionContext): Promise<ChainResult> {
    if (this.primary !== null && context.candidates.length > 0) {
      try {
        const exercises = await this.primary.select(context);
        return { exercises, llmUsed: true, fellBack: false };
      } catch (err) {
        warn('program-generator:llm_fallback', {
          phase: 'exercise_selection',
          workout_name: context.blueprint.name,
          week_number: context.week.week_number,
          error: err instanceof Error ? err.message : String(err),
        });
        const exercises = await this.fallback.select(context);
        return { exercises, llmUsed: false, fellBack: true };
      }
    }
    const exercises = await this.fallback.select(context);
    return { exercises, llmUsed: false, fellBack: false };
  }
}
