/**
 * Exercise Selector
 *
 * Fills workout slots from the exercise catalog using equipment filtering and
 * weighted scoring, and synthesizes placeholders when nothing qualifies.
 */

import { warn } from 'firebase-functions/logger';
import { DEFAULT_GENERATION_CONFIG, type GenerationConfig } from '../config.js';
import type { Exercise, SlotRequirements } from '../types/program.js';
import type { ExerciseLookup } from '../types/repository.js';
import { canonicalItem, isEquipmentSatisfied, normalizeEquipment } from './equipment.js';

export type ExerciseScoringWeights = GenerationConfig['exerciseScoring'];

export interface ScoredExercise {
  exercise: Exercise;
  score: number;
}

/**
 * Issues placeholder ids for a single generation run.
 * Ids are `<slug>-<n>` with a counter that never repeats within the run.
 */
export class PlaceholderIdGenerator {
  private counter = 0;
  private readonly issued = new Set<string>();

  constructor(private readonly reserved: ReadonlySet<string> = new Set()) {}

  next(name: string): string {
    const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '');
    let id: string;
    do {
      this.counter++;
      id = `${slug}-${this.counter}`;
    } while (this.issued.has(id) || this.reserved.has(id));
    this.issued.add(id);
    return id;
  }
}

function titleCase(value: string): string {
  return value
    .split('_')
    .map((word) => (word.length > 0 ? `${word[0]?.toUpperCase() ?? ''}${word.slice(1)}` : word))
    .join(' ');
}

/**
 * Build a placeholder exercise for a slot nothing in the catalog could fill.
 * Returns null when the requirements give nothing to name it after.
 */
export function createPlaceholderExercise(
  requirements: SlotRequirements,
  ids: PlaceholderIdGenerator
): Exercise | null {
  const muscles = requirements.target_muscles ?? [];
  if (requirements.movement_pattern === undefined && muscles.length === 0) {
    return null;
  }

  const nameParts: string[] = [];
  if (requirements.movement_pattern !== undefined) {
    nameParts.push(titleCase(requirements.movement_pattern));
  }
  const firstMuscle = muscles[0];
  if (firstMuscle !== undefined) {
    nameParts.push(titleCase(firstMuscle));
  }
  nameParts.push('Exercise');
  const name = nameParts.join(' ');

  return {
    id: ids.next(name),
    name,
    category: requirements.category ?? 'compound',
    movement_pattern: requirements.movement_pattern ?? null,
    primary_muscles: [...muscles],
    secondary_muscles: [],
    equipment: [],
    supports_1rm: requirements.supports_1rm ?? false,
    is_placeholder: true,
  };
}

/**
 * Score candidates against slot requirements, highest first.
 * Equal scores keep their input order.
 */
export function scoreCandidates(
  candidates: Exercise[],
  requirements: SlotRequirements,
  weights: ExerciseScoringWeights = DEFAULT_GENERATION_CONFIG.exerciseScoring
): ScoredExercise[] {
  const targetMuscles = new Set(requirements.target_muscles ?? []);
  const preferred = new Set((requirements.preferred_equipment ?? []).map(canonicalItem));

  const scored = candidates.map((exercise) => {
    let score = 0;

    if (targetMuscles.size > 0) {
      const overlap = exercise.primary_muscles.filter((muscle) => targetMuscles.has(muscle)).length;
      score += Math.min(overlap / targetMuscles.size, 1) * weights.muscle;
    }

    if (requirements.category !== undefined && exercise.category === requirements.category) {
      score += weights.category;
    }

    if (
      requirements.movement_pattern !== undefined &&
      exercise.movement_pattern === requirements.movement_pattern
    ) {
      score += weights.movementPattern;
    }

    if (preferred.size > 0 && exercise.equipment.some((item) => preferred.has(canonicalItem(item)))) {
      score += weights.preferredEquipment;
    }

    if (requirements.supports_1rm !== undefined && exercise.supports_1rm === requirements.supports_1rm) {
      score += weights.supports1rm;
    }

    if (exercise.category === 'compound') {
      score += weights.compoundBonus;
    }

    return { exercise, score };
  });

  return scored.sort((a, b) => b.score - a.score);
}

export interface ExerciseSelectorOptions {
  weights?: ExerciseScoringWeights;
  candidateLimit?: number;
  placeholderIds?: PlaceholderIdGenerator;
}

export class ExerciseSelector {
  private readonly weights: ExerciseScoringWeights;
  private readonly candidateLimit: number;
  readonly placeholderIds: PlaceholderIdGenerator;

  constructor(
    private readonly exerciseLookup: ExerciseLookup,
    options: ExerciseSelectorOptions = {}
  ) {
    this.weights = options.weights ?? DEFAULT_GENERATION_CONFIG.exerciseScoring;
    this.candidateLimit = options.candidateLimit ?? DEFAULT_GENERATION_CONFIG.candidateLimit;
    this.placeholderIds = options.placeholderIds ?? new PlaceholderIdGenerator();
  }

  /**
   * Pick the best catalog exercise for a slot, or a placeholder when no
   * catalog exercise qualifies.
   */
  async fillExerciseSlot(
    requirements: SlotRequirements,
    availableEquipment: readonly string[],
    excludeIds: ReadonlySet<string> = new Set()
  ): Promise<Exercise | null> {
    const best = await this.findBestMatch(requirements, availableEquipment, excludeIds);
    return best ?? this.placeholderFor(requirements);
  }

  /**
   * Highest scoring qualifying catalog exercise, without placeholder synthesis.
   */
  async findBestMatch(
    requirements: SlotRequirements,
    availableEquipment: readonly string[],
    excludeIds: ReadonlySet<string> = new Set()
  ): Promise<Exercise | null> {
    const available = normalizeEquipment(availableEquipment);
    const candidates = await this.searchSafely(requirements, available);

    const qualifying = candidates.filter(
      (exercise) => !excludeIds.has(exercise.id) && isEquipmentSatisfied(exercise.equipment, available)
    );

    return scoreCandidates(qualifying, requirements, this.weights)[0]?.exercise ?? null;
  }

  placeholderFor(requirements: SlotRequirements): Exercise | null {
    return createPlaceholderExercise(requirements, this.placeholderIds);
  }

  /**
   * Exercises similar to `exerciseId` that the available equipment supports.
   */
  async getAlternatives(
    exerciseId: string,
    availableEquipment: readonly string[],
    limit = 5
  ): Promise<Exercise[]> {
    const available = normalizeEquipment(availableEquipment);
    const similar = await this.exerciseLookup.getSimilarExercises(exerciseId, limit * 2);
    return similar
      .filter((exercise) => exercise.id !== exerciseId && isEquipmentSatisfied(exercise.equipment, available))
      .slice(0, limit);
  }

  private async searchSafely(
    requirements: SlotRequirements,
    available: Set<string>
  ): Promise<Exercise[]> {
    try {
      return await this.exerciseLookup.search({
        muscle_groups: requirements.target_muscles,
        equipment: available.size > 0 ? [...available] : undefined,
        movement_pattern: requirements.movement_pattern,
        category: requirements.category,
        supports_1rm: requirements.supports_1rm,
        limit: this.candidateLimit,
      });
    } catch (err) {
      warn('program-generator:exercise_lookup_failed', {
        phase: 'fill_slot',
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }
}
