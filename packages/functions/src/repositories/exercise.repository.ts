import type { Firestore } from 'firebase-admin/firestore';
import { isEquipmentSatisfied, normalizeEquipment } from '../services/equipment.js';
import { TtlCache } from '../services/ttl-cache.js';
import {
  EXERCISE_CATEGORIES,
  MOVEMENT_PATTERNS,
  type CreateExerciseDTO,
  type Exercise,
} from '../types/program.js';
import type { ExerciseLookup, ExerciseSearchCriteria } from '../types/repository.js';
import { BaseRepository } from './base.repository.js';
import {
  readBoolean,
  readEnum,
  readString,
  readStringArray,
} from './firestore-type-guards.js';

const CATALOG_KEY = 'catalog';
const DEFAULT_CATALOG_TTL_MS = 5 * 60 * 1000;
const DEFAULT_SEARCH_LIMIT = 50;

/**
 * Rank `candidates` by similarity to `source`: same movement pattern required,
 * then muscle overlap (0.6), same category (0.3), equipment overlap (0.1).
 */
export function rankSimilarExercises(source: Exercise, candidates: readonly Exercise[]): Exercise[] {
  const sourceMuscles = new Set(source.primary_muscles);
  const sourceEquipment = new Set(source.equipment);
  if (source.movement_pattern === null || sourceMuscles.size === 0) {
    return [];
  }

  const score = (exercise: Exercise): number => {
    const muscleOverlap = exercise.primary_muscles.filter((m) => sourceMuscles.has(m)).length;
    let total = (muscleOverlap / sourceMuscles.size) * 0.6;
    if (exercise.category === source.category) {
      total += 0.3;
    }
    if (exercise.equipment.length > 0 && sourceEquipment.size > 0) {
      const equipmentOverlap = exercise.equipment.filter((e) => sourceEquipment.has(e)).length;
      total += (equipmentOverlap / sourceEquipment.size) * 0.1;
    }
    return total;
  };

  return candidates
    .filter((exercise) => exercise.id !== source.id && exercise.movement_pattern === source.movement_pattern)
    .map((exercise) => ({ exercise, score: score(exercise) }))
    .sort((a, b) => b.score - a.score)
    .map((entry) => entry.exercise);
}

/**
 * Filter a catalog in memory. Muscles match on any overlap with the primary
 * muscles; equipment must cover everything the exercise needs.
 */
export function searchCatalog(catalog: readonly Exercise[], criteria: ExerciseSearchCriteria): Exercise[] {
  const muscles = new Set(criteria.muscle_groups ?? []);
  const available = criteria.equipment !== undefined ? normalizeEquipment(criteria.equipment) : null;

  return catalog
    .filter((exercise) => {
      if (muscles.size > 0 && !exercise.primary_muscles.some((muscle) => muscles.has(muscle))) {
        return false;
      }
      if (available !== null && !isEquipmentSatisfied(exercise.equipment, available)) {
        return false;
      }
      if (criteria.movement_pattern !== undefined && exercise.movement_pattern !== criteria.movement_pattern) {
        return false;
      }
      if (criteria.category !== undefined && exercise.category !== criteria.category) {
        return false;
      }
      if (criteria.supports_1rm !== undefined && exercise.supports_1rm !== criteria.supports_1rm) {
        return false;
      }
      return true;
    })
    .slice(0, criteria.limit ?? DEFAULT_SEARCH_LIMIT);
}

/**
 * Exercise catalog. The whole collection is loaded once per TTL window and
 * searched in memory, so no composite indexes are needed.
 */
export class ExerciseRepository
  extends BaseRepository<Exercise, CreateExerciseDTO, Record<string, unknown>>
  implements ExerciseLookup
{
  private readonly catalogCache: TtlCache<Exercise[]>;

  constructor(db?: Firestore, options: { cacheTtlMs?: number; now?: () => number } = {}) {
    super('exercises', db);
    this.catalogCache = new TtlCache({
      maxSize: 1,
      ttlMs: options.cacheTtlMs ?? DEFAULT_CATALOG_TTL_MS,
      now: options.now,
    });
  }

  async create(data: CreateExerciseDTO): Promise<Exercise> {
    const exerciseData = { ...data, ...this.createTimestamps() };
    const docRef = await this.collection.add(exerciseData);
    this.catalogCache.clear();
    return { id: docRef.id, ...data, is_placeholder: false };
  }

  protected parseEntity(id: string, data: Record<string, unknown>): Exercise | null {
    const name = readString(data, 'name');
    const category = readEnum(data, 'category', EXERCISE_CATEGORIES);
    const primaryMuscles = readStringArray(data, 'primary_muscles');
    const equipment = readStringArray(data, 'equipment');

    if (name === null || category === null || primaryMuscles === null || equipment === null) {
      return null;
    }

    return {
      id,
      name,
      category,
      movement_pattern: readEnum(data, 'movement_pattern', MOVEMENT_PATTERNS),
      primary_muscles: primaryMuscles,
      secondary_muscles: readStringArray(data, 'secondary_muscles') ?? [],
      equipment,
      supports_1rm: readBoolean(data, 'supports_1rm') ?? false,
      is_placeholder: false,
    };
  }

  async findAll(): Promise<Exercise[]> {
    const cached = this.catalogCache.get(CATALOG_KEY);
    if (cached !== undefined) {
      return cached;
    }
    const snapshot = await this.collection.orderBy('name').get();
    const exercises = this.snapshotToEntities(snapshot);
    this.catalogCache.set(CATALOG_KEY, exercises);
    return exercises;
  }

  async search(criteria: ExerciseSearchCriteria): Promise<Exercise[]> {
    return searchCatalog(await this.findAll(), criteria);
  }

  async getSimilarExercises(exerciseId: string, limit: number): Promise<Exercise[]> {
    const catalog = await this.findAll();
    const source = catalog.find((exercise) => exercise.id === exerciseId);
    if (source === undefined) {
      return [];
    }
    return rankSimilarExercises(source, catalog).slice(0, limit);
  }
}
