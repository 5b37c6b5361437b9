import { FieldValue, type Firestore } from 'firebase-admin/firestore';
import { TtlCache } from '../services/ttl-cache.js';
import {
  EXPERIENCE_LEVELS,
  TRAINING_GOALS,
  WORKOUT_TYPES,
  type DayOfWeek,
  type ExperienceLevel,
  type ProgramTemplate,
  type TemplateStructure,
  type TemplateWeek,
  type TrainingGoal,
  type WorkoutBlueprint,
} from '../types/program.js';
import type { TemplateLookup } from '../types/repository.js';
import { BaseRepository } from './base.repository.js';
import {
  isRecord,
  readBoolean,
  readEnum,
  readNumber,
  readRecordArray,
  readString,
  readStringArray,
} from './firestore-type-guards.js';

export type CreateProgramTemplateDTO = Omit<ProgramTemplate, 'id' | 'usage_count'>;

// Templates within this many weeks of the requested duration are returned.
const DURATION_TOLERANCE_WEEKS = 2;
const DEFAULT_CACHE_TTL_MS = 10 * 60 * 1000;
const CACHE_MAX_SIZE = 50;

const DAYS_OF_WEEK: readonly DayOfWeek[] = [1, 2, 3, 4, 5, 6, 7];

function parseBlueprint(data: Record<string, unknown>): WorkoutBlueprint | null {
  const day = DAYS_OF_WEEK.find((value) => value === readNumber(data, 'day_of_week'));
  const name = readString(data, 'name');
  const workoutType = readEnum(data, 'workout_type', WORKOUT_TYPES);
  const muscles = readStringArray(data, 'muscle_groups');
  const slots = readNumber(data, 'exercise_slots');

  if (day === undefined || name === null || workoutType === null || muscles === null || slots === null) {
    return null;
  }

  return {
    day_of_week: day,
    name,
    workout_type: workoutType,
    muscle_groups: muscles,
    exercise_slots: slots,
    target_duration_minutes: readNumber(data, 'target_duration_minutes') ?? 60,
  };
}

function parseTemplateWeek(data: Record<string, unknown>): TemplateWeek | null {
  const pattern = readNumber(data, 'week_pattern');
  const workouts = readRecordArray(data, 'workouts');
  if (pattern === null || workouts === null) {
    return null;
  }
  const week: TemplateWeek = {
    week_pattern: pattern,
    workouts: workouts
      .map(parseBlueprint)
      .filter((blueprint): blueprint is WorkoutBlueprint => blueprint !== null),
  };
  const focus = readString(data, 'focus');
  if (focus !== null) {
    week.focus = focus;
  }
  return week;
}

export function parseTemplateStructure(value: unknown): TemplateStructure | null {
  if (!isRecord(value)) {
    return null;
  }
  const weeks = readRecordArray(value, 'weeks');
  if (weeks === null) {
    return null;
  }
  return {
    split_type: readString(value, 'split_type') ?? 'custom',
    mesocycle_length: readNumber(value, 'mesocycle_length') ?? 4,
    deload_frequency: readNumber(value, 'deload_frequency') ?? 4,
    weeks: weeks.map(parseTemplateWeek).filter((week): week is TemplateWeek => week !== null),
  };
}

export class ProgramTemplateRepository
  extends BaseRepository<ProgramTemplate, CreateProgramTemplateDTO, Record<string, unknown>>
  implements TemplateLookup
{
  private readonly criteriaCache: TtlCache<ProgramTemplate[]>;

  constructor(db?: Firestore, options: { cacheTtlMs?: number; now?: () => number } = {}) {
    super('program_templates', db);
    this.criteriaCache = new TtlCache({
      maxSize: CACHE_MAX_SIZE,
      ttlMs: options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
      now: options.now,
    });
  }

  async create(data: CreateProgramTemplateDTO): Promise<ProgramTemplate> {
    const templateData = { ...data, usage_count: 0, ...this.createTimestamps() };
    const docRef = await this.collection.add(templateData);
    this.criteriaCache.clear();
    return { id: docRef.id, ...data, usage_count: 0 };
  }

  protected parseEntity(id: string, data: Record<string, unknown>): ProgramTemplate | null {
    const name = readString(data, 'name');
    const goal = readEnum(data, 'goal', TRAINING_GOALS);
    const experienceLevel = readEnum(data, 'experience_level', EXPERIENCE_LEVELS);
    const durationWeeks = readNumber(data, 'duration_weeks');
    const structure = parseTemplateStructure(data['structure']);

    if (
      name === null ||
      goal === null ||
      experienceLevel === null ||
      durationWeeks === null ||
      structure === null
    ) {
      return null;
    }

    return {
      id,
      name,
      goal,
      experience_level: experienceLevel,
      duration_weeks: durationWeeks,
      structure,
      usage_count: readNumber(data, 'usage_count') ?? 0,
      is_system: readBoolean(data, 'is_system') ?? false,
    };
  }

  /**
   * Templates for a goal and level, most used first. With a duration, only
   * templates within two weeks of it are kept.
   */
  async getByCriteria(
    goal: TrainingGoal,
    experienceLevel: ExperienceLevel,
    durationWeeks?: number
  ): Promise<ProgramTemplate[]> {
    const key = `${goal}:${experienceLevel}:${durationWeeks ?? 'any'}`;
    const cached = this.criteriaCache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const snapshot = await this.collection
      .where('goal', '==', goal)
      .where('experience_level', '==', experienceLevel)
      .get();

    const templates = this.snapshotToEntities(snapshot)
      .filter(
        (template) =>
          durationWeeks === undefined ||
          Math.abs(template.duration_weeks - durationWeeks) <= DURATION_TOLERANCE_WEEKS
      )
      .sort((a, b) => b.usage_count - a.usage_count);

    this.criteriaCache.set(key, templates);
    return templates;
  }

  async incrementUsageCount(id: string): Promise<void> {
    await this.collection.doc(id).update({
      usage_count: FieldValue.increment(1),
      updated_at: this.updateTimestamp(),
    });
    this.criteriaCache.clear();
  }
}
