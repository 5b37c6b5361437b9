import type { CollectionReference, DocumentData, Firestore } from 'firebase-admin/firestore';
import { getCollectionName } from '../firebase.js';
import { ProgramCreationError } from '../types/errors.js';
import {
  EXPERIENCE_LEVELS,
  PERIODIZATION_MODELS,
  PROGRAM_STATUSES,
  TRAINING_GOALS,
  WORKOUT_TYPES,
  type AtomicProgramResult,
  type DayOfWeek,
  type ExerciseAssignment,
  type GenerationMetadata,
  type ProgramDraft,
  type ProgramStatus,
  type ProgramWeek,
  type ProgramWorkout,
  type TrainingProgram,
  type TrainingProgramWithWeeks,
  type WeekDraft,
  type WorkoutDraft,
} from '../types/program.js';
import type { ProgramStore } from '../types/repository.js';
import { BaseRepository } from './base.repository.js';
import {
  isRecord,
  readBoolean,
  readEnum,
  readNullableString,
  readNumber,
  readRecordArray,
  readString,
  readStringArray,
} from './firestore-type-guards.js';

// Firestore rejects a batch with more writes than this.
export const MAX_BATCH_WRITES = 500;

type WeekRecord = Omit<ProgramWeek, 'workouts'>;

const DAYS_OF_WEEK: readonly DayOfWeek[] = [1, 2, 3, 4, 5, 6, 7];

function parseAssignment(data: Record<string, unknown>): ExerciseAssignment | null {
  const exerciseId = readString(data, 'exercise_id');
  const exerciseName = readString(data, 'exercise_name');
  const sets = readNumber(data, 'sets');
  const reps = readString(data, 'reps');
  const restSeconds = readNumber(data, 'rest_seconds');
  const order = readNumber(data, 'order');
  const primaryMuscles = readStringArray(data, 'primary_muscles');
  const equipment = readStringArray(data, 'equipment');

  if (
    exerciseId === null ||
    exerciseName === null ||
    sets === null ||
    reps === null ||
    restSeconds === null ||
    order === null ||
    primaryMuscles === null ||
    equipment === null
  ) {
    return null;
  }

  return {
    exercise_id: exerciseId,
    exercise_name: exerciseName,
    sets,
    reps,
    rest_seconds: restSeconds,
    order,
    primary_muscles: primaryMuscles,
    equipment,
    notes: readNullableString(data, 'notes') ?? null,
    is_placeholder: readBoolean(data, 'is_placeholder') ?? false,
  };
}

function parseMetadata(value: unknown): GenerationMetadata | null {
  if (!isRecord(value)) {
    return null;
  }
  const model = readEnum(value, 'periodization_model', PERIODIZATION_MODELS);
  if (model === null) {
    return null;
  }
  return {
    template_id: readString(value, 'template_id'),
    template_name: readString(value, 'template_name'),
    used_default_structure: readBoolean(value, 'used_default_structure') ?? false,
    periodization_model: model,
    generation_time_seconds: readNumber(value, 'generation_time_seconds') ?? 0,
    llm_used: readBoolean(value, 'llm_used') ?? false,
    llm_fallback_count: readNumber(value, 'llm_fallback_count') ?? 0,
    placeholder_count: readNumber(value, 'placeholder_count') ?? 0,
    validation_passed: readBoolean(value, 'validation_passed') ?? false,
    warning_count: readNumber(value, 'warning_count') ?? 0,
  };
}

export class ProgramRepository
  extends BaseRepository<TrainingProgram, ProgramDraft, { status?: ProgramStatus }>
  implements ProgramStore
{
  constructor(db?: Firestore) {
    super('programs', db);
  }

  private get weeksCollection(): CollectionReference<DocumentData> {
    return this.db.collection(getCollectionName('program_weeks'));
  }

  private get workoutsCollection(): CollectionReference<DocumentData> {
    return this.db.collection(getCollectionName('program_workouts'));
  }

  async create(data: ProgramDraft): Promise<TrainingProgram> {
    const programData = { ...data, ...this.createTimestamps() };
    const docRef = await this.collection.add(programData);
    return { id: docRef.id, ...programData };
  }

  async createWeek(programId: string, data: Omit<WeekDraft, 'workouts'>): Promise<WeekRecord> {
    const weekData = { program_id: programId, ...data };
    const docRef = await this.weeksCollection.add(weekData);
    return { id: docRef.id, ...weekData };
  }

  async createWorkout(weekId: string, data: WorkoutDraft): Promise<ProgramWorkout> {
    const workoutData = { week_id: weekId, ...data };
    const docRef = await this.workoutsCollection.add(workoutData);
    return { id: docRef.id, ...workoutData };
  }

  /**
   * Writes the program, its weeks and their workouts in one batch.
   * Either every document is committed or none is.
   */
  async createProgramAtomic(program: ProgramDraft, weeks: WeekDraft[]): Promise<AtomicProgramResult> {
    const writeCount = weeks.reduce((total, week) => total + 1 + week.workouts.length, 1);
    if (writeCount > MAX_BATCH_WRITES) {
      throw new ProgramCreationError(
        `Program needs ${writeCount} writes, more than the ${MAX_BATCH_WRITES} allowed in one batch`
      );
    }

    const batch = this.db.batch();
    const programRef = this.collection.doc();
    const programData = { ...program, ...this.createTimestamps() };
    batch.set(programRef, programData);

    const createdWeeks: WeekRecord[] = [];
    const createdWorkouts: ProgramWorkout[] = [];
    for (const week of weeks) {
      const { workouts, ...weekFields } = week;
      const weekRef = this.weeksCollection.doc();
      const weekData = { program_id: programRef.id, ...weekFields };
      batch.set(weekRef, weekData);
      createdWeeks.push({ id: weekRef.id, ...weekData });

      for (const workout of workouts) {
        const workoutRef = this.workoutsCollection.doc();
        const workoutData = { week_id: weekRef.id, ...workout };
        // program_id lets findWithWeeks load every workout in one query.
        batch.set(workoutRef, { program_id: programRef.id, ...workoutData });
        createdWorkouts.push({ id: workoutRef.id, ...workoutData });
      }
    }

    try {
      await batch.commit();
    } catch (err) {
      throw new ProgramCreationError('Failed to commit program batch', err);
    }

    return {
      program: { id: programRef.id, ...programData },
      weeks: createdWeeks,
      workouts: createdWorkouts,
    };
  }

  protected parseEntity(id: string, data: Record<string, unknown>): TrainingProgram | null {
    const userId = readString(data, 'user_id');
    const name = readString(data, 'name');
    const description = readString(data, 'description');
    const goal = readEnum(data, 'goal', TRAINING_GOALS);
    const model = readEnum(data, 'periodization_model', PERIODIZATION_MODELS);
    const durationWeeks = readNumber(data, 'duration_weeks');
    const sessionsPerWeek = readNumber(data, 'sessions_per_week');
    const experienceLevel = readEnum(data, 'experience_level', EXPERIENCE_LEVELS);
    const equipment = readStringArray(data, 'equipment_available');
    const status = readEnum(data, 'status', PROGRAM_STATUSES);
    const metadata = parseMetadata(data['generation_metadata']);
    const createdAt = readString(data, 'created_at');
    const updatedAt = readString(data, 'updated_at');

    if (
      userId === null ||
      name === null ||
      description === null ||
      goal === null ||
      model === null ||
      durationWeeks === null ||
      sessionsPerWeek === null ||
      experienceLevel === null ||
      equipment === null ||
      status === null ||
      metadata === null ||
      createdAt === null ||
      updatedAt === null
    ) {
      return null;
    }

    return {
      id,
      user_id: userId,
      name,
      description,
      goal,
      periodization_model: model,
      duration_weeks: durationWeeks,
      sessions_per_week: sessionsPerWeek,
      experience_level: experienceLevel,
      equipment_available: equipment,
      status,
      generation_metadata: metadata,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }

  private parseWeek(id: string, data: Record<string, unknown>): WeekRecord | null {
    const programId = readString(data, 'program_id');
    const weekNumber = readNumber(data, 'week_number');
    const focus = readString(data, 'focus');
    const isDeload = readBoolean(data, 'is_deload');
    const intensity = readNumber(data, 'intensity_percent');
    const volume = readNumber(data, 'volume_modifier');

    if (
      programId === null ||
      weekNumber === null ||
      focus === null ||
      isDeload === null ||
      intensity === null ||
      volume === null
    ) {
      return null;
    }

    return {
      id,
      program_id: programId,
      week_number: weekNumber,
      focus,
      is_deload: isDeload,
      intensity_percent: intensity,
      volume_modifier: volume,
      notes: readNullableString(data, 'notes') ?? null,
    };
  }

  private parseWorkout(id: string, data: Record<string, unknown>): ProgramWorkout | null {
    const weekId = readString(data, 'week_id');
    const day = DAYS_OF_WEEK.find((value) => value === readNumber(data, 'day_of_week'));
    const name = readString(data, 'name');
    const workoutType = readEnum(data, 'workout_type', WORKOUT_TYPES);
    const duration = readNumber(data, 'target_duration_minutes');
    const sortOrder = readNumber(data, 'sort_order');
    const exercises = readRecordArray(data, 'exercises');

    if (
      weekId === null ||
      day === undefined ||
      name === null ||
      workoutType === null ||
      duration === null ||
      sortOrder === null ||
      exercises === null
    ) {
      return null;
    }

    return {
      id,
      week_id: weekId,
      day_of_week: day,
      name,
      workout_type: workoutType,
      target_duration_minutes: duration,
      sort_order: sortOrder,
      notes: readNullableString(data, 'notes') ?? null,
      exercises: exercises
        .map(parseAssignment)
        .filter((assignment): assignment is ExerciseAssignment => assignment !== null),
    };
  }

  async findByUserId(userId: string): Promise<TrainingProgram[]> {
    const snapshot = await this.collection
      .where('user_id', '==', userId)
      .orderBy('created_at', 'desc')
      .get();
    return this.snapshotToEntities(snapshot);
  }

  async findWithWeeks(id: string): Promise<TrainingProgramWithWeeks | null> {
    const program = await this.findById(id);
    if (!program) {
      return null;
    }

    const [weeksSnapshot, workoutsSnapshot] = await Promise.all([
      this.weeksCollection.where('program_id', '==', id).orderBy('week_number').get(),
      this.workoutsCollection.where('program_id', '==', id).get(),
    ]);

    const workouts = workoutsSnapshot.docs
      .map((doc) => {
        const data = doc.data();
        return isRecord(data) ? this.parseWorkout(doc.id, data) : null;
      })
      .filter((workout): workout is ProgramWorkout => workout !== null)
      .sort((a, b) => a.sort_order - b.sort_order);

    const weeks = weeksSnapshot.docs
      .map((doc) => {
        const data = doc.data();
        return isRecord(data) ? this.parseWeek(doc.id, data) : null;
      })
      .filter((week): week is WeekRecord => week !== null)
      .map((week) => ({
        ...week,
        workouts: workouts.filter((workout) => workout.week_id === week.id),
      }));

    return { ...program, weeks };
  }

  async updateStatus(id: string, status: ProgramStatus): Promise<TrainingProgram | null> {
    return this.update(id, { status });
  }
}
