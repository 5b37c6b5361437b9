import type {
  AtomicProgramResult,
  Exercise,
  ExerciseCategory,
  ExperienceLevel,
  MovementPattern,
  ProgramDraft,
  ProgramStatus,
  ProgramTemplate,
  ProgramWeek,
  ProgramWorkout,
  TrainingGoal,
  TrainingProgram,
  TrainingProgramWithWeeks,
  WeekDraft,
  WorkoutDraft,
} from './program.js';

/**
 * Interface matching the public API of BaseRepository.
 * Lives in types/ so services can reference it without importing from repositories/.
 */
export interface IBaseRepository<T extends { id: string }, CreateDTO> {
  create(data: CreateDTO): Promise<T>;
  findById(id: string): Promise<T | null>;
}

/**
 * Persistence contract used by the program generator.
 * `createProgramAtomic` must either persist everything or nothing.
 */
export interface ProgramStore extends IBaseRepository<TrainingProgram, ProgramDraft> {
  createWeek(programId: string, data: Omit<WeekDraft, 'workouts'>): Promise<Omit<ProgramWeek, 'workouts'>>;
  createWorkout(weekId: string, data: WorkoutDraft): Promise<ProgramWorkout>;
  createProgramAtomic(program: ProgramDraft, weeks: WeekDraft[]): Promise<AtomicProgramResult>;
  findWithWeeks(id: string): Promise<TrainingProgramWithWeeks | null>;
  findByUserId(userId: string): Promise<TrainingProgram[]>;
  updateStatus(id: string, status: ProgramStatus): Promise<TrainingProgram | null>;
}

export interface TemplateLookup {
  getByCriteria(
    goal: TrainingGoal,
    experienceLevel: ExperienceLevel,
    durationWeeks?: number
  ): Promise<ProgramTemplate[]>;
  incrementUsageCount(id: string): Promise<void>;
}

export interface ExerciseSearchCriteria {
  muscle_groups?: string[];
  equipment?: string[];
  movement_pattern?: MovementPattern;
  category?: ExerciseCategory;
  supports_1rm?: boolean;
  limit?: number;
}

export interface ExerciseLookup {
  search(criteria: ExerciseSearchCriteria): Promise<Exercise[]>;
  getSimilarExercises(exerciseId: string, limit: number): Promise<Exercise[]>;
}
