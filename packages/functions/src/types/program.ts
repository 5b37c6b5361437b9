// Domain types for generated training programs.

export const TRAINING_GOALS = [
  'strength',
  'hypertrophy',
  'endurance',
  'weight_loss',
  'general_fitness',
  'sport_specific',
] as const;
export type TrainingGoal = (typeof TRAINING_GOALS)[number];

export const EXPERIENCE_LEVELS = ['beginner', 'intermediate', 'advanced', 'elite'] as const;
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export const PERIODIZATION_MODELS = [
  'linear',
  'undulating',
  'block',
  'conjugate',
  'reverse_linear',
] as const;
export type PeriodizationModel = (typeof PERIODIZATION_MODELS)[number];

export const BLOCK_PHASES = ['accumulation', 'transmutation', 'realization'] as const;
export type BlockPhase = (typeof BLOCK_PHASES)[number];

export const EFFORT_TYPES = ['max_effort', 'dynamic_effort', 'repetition_effort'] as const;
export type EffortType = (typeof EFFORT_TYPES)[number];

export const TRAINING_FOCUSES = ['strength', 'power', 'hypertrophy', 'endurance', 'deload'] as const;
export type TrainingFocus = (typeof TRAINING_FOCUSES)[number];

export const WORKOUT_TYPES = ['push', 'pull', 'legs', 'upper', 'lower', 'full_body', 'arms'] as const;
export type WorkoutType = (typeof WORKOUT_TYPES)[number];

export const PROGRAM_STATUSES = ['draft', 'active', 'completed', 'archived'] as const;
export type ProgramStatus = (typeof PROGRAM_STATUSES)[number];

export const EXERCISE_CATEGORIES = ['compound', 'isolation', 'cardio', 'mobility'] as const;
export type ExerciseCategory = (typeof EXERCISE_CATEGORIES)[number];

export const MOVEMENT_PATTERNS = [
  'push',
  'pull',
  'squat',
  'hinge',
  'lunge',
  'carry',
  'rotation',
  'isolation',
] as const;
export type MovementPattern = (typeof MOVEMENT_PATTERNS)[number];

export type DayOfWeek = 1 | 2 | 3 | 4 | 5 | 6 | 7;

// ============ Exercise catalog ============

export interface Exercise {
  id: string;
  name: string;
  category: ExerciseCategory;
  movement_pattern: MovementPattern | null;
  primary_muscles: string[];
  secondary_muscles: string[];
  equipment: string[];
  supports_1rm: boolean;
  is_placeholder: boolean;
}

export type CreateExerciseDTO = Omit<Exercise, 'id' | 'is_placeholder'>;

export interface SlotRequirements {
  movement_pattern?: MovementPattern;
  target_muscles?: string[];
  category?: ExerciseCategory;
  supports_1rm?: boolean;
  preferred_equipment?: string[];
}

// ============ Templates ============

export interface WorkoutBlueprint {
  day_of_week: DayOfWeek;
  name: string;
  workout_type: WorkoutType;
  muscle_groups: string[];
  exercise_slots: number;
  target_duration_minutes: number;
}

export interface TemplateWeek {
  week_pattern: number;
  focus?: string;
  workouts: WorkoutBlueprint[];
}

export interface TemplateStructure {
  split_type: string;
  mesocycle_length: number;
  deload_frequency: number;
  weeks: TemplateWeek[];
}

export interface ProgramTemplate {
  id: string;
  name: string;
  goal: TrainingGoal;
  experience_level: ExperienceLevel;
  duration_weeks: number;
  structure: TemplateStructure;
  usage_count: number;
  is_system: boolean;
}

export interface TemplateMatch {
  template: ProgramTemplate;
  score: number;
  match_reasons: string[];
}

// ============ Periodization ============

export interface WeekParameters {
  week_number: number;
  intensity_percent: number;
  volume_modifier: number;
  is_deload: boolean;
  phase?: BlockPhase;
  effort_type?: EffortType;
  focus: TrainingFocus;
  notes?: string;
}

export interface VolumeLimits {
  min_sets: number;
  max_sets: number;
}

// ============ Generated program ============

export interface ExerciseAssignment {
  exercise_id: string;
  exercise_name: string;
  sets: number;
  reps: string;
  rest_seconds: number;
  order: number;
  primary_muscles: string[];
  equipment: string[];
  notes: string | null;
  is_placeholder: boolean;
}

export interface ProgramWorkout {
  id: string;
  week_id: string;
  day_of_week: DayOfWeek;
  name: string;
  workout_type: WorkoutType;
  target_duration_minutes: number;
  sort_order: number;
  notes: string | null;
  exercises: ExerciseAssignment[];
}

export interface ProgramWeek {
  id: string;
  program_id: string;
  week_number: number;
  focus: string;
  is_deload: boolean;
  intensity_percent: number;
  volume_modifier: number;
  notes: string | null;
  workouts: ProgramWorkout[];
}

export interface GenerationMetadata {
  template_id: string | null;
  template_name: string | null;
  used_default_structure: boolean;
  periodization_model: PeriodizationModel;
  generation_time_seconds: number;
  llm_used: boolean;
  llm_fallback_count: number;
  placeholder_count: number;
  validation_passed: boolean;
  warning_count: number;
}

export interface TrainingProgram {
  id: string;
  user_id: string;
  name: string;
  description: string;
  goal: TrainingGoal;
  periodization_model: PeriodizationModel;
  duration_weeks: number;
  sessions_per_week: number;
  experience_level: ExperienceLevel;
  equipment_available: string[];
  status: ProgramStatus;
  generation_metadata: GenerationMetadata;
  created_at: string;
  updated_at: string;
}

export interface TrainingProgramWithWeeks extends TrainingProgram {
  weeks: ProgramWeek[];
}

// Drafts are what the orchestrator hands to the store; ids are assigned on commit.
export type ProgramDraft = Omit<TrainingProgram, 'id' | 'created_at' | 'updated_at'>;
export type WorkoutDraft = Omit<ProgramWorkout, 'id' | 'week_id'>;
export interface WeekDraft extends Omit<ProgramWeek, 'id' | 'program_id' | 'workouts'> {
  workouts: WorkoutDraft[];
}

export interface AtomicProgramResult {
  program: TrainingProgram;
  weeks: Omit<ProgramWeek, 'workouts'>[];
  workouts: ProgramWorkout[];
}

// ============ Validation ============

export type ValidationSeverity = 'error' | 'warning' | 'info';
export type ValidationCategory = 'equipment' | 'uniqueness' | 'volume' | 'balance' | 'limitation';

export interface ValidationIssue {
  severity: ValidationSeverity;
  category: ValidationCategory;
  message: string;
  location?: string;
  suggestion?: string;
}

export interface ValidationResult {
  is_valid: boolean;
  issues: ValidationIssue[];
  summary: string;
}

export interface GenerateProgramResponse {
  program: TrainingProgramWithWeeks;
  generation_metadata: GenerationMetadata;
  suggestions: string[];
}
