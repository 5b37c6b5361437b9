import type { ExerciseSelectionResponse } from '../schemas/exercise-selection.schema.js';
import type { ExperienceLevel, TrainingGoal, WorkoutType } from './program.js';

export interface CandidateExercise {
  id: string;
  name: string;
  primary_muscles: string[];
  equipment: string[];
}

export interface ExerciseSelectionRequest {
  workout_type: WorkoutType;
  muscle_groups: string[];
  equipment: string[];
  exercise_count: number;
  intensity_percent: number;
  volume_modifier: number;
  available_exercises: CandidateExercise[];
  user_limitations: string[];
  experience_level: ExperienceLevel;
  goal: TrainingGoal;
  is_deload: boolean;
}

/**
 * Optional language-model collaborator. Any rejection is treated as
 * recoverable by the caller.
 */
export interface ExerciseSelectionProvider {
  selectExercises(request: ExerciseSelectionRequest): Promise<ExerciseSelectionResponse>;
}
