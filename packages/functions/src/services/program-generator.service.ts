/**
 * Program Generator
 *
 * Orchestrates a generation run: template or default structure, periodization,
 * exercise selection per workout, validation, then one atomic write.
 */

import { error as logError, info, warn } from 'firebase-functions/logger';
import { DEFAULT_GENERATION_CONFIG, type GenerationConfig } from '../config.js';
import type { GenerateProgramRequest } from '../schemas/program.schema.js';
import {
  ProgramPersistenceError,
  ProgramValidationError,
} from '../types/errors.js';
import type { ExerciseSelectionProvider } from '../types/exercise-selection.js';
import type {
  AtomicProgramResult,
  Exercise,
  ExperienceLevel,
  GenerateProgramResponse,
  GenerationMetadata,
  PeriodizationModel,
  ProgramDraft,
  ProgramWeek,
  TemplateStructure,
  TemplateWeek,
  TrainingGoal,
  WeekDraft,
  WeekParameters,
  WorkoutBlueprint,
  WorkoutDraft,
} from '../types/program.js';
import type {
  ExerciseLookup,
  ExerciseSearchCriteria,
  ProgramStore,
  TemplateLookup,
} from '../types/repository.js';
import { BoundedExecutor } from './bounded-executor.js';
import { isEquipmentSatisfied, normalizeEquipment } from './equipment.js';
import { ExerciseSelector, PlaceholderIdGenerator } from './exercise-selector.service.js';
import { PeriodizationService } from './periodization.service.js';
import { ProgramValidator } from './program-validator.service.js';
import { TemplateSelector } from './template-selector.service.js';
import {
  DeterministicWorkoutExerciseSelector,
  ExerciseSelectionChain,
  LlmWorkoutExerciseSelector,
} from './workout-exercise-selection.service.js';

export interface ProgramGeneratorDeps {
  programStore: ProgramStore;
  templateLookup: TemplateLookup;
  exerciseLookup: ExerciseLookup;
  exerciseSelectionProvider?: ExerciseSelectionProvider | null;
  config?: GenerationConfig;
  now?: () => number;
}

const GOAL_LABELS: Record<TrainingGoal, string> = {
  strength: 'Strength',
  hypertrophy: 'Hypertrophy',
  endurance: 'Endurance',
  weight_loss: 'Fat Loss',
  general_fitness: 'Fitness',
  sport_specific: 'Sport Specific',
};

const GOAL_WEEK_FOCUS: Record<TrainingGoal, string> = {
  strength: 'Strength Development',
  hypertrophy: 'Muscle Building',
  endurance: 'Endurance Training',
  weight_loss: 'Fat Loss',
  general_fitness: 'General Fitness',
  sport_specific: 'Training',
};

const PHASE_FOCUS = {
  accumulation: 'Volume Accumulation',
  transmutation: 'Intensity Transmutation',
  realization: 'Peak Realization',
} as const;

const DELOAD_WEEK_NOTES = 'Deload week - reduced volume and intensity';
const MIN_DELOAD_SLOTS = 3;

export function generateProgramName(durationWeeks: number, goal: TrainingGoal): string {
  return `${durationWeeks}-Week ${GOAL_LABELS[goal]} Program`;
}

export function generateProgramDescription(
  durationWeeks: number,
  goal: TrainingGoal,
  experienceLevel: ExperienceLevel,
  sessionsPerWeek: number
): string {
  return `A ${durationWeeks}-week ${goal.replace(/_/g, ' ')} program designed for ${experienceLevel} lifters, with ${sessionsPerWeek} sessions per week.`;
}

export function weekFocus(params: WeekParameters, goal: TrainingGoal): string {
  if (params.is_deload) {
    return 'Recovery & Deload';
  }
  if (params.phase !== undefined) {
    return PHASE_FOCUS[params.phase];
  }
  return GOAL_WEEK_FOCUS[goal];
}

/**
 * Exercise slots for one workout; deload weeks drop two slots but keep at least three.
 */
export function slotsForWeek(blueprintSlots: number, isDeload: boolean): number {
  if (!isDeload) {
    return blueprintSlots;
  }
  return Math.min(blueprintSlots, Math.max(MIN_DELOAD_SLOTS, blueprintSlots - 2));
}

function defaultWorkoutName(blueprint: WorkoutBlueprint): string {
  if (blueprint.name.trim() !== '') {
    return blueprint.name;
  }
  const type = blueprint.workout_type.replace(/_/g, ' ');
  return `${type.charAt(0).toUpperCase()}${type.slice(1)} Workout`;
}

interface RunCounters {
  llmSuccesses: number;
  llmFallbacks: number;
  placeholders: number;
}

export class ProgramGenerator {
  private readonly programStore: ProgramStore;
  private readonly templateLookup: TemplateLookup;
  private readonly exerciseLookup: ExerciseLookup;
  private readonly provider: ExerciseSelectionProvider | null;
  private readonly config: GenerationConfig;
  private readonly now: () => number;
  private readonly executor: BoundedExecutor;
  private readonly templateSelector: TemplateSelector;
  private readonly periodization = new PeriodizationService();
  private readonly validator = new ProgramValidator();

  constructor(deps: ProgramGeneratorDeps) {
    this.config = deps.config ?? DEFAULT_GENERATION_CONFIG;
    this.now = deps.now ?? Date.now;
    this.executor = new BoundedExecutor(this.config.poolWidth);
    this.provider = deps.exerciseSelectionProvider ?? null;

    // Every collaborator call goes through the executor.
    const executor = this.executor;
    this.programStore = deps.programStore;
    this.templateLookup = {
      getByCriteria: (goal, level, weeks) =>
        executor.run(() => deps.templateLookup.getByCriteria(goal, level, weeks)),
      incrementUsageCount: (id) => executor.run(() => deps.templateLookup.incrementUsageCount(id)),
    };
    this.exerciseLookup = {
      search: (criteria) => executor.run(() => deps.exerciseLookup.search(criteria)),
      getSimilarExercises: (id, limit) =>
        executor.run(() => deps.exerciseLookup.getSimilarExercises(id, limit)),
    };
    this.templateSelector = new TemplateSelector(this.templateLookup, this.config.templateScoring);
  }

  get llmEnabled(): boolean {
    return this.provider !== null;
  }

  async generate(request: GenerateProgramRequest, userId: string): Promise<GenerateProgramResponse> {
    const start = this.now();
    const suggestions: string[] = [];
    info('program-generator:start', {
      user_id: userId,
      goal: request.goal,
      duration_weeks: request.duration_weeks,
      sessions_per_week: request.sessions_per_week,
      experience_level: request.experience_level,
      llm_enabled: this.llmEnabled,
    });

    // Template or default structure
    const match = await this.templateSelector.selectBestTemplate(
      request.goal,
      request.experience_level,
      request.sessions_per_week,
      request.duration_weeks
    );
    const template =
      match !== null && match.template.structure.weeks.some((week) => week.workouts.length > 0)
        ? match.template
        : null;

    let structure: TemplateStructure;
    if (template !== null) {
      structure = template.structure;
      suggestions.push(`Using template: ${template.name}`);
      await this.recordTemplateUse(template.id);
    } else {
      structure = this.templateSelector.getDefaultStructure(
        request.goal,
        request.experience_level,
        request.sessions_per_week,
        request.duration_weeks
      );
      suggestions.push('Using default workout structure');
    }

    // Periodization
    const model: PeriodizationModel = this.periodization.selectPeriodizationModel(
      request.goal,
      request.experience_level,
      request.duration_weeks
    );
    const weekParams = this.periodization.planProgression(
      request.duration_weeks,
      request.goal,
      request.experience_level,
      model
    );
    suggestions.push(`Using ${model} periodization`);
    const deloadWeeks = weekParams.filter((week) => week.is_deload).map((week) => week.week_number);
    if (deloadWeeks.length > 0) {
      suggestions.push(`Deload weeks scheduled: ${deloadWeeks.join(', ')}`);
    }
    info('program-generator:phase', {
      phase: 'periodization',
      periodization_model: model,
      deload_weeks: deloadWeeks,
      elapsed_ms: this.now() - start,
    });

    // Weeks and workouts
    const counters: RunCounters = { llmSuccesses: 0, llmFallbacks: 0, placeholders: 0 };
    const weeks = await this.buildWeeks(request, structure, weekParams, counters);
    if (counters.llmFallbacks > 0) {
      suggestions.push(
        `AI exercise selection was unavailable for ${counters.llmFallbacks} workout(s); rule-based selection was used instead`
      );
    }
    if (counters.placeholders > 0) {
      suggestions.push(
        `${counters.placeholders} exercise slot(s) use placeholders; replace them with exercises from your library`
      );
    }
    info('program-generator:phase', {
      phase: 'exercise_selection',
      week_count: weeks.length,
      llm_success_count: counters.llmSuccesses,
      llm_fallback_count: counters.llmFallbacks,
      placeholder_count: counters.placeholders,
      elapsed_ms: this.now() - start,
    });

    // Validation
    const validation = this.validator.validateProgram(
      weeks,
      request.equipment_available,
      request.experience_level,
      request.limitations
    );
    const errors = validation.issues.filter((issue) => issue.severity === 'error');
    const warnings = validation.issues.filter((issue) => issue.severity === 'warning');
    if (!validation.is_valid) {
      warn('program-generator:validation_failed', {
        error_count: errors.length,
        warning_count: warnings.length,
      });
      throw new ProgramValidationError(errors);
    }
    for (const issue of warnings) {
      suggestions.push(`Note: ${issue.message}`);
    }

    const metadata: GenerationMetadata = {
      template_id: template?.id ?? null,
      template_name: template?.name ?? null,
      used_default_structure: template === null,
      periodization_model: model,
      generation_time_seconds: 0,
      llm_used: counters.llmSuccesses > 0,
      llm_fallback_count: counters.llmFallbacks,
      placeholder_count: counters.placeholders,
      validation_passed: validation.is_valid,
      warning_count: warnings.length,
    };

    const draft: ProgramDraft = {
      user_id: userId,
      name: generateProgramName(request.duration_weeks, request.goal),
      description: generateProgramDescription(
        request.duration_weeks,
        request.goal,
        request.experience_level,
        request.sessions_per_week
      ),
      goal: request.goal,
      periodization_model: model,
      duration_weeks: request.duration_weeks,
      sessions_per_week: request.sessions_per_week,
      experience_level: request.experience_level,
      equipment_available: [...request.equipment_available],
      status: 'draft',
      generation_metadata: { ...metadata, generation_time_seconds: this.elapsedSeconds(start) },
    };

    // Persistence: all or nothing
    let result: AtomicProgramResult;
    try {
      result = await this.executor.run(() => this.programStore.createProgramAtomic(draft, weeks));
    } catch (err) {
      logError('program-generator:persistence_failed', {
        user_id: userId,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new ProgramPersistenceError('Failed to save generated program', err);
    }

    const programWeeks: ProgramWeek[] = result.weeks.map((week) => ({
      ...week,
      workouts: result.workouts.filter((workout) => workout.week_id === week.id),
    }));

    const finalMetadata: GenerationMetadata = {
      ...metadata,
      generation_time_seconds: this.elapsedSeconds(start),
    };
    info('program-generator:complete', {
      program_id: result.program.id,
      user_id: userId,
      week_count: programWeeks.length,
      workout_count: result.workouts.length,
      warning_count: warnings.length,
      elapsed_ms: this.now() - start,
    });

    return {
      program: { ...result.program, weeks: programWeeks },
      generation_metadata: finalMetadata,
      suggestions,
    };
  }

  private async buildWeeks(
    request: GenerateProgramRequest,
    structure: TemplateStructure,
    weekParams: WeekParameters[],
    counters: RunCounters
  ): Promise<WeekDraft[]> {
    // Placeholder ids are scoped to one run.
    const exerciseSelector = new ExerciseSelector(this.exerciseLookup, {
      weights: this.config.exerciseScoring,
      candidateLimit: this.config.candidateLimit,
      placeholderIds: new PlaceholderIdGenerator(),
    });
    const chain = new ExerciseSelectionChain(
      new DeterministicWorkoutExerciseSelector(exerciseSelector),
      this.provider !== null ? new LlmWorkoutExerciseSelector(this.provider, this.executor) : null
    );

    const patterns: TemplateWeek[] = structure.weeks;
    const weeks: WeekDraft[] = [];
    for (const params of weekParams) {
      const pattern = patterns[(params.week_number - 1) % patterns.length];
      const blueprints = pattern?.workouts ?? [];

      const workouts = await Promise.all(
        blueprints.map(async (blueprint, index): Promise<WorkoutDraft> => {
          const slotCount = slotsForWeek(blueprint.exercise_slots, params.is_deload);
          const candidates = await this.searchCandidates(blueprint, request.equipment_available);
          const selection = await chain.select({
            blueprint,
            week: params,
            slotCount,
            goal: request.goal,
            experienceLevel: request.experience_level,
            equipment: request.equipment_available,
            limitations: request.limitations,
            candidates,
          });
          if (selection.llmUsed) counters.llmSuccesses++;
          if (selection.fellBack) counters.llmFallbacks++;
          counters.placeholders += selection.exercises.filter((exercise) => exercise.is_placeholder).length;

          return {
            day_of_week: blueprint.day_of_week,
            name: defaultWorkoutName(blueprint),
            workout_type: blueprint.workout_type,
            target_duration_minutes: blueprint.target_duration_minutes,
            sort_order: index,
            notes: null,
            exercises: selection.exercises,
          };
        })
      );

      weeks.push({
        week_number: params.week_number,
        focus: weekFocus(params, request.goal),
        is_deload: params.is_deload,
        intensity_percent: params.intensity_percent,
        volume_modifier: params.volume_modifier,
        notes: params.is_deload ? DELOAD_WEEK_NOTES : params.notes ?? null,
        workouts,
      });
    }
    return weeks;
  }

  private async searchCandidates(
    blueprint: WorkoutBlueprint,
    equipmentAvailable: readonly string[]
  ): Promise<Exercise[]> {
    const available = normalizeEquipment(equipmentAvailable);
    const criteria: ExerciseSearchCriteria = {
      muscle_groups: [...blueprint.muscle_groups],
      limit: this.config.candidateLimit,
    };
    if (available.size > 0) {
      criteria.equipment = [...available];
    }
    try {
      const found = await this.exerciseLookup.search(criteria);
      return found.filter((exercise) => isEquipmentSatisfied(exercise.equipment, available));
    } catch (err) {
      warn('program-generator:exercise_lookup_failed', {
        phase: 'candidate_search',
        workout_name: blueprint.name,
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }

  private async recordTemplateUse(templateId: string): Promise<void> {
    try {
      await this.templateLookup.incrementUsageCount(templateId);
    } catch (err) {
      warn('program-generator:template_usage_update_failed', {
        template_id: templateId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private elapsedSeconds(start: number): number {
    return Math.round((this.now() - start) / 10) / 100;
  }
}
