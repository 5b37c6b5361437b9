/**
 * Template Selector
 *
 * Scores stored program templates against a request and synthesizes a
 * default weekly split when no template fits.
 */

import { info, warn } from 'firebase-functions/logger';
import { DEFAULT_GENERATION_CONFIG, type GenerationConfig } from '../config.js';
import type {
  DayOfWeek,
  ExperienceLevel,
  ProgramTemplate,
  TemplateMatch,
  TemplateStructure,
  TrainingGoal,
  WorkoutBlueprint,
  WorkoutType,
} from '../types/program.js';
import type { TemplateLookup } from '../types/repository.js';

export type TemplateScoringWeights = GenerationConfig['templateScoring'];

const DEFAULT_TEMPLATE_SESSIONS = 3;
const DEFAULT_DELOAD_FREQUENCY = 4;

const PUSH_MUSCLES = ['chest', 'anterior_deltoid', 'triceps'];
const PULL_MUSCLES = ['lats', 'rhomboids', 'rear_deltoid', 'biceps'];
const LEG_MUSCLES = ['quadriceps', 'hamstrings', 'glutes', 'calves'];

const GOAL_FOCUS: Record<TrainingGoal, string> = {
  strength: 'Strength Development',
  hypertrophy: 'Muscle Building',
  endurance: 'Muscular Endurance',
  weight_loss: 'Fat Loss & Conditioning',
  general_fitness: 'General Fitness',
  sport_specific: 'Sport Performance',
};

function workout(
  day: DayOfWeek,
  name: string,
  type: WorkoutType,
  muscles: string[],
  slots: number,
  minutes = 60
): WorkoutBlueprint {
  return {
    day_of_week: day,
    name,
    workout_type: type,
    muscle_groups: [...muscles],
    exercise_slots: slots,
    target_duration_minutes: minutes,
  };
}

interface Split {
  name: string;
  workouts: WorkoutBlueprint[];
}

function fullBodySplit(): Split {
  return {
    name: 'full_body',
    workouts: [
      workout(1, 'Full Body A', 'full_body', ['chest', 'lats', 'quadriceps', 'hamstrings', 'anterior_deltoid', 'biceps', 'triceps'], 6),
      workout(3, 'Full Body B', 'full_body', ['chest', 'rhomboids', 'glutes', 'quadriceps', 'rear_deltoid', 'biceps', 'triceps'], 6),
      workout(5, 'Full Body C', 'full_body', ['chest', 'lats', 'hamstrings', 'calves', 'anterior_deltoid', 'core'], 6),
    ],
  };
}

function pushPullLegsSplit(): Split {
  return {
    name: 'push_pull_legs',
    workouts: [
      workout(1, 'Push Day', 'push', PUSH_MUSCLES, 5),
      workout(3, 'Pull Day', 'pull', PULL_MUSCLES, 5),
      workout(5, 'Legs Day', 'legs', LEG_MUSCLES, 5),
    ],
  };
}

function upperLowerSplit(): Split {
  return {
    name: 'upper_lower',
    workouts: [
      workout(1, 'Upper Body A', 'upper', ['chest', 'lats', 'anterior_deltoid', 'triceps', 'biceps'], 6),
      workout(2, 'Lower Body A', 'lower', LEG_MUSCLES, 5),
      workout(4, 'Upper Body B', 'upper', ['chest', 'rhomboids', 'rear_deltoid', 'triceps', 'biceps'], 6),
      workout(5, 'Lower Body B', 'lower', LEG_MUSCLES, 5),
    ],
  };
}

function pplUpperLowerSplit(): Split {
  return {
    name: 'ppl_upper_lower',
    workouts: [
      workout(1, 'Push Day', 'push', PUSH_MUSCLES, 5),
      workout(2, 'Pull Day', 'pull', PULL_MUSCLES, 5),
      workout(3, 'Legs Day', 'legs', LEG_MUSCLES, 5),
      workout(5, 'Upper Body', 'upper', ['chest', 'lats', 'anterior_deltoid', 'triceps', 'biceps'], 6),
      workout(6, 'Lower Body', 'lower', LEG_MUSCLES, 5),
    ],
  };
}

function pplTwiceSplit(): Split {
  return {
    name: 'ppl_twice',
    workouts: [
      workout(1, 'Push Day A', 'push', PUSH_MUSCLES, 5),
      workout(2, 'Pull Day A', 'pull', PULL_MUSCLES, 5),
      workout(3, 'Legs Day A', 'legs', LEG_MUSCLES, 5),
      workout(4, 'Push Day B', 'push', PUSH_MUSCLES, 5),
      workout(5, 'Pull Day B', 'pull', PULL_MUSCLES, 5),
      workout(6, 'Legs Day B', 'legs', LEG_MUSCLES, 5),
    ],
  };
}

function pplTwicePlusSplit(): Split {
  const split = pplTwiceSplit();
  return {
    name: 'ppl_twice_plus',
    workouts: [
      ...split.workouts,
      workout(7, 'Arms & Core', 'arms', ['biceps', 'triceps', 'forearms', 'core'], 6, 45),
    ],
  };
}

function splitForSessions(goal: TrainingGoal, sessionsPerWeek: number): Split {
  switch (sessionsPerWeek) {
    case 3:
      return goal === 'strength' || goal === 'hypertrophy' ? pushPullLegsSplit() : fullBodySplit();
    case 4:
      return upperLowerSplit();
    case 5:
      return pplUpperLowerSplit();
    case 6:
      return pplTwiceSplit();
    case 7:
      return pplTwicePlusSplit();
    default: {
      // One or two sessions take the first days of the full body rotation.
      const split = fullBodySplit();
      return { name: split.name, workouts: split.workouts.slice(0, Math.max(1, sessionsPerWeek)) };
    }
  }
}

export function getFocusForGoal(goal: TrainingGoal): string {
  return GOAL_FOCUS[goal];
}

/**
 * Sessions per week a template prescribes: the workout count of its first week.
 */
export function getTemplateSessions(structure: TemplateStructure): number {
  const firstWeek = structure.weeks[0];
  if (firstWeek === undefined || firstWeek.workouts.length === 0) {
    return DEFAULT_TEMPLATE_SESSIONS;
  }
  return firstWeek.workouts.length;
}

export function scoreTemplate(
  template: ProgramTemplate,
  sessionsPerWeek: number,
  durationWeeks: number,
  weights: TemplateScoringWeights = DEFAULT_GENERATION_CONFIG.templateScoring
): TemplateMatch {
  let score = weights.base;
  const reasons = ['Goal and experience match'];

  const templateSessions = getTemplateSessions(template.structure);
  if (templateSessions === sessionsPerWeek) {
    score += weights.sessionsExact;
    reasons.push(`Exact sessions match (${sessionsPerWeek}/week)`);
  } else if (Math.abs(templateSessions - sessionsPerWeek) <= weights.sessionsCloseRange) {
    score += weights.sessionsClose;
    reasons.push(`Close sessions match (${templateSessions} vs ${sessionsPerWeek})`);
  }

  if (template.duration_weeks === durationWeeks) {
    score += weights.durationExact;
    reasons.push(`Exact duration match (${durationWeeks} weeks)`);
  } else if (Math.abs(template.duration_weeks - durationWeeks) <= weights.durationCloseRange) {
    score += weights.durationClose;
    reasons.push(`Close duration (${template.duration_weeks} vs ${durationWeeks} weeks)`);
  }

  const usage = Math.max(0, template.usage_count);
  score += Math.min(usage / weights.popularityCap, 1) * weights.popularityMax;
  if (usage > 0) {
    reasons.push(`Used ${usage} times`);
  }

  return { template, score, match_reasons: reasons };
}

export class TemplateSelector {
  constructor(
    private readonly templateLookup: TemplateLookup,
    private readonly weights: TemplateScoringWeights = DEFAULT_GENERATION_CONFIG.templateScoring
  ) {}

  /**
   * Highest scoring template for the request, or null when none is stored
   * or the lookup fails. Ties keep the order the lookup returned.
   */
  async selectBestTemplate(
    goal: TrainingGoal,
    experienceLevel: ExperienceLevel,
    sessionsPerWeek: number,
    durationWeeks: number
  ): Promise<TemplateMatch | null> {
    let templates: ProgramTemplate[];
    try {
      templates = await this.templateLookup.getByCriteria(goal, experienceLevel, durationWeeks);
    } catch (err) {
      warn('program-generator:template_lookup_failed', {
        phase: 'template_selection',
        goal,
        experience_level: experienceLevel,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    let best: TemplateMatch | null = null;
    for (const template of templates) {
      const match = scoreTemplate(template, sessionsPerWeek, durationWeeks, this.weights);
      if (best === null || match.score > best.score) {
        best = match;
      }
    }

    if (best === null) {
      info('program-generator:no_template', { goal, experience_level: experienceLevel });
      return null;
    }

    info('program-generator:template_selected', {
      template_id: best.template.id,
      template_name: best.template.name,
      score: best.score,
      candidate_count: templates.length,
    });
    return best;
  }

  /**
   * Synthesize a one-week pattern from a standard split. Never fails.
   */
  getDefaultStructure(
    goal: TrainingGoal,
    _experienceLevel: ExperienceLevel,
    sessionsPerWeek: number,
    durationWeeks: number
  ): TemplateStructure {
    const split = splitForSessions(goal, sessionsPerWeek);
    return {
      split_type: split.name,
      mesocycle_length: Math.min(4, durationWeeks),
      deload_frequency: DEFAULT_DELOAD_FREQUENCY,
      weeks: [
        {
          week_pattern: 1,
          focus: getFocusForGoal(goal),
          workouts: split.workouts,
        },
      ],
    };
  }
}
