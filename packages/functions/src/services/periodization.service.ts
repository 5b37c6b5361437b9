/**
 * Periodization Service
 *
 * Plans intensity, volume and deload placement across a program for the five
 * supported periodization models.
 */

import type {
  BlockPhase,
  EffortType,
  ExperienceLevel,
  PeriodizationModel,
  TrainingFocus,
  TrainingGoal,
  VolumeLimits,
  WeekParameters,
} from '../types/program.js';

interface RawParameters {
  intensity: number;
  volume: number;
  phase?: BlockPhase;
  effortType?: EffortType;
}

export const INTENSITY_RANGES: Record<TrainingGoal, readonly [number, number]> = {
  strength: [0.75, 0.95],
  hypertrophy: [0.65, 0.85],
  endurance: [0.5, 0.7],
  weight_loss: [0.55, 0.75],
  general_fitness: [0.6, 0.8],
  sport_specific: [0.65, 0.9],
};

// Weeks between deloads.
export const DELOAD_FREQUENCY: Record<ExperienceLevel, number> = {
  beginner: 6,
  intermediate: 4,
  advanced: 3,
  elite: 2,
};

export const VOLUME_LIMITS: Record<ExperienceLevel, VolumeLimits> = {
  beginner: { min_sets: 10, max_sets: 12 },
  intermediate: { min_sets: 12, max_sets: 18 },
  advanced: { min_sets: 16, max_sets: 25 },
  elite: { min_sets: 20, max_sets: 30 },
};

const UNDULATING_PATTERN: ReadonlyArray<readonly [number, number]> = [
  [0.85, 0.8], // heavy
  [0.65, 1.2], // light
  [0.75, 1.0], // moderate
];

const CONJUGATE_ROTATION: readonly EffortType[] = [
  'max_effort',
  'dynamic_effort',
  'repetition_effort',
  'max_effort',
];

const CONJUGATE_PARAMETERS: Record<EffortType, readonly [number, number]> = {
  max_effort: [0.92, 0.6],
  dynamic_effort: [0.55, 1.3],
  repetition_effort: [0.7, 1.1],
};

const CONJUGATE_WAVE = [-0.03, 0, 0.03];

const DELOAD_INTENSITY_FACTOR = 0.6;
const DELOAD_VOLUME_FACTOR = 0.5;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function deloadFrequencyFor(level: string): number {
  switch (level) {
    case 'beginner':
    case 'intermediate':
    case 'advanced':
    case 'elite':
      return DELOAD_FREQUENCY[level];
    default:
      return DELOAD_FREQUENCY.intermediate;
  }
}

function blockBoundaries(totalWeeks: number): { accumulationEnd: number; transmutationEnd: number } {
  return {
    accumulationEnd: Math.floor(totalWeeks * 0.4),
    transmutationEnd: Math.floor(totalWeeks * 0.8),
  };
}

/**
 * Rep range recommended for a working intensity (fraction of 1RM).
 */
export function getRepRange(intensity: number): string {
  const percent = intensity > 1 ? intensity : intensity * 100;
  if (percent >= 90) return '1-3';
  if (percent >= 80) return '4-6';
  if (percent >= 70) return '6-8';
  return '8-12';
}

export function determineFocus(
  intensity: number,
  isDeload: boolean,
  effortType?: EffortType
): TrainingFocus {
  if (isDeload) {
    return 'deload';
  }
  switch (effortType) {
    case 'max_effort':
      return 'strength';
    case 'dynamic_effort':
      return 'power';
    case 'repetition_effort':
      return 'hypertrophy';
    default:
      break;
  }
  const percent = intensity > 1 ? intensity : intensity * 100;
  if (percent >= 85) return 'strength';
  if (percent >= 75) return 'power';
  if (percent >= 65) return 'hypertrophy';
  return 'endurance';
}

function weekNotes(
  week: number,
  totalWeeks: number,
  isDeload: boolean,
  phase?: BlockPhase,
  effortType?: EffortType
): string | undefined {
  if (isDeload) {
    return 'Deload week - reduce weights and focus on recovery';
  }
  switch (phase) {
    case 'accumulation':
      return 'Accumulation phase - focus on volume and technique';
    case 'transmutation':
      return 'Transmutation phase - increase intensity, maintain technique';
    case 'realization':
      return 'Realization phase - peak performance, test maxes';
    default:
      break;
  }
  switch (effortType) {
    case 'max_effort':
      return 'Max effort emphasis - work up to heavy singles and triples';
    case 'dynamic_effort':
      return 'Dynamic effort emphasis - focus on speed and explosiveness';
    case 'repetition_effort':
      return 'Repetition effort emphasis - hypertrophy work with controlled tempo';
    default:
      break;
  }
  if (week === 1) {
    return 'Program start - establish baseline weights';
  }
  if (week === totalWeeks) {
    return 'Final week - test progress and reassess goals';
  }
  return undefined;
}

export class PeriodizationService {
  selectPeriodizationModel(
    goal: TrainingGoal,
    experienceLevel: ExperienceLevel,
    durationWeeks: number
  ): PeriodizationModel {
    switch (goal) {
      case 'strength':
        if (experienceLevel === 'advanced' || experienceLevel === 'elite') {
          return 'conjugate';
        }
        return durationWeeks >= 8 ? 'block' : 'linear';
      case 'hypertrophy':
        return experienceLevel === 'beginner' ? 'linear' : 'undulating';
      case 'endurance':
        return 'reverse_linear';
      case 'weight_loss':
        return 'linear';
      case 'sport_specific':
        return durationWeeks >= 12 ? 'block' : 'undulating';
      default:
        return 'linear';
    }
  }

  /**
   * Week numbers (ascending) that should be deloads.
   */
  calculateDeloadWeeks(
    durationWeeks: number,
    experienceLevel: ExperienceLevel,
    model: PeriodizationModel = 'linear'
  ): number[] {
    if (model === 'block') {
      const { accumulationEnd, transmutationEnd } = blockBoundaries(durationWeeks);
      const weeks: number[] = [];
      if (accumulationEnd > 0) {
        weeks.push(accumulationEnd);
      }
      if (transmutationEnd > 0 && transmutationEnd !== accumulationEnd) {
        weeks.push(transmutationEnd);
      }
      return weeks;
    }

    const frequency = deloadFrequencyFor(experienceLevel);
    const weeks: number[] = [];
    for (let week = frequency; week <= durationWeeks; week += frequency) {
      weeks.push(week);
    }
    if (durationWeeks >= 6 && !weeks.includes(durationWeeks)) {
      weeks.push(durationWeeks);
    }
    return weeks;
  }

  /**
   * Parameters for one session of a week. Undulating and conjugate models
   * vary by session; the other models only by week.
   */
  getWeekParameters(
    week: number,
    totalWeeks: number,
    model: PeriodizationModel,
    goal: TrainingGoal,
    experienceLevel: ExperienceLevel,
    session = 1
  ): WeekParameters {
    if (totalWeeks < 1) {
      throw new RangeError(`Total weeks must be at least 1, got ${totalWeeks}`);
    }
    if (week < 1 || week > totalWeeks) {
      throw new RangeError(`Week ${week} out of range [1, ${totalWeeks}]`);
    }

    const raw = this.rawParameters(model, week, totalWeeks, session);
    const isDeload = this.calculateDeloadWeeks(totalWeeks, experienceLevel, model).includes(week);

    const [minIntensity, maxIntensity] = INTENSITY_RANGES[goal];
    const normalized = clamp((raw.intensity - 0.5) / 0.5, 0, 1);
    let intensity = minIntensity + normalized * (maxIntensity - minIntensity);
    let volume = raw.volume;
    if (isDeload) {
      intensity *= DELOAD_INTENSITY_FACTOR;
      volume *= DELOAD_VOLUME_FACTOR;
    }

    const params: WeekParameters = {
      week_number: week,
      intensity_percent: round3(intensity),
      volume_modifier: round3(volume),
      is_deload: isDeload,
      focus: determineFocus(intensity, isDeload, raw.effortType),
    };
    if (raw.phase !== undefined) {
      params.phase = raw.phase;
    }
    if (raw.effortType !== undefined) {
      params.effort_type = raw.effortType;
    }
    const notes = weekNotes(week, totalWeeks, isDeload, raw.phase, raw.effortType);
    if (notes !== undefined) {
      params.notes = notes;
    }
    return params;
  }

  /**
   * Parameters for weeks 1..durationWeeks. Session-varying models rotate
   * their pattern week to week.
   */
  planProgression(
    durationWeeks: number,
    goal: TrainingGoal,
    experienceLevel: ExperienceLevel,
    model?: PeriodizationModel
  ): WeekParameters[] {
    const resolved = model ?? this.selectPeriodizationModel(goal, experienceLevel, durationWeeks);
    const weeks: WeekParameters[] = [];
    for (let week = 1; week <= durationWeeks; week++) {
      weeks.push(this.getWeekParameters(week, durationWeeks, resolved, goal, experienceLevel, week));
    }
    return weeks;
  }

  getVolumeLimits(experienceLevel: ExperienceLevel): VolumeLimits {
    return { ...VOLUME_LIMITS[experienceLevel] };
  }

  private rawParameters(
    model: PeriodizationModel,
    week: number,
    totalWeeks: number,
    session: number
  ): RawParameters {
    const progress = (week - 1) / Math.max(totalWeeks - 1, 1);

    switch (model) {
      case 'linear':
        return { intensity: 0.65 + 0.3 * progress, volume: 1 - 0.3 * progress };
      case 'reverse_linear':
        return { intensity: 0.9 - 0.3 * progress, volume: 0.7 + 0.6 * progress };
      case 'undulating': {
        const pattern = UNDULATING_PATTERN[(session - 1) % UNDULATING_PATTERN.length] ?? [0.75, 1];
        const weeklyBonus = Math.min(0.02 * (week - 1), 0.1);
        return { intensity: Math.min(pattern[0] + weeklyBonus, 0.95), volume: pattern[1] };
      }
      case 'conjugate': {
        const effortType = CONJUGATE_ROTATION[(session - 1) % CONJUGATE_ROTATION.length] ?? 'max_effort';
        const [baseIntensity, volume] = CONJUGATE_PARAMETERS[effortType];
        const wave = CONJUGATE_WAVE[(week - 1) % CONJUGATE_WAVE.length] ?? 0;
        return { intensity: clamp(baseIntensity + wave, 0.5, 0.98), volume, effortType };
      }
      case 'block':
        return this.blockParameters(week, totalWeeks);
    }
  }

  private blockParameters(week: number, totalWeeks: number): RawParameters {
    const { accumulationEnd, transmutationEnd } = blockBoundaries(totalWeeks);

    if (week <= accumulationEnd) {
      const progress = accumulationEnd > 1 ? (week - 1) / (accumulationEnd - 1) : 0;
      return { intensity: 0.65 + 0.05 * progress, volume: 1.2 - 0.1 * progress, phase: 'accumulation' };
    }
    if (week <= transmutationEnd) {
      const phaseWeeks = transmutationEnd - accumulationEnd;
      const progress = phaseWeeks > 1 ? (week - accumulationEnd - 1) / (phaseWeeks - 1) : 0;
      return { intensity: 0.75 + 0.1 * progress, volume: 1 - 0.15 * progress, phase: 'transmutation' };
    }
    const phaseWeeks = totalWeeks - transmutationEnd;
    const progress = phaseWeeks > 1 ? (week - transmutationEnd - 1) / (phaseWeeks - 1) : 0;
    return { intensity: 0.88 + 0.07 * progress, volume: 0.75 - 0.15 * progress, phase: 'realization' };
  }
}
