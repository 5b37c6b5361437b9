/**
 * Program Validator
 *
 * Safety and quality checks run on a generated program before it is saved.
 * Equipment and uniqueness problems are errors; volume, balance and
 * limitation findings are warnings surfaced to the user.
 */

import type { ValidationIssue, ValidationResult } from '../types/program.js';
import { BODYWEIGHT, canonicalItem, isEquipmentSatisfied, normalizeEquipment } from './equipment.js';

export interface ValidatableExercise {
  exercise_id: string;
  exercise_name: string;
  sets: number;
  primary_muscles: readonly string[];
  equipment: readonly string[];
}

export interface ValidatableWorkout {
  name: string;
  exercises: readonly ValidatableExercise[];
}

export interface ValidatableWeek {
  week_number: number;
  is_deload: boolean;
  workouts: readonly ValidatableWorkout[];
}

interface SetBounds {
  min_sets: number;
  max_sets: number;
}

const VALIDATION_VOLUME_LIMITS: Record<string, SetBounds> = {
  beginner: { min_sets: 8, max_sets: 12 },
  intermediate: { min_sets: 12, max_sets: 18 },
  advanced: { min_sets: 16, max_sets: 25 },
  elite: { min_sets: 20, max_sets: 30 },
};

const DEFAULT_VOLUME_LIMITS: SetBounds = { min_sets: 10, max_sets: 20 };

export const MAJOR_MUSCLES = ['chest', 'lats', 'quadriceps', 'hamstrings', 'glutes', 'anterior_deltoid'];

interface BalancePair {
  label: string;
  first: { name: string; muscles: readonly string[] };
  second: { name: string; muscles: readonly string[] };
}

const BALANCE_PAIRS: readonly BalancePair[] = [
  {
    label: 'push/pull',
    first: { name: 'push', muscles: ['chest', 'anterior_deltoid'] },
    second: { name: 'pull', muscles: ['lats', 'rhomboids', 'rear_deltoid'] },
  },
  {
    label: 'quadriceps/posterior chain',
    first: { name: 'quadriceps', muscles: ['quadriceps'] },
    second: { name: 'hamstrings and glutes', muscles: ['hamstrings', 'glutes'] },
  },
  {
    label: 'biceps/triceps',
    first: { name: 'biceps', muscles: ['biceps'] },
    second: { name: 'triceps', muscles: ['triceps'] },
  },
];

const MAX_BALANCE_RATIO = 1.5;

export const LIMITATION_MUSCLE_MAP: Record<string, readonly string[]> = {
  shoulder: ['anterior_deltoid', 'rear_deltoid', 'lateral_deltoid'],
  back: ['lats', 'rhomboids', 'erector_spinae', 'lower_back'],
  knee: ['quadriceps', 'hamstrings'],
  hip: ['hip_flexors', 'glutes', 'adductors'],
  wrist: ['forearms'],
  elbow: ['biceps', 'triceps', 'forearms'],
  ankle: ['calves', 'tibialis'],
};

function musclesToAvoid(limitations: readonly string[]): Set<string> {
  const avoid = new Set<string>();
  for (const limitation of limitations) {
    const lowered = limitation.toLowerCase();
    for (const [keyword, muscles] of Object.entries(LIMITATION_MUSCLE_MAP)) {
      if (lowered.includes(keyword)) {
        muscles.forEach((muscle) => avoid.add(muscle));
      }
    }
  }
  return avoid;
}

function weeklySets(week: ValidatableWeek): Map<string, number> {
  const totals = new Map<string, number>();
  for (const workout of week.workouts) {
    for (const exercise of workout.exercises) {
      for (const muscle of exercise.primary_muscles) {
        totals.set(muscle, (totals.get(muscle) ?? 0) + exercise.sets);
      }
    }
  }
  return totals;
}

function sumSets(totals: Map<string, number>, muscles: readonly string[]): number {
  return muscles.reduce((sum, muscle) => sum + (totals.get(muscle) ?? 0), 0);
}

function countBySeverity(issues: ValidationIssue[], severity: ValidationIssue['severity']): number {
  return issues.filter((issue) => issue.severity === severity).length;
}

export class ProgramValidator {
  validateProgram(
    weeks: readonly ValidatableWeek[],
    availableEquipment: readonly string[],
    experienceLevel: string,
    limitations: readonly string[] = []
  ): ValidationResult {
    const issues: ValidationIssue[] = [
      ...this.checkEquipment(weeks, availableEquipment),
      ...this.checkVolume(weeks, experienceLevel),
      ...this.checkUniqueness(weeks),
      ...this.checkBalance(weeks),
      ...this.checkLimitations(weeks, limitations),
    ];

    const errorCount = countBySeverity(issues, 'error');
    const warningCount = countBySeverity(issues, 'warning');
    const isValid = errorCount === 0;

    let summary: string;
    if (issues.length === 0) {
      summary = 'Program validated successfully with no issues.';
    } else if (isValid) {
      summary = `Program valid with ${warningCount} warning(s).`;
    } else {
      summary = `Program invalid: ${errorCount} error(s), ${warningCount} warning(s).`;
    }

    return { is_valid: isValid, issues, summary };
  }

  /**
   * Equipment, uniqueness and limitation checks for a single workout.
   */
  validateWorkout(
    workout: ValidatableWorkout,
    availableEquipment: readonly string[],
    limitations: readonly string[] = []
  ): ValidationResult {
    const weeks: ValidatableWeek[] = [{ week_number: 1, is_deload: false, workouts: [workout] }];
    const issues = [
      ...this.checkEquipment(weeks, availableEquipment),
      ...this.checkUniqueness(weeks),
      ...this.checkLimitations(weeks, limitations),
    ];
    const isValid = countBySeverity(issues, 'error') === 0;
    return {
      is_valid: isValid,
      issues,
      summary: `Workout ${isValid ? 'valid' : 'invalid'}: ${issues.length} issue(s)`,
    };
  }

  private checkEquipment(
    weeks: readonly ValidatableWeek[],
    availableEquipment: readonly string[]
  ): ValidationIssue[] {
    const available = normalizeEquipment(availableEquipment);
    const issues: ValidationIssue[] = [];

    for (const week of weeks) {
      for (const workout of week.workouts) {
        for (const exercise of workout.exercises) {
          if (isEquipmentSatisfied(exercise.equipment, available)) {
            continue;
          }
          const missing = exercise.equipment
            .map(canonicalItem)
            .filter((item) => item !== '' && item !== BODYWEIGHT && !available.has(item));
          issues.push({
            severity: 'error',
            category: 'equipment',
            message: `Exercise '${exercise.exercise_name}' requires unavailable equipment: ${missing.join(', ')}`,
            location: `Week ${week.week_number}, ${workout.name}`,
            suggestion: 'Replace with an exercise using the available equipment',
          });
        }
      }
    }
    return issues;
  }

  private checkVolume(weeks: readonly ValidatableWeek[], experienceLevel: string): ValidationIssue[] {
    const limits = VALIDATION_VOLUME_LIMITS[experienceLevel] ?? DEFAULT_VOLUME_LIMITS;
    const issues: ValidationIssue[] = [];

    for (const week of weeks) {
      const totals = weeklySets(week);
      const minSets = week.is_deload ? Math.floor(limits.min_sets / 2) : limits.min_sets;
      const maxSets = week.is_deload ? Math.floor(limits.max_sets / 2) : limits.max_sets;

      for (const muscle of MAJOR_MUSCLES) {
        const sets = totals.get(muscle) ?? 0;
        if (sets > 0 && sets < minSets) {
          issues.push({
            severity: 'warning',
            category: 'volume',
            message: `Low volume for ${muscle}: ${sets} sets (minimum: ${minSets})`,
            location: `Week ${week.week_number}`,
            suggestion: `Consider adding more ${muscle} exercises`,
          });
        } else if (sets > maxSets) {
          issues.push({
            severity: 'warning',
            category: 'volume',
            message: `High volume for ${muscle}: ${sets} sets (maximum: ${maxSets})`,
            location: `Week ${week.week_number}`,
            suggestion: `Consider reducing ${muscle} volume to prevent overtraining`,
          });
        }
      }
    }
    return issues;
  }

  private checkUniqueness(weeks: readonly ValidatableWeek[]): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const week of weeks) {
      for (const workout of week.workouts) {
        const seen = new Set<string>();
        for (const exercise of workout.exercises) {
          if (seen.has(exercise.exercise_id)) {
            issues.push({
              severity: 'error',
              category: 'uniqueness',
              message: `Duplicate exercise '${exercise.exercise_name}' in same workout`,
              location: `Week ${week.week_number}, ${workout.name}`,
              suggestion: 'Replace the duplicate with a different exercise',
            });
          }
          seen.add(exercise.exercise_id);
        }
      }
    }
    return issues;
  }

  private checkBalance(weeks: readonly ValidatableWeek[]): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const week of weeks) {
      const totals = weeklySets(week);
      for (const pair of BALANCE_PAIRS) {
        const firstTotal = sumSets(totals, pair.first.muscles);
        const secondTotal = sumSets(totals, pair.second.muscles);
        if (firstTotal === 0 || secondTotal === 0) {
          continue;
        }
        const ratio = Math.max(firstTotal, secondTotal) / Math.min(firstTotal, secondTotal);
        if (ratio > MAX_BALANCE_RATIO) {
          const weaker = firstTotal > secondTotal ? pair.second.name : pair.first.name;
          issues.push({
            severity: 'warning',
            category: 'balance',
            message: `Muscle imbalance (${pair.label}): ${firstTotal} ${pair.first.name} sets vs ${secondTotal} ${pair.second.name} sets`,
            location: `Week ${week.week_number}`,
            suggestion: `Consider adding more ${weaker} exercises`,
          });
        }
      }
    }
    return issues;
  }

  private checkLimitations(
    weeks: readonly ValidatableWeek[],
    limitations: readonly string[]
  ): ValidationIssue[] {
    const avoid = musclesToAvoid(limitations);
    if (avoid.size === 0) {
      return [];
    }

    const issues: ValidationIssue[] = [];
    for (const week of weeks) {
      for (const workout of week.workouts) {
        for (const exercise of workout.exercises) {
          const affected = exercise.primary_muscles.filter((muscle) => avoid.has(muscle));
          if (affected.length > 0) {
            issues.push({
              severity: 'warning',
              category: 'limitation',
              message: `Exercise '${exercise.exercise_name}' may aggravate limitation: targets ${affected.join(', ')}`,
              location: `Week ${week.week_number}, ${workout.name}`,
              suggestion: 'Consider replacing with a safer alternative',
            });
          }
        }
      }
    }
    return issues;
  }
}
