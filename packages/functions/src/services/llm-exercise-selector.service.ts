/**
 * LLM Exercise Selector
 *
 * Asks OpenAI to pick exercises for one workout from a candidate list.
 * A single call is made per request with no retry; callers fall back to
 * deterministic selection on any failure.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions.js';
import { info, warn } from 'firebase-functions/logger';
import { DEFAULT_GENERATION_CONFIG, type GenerationConfig } from '../config.js';
import {
  exerciseSelectionResponseSchema,
  type ExerciseSelectionResponse,
} from '../schemas/exercise-selection.schema.js';
import { sanitizeUserInput } from '../schemas/program.schema.js';
import { ExerciseSelectionError } from '../types/errors.js';
import type {
  ExerciseSelectionProvider,
  ExerciseSelectionRequest,
} from '../types/exercise-selection.js';
import { TtlCache } from './ttl-cache.js';

export const EXERCISE_SELECTION_SYSTEM_PROMPT = `You are an expert strength and conditioning coach designing workout programs.

Select exercises from the provided list based on target muscle groups, available equipment, training goal and intensity, experience level, and any limitations or injuries.

Guidelines:
1. Compound first: start with movements that train several muscle groups.
2. Muscle balance: pair pressing with pulling and quad work with hinge work.
3. Order exercises from most to least demanding.
4. Rest periods: heavy compounds 120-180 seconds, moderate work 60-90 seconds, isolation 30-60 seconds.
5. Rep ranges: strength 1-5, hypertrophy 6-12, endurance 12-20, power 3-5 (explosive).
6. Volume by experience: beginners 3 sets per exercise, intermediates 3-4, advanced lifters 3-5.
7. Deload weeks: reduce volume by 40-50% and intensity by 10-20%.

Rules:
- Only select exercises from the provided list and use their exact exercise_id.
- Avoid exercises that stress the user's limitations.
- Respond with a single JSON object.`;

export function formatGoal(goal: string): string {
  return goal
    .split('_')
    .map((word) => `${word.charAt(0).toUpperCase()}${word.slice(1)}`)
    .join(' ');
}

/**
 * Build the user prompt. Limitations are sanitized before they reach the model.
 */
export function buildExerciseSelectionPrompt(request: ExerciseSelectionRequest): string {
  const exercises = request.available_exercises
    .map(
      (exercise) =>
        `- ${exercise.id}: ${exercise.name} (muscles: ${exercise.primary_muscles.join(', ')}, equipment: ${exercise.equipment.join(', ')})`
    )
    .join('\n');

  const limitations = request.user_limitations
    .map((limitation) => sanitizeUserInput(limitation))
    .filter((limitation) => limitation.length > 0);
  const limitationsSection =
    limitations.length > 0
      ? `**User Limitations (AVOID exercises that stress these areas):**\n- ${limitations.join('\n- ')}\n\n`
      : '';

  return `Select ${request.exercise_count} exercises for a ${request.workout_type} workout.

**Target Muscle Groups:** ${request.muscle_groups.join(', ')}

**Available Equipment:** ${request.equipment.length > 0 ? request.equipment.join(', ') : 'Bodyweight only'}

**Training Parameters:**
- Goal: ${formatGoal(request.goal)}
- Experience Level: ${formatGoal(request.experience_level)}
- Intensity: ${Math.round(request.intensity_percent * 100)}%
- Volume Modifier: ${request.volume_modifier}x
- Deload Week: ${request.is_deload ? 'Yes (reduce volume and intensity)' : 'No'}

${limitationsSection}**Available Exercises (select from these only):**
${exercises}

Return a JSON object with this structure:
{
  "exercises": [
    {
      "exercise_id": "the-exercise-id",
      "exercise_name": "Exercise Name",
      "sets": 4,
      "reps": "8-10",
      "rest_seconds": 90,
      "notes": "Keep core tight",
      "order": 1,
      "superset_group": null
    }
  ],
  "workout_notes": "Brief overview of the workout focus",
  "estimated_duration_minutes": 45
}`;
}

export function selectionCacheKey(request: ExerciseSelectionRequest): string {
  const muscles = [...request.muscle_groups].sort().join(',');
  const equipment = [...request.equipment].sort().join(',');
  return `${request.workout_type}:${muscles}:${request.exercise_count}:${equipment}:${request.goal}:${request.is_deload ? 'deload' : 'normal'}`;
}

/**
 * Parse and validate raw model output. Exercises outside the candidate list
 * are dropped; a response with nothing usable left is an error.
 */
export function parseSelectionResponse(
  raw: string,
  request: ExerciseSelectionRequest
): ExerciseSelectionResponse {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new ExerciseSelectionError('Model response is not valid JSON');
  }

  const result = exerciseSelectionResponseSchema.safeParse(data);
  if (!result.success) {
    throw new ExerciseSelectionError(
      `Model response failed schema validation: ${result.error.errors.map((e) => e.message).join('; ')}`
    );
  }

  const allowed = new Set(request.available_exercises.map((exercise) => exercise.id));
  const exercises = result.data.exercises.filter((exercise) => allowed.has(exercise.exercise_id));
  const dropped = result.data.exercises.length - exercises.length;
  if (dropped > 0) {
    warn('program-generator:llm_unknown_exercise', { dropped_count: dropped });
  }
  if (exercises.length === 0) {
    throw new ExerciseSelectionError('Model selected no exercises from the candidate list');
  }

  return { ...result.data, exercises };
}

export type LlmOptions = Partial<GenerationConfig['llm']> & { now?: () => number };

export class OpenAIExerciseSelector implements ExerciseSelectionProvider {
  private readonly client: OpenAI;
  private readonly settings: GenerationConfig['llm'];
  private readonly cache: TtlCache<ExerciseSelectionResponse>;

  constructor(apiKey: string, options: LlmOptions = {}) {
    this.client = new OpenAI({ apiKey });
    const { now, ...overrides } = options;
    this.settings = { ...DEFAULT_GENERATION_CONFIG.llm, ...overrides };
    this.cache = new TtlCache({
      maxSize: this.settings.cacheMaxSize,
      ttlMs: this.settings.cacheTtlSeconds * 1000,
      now,
    });
  }

  async selectExercises(request: ExerciseSelectionRequest): Promise<ExerciseSelectionResponse> {
    const key = selectionCacheKey(request);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      info('program-generator:llm_cache_hit', { cache_key: key });
      return cached;
    }

    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: EXERCISE_SELECTION_SYSTEM_PROMPT },
      { role: 'user', content: buildExerciseSelectionPrompt(request) },
    ];

    const start = Date.now();
    const response = await this.client.chat.completions.create({
      model: this.settings.model,
      temperature: this.settings.temperature,
      max_tokens: this.settings.maxTokens,
      response_format: { type: 'json_object' },
      messages,
    });

    const usage = response.usage;
    info('program-generator:openai_call', {
      phase: 'exercise_selection',
      elapsed_ms: Date.now() - start,
      model: this.settings.model,
      prompt_tokens: usage?.prompt_tokens,
      completion_tokens: usage?.completion_tokens,
      total_tokens: usage?.total_tokens,
    });

    const content = response.choices[0]?.message?.content ?? '';
    if (content === '') {
      throw new ExerciseSelectionError('Empty response from model');
    }

    const parsed = parseSelectionResponse(content, request);
    this.cache.set(key, parsed);
    return parsed;
  }
}
