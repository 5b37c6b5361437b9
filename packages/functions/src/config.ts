import { z } from 'zod';

const templateScoringSchema = z.object({
  base: z.number().nonnegative(),
  sessionsExact: z.number().nonnegative(),
  sessionsClose: z.number().nonnegative(),
  sessionsCloseRange: z.number().int().nonnegative(),
  durationExact: z.number().nonnegative(),
  durationClose: z.number().nonnegative(),
  durationCloseRange: z.number().int().nonnegative(),
  popularityMax: z.number().nonnegative(),
  popularityCap: z.number().positive(),
});

const exerciseScoringSchema = z.object({
  muscle: z.number().nonnegative(),
  category: z.number().nonnegative(),
  movementPattern: z.number().nonnegative(),
  preferredEquipment: z.number().nonnegative(),
  supports1rm: z.number().nonnegative(),
  compoundBonus: z.number().nonnegative(),
});

const llmSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
  cacheMaxSize: z.number().int().positive(),
  cacheTtlSeconds: z.number().positive(),
});

export const generationConfigSchema = z.object({
  templateScoring: templateScoringSchema,
  exerciseScoring: exerciseScoringSchema,
  candidateLimit: z.number().int().positive(),
  poolWidth: z.number().int().min(1).max(32),
  llm: llmSchema,
});

export type GenerationConfig = z.infer<typeof generationConfigSchema>;

export interface GenerationConfigOverrides {
  templateScoring?: Partial<GenerationConfig['templateScoring']>;
  exerciseScoring?: Partial<GenerationConfig['exerciseScoring']>;
  candidateLimit?: number;
  poolWidth?: number;
  llm?: Partial<GenerationConfig['llm']>;
}

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
  templateScoring: {
    base: 20,
    sessionsExact: 30,
    sessionsClose: 15,
    sessionsCloseRange: 1,
    durationExact: 25,
    durationClose: 10,
    durationCloseRange: 2,
    popularityMax: 15,
    popularityCap: 100,
  },
  exerciseScoring: {
    muscle: 0.4,
    category: 0.3,
    movementPattern: 0.2,
    preferredEquipment: 0.1,
    supports1rm: 0.05,
    compoundBonus: 0.05,
  },
  candidateLimit: 50,
  poolWidth: 4,
  llm: {
    model: 'gpt-4o-mini',
    temperature: 0.7,
    maxTokens: 2000,
    cacheMaxSize: 100,
    cacheTtlSeconds: 3600,
  },
};

function readEnvNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function envOverrides(env: NodeJS.ProcessEnv): GenerationConfigOverrides {
  const llm: Partial<GenerationConfig['llm']> = {};
  const model = env['PROGRAM_LLM_MODEL'];
  if (model !== undefined && model.trim() !== '') {
    llm.model = model.trim();
  }
  const cacheTtl = readEnvNumber(env, 'PROGRAM_LLM_CACHE_TTL_SECONDS');
  if (cacheTtl !== undefined) {
    llm.cacheTtlSeconds = cacheTtl;
  }

  const overrides: GenerationConfigOverrides = { llm };
  const poolWidth = readEnvNumber(env, 'PROGRAM_POOL_WIDTH');
  if (poolWidth !== undefined) {
    overrides.poolWidth = poolWidth;
  }
  const candidateLimit = readEnvNumber(env, 'PROGRAM_CANDIDATE_LIMIT');
  if (candidateLimit !== undefined) {
    overrides.candidateLimit = candidateLimit;
  }
  return overrides;
}

function merge(base: GenerationConfig, overrides: GenerationConfigOverrides): GenerationConfig {
  return {
    templateScoring: { ...base.templateScoring, ...overrides.templateScoring },
    exerciseScoring: { ...base.exerciseScoring, ...overrides.exerciseScoring },
    candidateLimit: overrides.candidateLimit ?? base.candidateLimit,
    poolWidth: overrides.poolWidth ?? base.poolWidth,
    llm: { ...base.llm, ...overrides.llm },
  };
}

/**
 * Resolve generation settings: defaults, then environment, then explicit overrides.
 * Throws a ZodError when the result is out of range.
 */
export function resolveGenerationConfig(
  overrides: GenerationConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): GenerationConfig {
  const fromEnv = merge(DEFAULT_GENERATION_CONFIG, envOverrides(env));
  return generationConfigSchema.parse(merge(fromEnv, overrides));
}
