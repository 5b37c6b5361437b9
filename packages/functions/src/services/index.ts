import type { Firestore } from 'firebase-admin/firestore';
import { resolveGenerationConfig, type GenerationConfig } from '../config.js';
import { getFirestoreDb } from '../firebase.js';
import { createRepositories } from '../repositories/index.js';
import { OpenAIExerciseSelector } from './llm-exercise-selector.service.js';
import { ProgramGenerator } from './program-generator.service.js';

export { ProgramGenerator } from './program-generator.service.js';
export { TemplateSelector } from './template-selector.service.js';
export { PeriodizationService } from './periodization.service.js';
export { ExerciseSelector, PlaceholderIdGenerator } from './exercise-selector.service.js';
export { ProgramValidator } from './program-validator.service.js';
export { OpenAIExerciseSelector } from './llm-exercise-selector.service.js';
export { BoundedExecutor } from './bounded-executor.js';
export type { ProgramGeneratorDeps } from './program-generator.service.js';

// Singleton for use with the default database
let programGenerator: ProgramGenerator | null = null;

// Reset service singletons (for testing)
export function resetServices(): void {
  programGenerator = null;
}

/**
 * Build a generator over the Firestore collaborators. Without an API key
 * exercises are chosen by the rule-based selector only.
 */
export function createProgramGenerator(
  db: Firestore,
  config: GenerationConfig = resolveGenerationConfig(),
  openaiApiKey?: string
): ProgramGenerator {
  const repos = createRepositories(db);
  const provider =
    openaiApiKey !== undefined && openaiApiKey !== ''
      ? new OpenAIExerciseSelector(openaiApiKey, config.llm)
      : null;
  return new ProgramGenerator({
    programStore: repos.program,
    templateLookup: repos.template,
    exerciseLookup: repos.exercise,
    exerciseSelectionProvider: provider,
    config,
  });
}

export function getProgramGenerator(openaiApiKey?: string): ProgramGenerator {
  if (!programGenerator) {
    programGenerator = createProgramGenerator(getFirestoreDb(), resolveGenerationConfig(), openaiApiKey);
  }
  return programGenerator;
}
