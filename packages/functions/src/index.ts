import { onRequest, type HttpsFunction, type HttpsOptions } from 'firebase-functions/v2/https';
import { defineSecret } from 'firebase-functions/params';
import { initializeFirebase } from './firebase.js';

// Initialize Firebase at cold start
initializeFirebase();

// Import handler apps
import { programsApp } from './handlers/programs.js';

// Secrets
const openaiApiKey = defineSecret('OPENAI_API_KEY');

// Common options
const defaultOptions: HttpsOptions = {
  region: 'us-central1',
  cors: true,
  invoker: 'public',
};

// Generation makes one model call per workout, so it gets a longer timeout.
const withOpenAiOptions: HttpsOptions = {
  ...defaultOptions,
  secrets: [openaiApiKey],
  timeoutSeconds: 300,
  memory: '512MiB',
};

/** Register a dev/prod function pair from an Express app. */
function register(
  app: import('express').Application,
  options: HttpsOptions = defaultOptions
): { dev: HttpsFunction; prod: HttpsFunction } {
  return {
    dev: onRequest(options, app),
    prod: onRequest(options, app),
  };
}

// ============ Function Registration ============
const { dev: devPrograms, prod: prodPrograms } = register(programsApp, withOpenAiOptions);

export { devPrograms, prodPrograms };

export { ProgramGenerator, createProgramGenerator } from './services/index.js';
export { resolveGenerationConfig, DEFAULT_GENERATION_CONFIG } from './config.js';
export type { GenerationConfig } from './config.js';
export * from './types/program.js';
export type { ProgramStore, TemplateLookup, ExerciseLookup, ExerciseSearchCriteria } from './types/repository.js';
export type { ExerciseSelectionProvider, ExerciseSelectionRequest } from './types/exercise-selection.js';
