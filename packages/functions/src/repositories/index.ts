import type { Firestore } from 'firebase-admin/firestore';
import { ExerciseRepository } from './exercise.repository.js';
import { ProgramRepository } from './program.repository.js';
import { ProgramTemplateRepository } from './program-template.repository.js';

export { BaseRepository } from './base.repository.js';
export { ExerciseRepository, rankSimilarExercises, searchCatalog } from './exercise.repository.js';
export { ProgramRepository, MAX_BATCH_WRITES } from './program.repository.js';
export {
  ProgramTemplateRepository,
  parseTemplateStructure,
  type CreateProgramTemplateDTO,
} from './program-template.repository.js';

export interface Repositories {
  program: ProgramRepository;
  template: ProgramTemplateRepository;
  exercise: ExerciseRepository;
}

export function createRepositories(db: Firestore): Repositories {
  return {
    program: new ProgramRepository(db),
    template: new ProgramTemplateRepository(db),
    exercise: new ExerciseRepository(db),
  };
}
