export * from './program.schema.js';
export * from './exercise-selection.schema.js';
