export * from './rules.js';
export * from './validation-run.js';
export * from './validator.js';
