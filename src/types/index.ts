/**
 * Main type exports for loadbench
 */

export * from './trial.js';
export * from './collaborators.js';
