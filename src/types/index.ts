/**
 * Main type exports for mlfq-sim
 */

export * from './scheduling.js';
