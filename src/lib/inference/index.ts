/**
 * Inference System
 * Main export file for module inference
 */

export * from './inference.types';
export * from './inference.strategy';
export * from './inference.manager';
export * from './module-records';
export * from './heuristics/heading-detectors';
export * from './heuristics/tier-policy';
export * from './heuristics/description';
export * from './heuristics/local-inference';
export * from './strategies';
