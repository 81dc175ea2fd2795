export { ConvergenceDetector } from './convergence.js';
export type { ConvergenceDetectorEvents } from './convergence.js';
export { DEFAULT_CONVERGENCE_CONFIG, classifyConfidence } from './types.js';
export type { ConvergenceConfig, ConvergenceOutcome, ExecutionResult, SignalExecutor } from './types.js';
