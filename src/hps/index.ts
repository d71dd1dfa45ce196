/**
 * Human Plant Supervisor Module
 *
 * Fatigue classification and session mode monotonicity.
 */

export { HumanPlantSupervisor, type HumanPlantSupervisorOptions } from './human-plant-supervisor';
export { foldResults, countFailures, latestTimestamp, type FoldOptions } from './otests';
export type {
  HumanPlantState,
  HumanPlantView,
  TickOutcome,
  ResetOutcome,
  PreflightOptions,
  FoldedResults,
} from './types';
