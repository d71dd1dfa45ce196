/**
 * Session Module
 */

export { SupervisorSession } from './session';
export type {
  SessionOptions,
  PreflightResult,
  TickResult,
  CompleteResetResult,
  LedgerAudit,
} from './session';
