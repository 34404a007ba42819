/**
 * @tickwise/execution - Position lifecycle per symbol
 */

export { PositionLifecycle, PositionState, computePnl } from './PositionLifecycle';
export type {
  CloseReservation,
  OpenReservation,
  PositionLifecycleOptions,
  PositionLifecycleSettings,
  ProtectiveLevels
} from './PositionLifecycle';
