/**
 * Scheduler Module - Barrel Export
 *
 * Exports the maintenance scheduler that sweeps authentication state.
 */

export {
  MaintenanceScheduler,
  createMaintenanceScheduler,
  type MaintenanceConfig,
  type MaintenanceStatus,
  type SweepStats,
} from './maintenance-scheduler.js';
