export { PositionMonitor } from './position-monitor';
export type { PositionMonitorConfig } from './position-monitor';
export { MonitorRegistry, defaultAlias } from './trader-registry';
export {
  DEFAULT_SIZE_EPSILON,
  compareEvents,
  createSnapshot,
  diffSnapshots,
  getPositionKey,
} from './position-diff-detector';
export type { DiffOptions, PositionInput } from './position-diff-detector';
