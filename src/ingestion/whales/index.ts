export { DataApiClient } from './data-api.js';
export type { DataApiClientOptions } from './data-api.js';
export { WhaleRegistry, DEFAULT_VETTING_CONFIG } from './registry.js';
export type { WhaleVettingConfig, DiscoveryResult } from './registry.js';
export { WhaleMonitor, DEFAULT_MONITOR_CONFIG } from './monitor.js';
export type { WhaleMonitorConfig, MonitorCycleResult, ObservationSink } from './monitor.js';
