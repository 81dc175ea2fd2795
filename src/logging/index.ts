export { ActivityLog } from './activity-log.js';
export type { ActivityEntry, ActivityLogOptions, ActivityLogEvents, LogLevel } from './activity-log.js';
