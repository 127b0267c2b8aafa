// Public API for consumption by other packages

export {
  AuthenticationError,
  ScheduleError,
  ScheduleLookupError,
  InvalidTermError,
  CalendarNotFoundError,
} from './errors.js'

export { loadConfig, findConfigDir, sourceConfig } from './config.js'
export type { AppConfig, SourceConfig } from './config.js'

export * from './schedule/index.js'
export * from './sources/index.js'
export * from './calendar/index.js'

export { importSchedule, updateSchedule } from './sync/schedule-sync.js'
export type {
  SyncRequest,
  TermChooser,
  ImportOutcome,
  UpdateOutcome,
} from './sync/schedule-sync.js'
