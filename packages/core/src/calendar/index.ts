/**
 * Calendar Module
 *
 * CalDAV sink plus the bridge that submits formatted class events.
 */

export type {
  RemoteCalendar,
  ClassEventPayload,
  CalendarSink,
  BridgeOptions,
  CalendarServerConfig,
  CalendarCredentials,
} from './types.js'

export {
  CalDAVCalendarSink,
  createCalDAVSink,
  generateICalEvent,
  escapeICalText,
} from './caldav-client.js'

export {
  ScheduleCalendar,
  buildEventPayload,
  colorName,
  EVENT_COLORS,
  DEFAULT_REMINDER_MINUTES,
} from './bridge.js'

export { loadCalendarCredentials } from './config.js'
