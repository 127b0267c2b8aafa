/**
 * Calendar Types
 *
 * Interfaces between the schedule pipeline and the remote calendar store.
 */

/**
 * Calendar collection on the sink.
 */
export interface RemoteCalendar {
  /** Sink identifier (last URL segment for CalDAV) */
  id: string

  /** Human-readable name; calendars are looked up by exact match on this */
  displayName: string

  url: string
}

/**
 * One event-creation request, already mapped from a FormattedEvent.
 */
export interface ClassEventPayload {
  title: string
  location: string
  description: string

  /** Local wall-clock start, `yyyy-MM-ddTHH:mm:ss`, in `timeZone` */
  start: string

  /** Local wall-clock end of the first occurrence */
  end: string

  /** IANA zone the start/end are expressed in */
  timeZone: string

  /** RFC 5545 RRULE value, absent for single events */
  rrule?: string

  /** 1-based color id */
  colorId: number

  /** CSS3 color name for RFC 7986 COLOR */
  color: string

  /** Popup reminder before start, in minutes */
  reminderMinutes?: number
}

/**
 * Remote calendar store. Implementations perform no retries; errors
 * propagate to the caller.
 */
export interface CalendarSink {
  listCalendars(): Promise<RemoteCalendar[]>

  createCalendar(displayName: string, timeZone: string): Promise<RemoteCalendar>

  renameCalendar(calendarId: string, displayName: string): Promise<void>

  deleteCalendar(calendarId: string): Promise<void>

  /**
   * @returns The created event's UID
   */
  createEvent(calendarId: string, event: ClassEventPayload): Promise<string>
}

/**
 * Bridge options, resolved from config.yaml.
 */
export interface BridgeOptions {
  timeZone: string
  reminderMinutes?: number
}

/**
 * CalDAV server location from config.yaml.
 */
export interface CalendarServerConfig {
  host: string
  port: number
}

/**
 * Credentials for CalDAV authentication.
 * Stored in .timetable/calendar/credentials.json
 */
export interface CalendarCredentials {
  username: string
  password: string
}
