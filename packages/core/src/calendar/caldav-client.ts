/**
 * CalDAV Calendar Sink
 *
 * Implements CalendarSink using tsdav. Calendars are collections under
 * `<server>/<username>/<uuid>/`; each class series is one iCalendar object
 * with a weekly RRULE.
 */

import { createDAVClient, DAVNamespace, DAVNamespaceShort, type DAVCalendar } from 'tsdav'
import { DateTime } from 'luxon'
import { randomUUID } from 'node:crypto'
import type {
  CalendarCredentials,
  CalendarServerConfig,
  CalendarSink,
  ClassEventPayload,
  RemoteCalendar,
} from './types.js'

// Type for the DAV client returned by createDAVClient
type DAVClientInstance = Awaited<ReturnType<typeof createDAVClient>>

const ICAL_DATE_TIME = "yyyyMMdd'T'HHmmss"

/**
 * CalDAV-based implementation of CalendarSink
 */
export class CalDAVCalendarSink implements CalendarSink {
  private client: DAVClientInstance | null = null
  private server: CalendarServerConfig
  private credentials: CalendarCredentials
  private calendarsCache: Map<string, DAVCalendar> = new Map()
  private cacheExpiry: number = 0
  private readonly CACHE_TTL_MS = 60_000 // 60 seconds

  constructor(server: CalendarServerConfig, credentials: CalendarCredentials) {
    this.server = server
    this.credentials = credentials
  }

  private get serverUrl(): string {
    return `http://${this.server.host}:${this.server.port}`
  }

  /**
   * Get or create the DAV client connection
   */
  private async getClient(): Promise<DAVClientInstance> {
    if (this.client) {
      return this.client
    }

    this.client = await createDAVClient({
      serverUrl: this.serverUrl,
      credentials: {
        username: this.credentials.username,
        password: this.credentials.password,
      },
      authMethod: 'Basic',
      defaultAccountType: 'caldav',
    })

    return this.client
  }

  /**
   * Get DAVCalendar objects, with caching
   */
  private async getDAVCalendars(): Promise<Map<string, DAVCalendar>> {
    const now = Date.now()
    if (this.calendarsCache.size > 0 && now < this.cacheExpiry) {
      return this.calendarsCache
    }

    const client = await this.getClient()
    const davCalendars = await client.fetchCalendars()

    this.calendarsCache.clear()
    for (const cal of davCalendars) {
      this.calendarsCache.set(calendarIdFromUrl(cal.url), cal)
    }

    this.cacheExpiry = now + this.CACHE_TTL_MS
    return this.calendarsCache
  }

  private async findDAVCalendar(calendarId: string): Promise<DAVCalendar> {
    const calendars = await this.getDAVCalendars()
    const calendar = calendars.get(calendarId)
    if (!calendar) {
      throw new Error(`Calendar not found: ${calendarId}`)
    }
    return calendar
  }

  async listCalendars(): Promise<RemoteCalendar[]> {
    const davCalendars = await this.getDAVCalendars()
    const result: RemoteCalendar[] = []

    for (const [id, dav] of davCalendars) {
      // displayName can be string or object, extract string value
      const displayName = typeof dav.displayName === 'string' ? dav.displayName : id
      result.push({ id, displayName, url: dav.url })
    }

    return result
  }

  async createCalendar(displayName: string, timeZone: string): Promise<RemoteCalendar> {
    const client = await this.getClient()
    const id = randomUUID()
    const url = `${this.serverUrl}/${this.credentials.username}/${id}/`

    const responses = await client.makeCalendar({
      url,
      props: {
        displayname: displayName,
        [`${DAVNamespaceShort.CALDAV}:calendar-description`]: `Class schedule (${timeZone})`,
      },
    })
    assertAllOk(responses, `create calendar '${displayName}'`)

    this.invalidateCache()
    return { id, displayName, url }
  }

  async renameCalendar(calendarId: string, displayName: string): Promise<void> {
    const client = await this.getClient()
    const calendar = await this.findDAVCalendar(calendarId)

    const responses = await client.davRequest({
      url: calendar.url,
      init: {
        method: 'PROPPATCH',
        namespace: DAVNamespaceShort.DAV,
        body: {
          propertyupdate: {
            _attributes: { [`xmlns:${DAVNamespaceShort.DAV}`]: DAVNamespace.DAV },
            set: { prop: { displayname: displayName } },
          },
        },
      },
    })
    assertAllOk(responses, `rename calendar '${calendarId}'`)

    this.invalidateCache()
  }

  async deleteCalendar(calendarId: string): Promise<void> {
    const client = await this.getClient()
    const calendar = await this.findDAVCalendar(calendarId)

    const res = await client.deleteObject({ url: calendar.url })
    if (!res.ok) {
      throw new Error(`Failed to delete calendar '${calendarId}': ${res.status} ${res.statusText}`)
    }

    this.invalidateCache()
  }

  async createEvent(calendarId: string, event: ClassEventPayload): Promise<string> {
    const client = await this.getClient()
    const calendar = await this.findDAVCalendar(calendarId)

    const uid = `${randomUUID()}@timetable-sync`
    const res = await client.createCalendarObject({
      calendar,
      filename: `${uid}.ics`,
      iCalString: generateICalEvent(event, uid),
    })
    if (!res.ok) {
      throw new Error(`Failed to create event '${event.title}': ${res.status} ${res.statusText}`)
    }

    return uid
  }

  /**
   * Invalidate all caches
   */
  invalidateCache(): void {
    this.cacheExpiry = 0
    this.calendarsCache.clear()
  }

  /**
   * Close the client connection
   */
  close(): void {
    this.client = null
    this.invalidateCache()
  }
}

/**
 * Generate the iCalendar object for one class series.
 */
export function generateICalEvent(
  event: ClassEventPayload,
  uid: string,
  now: DateTime = DateTime.now(),
): string {
  const lines: string[] = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//timetable-sync//schedule//EN',
    'BEGIN:VEVENT',
    `UID:${uid}`,
    `DTSTAMP:${now.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'")}`,
    `DTSTART;TZID=${event.timeZone}:${formatLocal(event.start)}`,
    `DTEND;TZID=${event.timeZone}:${formatLocal(event.end)}`,
    `SUMMARY:${escapeICalText(event.title)}`,
  ]

  if (event.location) {
    lines.push(`LOCATION:${escapeICalText(event.location)}`)
  }
  if (event.description) {
    lines.push(`DESCRIPTION:${escapeICalText(event.description)}`)
  }
  if (event.rrule) {
    lines.push(`RRULE:${event.rrule}`)
  }

  lines.push(`COLOR:${event.color}`)
  lines.push(`X-TIMETABLE-COLOR-ID:${event.colorId}`)

  if (event.reminderMinutes !== undefined) {
    lines.push(
      'BEGIN:VALARM',
      'ACTION:DISPLAY',
      `DESCRIPTION:${escapeICalText(event.title)}`,
      `TRIGGER:-PT${event.reminderMinutes}M`,
      'END:VALARM',
    )
  }

  lines.push('END:VEVENT', 'END:VCALENDAR')

  return lines.join('\r\n')
}

/**
 * Escape text for iCalendar format
 */
export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\n/g, '\\n')
}

function formatLocal(value: string): string {
  return DateTime.fromISO(value, { zone: 'utc' }).toFormat(ICAL_DATE_TIME)
}

function calendarIdFromUrl(url: string): string {
  const urlParts = url.replace(/\/$/, '').split('/')
  return urlParts[urlParts.length - 1]
}

function assertAllOk(
  responses: { ok: boolean; status: number; statusText?: string }[],
  action: string,
): void {
  const failed = responses.find((res) => !res.ok)
  if (failed) {
    throw new Error(`Failed to ${action}: ${failed.status} ${failed.statusText ?? ''}`.trim())
  }
}

/**
 * Create a CalDAVCalendarSink instance
 */
export function createCalDAVSink(
  server: CalendarServerConfig,
  credentials: CalendarCredentials,
): CalDAVCalendarSink {
  return new CalDAVCalendarSink(server, credentials)
}
