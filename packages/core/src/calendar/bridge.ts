/**
 * Calendar Submission Bridge
 *
 * Maps formatted class events onto CalendarSink requests and exposes the
 * calendar lifecycle operations the import/update flows use. Calendars are
 * addressed by display name.
 */

import { CalendarNotFoundError } from '../errors.js'
import type { FormattedEvent } from '../schedule/types.js'
import type { BridgeOptions, CalendarSink, ClassEventPayload } from './types.js'

export const DEFAULT_REMINDER_MINUTES = 30

/**
 * CSS3 names for color ids 1..11; ids beyond wrap around.
 */
export const EVENT_COLORS = [
  'lavender',
  'darkseagreen',
  'mediumpurple',
  'lightcoral',
  'khaki',
  'coral',
  'darkturquoise',
  'gray',
  'royalblue',
  'seagreen',
  'tomato',
] as const

export function colorName(colorId: number): string {
  const index = (((colorId - 1) % EVENT_COLORS.length) + EVENT_COLORS.length) % EVENT_COLORS.length
  return EVENT_COLORS[index]
}

export function buildEventPayload(event: FormattedEvent, options: BridgeOptions): ClassEventPayload {
  const payload: ClassEventPayload = {
    title: `${event.code} ${event.name}`.trim(),
    location: event.room,
    description: `Class: ${event.classSection}\nLecturer: ${event.lecturer}`,
    start: event.startPeriodDate,
    end: event.endPeriodDate,
    timeZone: options.timeZone,
    colorId: event.color,
    color: colorName(event.color),
    reminderMinutes: options.reminderMinutes ?? DEFAULT_REMINDER_MINUTES,
  }

  // One-day entries (exams) never repeat
  if (event.repeat > 0) {
    payload.rrule = `FREQ=WEEKLY;COUNT=${event.repeat}`
  }

  return payload
}

export class ScheduleCalendar {
  private sink: CalendarSink
  private options: BridgeOptions

  constructor(sink: CalendarSink, options: BridgeOptions) {
    this.sink = sink
    this.options = options
  }

  async calendarExists(name: string): Promise<boolean> {
    const calendars = await this.sink.listCalendars()
    return calendars.some((calendar) => calendar.displayName === name)
  }

  async getCalendarId(name: string): Promise<string> {
    const calendars = await this.sink.listCalendars()
    const match = calendars.find((calendar) => calendar.displayName === name)
    if (!match) {
      throw new CalendarNotFoundError(name)
    }
    return match.id
  }

  async createCalendar(name: string): Promise<string> {
    const created = await this.sink.createCalendar(name, this.options.timeZone)
    console.log(`[Calendar] Created calendar ${created.displayName}.`)
    return created.id
  }

  async renameCalendar(name: string, newName: string): Promise<void> {
    const calendarId = await this.getCalendarId(name)
    await this.sink.renameCalendar(calendarId, newName)
    console.log(`[Calendar] Renamed calendar ${name} to ${newName}.`)
  }

  async deleteCalendar(name: string): Promise<void> {
    const calendarId = await this.getCalendarId(name)
    await this.sink.deleteCalendar(calendarId)
    console.log(`[Calendar] Deleted calendar ${name}.`)
  }

  /**
   * Create one remote event per formatted event, in order. Stops at the
   * first sink error.
   */
  async submitEvents(events: readonly FormattedEvent[], calendarName: string): Promise<string[]> {
    const calendarId = await this.getCalendarId(calendarName)
    const uids: string[] = []

    for (const event of events) {
      const payload = buildEventPayload(event, this.options)
      uids.push(await this.sink.createEvent(calendarId, payload))
      console.log(`[Calendar] Inserted ${payload.title}`)
    }

    return uids
  }
}
