/**
 * Schedule Sync
 *
 * Import and update flows: portal session, term choice, fetch, format,
 * then calendar mutations. Formatting finishes before the calendar is
 * touched.
 */

import { ScheduleCalendar } from '../calendar/bridge.js'
import { formatEvents } from '../schedule/formatter.js'
import type { FormattedEvent } from '../schedule/types.js'
import { withPortalSession } from '../sources/session.js'
import type {
  PortalAccount,
  SchedulePortal,
  TermOptions,
  TermSelection,
} from '../sources/types.js'

/**
 * Picks one value per term list, e.g. by prompting the user.
 */
export type TermChooser = (options: TermOptions) => Promise<TermSelection>

export interface SyncRequest {
  account: PortalAccount
  portal: SchedulePortal
  calendar: ScheduleCalendar
  calendarName: string
  chooseTerm: TermChooser
}

export type ImportOutcome =
  | { status: 'exists'; calendarName: string }
  | { status: 'imported'; calendarName: string; count: number }

export type UpdateOutcome =
  | { status: 'missing'; calendarName: string }
  | { status: 'updated'; calendarName: string; count: number }

async function fetchFormatted(
  portal: SchedulePortal,
  chooseTerm: TermChooser,
): Promise<FormattedEvent[]> {
  const options = await portal.listTerms()
  const term = await chooseTerm(options)
  const descriptors = await portal.fetchSchedule(term)
  const { events } = formatEvents(descriptors)
  console.log(`[Sync] Formatted ${events.length} classes.`)
  return events
}

export async function importSchedule(request: SyncRequest): Promise<ImportOutcome> {
  const { account, portal, calendar, calendarName, chooseTerm } = request

  if (await calendar.calendarExists(calendarName)) {
    return { status: 'exists', calendarName }
  }

  return withPortalSession<ImportOutcome>(account, async () => {
    const events = await fetchFormatted(portal, chooseTerm)
    await calendar.createCalendar(calendarName)
    await calendar.submitEvents(events, calendarName)
    return { status: 'imported', calendarName, count: events.length }
  })
}

/**
 * Replace the calendar's contents with a fresh fetch. The calendar is
 * deleted and recreated under the same name.
 */
export async function updateSchedule(request: SyncRequest): Promise<UpdateOutcome> {
  const { account, portal, calendar, calendarName, chooseTerm } = request

  if (!(await calendar.calendarExists(calendarName))) {
    return { status: 'missing', calendarName }
  }

  return withPortalSession<UpdateOutcome>(account, async () => {
    const events = await fetchFormatted(portal, chooseTerm)
    await calendar.deleteCalendar(calendarName)
    await calendar.createCalendar(calendarName)
    await calendar.submitEvents(events, calendarName)
    return { status: 'updated', calendarName, count: events.length }
  })
}
