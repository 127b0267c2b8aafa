import { DateTime } from 'luxon'
import { ScheduleLookupError } from '../../errors.js'
import { computeOccurrenceWindow } from '../../schedule/recurrence.js'
import type { NormalizedDescriptor } from '../../schedule/types.js'
import { resolveSlotRange, resolveSlotTime, resolveWeekday, type SourceTables } from '../tables.js'
import type { RawRecord, SourceAdapter, TermSelection } from '../types.js'
import { HUFLIT_FIELDS } from './tables.js'

const DATE_RANGE = /(\d{1,2}\/\d{1,2}\/\d{4})\s*-\s*(\d{1,2}\/\d{1,2}\/\d{4})/
const PORTAL_DATE_FORMAT = 'd/M/yyyy'

/**
 * HUFLIT rows carry their own first/last meeting dates instead of a
 * semester-relative week pattern. The adapter anchors on the Monday of the
 * first date's week and builds a pattern of one digit per week running to
 * the week after the last date.
 */
export class HuflitScheduleAdapter implements SourceAdapter {
  constructor(private tables: SourceTables) {}

  standardize(records: readonly RawRecord[], _term: TermSelection): NormalizedDescriptor[] {
    return records.map((record) => this.standardizeRecord(record))
  }

  private standardizeRecord(record: RawRecord): NormalizedDescriptor {
    const weekday = requireCell(record, 'weekday')
    const [startPeriod, endPeriod] = splitPeriods(requireCell(record, 'periods'))
    const lessonCount = resolveSlotRange(this.tables, startPeriod, endPeriod)
    const weekdayOffset = resolveWeekday(this.tables, weekday)

    const [firstDate, lastDate] = parseDateRange(requireCell(record, 'dateRange'))
    const weekStart = firstDate.startOf('week')
    const firstMeeting = weekStart.plus({ days: weekdayOffset })
    if (lastDate.toMillis() < firstMeeting.toMillis()) {
      throw new ScheduleLookupError(
        `Date range ends before the first meeting: ${requireCell(record, 'dateRange')}`,
      )
    }
    const weeks = Math.floor(lastDate.diff(firstMeeting, 'days').days / 7) + 1
    const weekPattern = buildWeekPattern(weeks)

    const { fromDate, toDate } = computeOccurrenceWindow({
      semesterStart: weekStart.toFormat('yyyy-MM-dd'),
      weekdayOffset,
      startSlotTime: resolveSlotTime(this.tables, startPeriod),
      lessonCount,
      weekPattern,
      lessonMinutes: this.tables.lessonMinutes,
    })

    return {
      code: cell(record, 'code'),
      name: cell(record, 'name') ?? '',
      credits: cell(record, 'credits'),
      classSection: cell(record, 'classSection'),
      room: cell(record, 'room') ?? '',
      lecturer: cell(record, 'lecturer'),
      weekday,
      startPeriod,
      endPeriod,
      weekPattern,
      fromDate,
      toDate,
    }
  }
}

/**
 * "123456789012..." with one character per week.
 */
export function buildWeekPattern(weeks: number): string {
  return Array.from({ length: weeks }, (_, i) => String((i + 1) % 10)).join('')
}

function splitPeriods(value: string): [string, string] {
  const parts = value.split('-').map((part) => part.trim())
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ScheduleLookupError(`Invalid period range '${value}'`)
  }
  return [parts[0], parts[1]]
}

function parseDateRange(value: string): [DateTime, DateTime] {
  const match = DATE_RANGE.exec(value)
  if (!match) {
    throw new ScheduleLookupError(`Invalid date range '${value}'`)
  }

  const first = DateTime.fromFormat(match[1], PORTAL_DATE_FORMAT, { zone: 'utc' })
  const last = DateTime.fromFormat(match[2], PORTAL_DATE_FORMAT, { zone: 'utc' })
  if (!first.isValid || !last.isValid) {
    throw new ScheduleLookupError(`Invalid date range '${value}'`)
  }
  return [first, last]
}

type HuflitField = keyof typeof HUFLIT_FIELDS

function cell(record: RawRecord, field: HuflitField): string | undefined {
  const index = HUFLIT_FIELDS[field]
  return index < record.length ? record[index] : undefined
}

function requireCell(record: RawRecord, field: HuflitField): string {
  const value = cell(record, field)
  if (value === undefined) {
    throw new ScheduleLookupError(`Missing '${field}' column in timetable row: ${record.join(' | ')}`)
  }
  return value
}
