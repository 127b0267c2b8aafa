import { ScheduleLookupError } from '../../errors.js'
import { computeOccurrenceWindow } from '../../schedule/recurrence.js'
import type { NormalizedDescriptor } from '../../schedule/types.js'
import {
  parseSlotIndex,
  resolveSemesterStart,
  resolveSlotRange,
  resolveSlotTime,
  resolveWeekday,
  type SourceTables,
} from '../tables.js'
import type { RawRecord, SourceAdapter, TermSelection } from '../types.js'
import { SGU_FIELDS } from './tables.js'

/**
 * SGU timetable rows → descriptors. The week pattern column carries one
 * character per semester week; leading non-digits are weeks before the
 * class starts.
 */
export class SguScheduleAdapter implements SourceAdapter {
  constructor(private tables: SourceTables) {}

  standardize(records: readonly RawRecord[], term: TermSelection): NormalizedDescriptor[] {
    const semester = term.semester ?? ''
    const semesterStart = resolveSemesterStart(this.tables, semester)

    return records.map((record) => this.standardizeRecord(record, semesterStart))
  }

  private standardizeRecord(record: RawRecord, semesterStart: string): NormalizedDescriptor {
    const weekday = requireCell(record, 'weekday')
    const startPeriod = requireCell(record, 'startPeriod')
    const lessonCount = parseSlotIndex(requireCell(record, 'lessonCount'))
    const weekPattern = requireCell(record, 'weekPattern')
    const endPeriod = String(parseSlotIndex(startPeriod) + lessonCount)

    resolveSlotRange(this.tables, startPeriod, endPeriod)

    const { fromDate, toDate } = computeOccurrenceWindow({
      semesterStart,
      weekdayOffset: resolveWeekday(this.tables, weekday),
      startSlotTime: resolveSlotTime(this.tables, startPeriod),
      lessonCount,
      weekPattern,
      lessonMinutes: this.tables.lessonMinutes,
    })

    return {
      code: cell(record, 'code'),
      name: cell(record, 'name') ?? '',
      credits: cell(record, 'credits'),
      // "DCT1201, DCT1202": the first class is the one the student attends
      classSection: cell(record, 'classSection')?.split(', ')[0],
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

type SguField = keyof typeof SGU_FIELDS

function cell(record: RawRecord, field: SguField): string | undefined {
  const index = SGU_FIELDS[field]
  return index < record.length ? record[index] : undefined
}

function requireCell(record: RawRecord, field: SguField): string {
  const value = cell(record, field)
  if (value === undefined) {
    throw new ScheduleLookupError(`Missing '${field}' column in timetable row: ${record.join(' | ')}`)
  }
  return value
}
