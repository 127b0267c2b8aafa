/**
 * Source Schema Adapter Tests
 *
 * Raw portal rows through the lookup tables and the date calculator.
 */

import { describe, it, expect } from 'vitest'
import { SguScheduleAdapter, SGU_TABLES } from '../src/sources/sgu/index.js'
import {
  HuflitScheduleAdapter,
  HUFLIT_TABLES,
  buildWeekPattern,
} from '../src/sources/huflit/index.js'
import {
  createSourceTables,
  resolveSlotRange,
  resolveSlotTime,
  resolveWeekday,
} from '../src/sources/tables.js'
import { ScheduleLookupError } from '../src/errors.js'
import { formatEvents } from '../src/schedule/formatter.js'
import { buildEventPayload } from '../src/calendar/bridge.js'

function sguRow(overrides: Record<number, string> = {}): string[] {
  const row = [
    '841020',
    'Data Structures',
    '',
    '4',
    'DCT1201, DCT1202',
    '',
    '',
    '',
    'Hai',
    '1',
    '2',
    'C.A105',
    'Tran Van A',
    '1234567890',
  ]
  for (const [index, value] of Object.entries(overrides)) {
    row[Number(index)] = value
  }
  return row
}

function huflitRow(overrides: Record<number, string> = {}): string[] {
  const row = [
    '1',
    'DIT0010',
    'Web Programming',
    '3',
    '22DH01',
    'Ba',
    '4-7',
    'B.201',
    'Nguyen Thi B',
    '05/09/2023 - 19/12/2023',
  ]
  for (const [index, value] of Object.entries(overrides)) {
    row[Number(index)] = value
  }
  return row
}

describe('source tables', () => {
  const tables = createSourceTables(SGU_TABLES)

  it('resolves weekday tokens with surrounding whitespace', () => {
    expect(resolveWeekday(tables, ' Tư ')).toBe(2)
  })

  it('does not resolve inherited object keys', () => {
    expect(() => resolveWeekday(tables, 'toString')).toThrow("Unknown weekday 'toString'")
  })

  it('resolves slot start times', () => {
    expect(resolveSlotTime(tables, '6')).toBe('13:00:00')
    expect(() => resolveSlotTime(tables, '14')).toThrow("Unknown lesson slot '14'")
  })

  it('returns the lesson count of an exclusive slot range', () => {
    expect(resolveSlotRange(tables, '1', '3')).toBe(2)
    expect(() => resolveSlotRange(tables, '3', '3')).toThrow('Slot range 3-3 is empty')
  })

  it('merges semester overrides over the built-in anchors', () => {
    const merged = createSourceTables(SGU_TABLES, { '20241': '2024-09-09' })
    expect(merged.semesterStarts['20241']).toBe('2024-09-09')
    expect(merged.semesterStarts['20231']).toBe('2023-09-04')
    expect(SGU_TABLES.semesterStarts['20241']).toBeUndefined()
  })
})

describe('SguScheduleAdapter', () => {
  const adapter = new SguScheduleAdapter(createSourceTables(SGU_TABLES))

  it('standardizes a timetable row', () => {
    const [result] = adapter.standardize([sguRow()], { semester: '20231' })

    expect(result).toEqual({
      code: '841020',
      name: 'Data Structures',
      credits: '4',
      classSection: 'DCT1201',
      room: 'C.A105',
      lecturer: 'Tran Van A',
      weekday: 'Hai',
      startPeriod: '1',
      endPeriod: '3',
      weekPattern: '1234567890',
      fromDate: '2023-09-04T07:00:00',
      toDate: '2023-11-13T08:40:00',
    })
  })

  it('applies skipped weeks and the weekday offset', () => {
    const [result] = adapter.standardize(
      [sguRow({ 8: 'Tư', 9: '6', 10: '3', 13: '--12345678' })],
      { semester: '20231' },
    )

    expect(result.endPeriod).toBe('9')
    expect(result.fromDate).toBe('2023-09-20T13:00:00')
    expect(result.toDate).toBe('2023-11-15T15:30:00')
  })

  it('repeats a late-starting class once per remaining week', () => {
    const descriptors = adapter.standardize(
      [sguRow({ 8: 'Tư', 9: '6', 10: '3', 13: '--12345678' })],
      { semester: '20231' },
    )
    const [event] = formatEvents(descriptors).events

    expect(event.repeat).toBe(8)
    expect(event.endPeriodDate).toBe('2023-09-20T15:30:00')
    expect(buildEventPayload(event, { timeZone: 'Asia/Ho_Chi_Minh' }).rrule).toBe(
      'FREQ=WEEKLY;COUNT=8',
    )
  })

  it('fails on an unknown weekday', () => {
    expect(() => adapter.standardize([sguRow({ 8: 'CN' })], { semester: '20231' })).toThrow(
      "Unknown weekday 'CN'",
    )
  })

  it('fails when the last slot is past the slot table', () => {
    expect(() =>
      adapter.standardize([sguRow({ 9: '12', 10: '3' })], { semester: '20231' }),
    ).toThrow("Unknown lesson slot '14'")
  })

  it('fails on a semester without a start date', () => {
    expect(() => adapter.standardize([sguRow()], { semester: '20301' })).toThrow(
      ScheduleLookupError,
    )
  })

  it('uses configured semester anchors', () => {
    const configured = new SguScheduleAdapter(
      createSourceTables(SGU_TABLES, { '20241': '2024-09-09' }),
    )
    const [result] = configured.standardize([sguRow()], { semester: '20241' })
    expect(result.fromDate).toBe('2024-09-09T07:00:00')
  })

  it('fails on a truncated row', () => {
    expect(() => adapter.standardize([sguRow().slice(0, 13)], { semester: '20231' })).toThrow(
      "Missing 'weekPattern' column",
    )
  })
})

describe('HuflitScheduleAdapter', () => {
  const adapter = new HuflitScheduleAdapter(createSourceTables(HUFLIT_TABLES))
  const term = { semester: '1', year: '2023-2024' }

  it('builds the week pattern from the row date range', () => {
    const [result] = adapter.standardize([huflitRow()], term)

    expect(result).toEqual({
      code: 'DIT0010',
      name: 'Web Programming',
      credits: '3',
      classSection: '22DH01',
      room: 'B.201',
      lecturer: 'Nguyen Thi B',
      weekday: 'Ba',
      startPeriod: '4',
      endPeriod: '7',
      weekPattern: '1234567890123456',
      fromDate: '2023-09-05T09:30:00',
      toDate: '2023-12-26T12:00:00',
    })
  })

  it('fails when the range ends before the first meeting', () => {
    expect(() =>
      adapter.standardize([huflitRow({ 9: '05/09/2023 - 01/09/2023' })], term),
    ).toThrow('Date range ends before the first meeting: 05/09/2023 - 01/09/2023')
  })

  it('fails on a malformed period range', () => {
    expect(() => adapter.standardize([huflitRow({ 6: '4' })], term)).toThrow(
      "Invalid period range '4'",
    )
    expect(() => adapter.standardize([huflitRow({ 6: '7-4' })], term)).toThrow(
      'Slot range 7-4 is empty',
    )
  })

  it('fails on a malformed date range', () => {
    expect(() => adapter.standardize([huflitRow({ 9: 'TBA' })], term)).toThrow(
      "Invalid date range 'TBA'",
    )
  })
})

describe('buildWeekPattern', () => {
  it('writes one digit per week, wrapping after 9', () => {
    expect(buildWeekPattern(12)).toBe('123456789012')
    expect(buildWeekPattern(0)).toBe('')
  })
})
