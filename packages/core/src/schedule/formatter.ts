/**
 * Event Formatter
 *
 * Batch step between the source adapters and the calendar bridge:
 * validates descriptors, derives the weekly repeat count and daily end
 * time, and hands out one color per subject.
 */

import { ScheduleError, ScheduleLookupError } from '../errors.js'
import { LOCAL_ISO_FORMAT, parseLocalTimestamp } from './recurrence.js'
import type {
  FormattedBatch,
  FormattedEvent,
  NormalizedDescriptor,
  SubjectColorMap,
} from './types.js'

const REQUIRED_FIELDS = ['name', 'room'] as const
const OPTIONAL_FIELDS = ['code', 'classSection', 'lecturer'] as const

export interface FormatOptions {
  /**
   * Color map to continue from. A new one is created when omitted; either
   * way the map used is returned with the batch.
   */
  colors?: SubjectColorMap
}

/**
 * Format a whole batch. Any missing required field fails the batch before
 * a single event is produced.
 */
export function formatEvents(
  descriptors: readonly NormalizedDescriptor[],
  options: FormatOptions = {},
): FormattedBatch {
  for (const [index, descriptor] of descriptors.entries()) {
    for (const field of REQUIRED_FIELDS) {
      if (!descriptor[field]) {
        throw new ScheduleLookupError(`Missing '${field}' field (record ${index + 1}).`)
      }
    }
  }

  const colors: SubjectColorMap = options.colors ?? new Map()
  const events = descriptors.map((descriptor) => formatEvent(descriptor, colors))

  return { events, colors }
}

/**
 * Color for a subject, assigning the next id on first sight.
 */
export function assignColor(colors: SubjectColorMap, name: string): number {
  const existing = colors.get(name)
  if (existing !== undefined) return existing

  const color = colors.size + 1
  colors.set(name, color)
  return color
}

/**
 * Whole weeks between two descriptor timestamps, rounded down.
 */
export function computeRepeat(fromDate: string, toDate: string): number {
  const from = parseLocalTimestamp(fromDate)
  const to = parseLocalTimestamp(toDate)
  if (!from.isValid || !to.isValid) {
    throw new ScheduleLookupError(`Invalid date range: ${fromDate} → ${toDate}`)
  }

  const repeat = Math.floor(to.diff(from, 'days').days / 7)
  if (repeat < 0) {
    throw new ScheduleError(`Event ends before it starts: ${fromDate} → ${toDate}`)
  }
  return repeat
}

/**
 * Same calendar date as `fromDate`, time of day taken from `toDate`.
 */
export function computeEndPeriodDate(fromDate: string, toDate: string): string {
  const from = parseLocalTimestamp(fromDate)
  const to = parseLocalTimestamp(toDate)

  return from
    .set({ hour: to.hour, minute: to.minute, second: to.second, millisecond: 0 })
    .toFormat(LOCAL_ISO_FORMAT)
}

function formatEvent(descriptor: NormalizedDescriptor, colors: SubjectColorMap): FormattedEvent {
  const filled = { ...descriptor }
  for (const field of OPTIONAL_FIELDS) {
    if (filled[field] === undefined) {
      console.warn(
        `[Formatter] Warning: Missing '${field}' field of '${descriptor.name}'. This field will be blank.`,
      )
      filled[field] = ''
    }
  }

  const repeat = computeRepeat(descriptor.fromDate, descriptor.toDate)

  return Object.freeze({
    code: filled.code ?? '',
    name: filled.name,
    credits: filled.credits ?? '',
    classSection: filled.classSection ?? '',
    room: filled.room,
    lecturer: filled.lecturer ?? '',
    weekday: filled.weekday,
    startPeriod: filled.startPeriod,
    endPeriod: filled.endPeriod,
    weekPattern: filled.weekPattern,
    fromDate: filled.fromDate,
    toDate: filled.toDate,
    repeat,
    startPeriodDate: filled.fromDate,
    endPeriodDate: computeEndPeriodDate(filled.fromDate, filled.toDate),
    color: assignColor(colors, filled.name),
  })
}
