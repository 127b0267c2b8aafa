/**
 * Recurrence & Date Calculator
 *
 * Turns a source's encoding of a class (semester anchor, weekday, slot,
 * week pattern) into the start of its first occurrence and the end of its
 * last one.
 */

import { DateTime } from 'luxon'
import { ScheduleLookupError } from '../errors.js'

/** Length of one lesson slot, in minutes */
export const LESSON_DURATION_MINUTES = 50

/** Output format for descriptor timestamps (local wall clock, no offset) */
export const LOCAL_ISO_FORMAT = "yyyy-MM-dd'T'HH:mm:ss"

export interface OccurrenceWindowInput {
  /** First day of the semester, `yyyy-MM-dd` */
  semesterStart: string
  /** Days from the source's week start (0 = first day of the week) */
  weekdayOffset: number
  /** Wall-clock start of the first slot, `HH:mm:ss` */
  startSlotTime: string
  lessonCount: number
  weekPattern: string
  lessonMinutes?: number
}

export interface OccurrenceWindow {
  fromDate: string
  toDate: string
}

/**
 * Number of leading non-digit characters, i.e. weeks the class skips
 * before its first meeting.
 */
export function countSkippedWeeks(weekPattern: string): number {
  let skipped = 0
  for (const char of weekPattern) {
    if (isDigit(char)) break
    skipped++
  }
  return skipped
}

/**
 * Weeks covered by a pattern, counted from the semester anchor. Every
 * character counts, including skip markers and separators.
 */
export function countSpanWeeks(weekPattern: string): number {
  return weekPattern.length
}

export function computeOccurrenceWindow(input: OccurrenceWindowInput): OccurrenceWindow {
  const lessonMinutes = input.lessonMinutes ?? LESSON_DURATION_MINUTES

  if (!Number.isInteger(input.weekdayOffset) || input.weekdayOffset < 0 || input.weekdayOffset > 6) {
    throw new ScheduleLookupError(`Weekday offset out of range: ${input.weekdayOffset}`)
  }
  if (!Number.isInteger(input.lessonCount) || input.lessonCount < 0) {
    throw new ScheduleLookupError(`Invalid lesson count: ${input.lessonCount}`)
  }

  // Arithmetic runs in UTC so that the wall-clock values never shift
  const anchor = DateTime.fromISO(`${input.semesterStart}T${input.startSlotTime}`, { zone: 'utc' })
  if (!anchor.isValid) {
    throw new ScheduleLookupError(
      `Invalid semester start or slot time: ${input.semesterStart} ${input.startSlotTime}`,
    )
  }

  const from = anchor.plus({
    weeks: countSkippedWeeks(input.weekPattern),
    days: input.weekdayOffset,
  })
  // The span is measured from the semester anchor, so skipped weeks fall inside it
  const to = anchor.plus({
    weeks: countSpanWeeks(input.weekPattern),
    days: input.weekdayOffset,
    minutes: input.lessonCount * lessonMinutes,
  })

  return {
    fromDate: from.toFormat(LOCAL_ISO_FORMAT),
    toDate: to.toFormat(LOCAL_ISO_FORMAT),
  }
}

/**
 * Parse a descriptor timestamp back into a DateTime on the same UTC clock
 * used by computeOccurrenceWindow.
 */
export function parseLocalTimestamp(value: string): DateTime {
  return DateTime.fromISO(value, { zone: 'utc' })
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9'
}
