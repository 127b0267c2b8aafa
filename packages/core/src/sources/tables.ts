/**
 * Source Lookup Tables
 *
 * Static per-source data the adapters resolve raw tokens through. Kept as
 * plain data so a source can be added (or a semester anchor updated from
 * config) without touching shared code.
 */

import { ScheduleLookupError } from '../errors.js'
import { LESSON_DURATION_MINUTES } from '../schedule/recurrence.js'

export interface SourceTables {
  /** Weekday token → days from the source's week start */
  weekdays: Readonly<Record<string, number>>
  /** Slot index ("1", "2", ...) → wall-clock start, `HH:mm:ss` */
  slots: Readonly<Record<string, string>>
  /** Semester id → first day of the semester, `yyyy-MM-dd` */
  semesterStarts: Readonly<Record<string, string>>
  lessonMinutes: number
}

export function createSourceTables(
  tables: Omit<SourceTables, 'lessonMinutes'> & { lessonMinutes?: number },
  semesterOverrides: Record<string, string> = {},
): SourceTables {
  return {
    weekdays: { ...tables.weekdays },
    slots: { ...tables.slots },
    semesterStarts: { ...tables.semesterStarts, ...semesterOverrides },
    lessonMinutes: tables.lessonMinutes ?? LESSON_DURATION_MINUTES,
  }
}

export function resolveWeekday(tables: SourceTables, token: string): number {
  const offset = lookup(tables.weekdays, token.trim())
  if (offset === undefined) {
    throw new ScheduleLookupError(`Unknown weekday '${token}'`)
  }
  return offset
}

export function resolveSlotTime(tables: SourceTables, slot: string): string {
  const time = lookup(tables.slots, slot.trim())
  if (time === undefined) {
    throw new ScheduleLookupError(`Unknown lesson slot '${slot}'`)
  }
  return time
}

export function resolveSemesterStart(tables: SourceTables, semester: string): string {
  const start = lookup(tables.semesterStarts, semester)
  if (start === undefined) {
    throw new ScheduleLookupError(
      `No start date known for semester '${semester}'. Add it under sources.<id>.semesterStarts in config.yaml.`,
    )
  }
  return start
}

/**
 * Validate a slot range and return its lesson count. `endPeriod` is
 * exclusive; both the first and the last occupied slot must exist.
 */
export function resolveSlotRange(tables: SourceTables, startPeriod: string, endPeriod: string): number {
  const start = parseSlotIndex(startPeriod)
  const end = parseSlotIndex(endPeriod)
  if (end <= start) {
    throw new ScheduleLookupError(`Slot range ${startPeriod}-${endPeriod} is empty`)
  }
  resolveSlotTime(tables, String(start))
  resolveSlotTime(tables, String(end - 1))
  return end - start
}

export function parseSlotIndex(value: string): number {
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new ScheduleLookupError(`Invalid lesson slot '${value}'`)
  }
  return Number(trimmed)
}

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined
}
