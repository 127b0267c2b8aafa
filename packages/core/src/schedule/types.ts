/**
 * Schedule Types
 *
 * Source-agnostic records that flow from the source adapters through the
 * formatter into the calendar bridge.
 */

/**
 * One class meeting series, normalized from a source's raw record.
 * Dates are local wall-clock ISO timestamps without an offset
 * (`yyyy-MM-ddTHH:mm:ss`); the calendar bridge applies the configured zone.
 */
export interface NormalizedDescriptor {
  /** Course code, e.g. "841020" */
  code?: string

  /** Subject name (required) */
  name: string

  credits?: string

  /** Class/section identifier */
  classSection?: string

  /** Room (required) */
  room: string

  lecturer?: string

  /** Source-native weekday token, e.g. "Hai" */
  weekday: string

  /** First slot, 1-based */
  startPeriod: string

  /** Slot after the last lesson (exclusive) */
  endPeriod: string

  /** Week pattern the dates were computed from */
  weekPattern: string

  /** Start of the first occurrence */
  fromDate: string

  /** End of the last occurrence */
  toDate: string
}

/**
 * Calendar-ready event. Produced frozen by the formatter.
 */
export interface FormattedEvent extends Readonly<Required<NormalizedDescriptor>> {
  /** Weekly recurrence count; 0 means a single occurrence */
  readonly repeat: number
  readonly startPeriodDate: string
  /** Date of `startPeriodDate` with the time of day of `toDate` */
  readonly endPeriodDate: string
  /** 1-based color id, stable per subject name within one batch */
  readonly color: number
}

/**
 * Subject name → color id, in first-seen order.
 */
export type SubjectColorMap = Map<string, number>

export interface FormattedBatch {
  events: FormattedEvent[]
  colors: SubjectColorMap
}
