/**
 * Schedule normalization pipeline: date calculator and batch formatter.
 */

export type {
  NormalizedDescriptor,
  FormattedEvent,
  FormattedBatch,
  SubjectColorMap,
} from './types.js'

export {
  computeOccurrenceWindow,
  countSkippedWeeks,
  countSpanWeeks,
  parseLocalTimestamp,
  LESSON_DURATION_MINUTES,
  LOCAL_ISO_FORMAT,
} from './recurrence.js'
export type { OccurrenceWindow, OccurrenceWindowInput } from './recurrence.js'

export { formatEvents, assignColor, computeRepeat, computeEndPeriodDate } from './formatter.js'
export type { FormatOptions } from './formatter.js'
