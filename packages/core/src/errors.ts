/**
 * Error taxonomy
 *
 * Every error here is fatal to the operation that raised it: nothing is
 * retried and no partial batch is kept.
 */

/**
 * Portal login/logout failed, or was attempted in the wrong state
 * (second login, logout while logged out).
 */
export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AuthenticationError'
  }
}

/**
 * Schedule data could not be turned into events.
 */
export class ScheduleError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ScheduleError'
  }
}

/**
 * A raw value has no entry in a source's lookup tables, or a required
 * descriptor field is missing.
 */
export class ScheduleLookupError extends ScheduleError {
  constructor(message: string) {
    super(message)
    this.name = 'ScheduleLookupError'
  }
}

/**
 * A semester/year selection that the portal does not offer.
 */
export class InvalidTermError extends Error {
  readonly validOptions: Readonly<Record<string, readonly string[]>>

  constructor(message: string, validOptions: Record<string, readonly string[]>) {
    super(`${message}. It must be one of ${formatOptions(validOptions)}`)
    this.name = 'InvalidTermError'
    this.validOptions = validOptions
  }
}

/**
 * No calendar with the given display name exists on the sink.
 */
export class CalendarNotFoundError extends Error {
  constructor(readonly calendarName: string) {
    super(`Cannot find calendar '${calendarName}'. You might need to create it first.`)
    this.name = 'CalendarNotFoundError'
  }
}

function formatOptions(options: Record<string, readonly string[]>): string {
  return Object.entries(options)
    .map(([key, values]) => `${key}: [${values.join(', ')}]`)
    .join('; ')
}
