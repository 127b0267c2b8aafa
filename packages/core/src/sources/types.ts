/**
 * Source Types
 *
 * Contracts every school/portal implements: an account that can log in and
 * out, a portal that lists terms and fetches raw rows, and an adapter that
 * turns those rows into normalized descriptors.
 */

import type { NormalizedDescriptor } from '../schedule/types.js'

/**
 * A positional row of cell text, as scraped from a portal table.
 */
export type RawRecord = readonly string[]

/**
 * Term choice lists offered by a portal, e.g. `{ semesters: [...], years: [...] }`.
 */
export type TermOptions = Record<string, string[]>

/**
 * One selected value per key of TermOptions.
 */
export type TermSelection = Record<string, string>

export interface PortalCredentials {
  username: string
  password: string
}

export interface PortalAccount {
  readonly loggedIn: boolean
  /** Student name reported by the portal, when it reports one */
  readonly displayName: string
  login(): Promise<void>
  logout(): Promise<void>
}

export interface SourceAdapter<TRecord = RawRecord> {
  standardize(records: readonly TRecord[], term: TermSelection): NormalizedDescriptor[]
}

export interface SchedulePortal {
  listTerms(): Promise<TermOptions>
  /**
   * Fetch and normalize the schedule for a term. An empty schedule yields
   * an empty array.
   */
  fetchSchedule(term: TermSelection): Promise<NormalizedDescriptor[]>
}

export interface SourceOptions {
  baseUrl?: string
  semesterStarts?: Record<string, string>
  fetchImpl?: typeof fetch
}

/**
 * Registry entry for a school.
 */
export interface ScheduleSource {
  id: string
  displayName: string
  connect(
    credentials: PortalCredentials,
    options?: SourceOptions,
  ): { account: PortalAccount; portal: SchedulePortal }
}
