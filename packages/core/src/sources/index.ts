/**
 * Source registry. Adding a school means adding its directory here; the
 * calculator and formatter stay untouched.
 */

import { huflitSource } from './huflit/index.js'
import { sguSource } from './sgu/index.js'
import type { ScheduleSource } from './types.js'

export const SOURCES: readonly ScheduleSource[] = [sguSource, huflitSource]

/**
 * Look a source up by id or display name, ignoring case.
 */
export function findSource(name: string): ScheduleSource | undefined {
  const key = name.trim().toLowerCase()
  return SOURCES.find(
    (source) => source.id === key || source.displayName.toLowerCase() === key,
  )
}

export type {
  RawRecord,
  TermOptions,
  TermSelection,
  PortalCredentials,
  PortalAccount,
  SourceAdapter,
  SchedulePortal,
  SourceOptions,
  ScheduleSource,
} from './types.js'
export type { SourceTables } from './tables.js'
export {
  createSourceTables,
  resolveWeekday,
  resolveSlotTime,
  resolveSemesterStart,
  resolveSlotRange,
} from './tables.js'
export { HttpSession } from './http.js'
export type { PortalResponse, RequestOptions } from './http.js'
export { PortalSession, withPortalSession } from './session.js'
export { sguSource } from './sgu/index.js'
export { huflitSource } from './huflit/index.js'
