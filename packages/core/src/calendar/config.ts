/**
 * Calendar Credentials Loader
 *
 * Loads CalDAV credentials from .timetable/calendar/credentials.json
 */

import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { z } from 'zod'
import { findConfigDir } from '../config.js'
import type { CalendarCredentials } from './types.js'

const credentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
})

/**
 * Load CalDAV credentials from credentials.json
 */
export function loadCalendarCredentials(configDir?: string): CalendarCredentials | null {
  const dir = configDir ?? process.env.TIMETABLE_DIR ?? findConfigDir()
  const credentialsPath = path.join(dir, 'calendar', 'credentials.json')

  if (!existsSync(credentialsPath)) {
    console.warn(`Calendar credentials not found at ${credentialsPath}.`)
    return null
  }

  try {
    const parsed = credentialsSchema.safeParse(JSON.parse(readFileSync(credentialsPath, 'utf-8')))
    if (!parsed.success) {
      console.warn(`Invalid credentials file at ${credentialsPath}: missing username or password.`)
      return null
    }
    return parsed.data
  } catch (err) {
    console.warn(
      `Could not load calendar credentials: ${err instanceof Error ? err.message : String(err)}`,
    )
    return null
  }
}
