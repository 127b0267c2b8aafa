/**
 * SGU (Saigon University) source
 */

import { HttpSession } from '../http.js'
import { createSourceTables } from '../tables.js'
import type { ScheduleSource } from '../types.js'
import { SguAccount } from './account.js'
import { SguScheduleAdapter } from './adapter.js'
import { SguPortal } from './portal.js'
import { SGU_BASE_URL, SGU_TABLES } from './tables.js'

export const sguSource: ScheduleSource = {
  id: 'sgu',
  displayName: 'SGU',
  connect(credentials, options = {}) {
    const http = new HttpSession(options.baseUrl ?? SGU_BASE_URL, options.fetchImpl)
    const account = new SguAccount(http, credentials)
    const adapter = new SguScheduleAdapter(createSourceTables(SGU_TABLES, options.semesterStarts))
    return { account, portal: new SguPortal(http, account, adapter) }
  },
}

export { SguAccount } from './account.js'
export { SguScheduleAdapter } from './adapter.js'
export { SguPortal, parseSemesterOptions, parseTimetableRows, parseViewState } from './portal.js'
export { SGU_TABLES, SGU_FIELDS } from './tables.js'
