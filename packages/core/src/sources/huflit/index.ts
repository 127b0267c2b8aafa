/**
 * HUFLIT (Ho Chi Minh City University of Foreign Languages and Information
 * Technology) source
 */

import { HttpSession } from '../http.js'
import { createSourceTables } from '../tables.js'
import type { ScheduleSource } from '../types.js'
import { HuflitAccount } from './account.js'
import { HuflitScheduleAdapter } from './adapter.js'
import { HuflitPortal } from './portal.js'
import { HUFLIT_BASE_URL, HUFLIT_TABLES } from './tables.js'

export const huflitSource: ScheduleSource = {
  id: 'huflit',
  displayName: 'HUFLIT',
  connect(credentials, options = {}) {
    const http = new HttpSession(options.baseUrl ?? HUFLIT_BASE_URL, options.fetchImpl)
    const account = new HuflitAccount(http, credentials)
    const adapter = new HuflitScheduleAdapter(
      createSourceTables(HUFLIT_TABLES, options.semesterStarts),
    )
    return { account, portal: new HuflitPortal(http, account, adapter) }
  },
}

export { HuflitAccount } from './account.js'
export { HuflitScheduleAdapter, buildWeekPattern } from './adapter.js'
export { HuflitPortal, parseTableRows, parseTermOptions } from './portal.js'
export { HUFLIT_TABLES, HUFLIT_FIELDS } from './tables.js'
