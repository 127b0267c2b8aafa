import * as cheerio from 'cheerio'
import { AuthenticationError, InvalidTermError } from '../../errors.js'
import type { NormalizedDescriptor } from '../../schedule/types.js'
import type { HttpSession } from '../http.js'
import type {
  PortalAccount,
  RawRecord,
  SchedulePortal,
  SourceAdapter,
  TermOptions,
  TermSelection,
} from '../types.js'
import { HUFLIT_SCHEDULE_API, HUFLIT_SCHEDULE_ENDPOINT } from './tables.js'

// The schedule table opens with two title rows, then two column-header rows
const TITLE_ROWS = 2
const HEADER_ROWS = 2

export class HuflitPortal implements SchedulePortal {
  constructor(
    private http: HttpSession,
    private account: PortalAccount,
    private adapter: SourceAdapter,
  ) {}

  async listTerms(): Promise<TermOptions> {
    this.requireLogin()
    const page = await this.http.get(HUFLIT_SCHEDULE_ENDPOINT)
    return parseTermOptions(page.body)
  }

  async fetchSchedule(term: TermSelection): Promise<NormalizedDescriptor[]> {
    this.requireLogin()

    const options = await this.listTerms()
    const semester = term.semester ?? ''
    const year = term.year ?? ''
    if (!options.semester.includes(semester) || !options.year.includes(year)) {
      throw new InvalidTermError('The values are invalid', options)
    }

    const res = await this.http.get(HUFLIT_SCHEDULE_API, {
      query: { YearStudy: year, TermID: semester },
    })
    const rows = parseTableRows(res.body).slice(TITLE_ROWS)

    // A lone row is the portal's "no timetable yet" notice
    if (rows.length === 1) {
      console.log(`[HUFLIT] ${rows[0].join(' ')}`)
      return []
    }

    return this.adapter.standardize(rows.slice(HEADER_ROWS), { semester, year })
  }

  private requireLogin(): void {
    if (!this.account.loggedIn) {
      throw new AuthenticationError('User is not logged in.')
    }
  }
}

export function parseTermOptions(html: string): { semester: string[]; year: string[] } {
  const $ = cheerio.load(html)
  const optionValues = (selector: string): string[] =>
    $(`${selector} option`)
      .toArray()
      .flatMap((option) => {
        const value = $(option).attr('value')
        return value ? [value] : []
      })

  return {
    semester: optionValues('select#TermID'),
    year: optionValues('select#YearStudy'),
  }
}

export function parseTableRows(html: string): RawRecord[] {
  const $ = cheerio.load(html)
  return $('tr')
    .toArray()
    .map((row) =>
      $(row)
        .find('td')
        .toArray()
        .map((td) => $(td).text().trim()),
    )
}
