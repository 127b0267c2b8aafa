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
import { SGU_SCHEDULE_ENDPOINT } from './tables.js'

const SEMESTER_SELECT = '#ctl00_ContentPlaceHolder1_ctl00_ddlChonNHHK'
const TIMETABLE_ROW = 'tr[height="22px"]'

export class SguPortal implements SchedulePortal {
  constructor(
    private http: HttpSession,
    private account: PortalAccount,
    private adapter: SourceAdapter,
  ) {}

  async listTerms(): Promise<TermOptions> {
    this.requireLogin()
    const page = await this.http.get(SGU_SCHEDULE_ENDPOINT)
    return { semester: parseSemesterOptions(page.body) }
  }

  async fetchSchedule(term: TermSelection): Promise<NormalizedDescriptor[]> {
    this.requireLogin()

    const page = await this.http.get(SGU_SCHEDULE_ENDPOINT)
    const semesters = parseSemesterOptions(page.body)
    const semester = pickSemester(term.semester ?? '', semesters)

    const res = await this.http.post(SGU_SCHEDULE_ENDPOINT, {
      form: {
        __EVENTTARGET: 'ctl00$ContentPlaceHolder1$ctl00$rad_ThuTiet',
        __EVENTARGUMENT: '',
        __LASTFOCUS: '',
        __VIEWSTATE: parseViewState(page.body) ?? '',
        ctl00$ContentPlaceHolder1$ctl00$ddlChonNHHK: semester,
        ctl00$ContentPlaceHolder1$ctl00$ddlLoai: '1',
        ctl00$ContentPlaceHolder1$ctl00$rad_ThuTiet: 'rad_ThuTiet',
        ctl00$ContentPlaceHolder1$ctl00$rad_MonHoc: 'rad_MonHoc',
      },
    })

    const rows = parseTimetableRows(res.body)
    if (rows.length === 0) {
      console.log(`[SGU] No timetable rows for semester ${semester}`)
      return []
    }

    return this.adapter.standardize(rows, { semester })
  }

  private requireLogin(): void {
    if (!this.account.loggedIn) {
      throw new AuthenticationError('User is not logged in.')
    }
  }
}

/**
 * Validate the requested semester; an empty request falls back to the
 * first (most recent) semester the portal offers.
 */
function pickSemester(requested: string, semesters: string[]): string {
  if (requested) {
    if (!semesters.includes(requested)) {
      throw new InvalidTermError('The semester is invalid', { semester: semesters })
    }
    return requested
  }

  const fallback = semesters[0]
  if (fallback === undefined) {
    throw new InvalidTermError('The portal offers no semesters', { semester: [] })
  }
  console.log(`[SGU] Semester not given. Class schedule will be taken from semester ${fallback}`)
  return fallback
}

export function parseSemesterOptions(html: string): string[] {
  const $ = cheerio.load(html)
  return $(`${SEMESTER_SELECT} option`)
    .toArray()
    .flatMap((option) => {
      const value = $(option).attr('value')
      return value ? [value] : []
    })
}

export function parseViewState(html: string): string | undefined {
  const $ = cheerio.load(html)
  return $('input#__VIEWSTATE').attr('value')
}

export function parseTimetableRows(html: string): RawRecord[] {
  const $ = cheerio.load(html)
  return $(TIMETABLE_ROW)
    .toArray()
    .map((row) =>
      $(row)
        .find('td')
        .toArray()
        .map((td) => $(td).text().trim()),
    )
}
