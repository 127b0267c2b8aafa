/**
 * SGU account and portal tests against an in-process fake portal.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { sguSource, parseSemesterOptions, parseTimetableRows } from '../src/sources/sgu/index.js'
import { AuthenticationError, InvalidTermError } from '../src/errors.js'
import { createFakeFetch, routeKey, type FakeReply, type RecordedRequest } from './fake-fetch.js'

const BASE_URL = 'http://sgu.test'
const credentials = { username: '3121410001', password: 'test-secret' }

const SCHEDULE_PAGE = `
<html><body><form>
  <input type="hidden" name="__VIEWSTATE" id="__VIEWSTATE" value="vs-1" />
  <select id="ctl00_ContentPlaceHolder1_ctl00_ddlChonNHHK">
    <option value="20231">HK1 2023-2024</option>
    <option value="20223">HK3 2022-2023</option>
  </select>
</form></body></html>`

const TIMETABLE = `
<table>
  <tr><td>Mã MH</td><td>Tên MH</td></tr>
  <tr height="22px">
    <td>841020</td><td>Data Structures</td><td></td><td>4</td><td>DCT1201, DCT1202</td>
    <td></td><td></td><td></td><td>Hai</td><td>1</td><td>2</td><td>C.A105</td>
    <td>Tran Van A</td><td>1234567890</td>
  </tr>
</table>`

function loginReply(body: Record<string, unknown>): FakeReply {
  return {
    body: JSON.stringify(body),
    headers: [['set-cookie', 'ASP.NET_SessionId=sess-1; path=/']],
  }
}

const LOGIN_OK = loginReply({
  code: 200,
  name: 'Le Van C',
  token_type: 'Bearer',
  access_token: 'test-token',
})

function portalRouter(timetable = TIMETABLE) {
  return (request: RecordedRequest): FakeReply => {
    switch (routeKey(request)) {
      case 'POST /api/auth/login':
        return LOGIN_OK
      case 'POST /api/auth/logout':
        return { body: '{"code":200}' }
      case 'GET /default.aspx':
        return { body: SCHEDULE_PAGE }
      case 'POST /default.aspx':
        return { body: timetable }
      default:
        return { status: 404 }
    }
  }
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('SguAccount', () => {
  it('logs in with the token API and sends the bearer token afterwards', async () => {
    const { fetchImpl, requests } = createFakeFetch(portalRouter())
    const { account, portal } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })

    await account.login()
    await portal.listTerms()

    expect(account.loggedIn).toBe(true)
    expect(account.displayName).toBe('Le Van C')
    expect(requests[0].url).toBe('http://sgu.test/api/auth/login')
    expect(requests[0].body).toBe('username=3121410001&password=test-secret&grant_type=password')
    expect(requests[1].headers.get('authorization')).toBe('Bearer test-token')
  })

  it('reports the portal message on a rejected login', async () => {
    const { fetchImpl } = createFakeFetch([loginReply({ code: 401, message: 'Wrong password' })])
    const { account } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })

    await expect(account.login()).rejects.toThrow(new AuthenticationError('Wrong password'))
    expect(account.loggedIn).toBe(false)
  })

  it('fails on a response that is not JSON', async () => {
    const { fetchImpl } = createFakeFetch([{ body: '<html>maintenance</html>' }])
    const { account } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })

    await expect(account.login()).rejects.toThrow(
      'Unexpected response from the SGU portal (not JSON).',
    )
  })

  it('refuses a blank username without contacting the portal', async () => {
    const { fetchImpl, requests } = createFakeFetch([])
    const { account } = sguSource.connect(
      { username: '', password: 'test-secret' },
      { baseUrl: BASE_URL, fetchImpl },
    )

    await expect(account.login()).rejects.toThrow('Username is blank.')
    expect(requests).toHaveLength(0)
  })

  it('refuses a second login', async () => {
    const { fetchImpl } = createFakeFetch(portalRouter())
    const { account } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })

    await account.login()
    await expect(account.login()).rejects.toThrow('User is already logged in.')
  })

  it('logs out and drops the token', async () => {
    const { fetchImpl, requests } = createFakeFetch(portalRouter())
    const { account } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })

    await account.login()
    await account.logout()

    expect(account.loggedIn).toBe(false)
    expect(requests[1].url).toBe('http://sgu.test/api/auth/logout')
    expect(requests[1].headers.get('authorization')).toBe('Bearer test-token')
  })

  it('names the session when logout is rejected', async () => {
    const { fetchImpl } = createFakeFetch([LOGIN_OK, { body: '{"code":500}' }])
    const { account } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })

    await account.login()
    await expect(account.logout()).rejects.toThrow('Logout failed. SessionID: sess-1')
    expect(account.loggedIn).toBe(true)
  })

  it('refuses logout while logged out', async () => {
    const { fetchImpl } = createFakeFetch([])
    const { account } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })

    await expect(account.logout()).rejects.toThrow('User is not logged in.')
  })
})

describe('SguPortal', () => {
  it('lists the semesters on offer', async () => {
    const { fetchImpl } = createFakeFetch(portalRouter())
    const { account, portal } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })
    await account.login()

    expect(await portal.listTerms()).toEqual({ semester: ['20231', '20223'] })
  })

  it('posts the selected semester and standardizes the rows', async () => {
    const { fetchImpl, requests } = createFakeFetch(portalRouter())
    const { account, portal } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })
    await account.login()

    const descriptors = await portal.fetchSchedule({ semester: '20231' })

    const form = new URLSearchParams(requests[2].body)
    expect(requests[2].method).toBe('POST')
    expect(form.get('ctl00$ContentPlaceHolder1$ctl00$ddlChonNHHK')).toBe('20231')
    expect(form.get('__VIEWSTATE')).toBe('vs-1')
    expect(descriptors).toHaveLength(1)
    expect(descriptors[0].name).toBe('Data Structures')
    expect(descriptors[0].fromDate).toBe('2023-09-04T07:00:00')
    expect(descriptors[0].toDate).toBe('2023-11-13T08:40:00')
  })

  it('falls back to the first semester when none is chosen', async () => {
    const { fetchImpl, requests } = createFakeFetch(portalRouter())
    const { account, portal } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })
    await account.login()

    await portal.fetchSchedule({})

    const form = new URLSearchParams(requests[2].body)
    expect(form.get('ctl00$ContentPlaceHolder1$ctl00$ddlChonNHHK')).toBe('20231')
  })

  it('rejects a semester the portal does not offer', async () => {
    const { fetchImpl } = createFakeFetch(portalRouter())
    const { account, portal } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })
    await account.login()

    const attempt = portal.fetchSchedule({ semester: '20301' })
    await expect(attempt).rejects.toThrow(InvalidTermError)
    await expect(attempt).rejects.toThrow(
      'The semester is invalid. It must be one of semester: [20231, 20223]',
    )
  })

  it('returns no descriptors for an empty timetable', async () => {
    const { fetchImpl } = createFakeFetch(portalRouter('<table></table>'))
    const { account, portal } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })
    await account.login()

    expect(await portal.fetchSchedule({ semester: '20223' })).toEqual([])
  })

  it('requires a login', async () => {
    const { fetchImpl } = createFakeFetch(portalRouter())
    const { portal } = sguSource.connect(credentials, { baseUrl: BASE_URL, fetchImpl })

    await expect(portal.listTerms()).rejects.toThrow('User is not logged in.')
  })
})

describe('SGU page parsing', () => {
  it('reads semester option values', () => {
    expect(parseSemesterOptions(SCHEDULE_PAGE)).toEqual(['20231', '20223'])
  })

  it('reads only timetable rows', () => {
    const rows = parseTimetableRows(TIMETABLE)
    expect(rows).toHaveLength(1)
    expect(rows[0][8]).toBe('Hai')
    expect(rows[0][13]).toBe('1234567890')
  })
})
