import type { SourceTables } from '../tables.js'

export const SGU_BASE_URL = 'http://thongtindaotao.sgu.edu.vn'
export const SGU_LOGIN_ENDPOINT = '/api/auth/login'
export const SGU_LOGOUT_ENDPOINT = '/api/auth/logout'
export const SGU_SCHEDULE_ENDPOINT = '/default.aspx?page=thoikhoabieu&sta=1'

export const SGU_SESSION_COOKIE = 'ASP.NET_SessionId'

export const SGU_TABLES: SourceTables = {
  weekdays: {
    Hai: 0,
    Ba: 1,
    Tư: 2,
    Năm: 3,
    Sáu: 4,
  },
  slots: {
    '1': '07:00:00',
    '2': '07:50:00',
    '3': '09:00:00',
    '4': '09:50:00',
    '5': '10:40:00',
    '6': '13:00:00',
    '7': '13:50:00',
    '8': '15:00:00',
    '9': '15:50:00',
    '10': '16:40:00',
    '11': '17:40:00',
    '12': '18:30:00',
    '13': '19:20:00',
  },
  semesterStarts: {
    '20211': '2021-09-13',
    '20212': '2022-02-14',
    '20221': '2022-09-05',
    '20222': '2023-02-06',
    '20223': '2023-06-26',
    '20231': '2023-09-04',
  },
  lessonMinutes: 50,
}

/** Column positions in a timetable row */
export const SGU_FIELDS = {
  code: 0,
  name: 1,
  credits: 3,
  classSection: 4,
  weekday: 8,
  startPeriod: 9,
  lessonCount: 10,
  room: 11,
  lecturer: 12,
  weekPattern: 13,
} as const
