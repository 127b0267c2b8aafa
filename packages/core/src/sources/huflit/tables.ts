import type { SourceTables } from '../tables.js'

export const HUFLIT_BASE_URL = 'https://portal.huflit.edu.vn'
export const HUFLIT_HOME_ENDPOINT = '/Home'
export const HUFLIT_LOGIN_ENDPOINT = '/Login'
export const HUFLIT_LOGOUT_ENDPOINT = '/Login/Logout'
export const HUFLIT_SCHEDULE_API = '/Home/DrawingStudentSchedule_Perior'
export const HUFLIT_SCHEDULE_ENDPOINT = '/Home/Schedules'

export const HUFLIT_SESSION_COOKIE = 'ASP.NET_SessionId'

// Semester dates come with every row, so no anchors are needed here
export const HUFLIT_TABLES: SourceTables = {
  weekdays: {
    Hai: 0,
    Ba: 1,
    Tư: 2,
    Năm: 3,
    Sáu: 4,
  },
  slots: {
    '1': '06:45:00',
    '2': '07:35:00',
    '3': '08:25:00',
    '4': '09:30:00',
    '5': '10:25:00',
    '6': '11:10:00',
    '7': '12:45:00',
    '8': '13:35:00',
    '9': '14:25:00',
    '10': '15:30:00',
    '11': '16:25:00',
    '12': '17:10:00',
    '13': '18:15:00',
    '14': '19:05:00',
    '15': '19:55:00',
  },
  semesterStarts: {},
  lessonMinutes: 50,
}

export const HUFLIT_FIELDS = {
  code: 1,
  name: 2,
  credits: 3,
  classSection: 4,
  weekday: 5,
  periods: 6,
  room: 7,
  lecturer: 8,
  dateRange: 9,
} as const
