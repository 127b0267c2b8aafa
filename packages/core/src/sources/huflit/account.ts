import { AuthenticationError } from '../../errors.js'
import type { HttpSession } from '../http.js'
import type { PortalAccount, PortalCredentials } from '../types.js'
import {
  HUFLIT_HOME_ENDPOINT,
  HUFLIT_LOGIN_ENDPOINT,
  HUFLIT_LOGOUT_ENDPOINT,
  HUFLIT_SESSION_COOKIE,
} from './tables.js'

/**
 * HUFLIT student account. The portal answers a successful login with a
 * redirect to the home page; after logout, the home page redirects back
 * to the login form.
 */
export class HuflitAccount implements PortalAccount {
  readonly displayName = ''
  private _loggedIn = false

  constructor(
    private http: HttpSession,
    private credentials: PortalCredentials,
  ) {}

  get loggedIn(): boolean {
    return this._loggedIn
  }

  get sessionId(): string {
    return this.http.cookie(HUFLIT_SESSION_COOKIE) ?? ''
  }

  async login(): Promise<void> {
    if (this._loggedIn) {
      throw new AuthenticationError('User is already logged in.')
    }
    if (!this.credentials.username) {
      throw new AuthenticationError('Username is blank.')
    }

    console.log('[HUFLIT] Logging in ...')

    const res = await this.http.post(HUFLIT_LOGIN_ENDPOINT, {
      form: {
        txtTaiKhoan: this.credentials.username,
        txtMatKhau: this.credentials.password,
      },
    })
    if (!res.redirected) {
      throw new AuthenticationError('Login failed.')
    }

    this._loggedIn = true
  }

  async logout(): Promise<void> {
    if (!this._loggedIn) {
      throw new AuthenticationError('User is not logged in.')
    }

    console.log('[HUFLIT] Logging out ...')

    await this.http.get(HUFLIT_LOGOUT_ENDPOINT)
    const home = await this.http.get(HUFLIT_HOME_ENDPOINT)
    if (!home.redirected) {
      throw new AuthenticationError(`Logout failed. SessionID: ${this.sessionId}`)
    }

    this._loggedIn = false
  }
}
