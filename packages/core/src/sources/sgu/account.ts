import { z } from 'zod'
import { AuthenticationError } from '../../errors.js'
import type { HttpSession } from '../http.js'
import type { PortalAccount, PortalCredentials } from '../types.js'
import {
  SGU_LOGIN_ENDPOINT,
  SGU_LOGOUT_ENDPOINT,
  SGU_SESSION_COOKIE,
} from './tables.js'

const apiResponseSchema = z.object({
  code: z.coerce.number(),
  message: z.string().optional(),
  name: z.string().optional(),
  token_type: z.string().optional(),
  access_token: z.string().optional(),
})

type ApiResponse = z.infer<typeof apiResponseSchema>

/**
 * SGU student account. Logs in through the portal's token API and sends
 * the bearer token on every later request.
 */
export class SguAccount implements PortalAccount {
  private _loggedIn = false
  private _displayName = ''

  constructor(
    private http: HttpSession,
    private credentials: PortalCredentials,
  ) {}

  get loggedIn(): boolean {
    return this._loggedIn
  }

  get displayName(): string {
    return this._displayName
  }

  get sessionId(): string {
    return this.http.cookie(SGU_SESSION_COOKIE) ?? ''
  }

  async login(): Promise<void> {
    if (this._loggedIn) {
      throw new AuthenticationError('User is already logged in.')
    }
    if (!this.credentials.username) {
      throw new AuthenticationError('Username is blank.')
    }

    console.log('[SGU] Logging in ...')

    const res = await this.http.post(SGU_LOGIN_ENDPOINT, {
      form: {
        username: this.credentials.username,
        password: this.credentials.password,
        grant_type: 'password',
      },
    })
    const payload = parseApiResponse(res.body)

    if (payload.code !== 200) {
      throw new AuthenticationError(payload.message ?? `Login failed (code ${payload.code}).`)
    }
    if (!payload.token_type || !payload.access_token) {
      throw new AuthenticationError('Login response did not include an access token.')
    }

    this.http.headers['Authorization'] = `${payload.token_type} ${payload.access_token}`
    this._displayName = payload.name ?? ''
    this._loggedIn = true
  }

  async logout(): Promise<void> {
    if (!this._loggedIn) {
      throw new AuthenticationError('User is not logged in.')
    }

    console.log('[SGU] Logging out ...')

    const res = await this.http.post(SGU_LOGOUT_ENDPOINT)
    const payload = parseApiResponse(res.body)

    if (payload.code !== 200) {
      throw new AuthenticationError(`Logout failed. SessionID: ${this.sessionId}`)
    }

    delete this.http.headers['Authorization']
    this._loggedIn = false
  }
}

function parseApiResponse(body: string): ApiResponse {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch {
    throw new AuthenticationError('Unexpected response from the SGU portal (not JSON).')
  }

  const parsed = apiResponseSchema.safeParse(json)
  if (!parsed.success) {
    throw new AuthenticationError(
      `Unexpected response from the SGU portal: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
    )
  }
  return parsed.data
}
