/**
 * Portal HTTP Session
 *
 * Thin wrapper over fetch that keeps cookies between requests, follows
 * redirects by hand (so cookies set on a redirect are not lost) and
 * reports whether a request was redirected. Portals signal login state
 * through redirects and session cookies.
 */

const MAX_REDIRECTS = 10

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/json',
  'Accept-Language': 'vi-VN,vi;q=0.9,en-US;q=0.8,en;q=0.7',
  'User-Agent':
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36',
}

export interface PortalResponse {
  status: number
  ok: boolean
  /** Final URL after redirects */
  url: string
  /** True if at least one redirect was followed */
  redirected: boolean
  body: string
}

export interface RequestOptions {
  query?: Record<string, string>
  form?: Record<string, string>
  headers?: Record<string, string>
}

export class HttpSession {
  /** Extra headers sent with every request (e.g. Authorization) */
  readonly headers: Record<string, string> = {}
  private cookies: Map<string, string> = new Map()
  private baseUrl: string
  private fetchImpl: typeof fetch

  constructor(baseUrl: string, fetchImpl: typeof fetch = fetch) {
    this.baseUrl = baseUrl.replace(/\/$/, '')
    this.fetchImpl = fetchImpl
  }

  cookie(name: string): string | undefined {
    return this.cookies.get(name)
  }

  async get(path: string, options: RequestOptions = {}): Promise<PortalResponse> {
    return this.request('GET', path, options)
  }

  async post(path: string, options: RequestOptions = {}): Promise<PortalResponse> {
    return this.request('POST', path, options)
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    options: RequestOptions,
  ): Promise<PortalResponse> {
    let url = this.resolveUrl(path, options.query)
    let currentMethod = method
    let body: string | undefined = options.form
      ? new URLSearchParams(options.form).toString()
      : undefined
    let redirected = false

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const headers: Record<string, string> = {
        ...DEFAULT_HEADERS,
        ...this.headers,
        ...options.headers,
      }
      if (body !== undefined) {
        headers['Content-Type'] = 'application/x-www-form-urlencoded'
      }
      const cookieHeader = this.cookieHeader()
      if (cookieHeader) {
        headers['Cookie'] = cookieHeader
      }

      const res = await this.fetchImpl(url, {
        method: currentMethod,
        headers,
        body,
        redirect: 'manual',
      })
      this.storeCookies(res.headers)

      const location = res.headers.get('location')
      if (res.status >= 300 && res.status < 400 && location) {
        redirected = true
        url = new URL(location, url).toString()
        // 307/308 keep the method and body; everything else becomes a GET
        if (res.status !== 307 && res.status !== 308) {
          currentMethod = 'GET'
          body = undefined
        }
        continue
      }

      return {
        status: res.status,
        ok: res.ok,
        url,
        redirected,
        body: await res.text(),
      }
    }

    throw new Error(`${method} ${path} -> too many redirects`)
  }

  private resolveUrl(path: string, query?: Record<string, string>): string {
    const url = new URL(path.startsWith('http') ? path : `${this.baseUrl}${path}`)
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value)
    }
    return url.toString()
  }

  private storeCookies(headers: Headers): void {
    for (const entry of headers.getSetCookie()) {
      const pair = entry.split(';', 1)[0]
      const eq = pair.indexOf('=')
      if (eq <= 0) continue

      const name = pair.slice(0, eq).trim()
      const value = pair.slice(eq + 1).trim()
      if (value) {
        this.cookies.set(name, value)
      } else {
        this.cookies.delete(name)
      }
    }
  }

  private cookieHeader(): string {
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ')
  }
}
