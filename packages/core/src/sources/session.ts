/**
 * Portal Session
 *
 * Scoped login/logout around portal work. A session is only obtainable
 * through `open()`, which logs in; `close()` logs out.
 */

import type { PortalAccount } from './types.js'

export class PortalSession {
  private closed = false

  private constructor(readonly account: PortalAccount) {}

  /**
   * Log in and return the open session. Login errors propagate unchanged.
   */
  static async open(account: PortalAccount): Promise<PortalSession> {
    await account.login()
    return new PortalSession(account)
  }

  get isOpen(): boolean {
    return !this.closed
  }

  /**
   * Log out. Calling close on an already closed session is a no-op.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.account.logout()
  }
}

/**
 * Run `fn` inside a logged-in session and always log out afterwards.
 * If `fn` throws and logout also fails, the logout error is logged and the
 * original error is rethrown.
 */
export async function withPortalSession<T>(
  account: PortalAccount,
  fn: (session: PortalSession) => Promise<T>,
): Promise<T> {
  const session = await PortalSession.open(account)

  let result: T
  try {
    result = await fn(session)
  } catch (err) {
    try {
      await session.close()
    } catch (logoutErr) {
      console.error(
        `[Session] Logout failed after an earlier error: ${logoutErr instanceof Error ? logoutErr.message : String(logoutErr)}`,
      )
    }
    throw err
  }

  await session.close()
  return result
}
