/**
 * Shared test stubs for the client.
 *
 * These are dumb test doubles — canned responses and call tracking.
 */

import { Element } from '../element.js'
import type { JsonValue } from '../json.js'
import type { RequestOptions, Session, ShojiResponse } from '../session.js'

// -- Call tracking ------------------------------------------------------------

export type SessionMethod = 'get' | 'post' | 'patch'

export interface SessionCall {
  readonly method: SessionMethod
  readonly url: string
  readonly options?: RequestOptions
}

// -- Canned responses ---------------------------------------------------------

export interface StubResponse {
  readonly status?: number
  readonly headers?: Record<string, string>
  /** Parsed through the element registry. Omit for an unparseable response. */
  readonly body?: JsonValue
}

// -- StubbedSession -----------------------------------------------------------

export interface StubbedSession {
  readonly session: Session
  readonly calls: SessionCall[]
  /** Register (or replace) the response for one method + URL */
  respond(method: SessionMethod, url: string, response: StubResponse): void
}

/** A session that answers from canned responses and fails on anything unregistered. */
export function StubbedSession(): StubbedSession {
  const calls: SessionCall[] = []
  const responses = new Map<string, StubResponse>()

  const answer = async (method: SessionMethod, url: string, options?: RequestOptions): Promise<ShojiResponse> => {
    calls.push(options === undefined ? { method, url } : { method, url, options })
    const canned = responses.get(`${method} ${url}`)
    if (!canned) {
      throw new Error(`Unexpected ${method.toUpperCase()} ${url}`)
    }
    return {
      status: canned.status ?? 200,
      headers: new Headers(canned.headers),
      payload: canned.body === undefined ? undefined : Element.parse(session, canned.body),
    }
  }

  const session: Session = {
    get: (url, options) => answer('get', url, options),
    post: (url, options) => answer('post', url, options),
    patch: (url, options) => answer('patch', url, options),
  }

  return {
    session,
    calls,
    respond(method, url, response) {
      responses.set(`${method} ${url}`, response)
    },
  }
}

// -- Helpers ------------------------------------------------------------------

/** Await a promise that is expected to reject and hand back what it rejected with */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (err) {
    return err
  }
  throw new Error('Expected promise to reject')
}
