/**
 * Shared test stubs for the CLI — a session answering from canned
 * responses, recording every call.
 */

import { Element, type JsonValue, type RequestOptions, type Session, type ShojiResponse } from '@shoji/client'
import { CLI } from '../cli.js'
import { CliConfig, type CliConfigOptions } from '../config.js'

export type SessionMethod = 'get' | 'post' | 'patch'

export interface SessionCall {
  readonly method: SessionMethod
  readonly url: string
  readonly options?: RequestOptions
}

export interface StubResponse {
  readonly status?: number
  readonly headers?: Record<string, string>
  readonly body?: JsonValue
}

export function StubbedSession() {
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
    respond(method: SessionMethod, url: string, response: StubResponse): void {
      responses.set(`${method} ${url}`, response)
    },
  }
}

/** A CLI over a fresh stub session, colour off */
export function createTestCli(config: CliConfigOptions = {}) {
  const stub = StubbedSession()
  const cli = new CLI(new CliConfig(config), { session: stub.session })
  return {
    ...stub,
    run: (argv: string[]) => cli.execute({ argv, color: false }),
  }
}
