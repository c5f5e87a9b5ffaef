/**
 * Session — the transport contract documents and tuples call through.
 *
 * A session is shared by every document and tuple built from its responses.
 * They hold a reference to it and never manage its lifetime. Implementations:
 *   - HttpSession: fetch-based, for real servers
 *   - StubbedSession (tests): canned responses, call recording
 */

import { StaticTypeCompanion } from '@shoji/core'
import type { JsonValue } from './json.js'
import type { ShojiDocument } from './element.js'
import { ErrParseFailed } from './errors.js'

/** A parsed response body: a document when the element tag is known, plain JSON otherwise */
export type Payload = ShojiDocument | JsonValue

export interface RequestOptions {
  readonly headers?: Readonly<Record<string, string>>
  /** Request body, sent as-is */
  readonly data?: string
  /** Appended to the URL's query string */
  readonly params?: Readonly<Record<string, string>>
}

/** Case-insensitive header view. The WHATWG Headers class satisfies it. */
export interface ResponseHeaders {
  get(name: string): string | null
}

export interface ShojiResponse {
  readonly status: number
  readonly headers: ResponseHeaders
  /** Undefined when the body could not be parsed (or there was none) */
  readonly payload: Payload | undefined
}

export interface Session {
  get(url: string, options?: RequestOptions): Promise<ShojiResponse>
  post(url: string, options?: RequestOptions): Promise<ShojiResponse>
  patch(url: string, options?: RequestOptions): Promise<ShojiResponse>
}

export const ShojiResponse = StaticTypeCompanion({
  /** The response's payload, or ErrParseFailed when it has none */
  expectPayload(response: ShojiResponse, url: string): Payload {
    if (response.payload === undefined) {
      throw ErrParseFailed.create({ url, status: response.status })
    }
    return response.payload
  },
})

export const RequestOptions = StaticTypeCompanion({
  /** Add `Content-Type: application/json` unless the headers already name a content type */
  withJsonContentType(options: RequestOptions): RequestOptions {
    const headers = options.headers ?? {}
    const hasContentType = Object.keys(headers).some((name) => name.toLowerCase() === 'content-type')
    if (hasContentType) return options
    return { ...options, headers: { ...headers, 'Content-Type': 'application/json' } }
  },
})
