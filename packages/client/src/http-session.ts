/**
 * HttpSession — a Session over the platform `fetch`.
 *
 * Responses outside 2xx fail with ErrRequestFailed; a fetch that rejects
 * fails with ErrNetworkFailed. Bodies that will not be read are cancelled
 * so the connection is released. Both belong to the session boundary and reach
 * document callers unchanged. Nothing is retried.
 */

import { Element } from './element.js'
import { ErrNetworkFailed, ErrRequestFailed } from './errors.js'
import { parseJson, type JsonValue } from './json.js'
import type { Payload, RequestOptions, Session, ShojiResponse } from './session.js'

export type HttpMethod = 'GET' | 'POST' | 'PATCH'

export interface HttpSessionOptions {
  /** Sent with every request. Per-call headers win. */
  readonly headers?: Readonly<Record<string, string>>
  /** Defaults to the global fetch */
  readonly fetch?: typeof fetch
}

/** application/json, or any structured +json type */
export function isJsonMediaType(contentType: string | null): boolean {
  if (contentType === null) return false
  const mediaType = contentType.split(';')[0].trim().toLowerCase()
  return mediaType === 'application/json' || mediaType.endsWith('+json')
}

/** Append query parameters, leaving the URL untouched when there are none */
export function withParams(url: string, params: Readonly<Record<string, string>> | undefined): string {
  const entries = Object.entries(params ?? {})
  if (entries.length === 0) return url
  const target = new URL(url)
  for (const [name, value] of entries) {
    target.searchParams.set(name, value)
  }
  return target.toString()
}

export class HttpSession implements Session {
  readonly #headers: Readonly<Record<string, string>>
  readonly #fetch: typeof fetch

  constructor(options: HttpSessionOptions = {}) {
    this.#headers = options.headers ?? {}
    this.#fetch = options.fetch ?? fetch
  }

  get(url: string, options?: RequestOptions): Promise<ShojiResponse> {
    return this.request('GET', url, options)
  }

  post(url: string, options?: RequestOptions): Promise<ShojiResponse> {
    return this.request('POST', url, options)
  }

  patch(url: string, options?: RequestOptions): Promise<ShojiResponse> {
    return this.request('PATCH', url, options)
  }

  private async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<ShojiResponse> {
    const target = withParams(url, options.params)
    const headers = { Accept: 'application/json', ...this.#headers, ...options.headers }

    const response = await ErrNetworkFailed.wrap({ method, url: target }, () =>
      this.#fetch(target, { method, headers, body: options.data }),
    )
    if (!response.ok) {
      await response.body?.cancel()
      throw ErrRequestFailed.create({ method, url: target, status: response.status })
    }

    return {
      status: response.status,
      headers: response.headers,
      payload: await this.readPayload(response),
    }
  }

  private async readPayload(response: Response): Promise<Payload | undefined> {
    if (!isJsonMediaType(response.headers.get('content-type'))) {
      await response.body?.cancel()
      return undefined
    }
    const text = await response.text()
    if (text.trim() === '') return undefined

    let value: JsonValue
    try {
      value = parseJson(text)
    } catch (err) {
      if (err instanceof SyntaxError) return undefined
      throw err
    }
    return Element.parse(this, value)
  }
}
