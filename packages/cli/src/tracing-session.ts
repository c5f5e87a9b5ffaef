import { HasStatus, ShojiError } from '@shoji/core'
import type { RequestOptions, Session, ShojiResponse } from '@shoji/client'

/**
 * TracingSession — a Session that reports each request as one line,
 * `METHOD url → status`, then behaves exactly like the session it wraps.
 *
 * Failed requests are reported too (with their status when the error
 * carries one) and rethrown unchanged.
 */
export class TracingSession implements Session {
  constructor(
    private readonly inner: Session,
    private readonly trace: (line: string) => void,
  ) {}

  get(url: string, options?: RequestOptions): Promise<ShojiResponse> {
    return this.traced('GET', url, () => this.inner.get(url, options))
  }

  post(url: string, options?: RequestOptions): Promise<ShojiResponse> {
    return this.traced('POST', url, () => this.inner.post(url, options))
  }

  patch(url: string, options?: RequestOptions): Promise<ShojiResponse> {
    return this.traced('PATCH', url, () => this.inner.patch(url, options))
  }

  private async traced(method: string, url: string, send: () => Promise<ShojiResponse>): Promise<ShojiResponse> {
    try {
      const response = await send()
      this.trace(`${method} ${url} → ${response.status}`)
      return response
    } catch (err) {
      const outcome = ShojiError.has(err, HasStatus) ? String(err.data.status) : 'failed'
      this.trace(`${method} ${url} → ${outcome}`)
      throw err
    }
  }
}
