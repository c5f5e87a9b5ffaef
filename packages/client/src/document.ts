/**
 * Document — the capability shared by Catalog, Entity and View.
 *
 * A document is one hypermedia resource. Attribute lookups are satisfied from
 * its own members first, then by following the first declared navigation
 * collection that links the key. That second step is a network call: treat
 * `lookup` and `resolve` as I/O, never as a plain property read.
 */

import { Inspect } from '@shoji/core'
import type { AttributeSet, AttributeTuple } from './attribute-tuple.js'
import { ErrAttributeNotFound, ErrDocumentNotLocated } from './errors.js'
import { isJsonObject, type JsonObject, type JsonValue } from './json.js'
import {
  RequestOptions,
  ShojiResponse,
  type Payload,
  type Session,
} from './session.js'

export type DocumentKind = 'catalog' | 'entity' | 'view'

/** Per-variant constants: wire tag and navigation collections in lookup order */
export interface DocumentVariant<K extends DocumentKind = DocumentKind> {
  readonly kind: K
  readonly element: `shoji:${K}`
  readonly navigation: readonly string[]
}

/** Anything a document holds locally: raw JSON, a body set, or a catalog index */
export type Member = JsonValue | AttributeSet | ReadonlyMap<string, AttributeTuple>

export type Resolution =
  | { readonly kind: 'local'; readonly value: Member }
  /** `value` is undefined when the linked response had no parseable body */
  | { readonly kind: 'remote'; readonly collection: string; readonly url: string; readonly value: Payload | undefined }
  | { readonly kind: 'missing' }

export abstract class Document {
  readonly session: Session
  /** Raw members, protocol fields (index, body) excluded */
  readonly members: Map<string, JsonValue>

  static {
    Inspect(this, (self) => ({
      format: '%s( %s ) %O',
      params: [self.variant.element, self.self ?? 'unlocated', self.toJSON()],
    }))
  }

  protected constructor(session: Session, members: Map<string, JsonValue>) {
    this.session = session
    this.members = members
  }

  abstract get kind(): DocumentKind
  abstract get variant(): DocumentVariant

  /** This document's own URL, when the server (or a create) gave it one */
  get self(): string | undefined {
    const self = this.members.get('self')
    return typeof self === 'string' ? self : undefined
  }

  /** A navigation collection as short key → URL. Non-string links are left out. */
  collection(name: string): ReadonlyMap<string, string> | undefined {
    const raw = this.members.get(name)
    if (!isJsonObject(raw)) return undefined
    const links = new Map<string, string>()
    for (const [key, url] of Object.entries(raw)) {
      if (typeof url === 'string') links.set(key, url)
    }
    return links
  }

  /** Local members first; variants answer their typed protocol fields here. */
  protected member(key: string): Member | undefined {
    if (key === 'element') return this.variant.element
    return this.members.get(key)
  }

  /** Protocol fields to append to the wire form */
  protected protocolEntries(): [string, JsonValue][] {
    return []
  }

  async lookup(key: string): Promise<Resolution> {
    const local = this.member(key)
    if (local !== undefined) {
      return { kind: 'local', value: local }
    }

    for (const name of this.variant.navigation) {
      const url = this.collection(name)?.get(key)
      if (url === undefined) continue
      const response = await this.session.get(url)
      return { kind: 'remote', collection: name, url, value: response.payload }
    }

    return { kind: 'missing' }
  }

  /** Like lookup, but unwrapped. Fails with ErrAttributeNotFound when nothing matches. */
  async resolve(key: string): Promise<Member | Payload | undefined> {
    const resolution = await this.lookup(key)
    if (resolution.kind === 'missing') {
      throw ErrAttributeNotFound.create({ document: this.kind, key })
    }
    return resolution.value
  }

  post(data: string, options: Omit<RequestOptions, 'data'> = {}): Promise<ShojiResponse> {
    const url = this.requireSelf('post')
    return this.session.post(url, RequestOptions.withJsonContentType({ ...options, data }))
  }

  patch(data: string, options: Omit<RequestOptions, 'data'> = {}): Promise<ShojiResponse> {
    const url = this.requireSelf('patch')
    return this.session.patch(url, RequestOptions.withJsonContentType({ ...options, data }))
  }

  /** GET this document's own URL */
  async refresh(options?: RequestOptions): Promise<Payload> {
    const url = this.requireSelf('refresh')
    const response = await this.session.get(url, options)
    return ShojiResponse.expectPayload(response, url)
  }

  toJSON(): JsonObject {
    return Object.fromEntries<JsonValue>([
      ['element', this.variant.element],
      ...this.members,
      ...this.protocolEntries(),
    ])
  }

  protected requireSelf(operation: string): string {
    const self = this.self
    if (self === undefined) {
      throw ErrDocumentNotLocated.create({ document: this.kind, operation })
    }
    return self
  }
}

/** Raw members of a wire document, minus the element tag and the named protocol fields */
export function rawMembers(raw: JsonObject, ...protocol: string[]): Map<string, JsonValue> {
  const skip = new Set(['element', ...protocol])
  return new Map(Object.entries(raw).filter(([key]) => !skip.has(key)))
}
