/**
 * Attribute bags.
 *
 * AttributeSet is an ordered map of JSON attributes. AttributeTuple is a set
 * bound to the URL of the resource it describes: Catalog index entries and
 * located Entity bodies are tuples, and `fetch()` requests that resource.
 *
 * An absent key reads as `undefined`; a key present with a JSON null reads
 * as `null`.
 */

import { Inspect } from '@shoji/core'
import { isJsonObject, type JsonObject, type JsonValue } from './json.js'
import { ShojiResponse, type Payload, type RequestOptions, type Session } from './session.js'

export class AttributeSet {
  /** Owned by this set; copies get their own map */
  readonly members: Map<string, JsonValue>

  static {
    Inspect(this, (self) => ({ format: 'AttributeSet %O', params: [self.toJSON()] }))
  }

  constructor(members: Map<string, JsonValue> = new Map()) {
    this.members = members
  }

  static fromObject(attrs: JsonObject): AttributeSet {
    return new AttributeSet(new Map(Object.entries(attrs)))
  }

  get size(): number {
    return this.members.size
  }

  has(key: string): boolean {
    return this.members.has(key)
  }

  get(key: string): JsonValue | undefined {
    return this.members.get(key)
  }

  set(key: string, value: JsonValue): this {
    this.members.set(key, value)
    return this
  }

  delete(key: string): boolean {
    return this.members.delete(key)
  }

  keys(): IterableIterator<string> {
    return this.members.keys()
  }

  entries(): IterableIterator<[string, JsonValue]> {
    return this.members.entries()
  }

  /** Shallow: the map is new, nested values are shared */
  copy(): AttributeSet {
    return new AttributeSet(new Map(this.members))
  }

  toJSON(): JsonObject {
    return Object.fromEntries(this.members)
  }
}

export class AttributeTuple extends AttributeSet {
  readonly session: Session
  readonly entityUrl: string

  static {
    Inspect(this, (self) => ({ format: 'AttributeTuple( %s ) %O', params: [self.entityUrl, self.toJSON()] }))
  }

  constructor(session: Session, entityUrl: string, members: Map<string, JsonValue> = new Map()) {
    super(members)
    this.session = session
    this.entityUrl = entityUrl
  }

  /** Build a tuple for `entityUrl` from a raw attribute object */
  static at(session: Session, entityUrl: string, attrs: JsonObject): AttributeTuple {
    return new AttributeTuple(session, entityUrl, new Map(Object.entries(attrs)))
  }

  override copy(): AttributeTuple {
    return new AttributeTuple(this.session, this.entityUrl, new Map(this.members))
  }

  /** GET the resource this tuple describes. Fails with ErrParseFailed when the body is unparseable. */
  async fetch(options?: RequestOptions): Promise<Payload> {
    const response = await this.session.get(this.entityUrl, options)
    return ShojiResponse.expectPayload(response, this.entityUrl)
  }
}

/** True for a raw index: an object whose every value is an attribute object */
export function isRawIndex(value: JsonValue | undefined): value is Record<string, JsonObject> {
  return isJsonObject(value) && Object.values(value).every((entry) => isJsonObject(entry))
}
