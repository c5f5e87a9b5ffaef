import { AttributeSet, AttributeTuple } from './attribute-tuple.js'
import { Document, rawMembers, type DocumentVariant, type Member } from './document.js'
import { ErrMalformedDocument } from './errors.js'
import { isJsonObject, type JsonObject, type JsonValue } from './json.js'
import type { Session } from './session.js'

/**
 * Entity — a single resource. Its data is the body; once the entity has a
 * `self` URL the body is an AttributeTuple bound to it, so `body.fetch()`
 * re-requests the entity itself.
 *
 * Build through the factories: `Entity.located` when the URL is known,
 * `Entity.stub` for an entity not yet created on the server.
 */
export class Entity extends Document {
  static readonly variant = {
    kind: 'entity',
    element: 'shoji:entity',
    navigation: ['catalogs', 'fragments', 'views', 'urls'],
  } as const satisfies DocumentVariant<'entity'>

  #body: AttributeSet

  private constructor(session: Session, members: Map<string, JsonValue>, body: AttributeSet) {
    super(session, members)
    this.#body = body
  }

  /** An entity with no URL yet — what you POST to a catalog */
  static stub(session: Session, body: JsonObject = {}, members: JsonObject = {}): Entity {
    const raw = rawMembers(members, 'body', 'self')
    return new Entity(session, raw, AttributeSet.fromObject(body))
  }

  /** An entity at a known URL; its body is bound to that URL */
  static located(session: Session, self: string, body: JsonObject = {}, members: JsonObject = {}): Entity {
    const raw = new Map<string, JsonValue>([['self', self], ...rawMembers(members, 'body', 'self')])
    return new Entity(session, raw, AttributeTuple.at(session, self, body))
  }

  /** From a wire document: located when it carries a string `self`, a stub otherwise */
  static from(session: Session, raw: JsonObject): Entity {
    const body: JsonValue = 'body' in raw ? raw.body : {}
    if (!isJsonObject(body)) {
      throw ErrMalformedDocument.create({ document: 'entity', member: 'body', expected: 'an object' })
    }
    const self = raw.self
    if (typeof self === 'string') {
      return Entity.located(session, self, body, raw)
    }
    const entity = Entity.stub(session, body, raw)
    if (self !== undefined) entity.members.set('self', self)
    return entity
  }

  get kind(): 'entity' {
    return 'entity'
  }

  get variant(): typeof Entity.variant {
    return Entity.variant
  }

  get body(): AttributeSet {
    return this.#body
  }

  /**
   * Give this entity its URL: sets `self` and rebinds the body to a tuple at
   * that URL. The body keeps its attributes (the map moves to the new tuple).
   */
  locate(url: string): this {
    this.members.set('self', url)
    this.#body = new AttributeTuple(this.session, url, this.#body.members)
    return this
  }

  protected override member(key: string): Member | undefined {
    return key === 'body' ? this.#body : super.member(key)
  }

  protected override protocolEntries(): [string, JsonValue][] {
    return [['body', this.#body.toJSON()]]
  }
}
