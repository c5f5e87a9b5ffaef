import { AttributeTuple, isRawIndex } from './attribute-tuple.js'
import { Document, rawMembers, type DocumentVariant, type Member } from './document.js'
import { Entity } from './entity.js'
import { ErrKeyType, ErrMalformedDocument, ErrMissingLocation } from './errors.js'
import type { JsonObject, JsonPrimitive, JsonValue } from './json.js'
import type { Payload, Session } from './session.js'

/** Values `Catalog.by` can group on. Objects and arrays cannot key a mapping. */
export type GroupKey = JsonPrimitive

function isGroupKey(value: JsonValue): value is GroupKey {
  return value === null || typeof value !== 'object'
}

/**
 * Catalog — a collection of resources, addressed by URL.
 *
 * The index maps each member's URL to a tuple of catalog-level attributes;
 * the members themselves are not fetched until a tuple's `fetch()` is called.
 */
export class Catalog extends Document {
  static readonly variant = {
    kind: 'catalog',
    element: 'shoji:catalog',
    navigation: ['catalogs', 'views', 'urls'],
  } as const satisfies DocumentVariant<'catalog'>

  readonly index: Map<string, AttributeTuple>

  private constructor(session: Session, members: Map<string, JsonValue>, index: Map<string, AttributeTuple>) {
    super(session, members)
    this.index = index
  }

  static from(session: Session, raw: JsonObject): Catalog {
    const rawIndex: JsonValue = 'index' in raw ? raw.index : {}
    if (!isRawIndex(rawIndex)) {
      throw ErrMalformedDocument.create({ document: 'catalog', member: 'index', expected: 'an object of attribute objects' })
    }
    const index = new Map<string, AttributeTuple>()
    for (const [entityUrl, attrs] of Object.entries(rawIndex)) {
      index.set(entityUrl, AttributeTuple.at(session, entityUrl, attrs))
    }
    return new Catalog(session, rawMembers(raw, 'index'), index)
  }

  get kind(): 'catalog' {
    return 'catalog'
  }

  get variant(): typeof Catalog.variant {
    return Catalog.variant
  }

  entries(): IterableIterator<[string, AttributeTuple]> {
    return this.index.entries()
  }

  /**
   * Re-key the index by the value of `attr` in each tuple.
   *
   * Tuples without `attr` are left out. When several tuples share a value,
   * one of them survives; which one is not part of the contract. The tuples
   * are copies and keep `attr` among their members.
   */
  by(attr: string): Map<GroupKey, AttributeTuple> {
    const grouped = new Map<GroupKey, AttributeTuple>()
    for (const tuple of this.index.values()) {
      const value = tuple.get(attr)
      if (value === undefined) continue
      if (!isGroupKey(value)) {
        throw ErrKeyType.create({
          attr,
          url: tuple.entityUrl,
          valueType: Array.isArray(value) ? 'array' : 'object',
        })
      }
      grouped.set(value, tuple.copy())
    }
    return grouped
  }

  /**
   * POST an entity to this catalog, creating a new resource.
   *
   * With `refresh`, the new resource is fetched and its payload returned
   * (undefined when that response had no parseable body).
   * Without it, the posted entity is located at the new URL and returned as
   * is. `refresh` defaults to true only when no entity is given: a stub
   * posted on the caller's behalf says nothing about the resource.
   */
  async create(entity?: Entity, refresh: boolean = entity === undefined): Promise<Payload | undefined> {
    const catalogUrl = this.requireSelf('create')
    const posted = entity ?? Entity.stub(this.session)

    const response = await this.post(JSON.stringify(posted))
    const location = response.headers.get('Location')
    if (location === null) {
      throw ErrMissingLocation.create({ url: catalogUrl })
    }

    if (refresh) {
      const fetched = await this.session.get(location)
      return fetched.payload
    }
    return posted.locate(location)
  }

  /** Add one resource to this catalog (or update its catalog attributes) with a PATCH */
  async add(entityUrl: string, attrs?: JsonObject): Promise<Payload | undefined> {
    const index: JsonObject = { [entityUrl]: attrs ?? {} }
    const response = await this.patch(JSON.stringify(index))
    return response.payload
  }

  protected override member(key: string): Member | undefined {
    return key === 'index' ? this.index : super.member(key)
  }

  protected override protocolEntries(): [string, JsonValue][] {
    const index = Object.fromEntries<JsonValue>(
      [...this.index].map(([entityUrl, tuple]): [string, JsonValue] => [entityUrl, tuple.toJSON()]),
    )
    return [['index', index]]
  }
}
