/**
 * Element registry — turns parsed JSON into documents by their `element` tag.
 *
 * Only the top-level value is converted. Values without a known tag stay
 * plain JSON, so a session can hand back anything the server sends.
 */

import { StaticTypeCompanion } from '@shoji/core'
import { Catalog } from './catalog.js'
import { Entity } from './entity.js'
import { View } from './view.js'
import { isJsonObject, type JsonObject, type JsonValue } from './json.js'
import type { Payload, Session } from './session.js'

export type ShojiDocument = Catalog | Entity | View

type DocumentFactory = (session: Session, raw: JsonObject) => ShojiDocument

const factories: ReadonlyMap<string, DocumentFactory> = new Map<string, DocumentFactory>([
  [Catalog.variant.element, (session, raw) => Catalog.from(session, raw)],
  [Entity.variant.element, (session, raw) => Entity.from(session, raw)],
  [View.variant.element, (session, raw) => View.from(session, raw)],
])

export const Element = StaticTypeCompanion({
  /** The wire tags this client understands */
  known(): string[] {
    return [...factories.keys()]
  },

  parse(session: Session, value: JsonValue): Payload {
    if (!isJsonObject(value)) return value
    const element = value.element
    if (typeof element !== 'string') return value
    const factory = factories.get(element)
    return factory ? factory(session, value) : value
  },

  isDocument(payload: Payload | undefined): payload is ShojiDocument {
    return payload instanceof Catalog || payload instanceof Entity || payload instanceof View
  },
})
