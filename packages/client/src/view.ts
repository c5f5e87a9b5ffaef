import { Document, rawMembers, type DocumentVariant } from './document.js'
import type { JsonObject, JsonValue } from './json.js'
import type { Session } from './session.js'

/** View — navigation links and opaque content, stored as given */
export class View extends Document {
  static readonly variant = {
    kind: 'view',
    element: 'shoji:view',
    navigation: ['views', 'urls'],
  } as const satisfies DocumentVariant<'view'>

  private constructor(session: Session, members: Map<string, JsonValue>) {
    super(session, members)
  }

  static from(session: Session, raw: JsonObject): View {
    return new View(session, rawMembers(raw))
  }

  get kind(): 'view' {
    return 'view'
  }

  get variant(): typeof View.variant {
    return View.variant
  }

  /** The view's `value` member, where Shoji views put their content */
  get value(): JsonValue | undefined {
    return this.members.get('value')
  }
}
