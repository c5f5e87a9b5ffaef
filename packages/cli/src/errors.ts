/**
 * CLI error boundary — errors owned by argument and environment handling.
 */

import { BadInput, ErrFacet, HasUrl, ShojiError } from '@shoji/core'

export const CliBoundary = ShojiError.boundary('cli')

/** A JSON argument or environment value did not hold what was expected */
export const ErrInvalidJson = CliBoundary.define('invalid_json', {
  customProps: ErrFacet.props<{ source: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid JSON in ${d.source}: ${d.reason}`,
})

/** The URL answered with something other than the document the command needs */
export const ErrUnexpectedPayload = CliBoundary.define('unexpected_payload', {
  customProps: ErrFacet.props<{ expected: string; received: string }>(),
  facets: [BadInput, HasUrl],
  message: (d) => `Expected a ${d.expected} at ${d.url}, got ${d.received}`,
})
