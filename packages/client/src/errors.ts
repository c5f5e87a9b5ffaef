/**
 * Client and session boundaries — errors owned by the document model and
 * by the HTTP transport.
 */

import { BadInput, ErrFacet, HasStatus, HasUrl, InvariantViolated, NotFound, ShojiError } from '@shoji/core'

// ============================================================================
// Client Boundary
// ============================================================================

export const ClientBoundary = ShojiError.boundary('client')

/** A response arrived without a body that could be parsed as a document */
export const Unparseable = ErrFacet.marker('Unparseable')

/** Carries the document variant involved (catalog, entity, view) */
export const HasDocument = ErrFacet.data<{ document: string }>('HasDocument')

/** Response body could not be parsed into a payload */
export const ErrParseFailed = ClientBoundary.define('parse_failed', {
  customProps: ErrFacet.props<{ status: number }>(),
  facets: [Unparseable, HasUrl],
  message: (d) => `Response could not be parsed (${d.status} from ${d.url})`,
})

/** Key is neither a member nor a link in any navigation collection */
export const ErrAttributeNotFound = ClientBoundary.define('attribute_not_found', {
  customProps: ErrFacet.props<{ key: string }>(),
  facets: [NotFound, HasDocument],
  message: (d) => `${d.document} has no attribute ${d.key}`,
})

/** Catalog.by() met a value that cannot key a mapping */
export const ErrKeyType = ClientBoundary.define('key_type', {
  customProps: ErrFacet.props<{ attr: string; valueType: string }>(),
  facets: [BadInput, HasUrl],
  message: (d) => `Cannot group by '${d.attr}': ${d.valueType} value at ${d.url} is not a valid key`,
})

/** Operation needs the document's own URL and it has none */
export const ErrDocumentNotLocated = ClientBoundary.define('document_not_located', {
  customProps: ErrFacet.props<{ operation: string }>(),
  facets: [BadInput, HasDocument],
  message: (d) => `Cannot ${d.operation}: ${d.document} has no self URL`,
})

/** A create POST succeeded without telling us where the new resource lives */
export const ErrMissingLocation = ClientBoundary.define('missing_location', {
  facets: [InvariantViolated, HasUrl],
  message: (d) => `POST to ${d.url} returned no Location header`,
})

/** A protocol member had the wrong shape */
export const ErrMalformedDocument = ClientBoundary.define('malformed_document', {
  customProps: ErrFacet.props<{ member: string; expected: string }>(),
  facets: [BadInput, HasDocument],
  message: (d) => `Malformed ${d.document}: '${d.member}' must be ${d.expected}`,
})

// ============================================================================
// Session Boundary
// ============================================================================

export const SessionBoundary = ShojiError.boundary('session')

/** Server answered outside the 2xx range */
export const ErrRequestFailed = SessionBoundary.define('request_failed', {
  facets: [HasUrl, HasStatus],
  message: (d) => `${d.method} ${d.url} failed with status ${d.status}`,
})

/** The request never produced a response */
export const ErrNetworkFailed = SessionBoundary.define('network_failed', {
  customProps: ErrFacet.props<{ method: string }>(),
  facets: [HasUrl],
  message: (d) => `${d.method} ${d.url} did not complete`,
})
