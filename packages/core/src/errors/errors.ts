/**
 * Standard facets shared by every boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 * Packages own their boundaries and error definitions; core owns only the
 * vocabulary they are built from.
 */

import {ErrFacet} from "../shoji-error.js";

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** Internal or protocol invariant violated */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");

/** Carries the URL of the resource involved */
export const HasUrl = ErrFacet.data<{ url: string }>("HasUrl");

/** Carries an HTTP method and response status */
export const HasStatus = ErrFacet.data<{ method: string; status: number }>("HasStatus");
