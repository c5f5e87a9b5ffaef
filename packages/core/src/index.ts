/**
 * @shoji/core - Shared error system, printing and type utilities
 */

export { StaticTypeCompanion } from "./companion.js";

// Errors (ShojiError is both type and value)
export { ShojiError, ErrFacet } from "./shoji-error.js";
export type {
  AnyFacet,
  ErrProps,
  ErrorDef,
  ErrorBoundary,
  ErrorData,
  FacetFields,
  FieldsOf,
  PropsOf,
  PrettyPrintOptions,
  UnionToIntersection,
  ShojiErrorJSON,
} from "./shoji-error.js";
export { NotFound, BadInput, InvariantViolated, HasUrl, HasStatus } from "./errors/errors.js";

// Inspection
export { Inspect, inspect } from "./inspect.js";

// Laziness
export { Lazy } from "./lazy.js";
export type { LazyOne } from "./lazy.js";

// Printing
export { Fmt } from "./fmt.js";
export type { FmtStyle } from "./fmt.js";
export { Printer, PrintFormatter } from "./printable.js";
