/**
 * Marks an object of statics that share a name with a type, such as
 * `ShojiResponse` the interface and `ShojiResponse.expectPayload`.
 * Returns its argument unchanged.
 */
export function StaticTypeCompanion<const Companion>(statics: Companion): Companion {
  return statics
}
