import util, {type InspectOptions} from 'node-inspect-extracted'

/**
 * Assign a custom inspect renderer to a class prototype.
 * Call inside a `static {}` block — assigns once to the prototype, not per instance.
 *
 * The `fn` receives the instance as `self` and returns a format string with params.
 * Format specifiers (%s, %O, %d, etc.) are handled by `util.formatWithOptions`,
 * which provides colored output, depth-aware object rendering, etc.
 *
 * ```typescript
 * class Catalog {
 *   static {
 *     Inspect(this, (self) => ({
 *       format: "Catalog( %s | %d entries )",
 *       params: [self.self, self.index.size],
 *     }));
 *   }
 * }
 * ```
 */
export function Inspect<T extends object>(
  cls: { prototype: T },
  fn: (self: T, options: InspectOptions) => { format: string; params: unknown[] },
): void {
  Object.defineProperty(cls.prototype, inspect, {
    configurable: true,
    writable: true,
    value: function (this: T, depth: number, options: InspectOptions): string {
      const opts: InspectOptions = { ...options, depth: (depth ?? 2) - 1 }
      const data = fn(this, opts)
      return util.formatWithOptions(opts, data.format, ...data.params)
    },
  })
}

export const inspect: unique symbol = Symbol.for('nodejs.util.inspect.custom')
