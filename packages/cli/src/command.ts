/**
 * Command — A self-contained CLI command with type-safe args.
 *
 * Each command owns its parser (lazy) and handler. The `Inferred<this>`
 * trick extracts the parsed value type from the concrete class's parser
 * definition, giving end-to-end type safety from parser → handler args.
 */

import type { LazyOne } from '@shoji/core'
import type { InferValue, Mode, Parser } from '@optique/core/parser'

/** Extract the parsed value type from a Command's parser. */
export type Inferred<T extends Command> = InferValue<T['parser']['get']>

/** Per-request options passed to command handlers. */
export interface CommandOptions {
  color: boolean
}

export interface Command {
  /** Command name as typed by the user (e.g. 'get', 'by'). */
  readonly name: string
  /** Lazy parser — built on first access. */
  readonly parser: LazyOne<Parser<Mode>>
  /** Execute the command with type-safe parsed args. */
  run(args: Inferred<this>, opts: CommandOptions): Promise<string>
}
