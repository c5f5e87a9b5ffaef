import { Lazy } from '@shoji/core'
import { argument, command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import { documentUrl, outputOption } from '../parsers/standard-opts.js'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'

export class CmdResolve implements Command {
  readonly name = 'resolve'

  constructor(private services: CliServices) {}

  parser = Lazy.once(() => command(
    'resolve',
    object({
      cmd: constant('resolve'),
      url: documentUrl,
      key: argument(string({ metavar: 'KEY' }), {
        description: message`Member name or navigation key`,
      }),
      output: outputOption,
    }),
    { description: message`Resolve a key on a document, following navigation links` }
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const document = await this.services.fetchDocument(args.url)
    const value = await document.resolve(args.key)
    return this.services.formatValue(value, args.output, opts.color)
  }
}
