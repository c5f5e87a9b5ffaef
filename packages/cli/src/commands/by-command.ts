import { Lazy } from '@shoji/core'
import { argument, command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import { documentUrl, outputOption } from '../parsers/standard-opts.js'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'

export class CmdBy implements Command {
  readonly name = 'by'

  constructor(private services: CliServices) {}

  parser = Lazy.once(() => command(
    'by',
    object({
      cmd: constant('by'),
      url: documentUrl,
      attr: argument(string({ metavar: 'ATTR' }), {
        description: message`Attribute to group the index by`,
      }),
      output: outputOption,
    }),
    { description: message`Group a catalog's index by an attribute` }
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const catalog = await this.services.fetchCatalog(args.url)
    const groups = catalog.by(args.attr)
    return this.services.formatGrouping({ attr: args.attr, groups }, args.output, opts.color)
  }
}
