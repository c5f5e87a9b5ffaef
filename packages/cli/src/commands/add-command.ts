import { Lazy } from '@shoji/core'
import { argument, command, constant, option } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { optional } from '@optique/core/modifiers'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import { documentUrl, outputOption } from '../parsers/standard-opts.js'
import { jsonObject } from '../parsers/json-value-parser.js'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'

export class CmdAdd implements Command {
  readonly name = 'add'

  constructor(private services: CliServices) {}

  parser = Lazy.once(() => command(
    'add',
    object({
      cmd: constant('add'),
      url: documentUrl,
      entity: argument(string({ metavar: 'ENTITY_URL' }), {
        description: message`URL of the resource to add`,
      }),
      attrs: optional(option('--attrs', jsonObject('--attrs'), {
        description: message`Catalog attributes for the new entry`,
      })),
      output: outputOption,
    }),
    { description: message`Add a resource to a catalog's index` }
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const catalog = await this.services.fetchCatalog(args.url)
    const response = await catalog.add(args.entity, args.attrs)
    return this.services.formatAdd(
      { catalog: args.url, entity: args.entity, response },
      args.output,
      opts.color,
    )
  }
}
