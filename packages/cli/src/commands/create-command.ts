import { Lazy } from '@shoji/core'
import { Entity } from '@shoji/client'
import { command, constant, flag, option } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { optional } from '@optique/core/modifiers'
import { message } from '@optique/core/message'
import { documentUrl, outputOption } from '../parsers/standard-opts.js'
import { jsonObject } from '../parsers/json-value-parser.js'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'

export class CmdCreate implements Command {
  readonly name = 'create'

  constructor(private services: CliServices) {}

  parser = Lazy.once(() => command(
    'create',
    object({
      cmd: constant('create'),
      url: documentUrl,
      body: optional(option('--body', jsonObject('--body'), {
        description: message`Body of the entity to create`,
      })),
      refresh: optional(flag('--refresh', {
        description: message`Fetch the new resource after creating it`,
      })),
      output: outputOption,
    }),
    { description: message`Create a resource in a catalog` }
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const catalog = await this.services.fetchCatalog(args.url)
    const entity = args.body === undefined ? undefined : Entity.stub(this.services.session, args.body)
    const created = await catalog.create(entity, args.refresh)
    return this.services.formatValue(created, args.output, opts.color)
  }
}
