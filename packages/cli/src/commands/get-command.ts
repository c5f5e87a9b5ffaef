import { Lazy } from '@shoji/core'
import { ShojiResponse } from '@shoji/client'
import { command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { message } from '@optique/core/message'
import { documentUrl, outputOption } from '../parsers/standard-opts.js'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'

export class CmdGet implements Command {
  readonly name = 'get'

  constructor(private services: CliServices) {}

  parser = Lazy.once(() => command(
    'get',
    object({
      cmd: constant('get'),
      url: documentUrl,
      output: outputOption,
    }),
    { description: message`Fetch a document and show it` }
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const response = await this.services.session.get(args.url)
    const payload = ShojiResponse.expectPayload(response, args.url)
    return this.services.formatValue(payload, args.output, opts.color)
  }
}
