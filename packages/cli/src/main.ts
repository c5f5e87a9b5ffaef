/**
 * CLI harness — process-level entry point.
 *
 * Reads the harness flags and the environment, runs one request through
 * the CLI class and writes its response. All process-level concerns
 * (argv, env, stdout/stderr, exit code) live here; cli.ts is pure logic.
 */

import { flag, parseSync, passThrough } from '@optique/core'
import { object } from '@optique/core/constructs'
import { withDefault } from '@optique/core/modifiers'
import { formatMessage } from '@optique/core/message'

import { ShojiError } from '@shoji/core'
import { CLI } from './cli.js'
import { CliConfig } from './config.js'

/** Write data in 64 KB chunks, awaiting flush on each to avoid truncation when piped. */
async function flushWrite(stream: NodeJS.WritableStream, data: string): Promise<void> {
  const CHUNK = 65536
  let offset = 0
  while (offset < data.length) {
    const chunk = data.slice(offset, offset + CHUNK)
    offset += CHUNK
    await new Promise<void>((resolve, reject) => {
      stream.write(chunk, (err) => (err ? reject(err) : resolve()))
    })
  }
}

const harnessParsers = object({
  verbose: withDefault(flag('-v', '--verbose'), false),
  command: passThrough({ format: 'greedy' }),
})

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseSync(harnessParsers, argv)
  if (!parsed.success) {
    await flushWrite(process.stderr, formatMessage(parsed.error) + '\n')
    return 1
  }

  let cfg: CliConfig
  try {
    cfg = CliConfig.fromEnvironment({ verbose: parsed.value.verbose })
  } catch (err) {
    await flushWrite(process.stderr, ShojiError.wrap(err).prettyPrint() + '\n')
    return 1
  }

  const cli = new CLI(cfg)
  const response = await cli.execute({ argv: parsed.value.command, color: cfg.useColor })

  if (response.stdout) await flushWrite(process.stdout, response.stdout)
  if (response.stderr) await flushWrite(process.stderr, response.stderr)
  return response.exitCode
}
