/**
 * CLI — The dispatch engine.
 *
 * One optique `or` over every command; the parsed `cmd` picks the handler.
 * The harness (process argv, environment, exit codes) lives in main.ts.
 * This file is pure logic, no process-level side effects.
 */

import { or } from '@optique/core/constructs'
import type { InferValue } from '@optique/core/parser'
import { Lazy, ShojiError } from '@shoji/core'
import { HttpSession, type Session } from '@shoji/client'

import type { CliRequest, CliResponse } from './types.js'
import { parseAndValidateArgs } from './argv-parser.js'
import { CliServices } from './cli-services.js'
import type { CliConfig } from './config.js'
import { TracingSession } from './tracing-session.js'
import type { CommandOptions } from './command.js'

import { CmdGet } from './commands/get-command.js'
import { CmdResolve } from './commands/resolve-command.js'
import { CmdBy } from './commands/by-command.js'
import { CmdAdd } from './commands/add-command.js'
import { CmdCreate } from './commands/create-command.js'

// ============================================================================
// Commands
// ============================================================================

class Commands {
  readonly get: CmdGet
  readonly resolve: CmdResolve
  readonly by: CmdBy
  readonly add: CmdAdd
  readonly create: CmdCreate

  constructor(services: CliServices) {
    this.get = new CmdGet(services)
    this.resolve = new CmdResolve(services)
    this.by = new CmdBy(services)
    this.add = new CmdAdd(services)
    this.create = new CmdCreate(services)
  }

  program = Lazy.once(() => or(
    this.get.parser.get,
    this.resolve.parser.get,
    this.by.parser.get,
    this.add.parser.get,
    this.create.parser.get,
  ))

  run(args: InferValue<Commands['program']['get']>, opts: CommandOptions): Promise<string> {
    switch (args.cmd) {
      case 'get':     return this.get.run(args, opts)
      case 'resolve': return this.resolve.run(args, opts)
      case 'by':      return this.by.run(args, opts)
      case 'add':     return this.add.run(args, opts)
      case 'create':  return this.create.run(args, opts)
    }
  }
}

// ============================================================================
// CLI
// ============================================================================

export interface CliOptions {
  /** Pre-built session — skips HttpSession. Used for testing. */
  session?: Session
}

export class CLI {
  constructor(
    public cfg: CliConfig,
    private opts: CliOptions = {},
  ) {}

  private baseSession = Lazy.once((): Session =>
    this.opts.session ?? new HttpSession({ headers: this.cfg.headers }),
  )

  async execute(req: CliRequest): Promise<CliResponse> {
    const color = req.color ?? this.cfg.useColor

    // --verbose: one trace line per request, reported ahead of any error
    const trace: string[] = []
    const session = this.cfg.verbose
      ? new TracingSession(this.baseSession.get, (line) => trace.push(line))
      : this.baseSession.get
    const commands = new Commands(new CliServices(session))

    const parsed = await parseAndValidateArgs(commands.program.get, 'shoji', req.argv, color)
    if (!parsed.ok) return parsed.response

    try {
      const result = await commands.run(parsed.value, { color })
      return { exitCode: 0, stdout: result + '\n', stderr: traceOutput(trace) }
    } catch (e) {
      return { exitCode: 1, stderr: traceOutput(trace) + ShojiError.wrap(e).prettyPrint({ color }) + '\n' }
    }
  }
}

function traceOutput(trace: readonly string[]): string {
  return trace.map((line) => line + '\n').join('')
}
