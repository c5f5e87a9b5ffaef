import { isJsonObject, parseJson, type JsonValue } from '@shoji/client'
import { ErrInvalidJson } from './errors.js'

export interface CliConfigOptions {
  readonly verbose?: boolean
  readonly useColor?: boolean
  /** Sent with every request */
  readonly headers?: Readonly<Record<string, string>>
}

/**
 * CliConfig — resolved settings for one CLI process.
 *
 * Built from explicit options; `fromEnvironment` fills the gaps from
 * SHOJI_TOKEN, SHOJI_HEADERS, NO_COLOR and whether stdout is a terminal.
 */
export class CliConfig {
  readonly verbose: boolean
  readonly useColor: boolean
  readonly headers: Readonly<Record<string, string>>

  constructor(opts: CliConfigOptions = {}) {
    this.verbose = opts.verbose ?? false
    this.useColor = opts.useColor ?? false
    this.headers = opts.headers ?? {}
  }

  static fromEnvironment(
    overrides: CliConfigOptions = {},
    env: NodeJS.ProcessEnv = process.env,
    isTTY: boolean = process.stdout.isTTY === true,
  ): CliConfig {
    const token = env.SHOJI_TOKEN
    const headers = {
      ...parseHeaders(env.SHOJI_HEADERS),
      ...(token ? { Authorization: `Bearer ${token}` } : {}),
      ...overrides.headers,
    }
    return new CliConfig({
      verbose: overrides.verbose,
      useColor: overrides.useColor ?? (isTTY && !env.NO_COLOR),
      headers,
    })
  }
}

/** SHOJI_HEADERS: a JSON object of header name → string value */
export function parseHeaders(text: string | undefined): Record<string, string> {
  if (text === undefined || text.trim() === '') return {}

  let value: JsonValue
  try {
    value = parseJson(text)
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw ErrInvalidJson.create({ source: 'SHOJI_HEADERS', reason: err.message })
    }
    throw err
  }

  if (!isJsonObject(value)) {
    throw ErrInvalidJson.create({ source: 'SHOJI_HEADERS', reason: 'expected an object of header values' })
  }
  const headers: Record<string, string> = {}
  for (const [name, header] of Object.entries(value)) {
    if (typeof header !== 'string') {
      throw ErrInvalidJson.create({ source: 'SHOJI_HEADERS', reason: `header ${name} is not a string` })
    }
    headers[name] = header
  }
  return headers
}
