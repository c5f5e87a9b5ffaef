/**
 * @shoji/cli - `shoji` command line for browsing Shoji APIs
 */

export { CLI } from './cli.js'
export type { CliOptions } from './cli.js'
export { CliConfig, parseHeaders } from './config.js'
export type { CliConfigOptions } from './config.js'
export { TracingSession } from './tracing-session.js'
export { main } from './main.js'
export type { CliRequest, CliResponse } from './types.js'
export * from './errors.js'
