import type {CliResponse} from "./types.js";
import type {InferValue, Mode, Parser} from '@optique/core/parser'
import {runParserAsync, RunParserError} from '@optique/core/facade'

/** Sentinel thrown by runParserAsync callbacks to signal help/error was shown. */
const HELP_SHOWN = Symbol("help");
const ERROR_SHOWN = Symbol("error");

type RunResult<T> =
  | { ok: true; value: T }
  | { ok: false; response: CliResponse };

/**
 * Run optique over argv, capturing help and usage errors as a response
 * instead of letting them reach the process.
 */
export async function parseAndValidateArgs<TParser extends Parser<Mode, unknown, unknown>>(
  parser: TParser,
  programName: string,
  args: readonly string[],
  useColor?: boolean
): Promise<RunResult<InferValue<TParser>>> {
  let stdout = "";
  let stderr = "";

  try {
    const value = await runParserAsync(parser, programName, args, {
      colors: useColor,
      aboveError: 'usage',
      help: {
        mode: 'both',
        onShow: () => {
          throw HELP_SHOWN
        },
      },
      onError: () => {
        throw ERROR_SHOWN
      },
      stdout: (text) => {
        stdout += text + '\n'
      },
      stderr: (text) => {
        stderr += text + '\n'
      },
    })
    return { ok: true, value };
  } catch (e) {
    if (e === HELP_SHOWN) {
      return { ok: false, response: { stdout, exitCode: 0 } };
    }
    if (e === ERROR_SHOWN || e instanceof RunParserError) {
      return { ok: false, response: { stderr, exitCode: 1 } };
    }
    throw e;
  }
}
