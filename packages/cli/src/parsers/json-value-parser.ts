/**
 * JSON object value parser for arguments such as `--attrs` and `--body`.
 *
 * Invalid input is reported through optique as a parse failure, worded
 * like the cli.invalid_json error.
 */

import { isJsonObject, parseJson, type JsonObject } from '@shoji/client'
import type { ValueParser, ValueParserResult } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import { ErrInvalidJson } from '../errors.js'

export function jsonObject(source: string): ValueParser<'sync', JsonObject> {
  const failure = (reason: string): ValueParserResult<JsonObject> => {
    const msg = ErrInvalidJson.create({ source, reason }).message
    return { success: false, error: message`${msg}` }
  }

  return {
    $mode: 'sync',
    metavar: 'JSON',

    parse(input: string): ValueParserResult<JsonObject> {
      try {
        const value = parseJson(input)
        return isJsonObject(value) ? { success: true, value } : failure('expected an object')
      } catch (e: unknown) {
        if (e instanceof SyntaxError) return failure(e.message)
        throw e
      }
    },

    format(value: JsonObject): string {
      return JSON.stringify(value)
    },
  }
}
