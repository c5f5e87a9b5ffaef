import { describe, test, expect } from 'vitest'
import { CliConfig, parseHeaders } from '../config.js'
import { ErrInvalidJson } from '../errors.js'

function errorOf(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('Expected an error')
}

describe('CliConfig', () => {
  test('defaults', () => {
    const cfg = new CliConfig()
    expect(cfg.verbose).toBe(false)
    expect(cfg.useColor).toBe(false)
    expect(cfg.headers).toEqual({})
  })

  test('fromEnvironment reads token and extra headers', () => {
    const cfg = CliConfig.fromEnvironment(
      { verbose: true },
      { SHOJI_TOKEN: 'test-token', SHOJI_HEADERS: '{"X-Trace":"1"}' },
      true,
    )

    expect(cfg.verbose).toBe(true)
    expect(cfg.useColor).toBe(true)
    expect(cfg.headers).toEqual({ 'X-Trace': '1', Authorization: 'Bearer test-token' })
  })

  test('NO_COLOR or a non-terminal turns colour off', () => {
    expect(CliConfig.fromEnvironment({}, { NO_COLOR: '1' }, true).useColor).toBe(false)
    expect(CliConfig.fromEnvironment({}, {}, false).useColor).toBe(false)
    expect(CliConfig.fromEnvironment({ useColor: true }, {}, false).useColor).toBe(true)
  })
})

describe('parseHeaders', () => {
  test('empty or unset means no headers', () => {
    expect(parseHeaders(undefined)).toEqual({})
    expect(parseHeaders('  ')).toEqual({})
  })

  test('rejects malformed JSON', () => {
    expect(ErrInvalidJson.is(errorOf(() => parseHeaders('{nope')))).toBe(true)
  })

  test('rejects anything but an object of strings', () => {
    const notObject = errorOf(() => parseHeaders('[1]'))
    const notString = errorOf(() => parseHeaders('{"X-A":1}'))

    expect(ErrInvalidJson.is(notObject) && notObject.message).toBe(
      'Invalid JSON in SHOJI_HEADERS: expected an object of header values',
    )
    expect(ErrInvalidJson.is(notString) && notString.message).toBe(
      'Invalid JSON in SHOJI_HEADERS: header X-A is not a string',
    )
  })
})
