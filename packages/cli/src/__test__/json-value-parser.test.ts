import { describe, test, expect } from 'vitest'
import { jsonObject } from '../parsers/json-value-parser.js'

describe('jsonObject', () => {
  const parser = jsonObject('--body')

  test('parses an object', () => {
    expect(parser.parse('{"name":"a","n":1}')).toEqual({ success: true, value: { name: 'a', n: 1 } })
  })

  test('fails on other JSON and on malformed input', () => {
    expect(parser.parse('[1]').success).toBe(false)
    expect(parser.parse('"a"').success).toBe(false)
    expect(parser.parse('{a').success).toBe(false)
  })

  test('formats back to compact JSON', () => {
    expect(parser.format({ a: [1, 2] })).toBe('{"a":[1,2]}')
  })
})
