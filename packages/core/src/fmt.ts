/**
 * Fmt — text styling for printers.
 *
 * `Fmt.ansi` wraps text in SGR escape codes, `Fmt.plain` leaves it as is.
 * Commands choose once per request with `Fmt.usingColor`.
 */
import {StaticTypeCompanion} from "./companion.js";

/** SGR parameter for each style */
const SGR = {
  bold: 1,
  dim: 2,
  underline: 4,
  red: 31,
  green: 32,
  yellow: 33,
  cyan: 36,
} as const

export type FmtStyle = keyof typeof SGR

type Styler = (text: string) => string

export interface Fmt extends Record<FmtStyle, Styler> {
  readonly isColor: boolean
}

function buildFmt(color: boolean): Fmt {
  const style = (name: FmtStyle): Styler =>
    color ? (text) => `\x1b[${SGR[name]}m${text}\x1b[0m` : (text) => text
  return Object.freeze({
    isColor: color,
    bold: style('bold'),
    dim: style('dim'),
    underline: style('underline'),
    red: style('red'),
    green: style('green'),
    yellow: style('yellow'),
    cyan: style('cyan'),
  })
}

const ansi = buildFmt(true)
const plain = buildFmt(false)

export const Fmt = StaticTypeCompanion({
  ansi,
  plain,
  usingColor(color: boolean): Fmt {
    return color ? ansi : plain
  },
})
