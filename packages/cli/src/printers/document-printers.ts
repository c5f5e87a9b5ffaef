/**
 * Printers for documents, resolved values and catalog groupings.
 *
 * Text output is for people; JSON output is the wire form (documents and
 * attribute sets through their toJSON, catalog indexes as URL → attributes).
 */

import { Fmt, Printer } from '@shoji/core'
import {
  AttributeSet,
  Catalog,
  Document,
  Entity,
  View,
  type AttributeTuple,
  type GroupKey,
  type JsonValue,
  type Member,
  type Payload,
  type ShojiDocument,
} from '@shoji/client'

/**
 * Anything a command can hand to a printer: a resolved member or a response
 * payload. Undefined stands for a response with no parseable body.
 */
export type Printable = Member | Payload | undefined

function isTupleIndex(value: JsonValue | ReadonlyMap<string, AttributeTuple>): value is ReadonlyMap<string, AttributeTuple> {
  return value instanceof Map
}

export function toPlainJson(value: Printable): JsonValue {
  if (value === undefined) return null
  if (value instanceof Document || value instanceof AttributeSet) return value.toJSON()
  if (isTupleIndex(value)) {
    return Object.fromEntries([...value].map(([url, tuple]): [string, JsonValue] => [url, tuple.toJSON()]))
  }
  return value
}

// ============================================================================
// Shared helpers
// ============================================================================

function section(title: string, fmt: Fmt): string[] {
  return ['', fmt.underline(title)]
}

function pairs(rows: [string, string][], fmt: Fmt): string[] {
  const width = Math.max(0, ...rows.map(([key]) => key.length))
  return rows.map(([key, value]) => `  ${fmt.cyan(key.padEnd(width))}  ${value}`)
}

function attributeLines(attrs: AttributeSet, fmt: Fmt): string[] {
  if (attrs.size === 0) return [`  ${fmt.dim('(empty)')}`]
  return pairs([...attrs.entries()].map(([key, value]): [string, string] => [key, JSON.stringify(value)]), fmt)
}

function documentLines(doc: ShojiDocument, fmt: Fmt): string[] {
  const lines = [`${fmt.bold(doc.variant.element)} ${fmt.dim(doc.self ?? '(unlocated)')}`]

  if (doc instanceof Catalog) {
    lines.push(...section('index', fmt))
    if (doc.index.size === 0) lines.push(`  ${fmt.dim('(empty)')}`)
    for (const [url, tuple] of doc.index) {
      lines.push(`  ${url}  ${fmt.dim(JSON.stringify(tuple.toJSON()))}`)
    }
  } else if (doc instanceof Entity) {
    lines.push(...section('body', fmt), ...attributeLines(doc.body, fmt))
  } else if (doc instanceof View && doc.value !== undefined) {
    lines.push(...section('value', fmt), JSON.stringify(doc.value, null, 2))
  }

  for (const name of doc.variant.navigation) {
    const links = doc.collection(name)
    if (!links || links.size === 0) continue
    lines.push(...section(name, fmt), ...pairs([...links], fmt))
  }
  return lines
}

// ============================================================================
// Values
// ============================================================================

const ValueText = Printer.define<Printable>((value, fmt) => {
  if (value === undefined) return fmt.dim('(no parseable body)')
  if (value instanceof Catalog || value instanceof Entity || value instanceof View) {
    return Printer.lines(documentLines(value, fmt))
  }
  if (value instanceof AttributeSet) return Printer.lines(attributeLines(value, fmt))
  return JSON.stringify(toPlainJson(value), null, 2)
})

const ValueJson = Printer.define<Printable>((value) => JSON.stringify(toPlainJson(value), null, 2))

// ============================================================================
// by
// ============================================================================

export interface GroupingView {
  attr: string
  groups: ReadonlyMap<GroupKey, AttributeTuple>
}

const GroupingText = Printer.define<GroupingView>((view, fmt) => {
  if (view.groups.size === 0) return fmt.dim(`No tuples have ${view.attr}`)
  const rows = [...view.groups].map(([key, tuple]): [string, string] => [String(key), tuple.entityUrl])
  return Printer.lines([fmt.bold(view.attr), ...pairs(rows, fmt)])
})

const GroupingJson = Printer.define<GroupingView>((view) =>
  JSON.stringify(
    [...view.groups].map(([key, tuple]) => ({ key, url: tuple.entityUrl, attributes: tuple.toJSON() })),
    null,
    2,
  ),
)

// ============================================================================
// add
// ============================================================================

export interface AddView {
  catalog: string
  entity: string
  response: Payload | undefined
}

const AddText = Printer.define<AddView>((view, fmt) =>
  `Added ${fmt.bold(view.entity)} to ${fmt.dim(view.catalog)}`,
)

const AddJson = Printer.define<AddView>((view) =>
  JSON.stringify(
    {
      catalog: view.catalog,
      entity: view.entity,
      response: toPlainJson(view.response),
    },
    null,
    2,
  ),
)

export const DocumentPrinters = {
  ValueText,
  ValueJson,
  GroupingText,
  GroupingJson,
  AddText,
  AddJson,
}
