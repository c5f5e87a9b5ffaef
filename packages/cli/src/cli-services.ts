/**
 * CliServices — per-request container for command classes.
 *
 * Holds the session every command talks through, plus the printers and
 * the fetch-and-check helpers commands share.
 */

import { Fmt, PrintFormatter } from '@shoji/core'
import { Catalog, Element, ShojiResponse, type Session, type ShojiDocument } from '@shoji/client'
import { ErrUnexpectedPayload } from './errors.js'
import type { OutputFormat } from './parsers/standard-opts.js'
import { DocumentPrinters, type AddView, type GroupingView, type Printable } from './printers/document-printers.js'

export class CliServices {
  private colorPrinter = new PrintFormatter(Fmt.ansi)
  private plainPrinter = new PrintFormatter(Fmt.plain)

  constructor(readonly session: Session) {}

  getPrintFormatter(color: boolean): PrintFormatter {
    return color ? this.colorPrinter : this.plainPrinter
  }

  formatValue(value: Printable, output: OutputFormat | undefined, color: boolean): string {
    const printer = this.getPrintFormatter(color)
    switch (output) {
      case 'json': return printer.printVia(DocumentPrinters.ValueJson, value)
      default:     return printer.printVia(DocumentPrinters.ValueText, value)
    }
  }

  formatGrouping(view: GroupingView, output: OutputFormat | undefined, color: boolean): string {
    const printer = this.getPrintFormatter(color)
    switch (output) {
      case 'json': return printer.printVia(DocumentPrinters.GroupingJson, view)
      default:     return printer.printVia(DocumentPrinters.GroupingText, view)
    }
  }

  formatAdd(view: AddView, output: OutputFormat | undefined, color: boolean): string {
    const printer = this.getPrintFormatter(color)
    switch (output) {
      case 'json': return printer.printVia(DocumentPrinters.AddJson, view)
      default:     return printer.printVia(DocumentPrinters.AddText, view)
    }
  }

  /** GET a URL that must answer with a Shoji document */
  async fetchDocument(url: string): Promise<ShojiDocument> {
    const response = await this.session.get(url)
    const payload = ShojiResponse.expectPayload(response, url)
    if (!Element.isDocument(payload)) {
      throw ErrUnexpectedPayload.create({ url, expected: 'Shoji document', received: 'plain JSON' })
    }
    return payload
  }

  /** GET a URL that must answer with a catalog */
  async fetchCatalog(url: string): Promise<Catalog> {
    const document = await this.fetchDocument(url)
    if (!(document instanceof Catalog)) {
      throw ErrUnexpectedPayload.create({ url, expected: 'catalog', received: document.kind })
    }
    return document
  }
}
