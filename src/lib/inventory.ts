import { readFile } from 'node:fs/promises'
import { isIP } from 'node:net'
import type { Logger } from './logger'
import type {
  InventoryParseResult,
  InventoryRecord,
  ParseDiagnostic,
} from '@/types'

export interface ParseOptions {
  logger?: Logger
  /** Report lines with an empty hostname or address instead of dropping them */
  reportEmptyFields?: boolean
}

export class InventoryReadError extends Error {
  constructor(readonly path: string, cause: unknown) {
    super(
      `Inventory file could not be read: ${path} (${cause instanceof Error ? cause.message : String(cause)})`,
      { cause }
    )
    this.name = 'InventoryReadError'
  }
}

type LineResult =
  | { type: 'skip' }
  | { type: 'drop' }
  | { type: 'record'; record: InventoryRecord }
  | { type: 'diagnostic'; diagnostic: ParseDiagnostic }

/**
 * Split a line on commas. A field that starts with a double quote runs to the
 * closing quote and may contain commas; `""` inside it is a literal quote.
 */
export function splitFields(line: string): string[] {
  const fields: string[] = []
  let field = ''
  let quoted = false
  let atFieldStart = true

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]

    if (quoted) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          field += '"'
          i++
        } else {
          quoted = false
        }
      } else {
        field += ch
      }
      continue
    }

    if (ch === '"' && atFieldStart) {
      quoted = true
      atFieldStart = false
    } else if (ch === ',') {
      fields.push(field)
      field = ''
      atFieldStart = true
    } else {
      field += ch
      atFieldStart = false
    }
  }

  fields.push(field)
  return fields
}

export function isValidAddress(value: string): boolean {
  return isIP(value) !== 0
}

function diagnostic(
  lineNumber: number,
  rawLine: string,
  kind: ParseDiagnostic['kind'],
  reason: string
): LineResult {
  return { type: 'diagnostic', diagnostic: Object.freeze({ lineNumber, rawLine, kind, reason }) }
}

function classifyLine(rawLine: string, lineNumber: number, options: ParseOptions): LineResult {
  if (rawLine.trim() === '') return { type: 'skip' }

  const fields = splitFields(rawLine)
  if (fields[0].trim().startsWith('#')) return { type: 'skip' }

  let hostname: string
  let address: string

  if (fields.length >= 2) {
    hostname = fields[0]
    address = fields[1]
  } else {
    // A quoted "host,address" arrives as one field
    const comma = fields[0].indexOf(',')
    const head = comma === -1 ? '' : fields[0].slice(0, comma)
    const tail = comma === -1 ? '' : fields[0].slice(comma + 1)
    if (!head || !tail) {
      return diagnostic(lineNumber, rawLine, 'MalformedLine', "expected 'hostname,address'")
    }
    hostname = head
    address = tail
  }

  hostname = hostname.trim()
  address = address.trim()

  if (hostname === '' || address === '') {
    if (options.reportEmptyFields) {
      return diagnostic(lineNumber, rawLine, 'EmptyField', 'empty hostname or address')
    }
    return { type: 'drop' }
  }

  if (!isValidAddress(address)) {
    return diagnostic(lineNumber, rawLine, 'InvalidAddress', `invalid address: ${address}`)
  }

  return { type: 'record', record: Object.freeze({ hostname, address }) }
}

class InventoryCollector {
  private result: InventoryParseResult = {
    records: [],
    diagnostics: [],
    stats: { totalLines: 0, skipped: 0, dropped: 0 },
  }

  constructor(private options: ParseOptions) {}

  push(rawLine: string): void {
    const lineNumber = ++this.result.stats.totalLines
    const outcome = classifyLine(rawLine, lineNumber, this.options)

    switch (outcome.type) {
      case 'skip':
        this.result.stats.skipped++
        break
      case 'drop':
        this.result.stats.dropped++
        this.options.logger?.debug({ lineNumber, rawLine }, 'Dropped line with empty field')
        break
      case 'record':
        this.result.records.push(outcome.record)
        break
      case 'diagnostic':
        this.result.diagnostics.push(outcome.diagnostic)
        this.options.logger?.warn(
          { lineNumber, rawLine, kind: outcome.diagnostic.kind },
          `Parse error line ${lineNumber}: ${outcome.diagnostic.reason}`
        )
        break
    }
  }

  finish(): InventoryParseResult {
    return this.result
  }
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/)
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}

/** Parse inventory text. Never throws for malformed content. */
export function parseInventory(text: string, options: ParseOptions = {}): InventoryParseResult {
  const collector = new InventoryCollector(options)
  for (const line of splitLines(text)) collector.push(line)
  return collector.finish()
}

/** Parse a stream of lines, e.g. a `readline` interface over stdin. */
export async function parseInventoryStream(
  lines: AsyncIterable<string>,
  options: ParseOptions = {}
): Promise<InventoryParseResult> {
  const collector = new InventoryCollector(options)
  for await (const line of lines) collector.push(line)
  return collector.finish()
}

export async function readInventory(path: string, options: ParseOptions = {}): Promise<InventoryParseResult> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    throw new InventoryReadError(path, err)
  }

  const result = parseInventory(text, options)
  options.logger?.info(
    { path, valid: result.records.length, parseErrors: result.diagnostics.length },
    `Parsed inventory: ${result.records.length} valid entries, ${result.diagnostics.length} parse errors`
  )
  return result
}
