/**
 * Minimal RFC 4180 CSV encoding and parsing
 */

export type CsvCell = string | number

const NEEDS_QUOTES = /[",\r\n]/

export function encodeCsvCell(value: CsvCell): string {
  const text = String(value)
  return NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export function encodeCsvRow(cells: CsvCell[]): string {
  return cells.map(encodeCsvCell).join(',')
}

export function encodeCsv(rows: CsvCell[][]): string {
  return rows.map((row) => `${encodeCsvRow(row)}\r\n`).join('')
}

export class CsvParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CsvParseError'
  }
}

/**
 * Parse CSV text into records. Blank lines are skipped; an unterminated
 * quoted field is an error.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = []
  let record: string[] = []
  let field = ''
  let inQuotes = false
  let fieldStarted = false

  const endRecord = () => {
    if (fieldStarted || record.length > 0) {
      record.push(field)
      records.push(record)
    }
    record = []
    field = ''
    fieldStarted = false
  }

  for (let i = 0; i < text.length; i++) {
    const char = text[i]

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        field += char
      }
      continue
    }

    if (char === '"') {
      inQuotes = true
      fieldStarted = true
    } else if (char === ',') {
      record.push(field)
      field = ''
      fieldStarted = true
    } else if (char === '\n') {
      endRecord()
    } else if (char === '\r') {
      if (text[i + 1] !== '\n') endRecord()
    } else {
      field += char
      fieldStarted = true
    }
  }

  if (inQuotes) {
    throw new CsvParseError('Unterminated quoted field at end of input')
  }
  endRecord()
  return records
}
