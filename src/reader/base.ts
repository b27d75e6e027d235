import { promises as fs } from 'node:fs'
import { RawRow } from '../types/edges'

export class EdgeTableReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'EdgeTableReadError'
  }
}

function isRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export class EdgeTableReader {
  // Accepts a bare array of rows or an object with an `edges` array.
  private extractRows(parsed: unknown): RawRow[] {
    const rows = isRow(parsed) ? parsed.edges : parsed

    if (!Array.isArray(rows)) {
      throw new EdgeTableReadError('No edge rows found')
    }

    return rows.map((row: unknown, i: number) => {
      if (!isRow(row)) {
        throw new EdgeTableReadError(`Row ${i} is not an object`)
      }
      return row
    })
  }

  public readString(content: string): RawRow[] {
    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (error) {
      throw new EdgeTableReadError(
        `Failed to parse edge table: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }
    return this.extractRows(parsed)
  }

  public async readFile(filepath: string): Promise<RawRow[]> {
    const content = await fs.readFile(filepath, 'utf8')
    return this.readString(content)
  }
}
