import { readAttributes, readBoolean, readGroup, readNumber } from '../parsers/values'
import { EndpointPair, RawRow } from '../types/edges'
import { InputValidationError } from './exceptions'

// Columns consumed by the geometry and never passed through.
const PAIRED_COLUMNS = ['x', 'y', 'xend', 'yend', 'group', 'index']
const ENDPOINT_COLUMNS = ['x', 'y', 'group', 'index']

function withoutFilter(row: RawRow): RawRow {
  const copy: RawRow = {}
  for (const [key, value] of Object.entries(row)) {
    if (key !== 'filter') {
      copy[key] = value
    }
  }
  return copy
}

// Drops rows whose filter is false. A table either has no filter at all or a
// logical one; rows without the column count as kept.
export function applyFilter(rows: readonly RawRow[]): RawRow[] {
  if (!rows.some((row) => 'filter' in row)) {
    return rows.map((row) => ({ ...row }))
  }

  rows.forEach((row, i) => {
    if ('filter' in row && typeof row.filter !== 'boolean') {
      throw new InputValidationError(`Row ${i}: filter must be logical, got ${String(row.filter)}`)
    }
  })

  return rows.filter((row) => row.filter !== false).map(withoutFilter)
}

// One row per edge with start and end inline. Groups are renumbered from 0
// after filtering.
export function readPairedEdges(rows: readonly RawRow[]): EndpointPair[] {
  return applyFilter(rows).map((row, i) => {
    const attributes = readAttributes(row, PAIRED_COLUMNS, i)
    return {
      start: { x: readNumber(row, 'x', i), y: readNumber(row, 'y', i) },
      end: { x: readNumber(row, 'xend', i), y: readNumber(row, 'yend', i) },
      circular: readBoolean(row, 'circular', i),
      group: i,
      startAttributes: attributes,
      endAttributes: attributes
    }
  })
}

// Numeric groups sort before string groups.
export function compareGroups(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b
  }
  if (typeof a === 'number') {
    return -1
  }
  if (typeof b === 'number') {
    return 1
  }
  return a < b ? -1 : a > b ? 1 : 0
}

interface EndpointRecord {
  row: RawRow
  group: string | number
  rowIndex: number
}

// Two rows per edge sharing a group. Within a group the first row is the start
// and the second the end.
export function readEndpointEdges(rows: readonly RawRow[]): EndpointPair[] {
  const records: EndpointRecord[] = applyFilter(rows).map((row, rowIndex) => ({
    row,
    group: readGroup(row, rowIndex),
    rowIndex
  }))
  records.sort((a, b) => compareGroups(a.group, b.group))

  if (records.length % 2 !== 0) {
    throw new InputValidationError(`Endpoint rows must come in pairs, got ${records.length} rows`)
  }

  const edges: EndpointPair[] = []
  for (let i = 0; i < records.length; i += 2) {
    const from = records[i]
    const to = records[i + 1]
    if (from.group !== to.group) {
      throw new InputValidationError(`Group ${from.group} does not have exactly two endpoints`)
    }

    const circular = readBoolean(from.row, 'circular', from.rowIndex)
    if (readBoolean(to.row, 'circular', to.rowIndex) !== circular) {
      throw new InputValidationError(`Group ${from.group}: endpoints disagree on circular`)
    }

    edges.push({
      start: {
        x: readNumber(from.row, 'x', from.rowIndex),
        y: readNumber(from.row, 'y', from.rowIndex)
      },
      end: {
        x: readNumber(to.row, 'x', to.rowIndex),
        y: readNumber(to.row, 'y', to.rowIndex)
      },
      circular,
      group: from.group,
      startAttributes: readAttributes(from.row, ENDPOINT_COLUMNS, from.rowIndex),
      endAttributes: readAttributes(to.row, ENDPOINT_COLUMNS, to.rowIndex)
    })
  }
  return edges
}
