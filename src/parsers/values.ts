import { InputValidationError } from '../arc/exceptions'
import { AttributeValue, Attributes, RawRow } from '../types/edges'

export function readNumber(row: RawRow, name: string, rowIndex: number): number {
  const value = row[name]
  if (value === undefined || value === null) {
    throw new InputValidationError(`Row ${rowIndex}: missing ${name}`)
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InputValidationError(`Row ${rowIndex}: invalid ${name}: ${String(value)}`)
  }
  return value
}

export function readBoolean(row: RawRow, name: string, rowIndex: number): boolean {
  const value = row[name]
  if (value === undefined || value === null) {
    throw new InputValidationError(`Row ${rowIndex}: missing ${name}`)
  }
  if (typeof value !== 'boolean') {
    throw new InputValidationError(`Row ${rowIndex}: ${name} must be logical, got ${String(value)}`)
  }
  return value
}

export function readGroup(row: RawRow, rowIndex: number): string | number {
  const value = row.group
  if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
    return value
  }
  throw new InputValidationError(`Row ${rowIndex}: missing or invalid group`)
}

function isAttributeValue(value: unknown): value is AttributeValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  )
}

// Everything that is not geometry is carried through untouched.
export function readAttributes(
  row: RawRow,
  exclude: readonly string[],
  rowIndex: number
): Attributes {
  const attributes: Attributes = {}
  for (const [key, value] of Object.entries(row)) {
    if (exclude.includes(key) || value === undefined) {
      continue
    }
    if (!isAttributeValue(value)) {
      throw new InputValidationError(`Row ${rowIndex}: unsupported value for ${key}`)
    }
    attributes[key] = value
  }
  return attributes
}
