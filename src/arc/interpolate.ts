import { lerp } from '../bezier/math'
import { AttributeValue, Attributes } from '../types/edges'

// Only opaque hex colours blend. Names and #rrggbbaa switch over like any
// other discrete value.
const HEX_COLOUR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i
const SHORT_HEX_COLOUR = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/i

function parseHexColour(value: string): [number, number, number] | null {
  const match = HEX_COLOUR.exec(value)
  if (match) {
    return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)]
  }
  const short = SHORT_HEX_COLOUR.exec(value)
  if (short) {
    const channel = (digit: string) => parseInt(digit + digit, 16)
    return [channel(short[1]), channel(short[2]), channel(short[3])]
  }
  return null
}

function toHex(channel: number): string {
  return Math.round(channel).toString(16).padStart(2, '0')
}

export function mixHexColours(from: string, to: string, t: number): string | null {
  const a = parseHexColour(from)
  const b = parseHexColour(to)
  if (!a || !b) {
    return null
  }
  return `#${toHex(lerp(a[0], b[0], t))}${toHex(lerp(a[1], b[1], t))}${toHex(lerp(a[2], b[2], t))}`
}

export function interpolateValue(
  from: AttributeValue,
  to: AttributeValue,
  t: number
): AttributeValue {
  // The nodes keep their values exactly as given.
  if (t === 0) {
    return from
  }
  if (t === 1) {
    return to
  }
  if (typeof from === 'number' && typeof to === 'number') {
    return lerp(from, to, t)
  }
  if (typeof from === 'string' && typeof to === 'string') {
    const mixed = mixHexColours(from, to, t)
    if (mixed !== null) {
      return mixed
    }
  }
  // Discrete values switch over halfway along the arc.
  return t < 0.5 ? from : to
}

// Attributes for a point `t` of the way from the start node to the end node.
// A column present at only one end is carried as is.
export function interpolateAttributes(from: Attributes, to: Attributes, t: number): Attributes {
  const result: Attributes = {}
  for (const key of new Set([...Object.keys(from), ...Object.keys(to)])) {
    if (!(key in to)) {
      result[key] = from[key]
    } else if (!(key in from)) {
      result[key] = to[key]
    } else {
      result[key] = interpolateValue(from[key], to[key], t)
    }
  }
  return result
}
