import { ControlPolygon } from '../bezier/core'
import { N_CONTROL_POINTS } from '../constants'
import { Point } from '../types/base'
import {
  ArcOptions,
  ArcRow,
  ArcVariant,
  Attributes,
  EndpointPair,
  RawRow,
  ResolvedArcOptions
} from '../types/edges'
import { deriveControlPolygon } from './geometry'
import { interpolateAttributes } from './interpolate'
import { resolveArcOptions } from './options'
import { sampleControlPolygon } from './sampler'
import { readEndpointEdges, readPairedEdges } from './table'

// One control point tagged with its place in the batch draw order.
export interface ControlRecord {
  order: number
  group: string | number
  point: Point
  attributes: Attributes
}

interface ArcSegment {
  group: string | number
  polygon: ControlPolygon
  startAttributes: Attributes
  endAttributes: Attributes
}

export function createControlRecords(
  edges: readonly EndpointPair[],
  options: ResolvedArcOptions
): ControlRecord[] {
  const records: ControlRecord[] = []

  edges.forEach((edge, k) => {
    const { start, control1, control2, end } = deriveControlPolygon(
      edge.start,
      edge.end,
      edge.circular,
      options.curvature,
      options.fold
    )
    const bezierStart = k * N_CONTROL_POINTS
    const { group, startAttributes, endAttributes } = edge

    records.push(
      { order: bezierStart, group, point: start, attributes: startAttributes },
      { order: bezierStart + 1, group, point: control1, attributes: startAttributes },
      { order: bezierStart + 2, group, point: control2, attributes: endAttributes },
      { order: bezierStart + 3, group, point: end, attributes: endAttributes }
    )
  })

  return records.sort((a, b) => a.order - b.order)
}

// Sorted records form contiguous blocks of four per edge.
function toSegments(records: readonly ControlRecord[]): ArcSegment[] {
  const segments: ArcSegment[] = []
  for (let i = 0; i < records.length; i += N_CONTROL_POINTS) {
    const [start, control1, control2, end] = records.slice(i, i + N_CONTROL_POINTS)
    segments.push({
      group: start.group,
      polygon: {
        start: start.point,
        control1: control1.point,
        control2: control2.point,
        end: end.point
      },
      startAttributes: start.attributes,
      endAttributes: end.attributes
    })
  }
  return segments
}

function sampleSegments(
  segments: readonly ArcSegment[],
  n: number,
  interpolate: boolean
): ArcRow[] {
  return segments.flatMap((segment) =>
    sampleControlPolygon(segment.polygon, n).map(({ x, y, t }) => {
      const attributes = interpolate
        ? interpolateAttributes(segment.startAttributes, segment.endAttributes, t)
        : segment.startAttributes
      return { ...attributes, x, y, group: segment.group, index: t }
    })
  )
}

export function createArc(rows: readonly RawRow[], options: ArcOptions = {}): ArcRow[] {
  const resolved = resolveArcOptions(options, ArcVariant.Arc)
  const records = createControlRecords(readPairedEdges(rows), resolved)
  return sampleSegments(toSegments(records), resolved.n, false)
}

export function createArc2(rows: readonly RawRow[], options: ArcOptions = {}): ArcRow[] {
  const resolved = resolveArcOptions(options, ArcVariant.Arc2)
  const records = createControlRecords(readEndpointEdges(rows), resolved)
  return sampleSegments(toSegments(records), resolved.n, true)
}

export function createArc0(rows: readonly RawRow[], options: ArcOptions = {}): ArcRow[] {
  const resolved = resolveArcOptions(options, ArcVariant.Arc0)
  return createControlRecords(readPairedEdges(rows), resolved).map((record) => ({
    ...record.attributes,
    x: record.point.x,
    y: record.point.y,
    group: record.group
  }))
}

export function createArcs(
  rows: readonly RawRow[],
  variant: ArcVariant,
  options: ArcOptions = {}
): ArcRow[] {
  switch (variant) {
    case ArcVariant.Arc:
      return createArc(rows, options)
    case ArcVariant.Arc2:
      return createArc2(rows, options)
    case ArcVariant.Arc0:
      return createArc0(rows, options)
    default: {
      const unknown: never = variant
      throw new Error(`Unsupported arc variant: ${String(unknown)}`)
    }
  }
}
