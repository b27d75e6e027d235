import { Point } from './base'

// The three ways edges can be turned into arcs.
export enum ArcVariant {
  Arc = 'arc',
  Arc2 = 'arc2',
  Arc0 = 'arc0'
}

export type AttributeValue = string | number | boolean | null

// Any styling columns carried alongside the geometry.
export type Attributes = Record<string, AttributeValue>

// A row as it comes in from the caller, before validation.
export type RawRow = Record<string, unknown>

// An edge ready for geometry, whatever the input shape was.
export interface EndpointPair {
  start: Point
  end: Point
  circular: boolean
  group: string | number
  startAttributes: Attributes
  endAttributes: Attributes
}

export type ArcOptions = {
  curvature?: number
  fold?: boolean
  n?: number
}

export type ResolvedArcOptions = Required<ArcOptions>

// An output row. `index` is the position along the path and is absent for
// unsampled arcs.
export type ArcRow = Attributes & {
  x: number
  y: number
  group: string | number
  index?: number
}
