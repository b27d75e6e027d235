export {
  createArc,
  createArc0,
  createArc2,
  createArcs,
  createControlRecords
} from './arc/assembler'
export type { ControlRecord } from './arc/assembler'
export { InputValidationError } from './arc/exceptions'
export { deriveArc, deriveControlPolygon, foldControlPoint } from './arc/geometry'
export { interpolateAttributes } from './arc/interpolate'
export { resolveArcOptions } from './arc/options'
export { sampleControlPolygon } from './arc/sampler'
export { Bezier } from './bezier/core'
export type { BezierPointsCubic, ControlPolygon } from './bezier/core'
export { EdgeTableReader, EdgeTableReadError } from './reader/base'
export { renderArcs } from './main'
export type { RenderOptions } from './main'
export type { Point } from './types/base'
export { ArcVariant } from './types/edges'
export type { ArcOptions, ArcRow, Attributes, EndpointPair, RawRow } from './types/edges'
export type { SampledPoint } from './utils/bezier'
export { SvgWriter, SvgWriteError } from './writer/base'
export { Formatter, FormatterError } from './writer/formatter'
