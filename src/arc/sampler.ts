import { Bezier, ControlPolygon } from '../bezier/core'
import { sampleCubicBezier, SampledPoint } from '../utils/bezier'

export { assertSampleCount } from '../utils/bezier'

export function sampleControlPolygon(polygon: ControlPolygon, n: number): SampledPoint[] {
  return sampleCubicBezier(Bezier.cubic(polygon), n)
}
