import { Point } from '../types/base'
import { BezierPointsCubic } from './core'

export function evaluateCubicBezier(t: number, object: BezierPointsCubic): Point {
  // B(t) = (1-t)³P0 + 3(1-t)²tP1 + 3(1-t)t²P2 + t³P3
  const { start, control1, control2, end } = object
  const mt = 1 - t
  const mt2 = mt * mt
  const t2 = t * t
  return {
    x: mt2 * mt * start.x + 3 * mt2 * t * control1.x + 3 * mt * t2 * control2.x + t2 * t * end.x,
    y: mt2 * mt * start.y + 3 * mt2 * t * control1.y + 3 * mt * t2 * control2.y + t2 * t * end.y
  }
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t
}
