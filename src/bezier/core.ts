import { Point } from '../types/base'
import { evaluateCubicBezier } from './math'

export interface BezierPointsCubic {
  start: Point
  control1: Point
  control2: Point
  end: Point
}

// The four points defining one arc, in draw order.
export type ControlPolygon = BezierPointsCubic

export class Bezier {
  public readonly start: Point
  public readonly control1: Point
  public readonly control2: Point
  public readonly end: Point

  private constructor(start: Point, control1: Point, control2: Point, end: Point) {
    this.start = start
    this.control1 = control1
    this.control2 = control2
    this.end = end
  }

  static cubic(object: BezierPointsCubic): Bezier {
    return new Bezier(object.start, object.control1, object.control2, object.end)
  }

  asCubic(): BezierPointsCubic {
    return {
      start: this.start,
      control1: this.control1,
      control2: this.control2,
      end: this.end
    }
  }

  // Points in the order a renderer walks them: start, control1, control2, end.
  get points(): [Point, Point, Point, Point] {
    return [this.start, this.control1, this.control2, this.end]
  }

  // Exact at the ends so sampled paths meet their nodes without drift.
  evaluate(t: number): Point {
    if (t === 0) {
      return { ...this.start }
    }
    if (t === 1) {
      return { ...this.end }
    }
    return evaluateCubicBezier(t, this.asCubic())
  }
}
