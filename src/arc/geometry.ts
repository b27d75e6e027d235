import { Bezier, ControlPolygon } from '../bezier/core'
import { Point } from '../types/base'

function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y)
}

// Pull a point towards the origin, keeping its angle.
function scaleTowardsOrigin(point: Point, factor: number): Point {
  return { x: point.x * factor, y: point.y * factor }
}

// Project a control point to the side of the axis given by the sign of the
// curvature. Only y moves.
export function foldControlPoint(point: Point, curvature: number): Point {
  return { x: point.x, y: Math.abs(point.y) * Math.sign(curvature) }
}

function circularControlPoints(start: Point, end: Point): [Point, Point] {
  const halfDistance = distance(start, end) / 2

  // Both endpoints sit on the same ring, so the end radius serves for both.
  const radius = Math.hypot(end.x, end.y)
  if (radius === 0) {
    return [
      { x: 0, y: 0 },
      { x: 0, y: 0 }
    ]
  }

  const factor = 1 - halfDistance / radius
  return [scaleTowardsOrigin(start, factor), scaleTowardsOrigin(end, factor)]
}

function linearControlPoints(start: Point, end: Point, curvature: number): [Point, Point] {
  const halfDistance = distance(start, end) / 2
  const edgeAngle = Math.atan2(end.y - start.y, end.x - start.x)
  const bendAngle = (Math.PI / 2) * curvature
  const startAngle = edgeAngle - bendAngle
  const endAngle = edgeAngle - Math.PI + bendAngle

  return [
    {
      x: start.x + Math.cos(startAngle) * halfDistance,
      y: start.y + Math.sin(startAngle) * halfDistance
    },
    {
      x: end.x + Math.cos(endAngle) * halfDistance,
      y: end.y + Math.sin(endAngle) * halfDistance
    }
  ]
}

export function deriveControlPolygon(
  start: Point,
  end: Point,
  circular: boolean,
  curvature: number,
  fold: boolean
): ControlPolygon {
  const [control1, control2] = circular
    ? circularControlPoints(start, end)
    : linearControlPoints(start, end, curvature)

  // Folding has no meaning on a ring.
  if (fold && !circular) {
    return {
      start: { x: start.x, y: start.y },
      control1: foldControlPoint(control1, curvature),
      control2: foldControlPoint(control2, curvature),
      end: { x: end.x, y: end.y }
    }
  }

  return {
    start: { x: start.x, y: start.y },
    control1,
    control2,
    end: { x: end.x, y: end.y }
  }
}

export function deriveArc(
  start: Point,
  end: Point,
  circular: boolean,
  curvature: number,
  fold: boolean
): Bezier {
  return Bezier.cubic(deriveControlPolygon(start, end, circular, curvature, fold))
}
