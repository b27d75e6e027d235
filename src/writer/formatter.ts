import { COORDINATE_PRECISION } from '../constants'
import { Point } from '../types/base'

export class FormatterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FormatterError'
  }
}

export class Formatter {
  // Plot space is y-up, SVG is y-down.
  constructor(private readonly invertY: boolean = true) {}

  public formatPoint(point: Point): string {
    const scalar = this.invertY ? -1 : 1
    // Adding 0 turns -0 into 0.
    const x = Number(point.x.toFixed(COORDINATE_PRECISION)) + 0
    const y = Number((scalar * point.y).toFixed(COORDINATE_PRECISION)) + 0
    return `${x} ${y}`
  }

  // For renderers that stroke the bezier themselves.
  public formatCubicPath(points: readonly Point[]): string {
    if (points.length !== 4) {
      throw new FormatterError(`A cubic path needs 4 points, got ${points.length}`)
    }
    const [start, control1, control2, end] = points
    const controls = [control1, control2, end].map((point) => this.formatPoint(point))
    return `M ${this.formatPoint(start)} C ${controls.join(' ')}`
  }

  public formatPolylinePath(points: readonly Point[]): string {
    if (points.length < 2) {
      throw new FormatterError(`A polyline needs at least 2 points, got ${points.length}`)
    }
    const [first, ...rest] = points
    const segments = rest.map((point) => `L ${this.formatPoint(point)}`)
    return `M ${this.formatPoint(first)} ${segments.join(' ')}`
  }
}
