import { XMLBuilder } from 'fast-xml-parser'
import { promises as fs } from 'node:fs'
import { Point } from '../types/base'
import { ArcRow, ArcVariant, AttributeValue } from '../types/edges'
import { Formatter } from './formatter'

export class SvgWriteError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SvgWriteError'
  }
}

export type SvgWriterOptions = {
  invertY?: boolean
  padding?: number
}

type SvgAttributes = Record<string, string | number>

const SVG_NAMESPACE = 'http://www.w3.org/2000/svg'

// Row columns that map onto SVG stroke attributes.
const STROKE_ATTRIBUTES: [string, string][] = [
  ['colour', 'stroke'],
  ['color', 'stroke'],
  ['width', 'stroke-width'],
  ['alpha', 'stroke-opacity']
]

function groupRows(rows: readonly ArcRow[]): Map<string | number, ArcRow[]> {
  const groups = new Map<string | number, ArcRow[]>()
  for (const row of rows) {
    const existing = groups.get(row.group)
    if (existing) {
      existing.push(row)
    } else {
      groups.set(row.group, [row])
    }
  }
  return groups
}

// String groups get their own prefix so `1` and `"1"` stay distinct.
export function edgeId(group: string | number): string {
  return typeof group === 'number' ? `edge-${group}` : `edge-s${group}`
}

function isSvgValue(value: AttributeValue): value is string | number {
  return typeof value === 'string' || typeof value === 'number'
}

export class SvgWriter {
  private formatter: Formatter
  private readonly invertY: boolean
  private readonly padding: number
  private builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    suppressEmptyNode: true
  })

  constructor(options: SvgWriterOptions = {}) {
    this.invertY = options.invertY ?? true
    this.padding = options.padding ?? 0
    this.formatter = new Formatter(this.invertY)
  }

  private strokeAttributes(row: ArcRow): SvgAttributes {
    const attributes: SvgAttributes = { '@_fill': 'none', '@_stroke': 'black' }
    for (const [column, name] of STROKE_ATTRIBUTES) {
      const value = row[column]
      if (isSvgValue(value)) {
        attributes[`@_${name}`] = value
      }
    }
    return attributes
  }

  private viewBox(rows: readonly ArcRow[]): string {
    if (rows.length === 0) {
      return '0 0 0 0'
    }
    const scalar = this.invertY ? -1 : 1
    let left = Infinity
    let right = -Infinity
    let top = Infinity
    let bottom = -Infinity
    for (const row of rows) {
      const y = scalar * row.y
      left = Math.min(left, row.x)
      right = Math.max(right, row.x)
      top = Math.min(top, y)
      bottom = Math.max(bottom, y)
    }
    const xMin = left - this.padding
    const yMin = top - this.padding
    const width = right + this.padding - xMin
    const height = bottom + this.padding - yMin
    return [xMin, yMin, width, height].map((value) => this.round(value)).join(' ')
  }

  private round(value: number): number {
    return Number(value.toFixed(3)) + 0
  }

  private formatPath(points: Point[], variant: ArcVariant): string {
    return variant === ArcVariant.Arc0
      ? this.formatter.formatCubicPath(points)
      : this.formatter.formatPolylinePath(points)
  }

  public format(rows: readonly ArcRow[], variant: ArcVariant): string {
    try {
      const paths: SvgAttributes[] = []
      for (const [group, edgeRows] of groupRows(rows)) {
        const points = edgeRows.map(({ x, y }) => ({ x, y }))
        paths.push({
          '@_id': edgeId(group),
          '@_d': this.formatPath(points, variant),
          ...this.strokeAttributes(edgeRows[0])
        })
      }

      return this.builder.build({
        svg: {
          '@_xmlns': SVG_NAMESPACE,
          '@_viewBox': this.viewBox(rows),
          path: paths
        }
      })
    } catch (error) {
      throw new SvgWriteError(
        `Failed to write SVG: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }
  }

  public async formatAndWrite(
    rows: readonly ArcRow[],
    variant: ArcVariant,
    outputPath: string
  ): Promise<string> {
    const svg = this.format(rows, variant)
    await fs.writeFile(outputPath, svg, 'utf8')
    return svg
  }
}
