import { describe, expect, it } from '@jest/globals'
import { XMLParser } from 'fast-xml-parser'
import { createArc, createArc0, createArc2 } from '../src/arc/assembler'
import { ArcVariant, RawRow } from '../src/types/edges'
import { edgeId, SvgWriteError, SvgWriter } from '../src/writer/base'
import { Formatter, FormatterError } from '../src/writer/formatter'

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  isArray: (name) => name === 'path'
})

const edges: RawRow[] = [
  { x: 0, y: 0, xend: 2, yend: 0, circular: false, colour: 'red', width: 2 },
  { x: 0, y: 0, xend: 4, yend: 0, circular: false, alpha: 0.5 }
]

describe('Formatter', () => {
  const formatter = new Formatter()

  it('should round and flip points', () => {
    expect(formatter.formatPoint({ x: 1.23456, y: 2 })).toBe('1.235 -2')
    expect(formatter.formatPoint({ x: 0, y: 0 })).toBe('0 0')
  })

  it('should leave y alone when asked', () => {
    expect(new Formatter(false).formatPoint({ x: 1, y: 2 })).toBe('1 2')
  })

  it('should write cubic paths', () => {
    const d = formatter.formatCubicPath([
      { x: 0, y: 0 },
      { x: 0, y: -1 },
      { x: 2, y: -1 },
      { x: 2, y: 0 }
    ])

    expect(d).toBe('M 0 0 C 0 1 2 1 2 0')
  })

  it('should write polyline paths', () => {
    expect(
      formatter.formatPolylinePath([
        { x: 0, y: 0 },
        { x: 1, y: 1 },
        { x: 2, y: 0 }
      ])
    ).toBe('M 0 0 L 1 -1 L 2 0')
  })

  it('should bark at the wrong number of points', () => {
    expect(() => formatter.formatCubicPath([{ x: 0, y: 0 }])).toThrow(FormatterError)
    expect(() => formatter.formatPolylinePath([{ x: 0, y: 0 }])).toThrow(
      'A polyline needs at least 2 points, got 1'
    )
  })
})

describe('SVG writer', () => {
  it('should write one bezier path per unsampled edge', () => {
    const svg = new SvgWriter().format(createArc0(edges), ArcVariant.Arc0)
    const paths = parser.parse(svg).svg.path

    expect(paths).toHaveLength(2)
    expect(paths[0]).toEqual({
      id: 'edge-0',
      d: 'M 0 0 C 0 1 2 1 2 0',
      fill: 'none',
      stroke: 'red',
      'stroke-width': '2'
    })
    expect(paths[1].d).toBe('M 0 0 C 0 2 4 2 4 0')
    expect(paths[1]['stroke-opacity']).toBe('0.5')
    expect(paths[1].stroke).toBe('black')
  })

  it('should write sampled edges as polylines', () => {
    const svg = new SvgWriter().format(createArc(edges.slice(0, 1), { n: 3 }), ArcVariant.Arc)
    const paths = parser.parse(svg).svg.path

    expect(paths[0].d).toBe('M 0 0 L 1 0.75 L 2 0')
  })

  it('should size the view box to the arcs', () => {
    const svg = new SvgWriter().format(createArc0(edges.slice(0, 1)), ArcVariant.Arc0)

    expect(parser.parse(svg).svg.viewBox).toBe('0 0 2 1')
  })

  it('should pad the view box', () => {
    const svg = new SvgWriter({ padding: 1 }).format(createArc0(edges.slice(0, 1)), ArcVariant.Arc0)

    expect(parser.parse(svg).svg.viewBox).toBe('-1 -1 4 3')
  })

  it('should handle large batches', () => {
    const straight = Array.from({ length: 2000 }, () => ({
      x: 0,
      y: 0,
      xend: 2,
      yend: 0,
      circular: false
    }))
    const rows = createArc(straight, { curvature: 0 })
    expect(rows).toHaveLength(200000)

    const parsed = parser.parse(new SvgWriter().format(rows, ArcVariant.Arc))

    expect(parsed.svg.path).toHaveLength(2000)
    expect(parsed.svg.viewBox).toBe('0 0 2 0')
  }, 30000)

  it('should keep ids of numeric and string groups apart', () => {
    expect(edgeId(1)).toBe('edge-1')
    expect(edgeId('1')).toBe('edge-s1')

    const rows = createArc2(
      [1, '1', 1, '1'].map((group, i) => ({ x: i, y: 0, group, circular: false })),
      { n: 2 }
    )
    const paths = parser.parse(new SvgWriter().format(rows, ArcVariant.Arc2)).svg.path

    expect(paths.map((p: { id: string }) => p.id)).toEqual(['edge-1', 'edge-s1'])
  })

  it('should wrap formatting failures', () => {
    const rows = createArc(edges.slice(0, 1), { n: 3 })

    expect(() => new SvgWriter().format(rows, ArcVariant.Arc0)).toThrow(SvgWriteError)
    expect(() => new SvgWriter().format(rows, ArcVariant.Arc0)).toThrow(
      'Failed to write SVG: A cubic path needs 4 points, got 3'
    )
  })
})
