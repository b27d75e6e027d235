import { describe, expect, it } from '@jest/globals'
import { InputValidationError } from '../../src/arc/exceptions'
import { interpolateAttributes, interpolateValue, mixHexColours } from '../../src/arc/interpolate'
import { isSamplingVariant, resolveArcOptions } from '../../src/arc/options'
import { ArcVariant } from '../../src/types/edges'

describe('Arc options', () => {
  it('should fill in defaults', () => {
    expect(resolveArcOptions()).toEqual({ curvature: 1, fold: false, n: 100 })
  })

  it('should keep given values', () => {
    expect(resolveArcOptions({ curvature: -0.4, fold: true, n: 12 }, ArcVariant.Arc2)).toEqual({
      curvature: -0.4,
      fold: true,
      n: 12
    })
  })

  it('should reject a curvature that is not finite', () => {
    expect(() => resolveArcOptions({ curvature: Number.NaN })).toThrow('Invalid curvature: NaN')
    expect(() => resolveArcOptions({ curvature: Infinity })).toThrow(InputValidationError)
  })

  it('should only check the sample count for sampling variants', () => {
    expect(() => resolveArcOptions({ n: 1 }, ArcVariant.Arc)).toThrow(InputValidationError)
    expect(() => resolveArcOptions({ n: 1 }, ArcVariant.Arc2)).toThrow(InputValidationError)
    expect(resolveArcOptions({ n: 1 }, ArcVariant.Arc0).n).toBe(1)
  })

  it('should know which variants sample', () => {
    expect(isSamplingVariant(ArcVariant.Arc)).toBe(true)
    expect(isSamplingVariant(ArcVariant.Arc2)).toBe(true)
    expect(isSamplingVariant(ArcVariant.Arc0)).toBe(false)
  })
})

describe('Attribute interpolation', () => {
  it('should mix hex colours per channel', () => {
    expect(mixHexColours('#000000', '#ff0000', 0.5)).toBe('#800000')
    expect(mixHexColours('#102030', '#102030', 0.3)).toBe('#102030')
    expect(mixHexColours('#00FF00', '#000000', 0.25)).toBe('#00bf00')
  })

  it('should mix short hex colours', () => {
    expect(mixHexColours('#fff', '#000', 0.5)).toBe('#808080')
  })

  it('should keep colours verbatim at the nodes', () => {
    expect(interpolateValue('#FFFFFF', '#000000', 0)).toBe('#FFFFFF')
    expect(interpolateValue('#FFFFFF', '#000', 1)).toBe('#000')
  })

  it('should switch colours it cannot mix halfway', () => {
    expect(mixHexColours('#ff000080', '#00ff0080', 0.5)).toBeNull()
    expect(interpolateValue('red', 'blue', 0.4)).toBe('red')
    expect(interpolateValue('red', 'blue', 0.5)).toBe('blue')
  })

  it('should not treat colour names as hex', () => {
    expect(mixHexColours('red', '#000000', 0.5)).toBeNull()
  })

  it('should interpolate numbers linearly', () => {
    expect(interpolateValue(1, 3, 0.25)).toBe(1.5)
  })

  it('should switch discrete values halfway', () => {
    expect(interpolateValue('a', 'b', 0.49)).toBe('a')
    expect(interpolateValue('a', 'b', 0.5)).toBe('b')
    expect(interpolateValue(true, 2, 0.2)).toBe(true)
  })

  it('should carry columns present at only one end', () => {
    expect(interpolateAttributes({ width: 1, label: 'x' }, { width: 3, alpha: 0.5 }, 0.5)).toEqual({
      width: 2,
      label: 'x',
      alpha: 0.5
    })
  })
})
