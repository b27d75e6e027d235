import { DEFAULT_CURVATURE, DEFAULT_N_SAMPLES } from '../constants'
import { ArcOptions, ArcVariant, ResolvedArcOptions } from '../types/edges'
import { InputValidationError } from './exceptions'
import { assertSampleCount } from './sampler'

export function isSamplingVariant(variant: ArcVariant): boolean {
  return variant !== ArcVariant.Arc0
}

export function resolveArcOptions(
  options: ArcOptions = {},
  variant: ArcVariant = ArcVariant.Arc
): ResolvedArcOptions {
  const curvature = options.curvature ?? DEFAULT_CURVATURE
  const fold = options.fold ?? false
  const n = options.n ?? DEFAULT_N_SAMPLES

  if (typeof curvature !== 'number' || !Number.isFinite(curvature)) {
    throw new InputValidationError(`Invalid curvature: ${curvature}`)
  }
  if (typeof fold !== 'boolean') {
    throw new InputValidationError(`Invalid fold: ${fold}`)
  }

  // Unsampled arcs never look at n.
  if (isSamplingVariant(variant)) {
    assertSampleCount(n)
  }

  return { curvature, fold, n }
}
