import { InputValidationError } from '../arc/exceptions'
import { Bezier } from '../bezier/core'
import { DEFAULT_N_SAMPLES } from '../constants'
import { Point } from '../types/base'

export interface SampledPoint extends Point {
  t: number
}

export function assertSampleCount(n: number): void {
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 2) {
    throw new InputValidationError(`Number of samples must be an integer of at least 2, got ${n}`)
  }
}

export function sampleParameters(numSamples: number): number[] {
  const params: number[] = []
  for (let i = 0; i < numSamples; i++) {
    params.push(i === numSamples - 1 ? 1 : i / (numSamples - 1))
  }
  return params
}

export function sampleCubicBezier(
  bezier: Bezier,
  numSamples: number = DEFAULT_N_SAMPLES
): SampledPoint[] {
  assertSampleCount(numSamples)

  // Both ends are included, so the path starts and stops on its nodes.
  return sampleParameters(numSamples).map((t) => ({ ...bezier.evaluate(t), t }))
}
