#!/usr/bin/env node
import { createArcs } from './arc/assembler'
import { InputValidationError } from './arc/exceptions'
import { EdgeTableReader } from './reader/base'
import { ArcOptions, ArcVariant } from './types/edges'
import { SvgWriter } from './writer/base'

export type RenderOptions = ArcOptions & {
  variant?: ArcVariant
  invertY?: boolean
}

export interface CliArgs {
  inputFile: string
  outputFile: string
  options: RenderOptions
}

export async function renderArcs(
  inputPath: string,
  outputPath: string,
  options: RenderOptions = {}
): Promise<string> {
  const { variant = ArcVariant.Arc, invertY, ...arcOptions } = options

  // Read.
  const reader = new EdgeTableReader()
  const rows = await reader.readFile(inputPath)

  // Build arcs.
  const arcs = createArcs(rows, variant, arcOptions)

  // Write.
  const writer = new SvgWriter({ invertY })
  return writer.formatAndWrite(arcs, variant, outputPath)
}

function parseVariant(value: string): ArcVariant {
  const variant = Object.values(ArcVariant).find((candidate) => candidate === value)
  if (!variant) {
    throw new InputValidationError(`Unknown variant: ${value}`)
  }
  return variant
}

function parseNumberFlag(name: string, value: string): number {
  const num = Number(value)
  if (value.trim() === '' || Number.isNaN(num)) {
    throw new InputValidationError(`Invalid ${name}: ${value}`)
  }
  return num
}

export function parseCliArgs(args: readonly string[]): CliArgs {
  // Separate flags from file arguments.
  const flags = args.filter((arg) => arg.startsWith('--'))
  const fileArgs = args.filter((arg) => !arg.startsWith('--'))

  if (fileArgs.length < 1) {
    throw new InputValidationError('Missing input file')
  }

  const inputFile = fileArgs[0]
  // Default output file is input filename with .svg extension.
  const outputFile = fileArgs[1] || inputFile.replace(/\.[^/.]+$/, '') + '.svg'

  const options: RenderOptions = {}
  for (const flag of flags) {
    const [name, value = ''] = flag.slice(2).split('=', 2)
    switch (name) {
      case 'variant':
        options.variant = parseVariant(value)
        break
      case 'curvature':
        options.curvature = parseNumberFlag(name, value)
        break
      case 'n':
        options.n = parseNumberFlag(name, value)
        break
      case 'fold':
        options.fold = true
        break
      case 'no-invert-y':
        options.invertY = false
        break
      default:
        throw new InputValidationError(`Unknown flag: ${flag}`)
    }
  }

  return { inputFile, outputFile, options }
}

async function main() {
  const args = process.argv.slice(2)

  if (args.length < 1) {
    console.log('Usage: edge-arcs <edges.json> [output.svg] [--variant=arc|arc2|arc0]')
    console.log('       [--curvature=<number>] [--n=<samples>] [--fold] [--no-invert-y]')
    console.log('Example: edge-arcs ./edges.json ./arcs.svg --curvature=0.6 --fold')
    process.exitCode = 1
    return
  }

  try {
    const { inputFile, outputFile, options } = parseCliArgs(args)
    await renderArcs(inputFile, outputFile, options)
    console.log(`Successfully rendered ${inputFile} to ${outputFile}`)
  } catch (error) {
    console.error('Rendering failed:', error instanceof Error ? error.message : error)
    process.exitCode = 1
  }
}

// Run the main function if this file is executed directly.
if (require.main === module) {
  void main()
}
