import type { BiomeType, IBiomeGenerator } from '../BiomeGenerator.ts'
import { BasicLandGenerator } from './BasicLandGenerator.ts'
import { DryLandGenerator } from './DryLandGenerator.ts'
import { SnowLandGenerator } from './SnowLandGenerator.ts'
import { SandLandGenerator } from './SandLandGenerator.ts'
import { BlueLandGenerator } from './BlueLandGenerator.ts'

/**
 * One selection band: attributes below `upperBound` (and at or above the
 * previous band's bound) select `type`.
 */
export interface BiomeBand {
  readonly upperBound: number
  readonly type: BiomeType
}

/**
 * Ordered threshold bands, first match wins. The last band is unbounded above.
 * Changing a bound changes generated worlds.
 */
export const BIOME_BANDS: readonly BiomeBand[] = [
  { upperBound: 0.1, type: 'basic-land' },
  { upperBound: 0.4, type: 'dry-land' },
  { upperBound: 0.6, type: 'snow-land' },
  { upperBound: 0.8, type: 'sand-land' },
  { upperBound: Infinity, type: 'blue-land' },
]

/**
 * Map a biome attribute to a biome type.
 * Non-finite attributes mean the noise field is broken, so they throw.
 */
export function selectBiomeType(attribute: number): BiomeType {
  if (!Number.isFinite(attribute)) {
    throw new RangeError(`Biome attribute must be finite, got ${attribute}`)
  }

  for (const band of BIOME_BANDS) {
    if (attribute < band.upperBound) {
      return band.type
    }
  }

  // Unreachable while the last band is unbounded
  throw new Error(`No biome band covers attribute ${attribute}`)
}

/**
 * Get the generator singleton for a biome type.
 */
export function getGenerator(type: BiomeType): IBiomeGenerator {
  switch (type) {
    case 'basic-land':
      return BasicLandGenerator
    case 'dry-land':
      return DryLandGenerator
    case 'snow-land':
      return SnowLandGenerator
    case 'sand-land':
      return SandLandGenerator
    case 'blue-land':
      return BlueLandGenerator
  }
}

export function selectGenerator(attribute: number): IBiomeGenerator {
  return getGenerator(selectBiomeType(attribute))
}

/**
 * All biome types in band order.
 */
export function getAllBiomeTypes(): BiomeType[] {
  return BIOME_BANDS.map((band) => band.type)
}
