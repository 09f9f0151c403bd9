import { describe, it, expect } from 'vitest'
import {
  BIOME_BANDS,
  getAllBiomeTypes,
  getGenerator,
  selectBiomeType,
  selectGenerator,
} from '../world/generate/biomes/BiomeRegistry.ts'
import { BasicLandGenerator } from '../world/generate/biomes/BasicLandGenerator.ts'
import { DryLandGenerator } from '../world/generate/biomes/DryLandGenerator.ts'
import { BlueLandGenerator } from '../world/generate/biomes/BlueLandGenerator.ts'

describe('BiomeRegistry', () => {
  describe('selectBiomeType', () => {
    it('pins the threshold bands', () => {
      expect(BIOME_BANDS.map((band) => band.upperBound)).toEqual([0.1, 0.4, 0.6, 0.8, Infinity])
      expect(getAllBiomeTypes()).toEqual([
        'basic-land',
        'dry-land',
        'snow-land',
        'sand-land',
        'blue-land',
      ])
    })

    it('resolves boundary values to the upper band', () => {
      expect(selectBiomeType(0.1)).toBe('dry-land')
      expect(selectBiomeType(0.4)).toBe('snow-land')
      expect(selectBiomeType(0.6)).toBe('sand-land')
      expect(selectBiomeType(0.8)).toBe('blue-land')
    })

    it('selects within each band', () => {
      expect(selectBiomeType(0.0999)).toBe('basic-land')
      expect(selectBiomeType(0.25)).toBe('dry-land')
      expect(selectBiomeType(0.5)).toBe('snow-land')
      expect(selectBiomeType(0.7999)).toBe('sand-land')
      expect(selectBiomeType(0.95)).toBe('blue-land')
    })

    it('covers the whole finite range', () => {
      expect(selectBiomeType(-Number.MAX_VALUE)).toBe('basic-land')
      expect(selectBiomeType(-1)).toBe('basic-land')
      expect(selectBiomeType(0)).toBe('basic-land')
      expect(selectBiomeType(1)).toBe('blue-land')
      expect(selectBiomeType(Number.MAX_VALUE)).toBe('blue-land')
    })

    it('throws on non-finite attributes', () => {
      expect(() => selectBiomeType(Number.NaN)).toThrow(RangeError)
      expect(() => selectBiomeType(Infinity)).toThrow(RangeError)
      expect(() => selectBiomeType(-Infinity)).toThrow(RangeError)
    })
  })

  describe('getGenerator', () => {
    it('returns the generator for each type', () => {
      for (const type of getAllBiomeTypes()) {
        expect(getGenerator(type).type).toBe(type)
      }
    })
  })

  describe('selectGenerator', () => {
    it('returns shared singletons', () => {
      expect(selectGenerator(0.05)).toBe(BasicLandGenerator)
      expect(selectGenerator(0.1)).toBe(DryLandGenerator)
      expect(selectGenerator(0.3)).toBe(selectGenerator(0.2))
      expect(selectGenerator(0.9)).toBe(BlueLandGenerator)
    })
  })
})
