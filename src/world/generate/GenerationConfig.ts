import { readFileSync, writeFileSync } from 'node:fs'
import { CHUNK_SIZE } from '../interfaces/IChunk.ts'
import { BIOME_NOISE_FREQUENCY } from './BiomeNoise.ts'

export interface IGenerationConfig {
  seed: number
  chunkSize: number
  biomeNoiseFrequency: number
}

const DEFAULT_CONFIG: IGenerationConfig = {
  seed: Date.now(),
  chunkSize: CHUNK_SIZE,
  biomeNoiseFrequency: BIOME_NOISE_FREQUENCY,
}

const MAX_CHUNK_SIZE = 256

const CONFIG_FIELDS = ['seed', 'chunkSize', 'biomeNoiseFrequency'] as const

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function isValidFrequency(value: number): boolean {
  return Number.isFinite(value) && value > 0
}

/**
 * Keep the stored fields that hold usable numbers. Anything else is dropped
 * with a warning so the default applies.
 */
function readStoredConfig(parsed: unknown): Partial<IGenerationConfig> {
  const result: Partial<IGenerationConfig> = {}
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    console.warn('Ignoring world config that is not an object:', parsed)
    return result
  }

  for (const field of CONFIG_FIELDS) {
    if (!(field in parsed)) continue
    const value: unknown = Reflect.get(parsed, field)
    if (isFiniteNumber(value) && (field !== 'biomeNoiseFrequency' || isValidFrequency(value))) {
      result[field] = value
    } else {
      console.warn(`Ignoring stored world config ${field}:`, value)
    }
  }
  return result
}

/**
 * World generation settings. Values come from defaults, then the optional
 * JSON file at `storagePath`, then explicit overrides.
 */
export class GenerationConfig {
  private config: IGenerationConfig
  private readonly storagePath: string | undefined

  constructor(overrides?: Partial<IGenerationConfig>, storagePath?: string) {
    this.storagePath = storagePath
    this.config = this.normalize(this.load(overrides))
  }

  private load(overrides?: Partial<IGenerationConfig>): IGenerationConfig {
    if (this.storagePath) {
      try {
        const stored = readFileSync(this.storagePath, 'utf8')
        const parsed: unknown = JSON.parse(stored)
        return { ...DEFAULT_CONFIG, ...readStoredConfig(parsed), ...overrides }
      } catch (e) {
        console.warn('Failed to load world config:', e)
      }
    }
    return { ...DEFAULT_CONFIG, ...overrides }
  }

  private normalize(config: IGenerationConfig): IGenerationConfig {
    const chunkSize = Math.round(config.chunkSize)
    if (!Number.isFinite(chunkSize)) {
      throw new Error(`Invalid chunk size: ${config.chunkSize}`)
    }
    if (!isValidFrequency(config.biomeNoiseFrequency)) {
      throw new Error(`Invalid biome noise frequency: ${config.biomeNoiseFrequency}`)
    }
    if (!Number.isFinite(config.seed)) {
      throw new Error(`Invalid seed: ${config.seed}`)
    }
    return {
      // Same unsigned 32-bit value WorleyNoise seeds its permutation with
      seed: Math.trunc(config.seed) >>> 0,
      chunkSize: Math.max(1, Math.min(MAX_CHUNK_SIZE, chunkSize)),
      biomeNoiseFrequency: config.biomeNoiseFrequency,
    }
  }

  save(): void {
    if (!this.storagePath) return
    try {
      writeFileSync(this.storagePath, JSON.stringify(this.config, null, 2))
    } catch (e) {
      console.warn('Failed to save world config:', e)
    }
  }

  get seed(): number {
    return this.config.seed
  }

  get chunkSize(): number {
    return this.config.chunkSize
  }

  get biomeNoiseFrequency(): number {
    return this.config.biomeNoiseFrequency
  }

  reset(newSeed?: number): void {
    this.config = this.normalize({ ...DEFAULT_CONFIG, seed: newSeed ?? Date.now() })
    this.save()
  }

  getConfig(): IGenerationConfig {
    return { ...this.config }
  }
}
