import { Vector2 } from 'three'

export type WorleyDistance = 'euclidean' | 'manhattan' | 'chebyshev'

/**
 * What a sample reports: the nearest feature cell's random value, or the
 * distance to the nearest feature point.
 */
export type WorleyReturnType = 'value' | 'distance'

export interface WorleyOptions {
  frequency?: number
  distance?: WorleyDistance
  returnType?: WorleyReturnType
}

/**
 * World-space rectangle sampled into a width x height grid.
 * Bounds are [lower, upper); sample i sits at lower + i * (upper - lower) / size.
 */
export interface PlaneBounds {
  readonly width: number
  readonly height: number
  readonly xBounds: readonly [number, number]
  readonly zBounds: readonly [number, number]
}

// Jitter stays inside the cell, so a cell three away is never closer than the sample's own
const SEARCH_RADIUS = 2

type DistanceFunction = (a: Vector2, b: Vector2) => number

const DISTANCE_FUNCTIONS: Record<WorleyDistance, DistanceFunction> = {
  euclidean: (a, b) => a.distanceTo(b),
  manhattan: (a, b) => a.manhattanDistanceTo(b),
  chebyshev: (a, b) => Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y)),
}

/**
 * Seeded 2D Worley (cellular) noise.
 * One jittered feature point per unit cell; each sample looks at the 5x5 cells
 * around it, which always contains the nearest point. 'value' samples are in [-1, 1]; 'distance' samples start at -1.
 */
export class WorleyNoise {
  readonly frequency: number
  readonly distance: WorleyDistance
  readonly returnType: WorleyReturnType

  private readonly perm: Uint8Array
  private readonly distanceTo: DistanceFunction

  // Scratch vectors, reused across samples
  private readonly samplePoint = new Vector2()
  private readonly featurePoint = new Vector2()

  constructor(seed: number, options: WorleyOptions = {}) {
    this.frequency = options.frequency ?? 1
    this.distance = options.distance ?? 'euclidean'
    this.returnType = options.returnType ?? 'value'
    this.distanceTo = DISTANCE_FUNCTIONS[this.distance]

    if (!Number.isFinite(this.frequency) || this.frequency <= 0) {
      throw new RangeError(`Worley frequency must be positive, got ${this.frequency}`)
    }

    this.perm = new Uint8Array(512)

    const p = new Uint8Array(256)
    for (let i = 0; i < 256; i++) {
      p[i] = i
    }

    // Fisher-Yates shuffle with seeded LCG random
    let s = seed >>> 0
    for (let i = 255; i > 0; i--) {
      s = (s * 1103515245 + 12345) >>> 0
      const j = s % (i + 1)
      const tmp = p[i]
      p[i] = p[j]
      p[j] = tmp
    }

    // Double the permutation table for wrapping
    for (let i = 0; i < 512; i++) {
      this.perm[i] = p[i & 255]
    }
  }

  /**
   * Sample the noise at world coordinates.
   */
  get(x: number, z: number): number {
    const px = x * this.frequency
    const pz = z * this.frequency
    const cellX = Math.floor(px)
    const cellZ = Math.floor(pz)

    this.samplePoint.set(px, pz)

    let nearest = Infinity
    let nearestHash = 0

    for (let dz = -SEARCH_RADIUS; dz <= SEARCH_RADIUS; dz++) {
      for (let dx = -SEARCH_RADIUS; dx <= SEARCH_RADIUS; dx++) {
        const gx = cellX + dx
        const gz = cellZ + dz

        this.getFeaturePoint(gx, gz, this.featurePoint)

        const d = this.distanceTo(this.samplePoint, this.featurePoint)
        if (d < nearest) {
          nearest = d
          nearestHash = this.hashCell(gx, gz)
        }
      }
    }

    if (this.returnType === 'distance') {
      return nearest * 2 - 1
    }
    return (this.perm[nearestHash + 2] / 255) * 2 - 1
  }

  /**
   * Feature point of a unit cell, in frequency-scaled space.
   */
  getFeaturePoint(cellX: number, cellZ: number, target: Vector2 = new Vector2()): Vector2 {
    const hash = this.hashCell(cellX, cellZ)
    return target.set(cellX + this.perm[hash] / 256, cellZ + this.perm[hash + 1] / 256)
  }

  /**
   * Sample a world-space rectangle into a row-major (z-major) grid.
   */
  samplePlane(bounds: PlaneBounds): Float32Array {
    const { width, height, xBounds, zBounds } = bounds
    if (!Number.isInteger(width) || width < 1 || !Number.isInteger(height) || height < 1) {
      throw new RangeError(`Plane size must be positive integers, got ${width}x${height}`)
    }

    const xStep = (xBounds[1] - xBounds[0]) / width
    const zStep = (zBounds[1] - zBounds[0]) / height
    const out = new Float32Array(width * height)

    for (let z = 0; z < height; z++) {
      const worldZ = zBounds[0] + zStep * z
      for (let x = 0; x < width; x++) {
        out[z * width + x] = this.get(xBounds[0] + xStep * x, worldZ)
      }
    }

    return out
  }

  private hashCell(x: number, z: number): number {
    return this.perm[(x & 255) + this.perm[z & 255]]
  }
}
