import { Vector3 } from 'three'
import { CHUNK_SIZE } from '../interfaces/IChunk.ts'
import type { ChunkKey, ILocalCoordinate, IPlaneCoordinate } from '../interfaces/ICoordinates.ts'

/**
 * Maps between linear buffer indices and local coordinates for a cubic chunk.
 *
 * Memory layout: Y-major (y * E * E + z * E + x) for the voxel buffer and
 * Z-major (z * E + x) for the planar attribute field. Every generator reads and
 * writes through this class so the two layouts always agree.
 */
export class ChunkShape {
  readonly edge: number
  readonly area: number
  readonly volume: number

  constructor(edge: number) {
    if (!Number.isInteger(edge) || edge < 1) {
      throw new RangeError(`Chunk edge must be a positive integer, got ${edge}`)
    }
    this.edge = edge
    this.area = edge * edge
    this.volume = edge * edge * edge
  }

  linearize3d(x: number, y: number, z: number): number {
    if (!this.isValidLocal(x, y, z)) {
      throw new RangeError(`Local coordinate (${x}, ${y}, ${z}) outside chunk of edge ${this.edge}`)
    }
    return y * this.area + z * this.edge + x
  }

  delinearize3d(index: number): ILocalCoordinate {
    if (!Number.isInteger(index) || index < 0 || index >= this.volume) {
      throw new RangeError(`Chunk index ${index} outside [0, ${this.volume})`)
    }
    const y = Math.floor(index / this.area)
    const remainder = index % this.area
    const z = Math.floor(remainder / this.edge)
    const x = remainder % this.edge
    return { x, y, z }
  }

  linearize2d(x: number, z: number): number {
    if (!this.isValidAxis(x) || !this.isValidAxis(z)) {
      throw new RangeError(`Plane coordinate (${x}, ${z}) outside chunk of edge ${this.edge}`)
    }
    return z * this.edge + x
  }

  delinearize2d(index: number): IPlaneCoordinate {
    if (!Number.isInteger(index) || index < 0 || index >= this.area) {
      throw new RangeError(`Plane index ${index} outside [0, ${this.area})`)
    }
    return {
      x: index % this.edge,
      z: Math.floor(index / this.edge),
    }
  }

  /**
   * Check if local coordinates are valid.
   */
  isValidLocal(x: number, y: number, z: number): boolean {
    return this.isValidAxis(x) && this.isValidAxis(y) && this.isValidAxis(z)
  }

  private isValidAxis(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < this.edge
  }
}

export const DEFAULT_CHUNK_SHAPE = new ChunkShape(CHUNK_SIZE)

/**
 * World-space position of a chunk's local (0, 0, 0).
 */
export function chunkOrigin(key: ChunkKey, shape: ChunkShape = DEFAULT_CHUNK_SHAPE): Vector3 {
  return new Vector3(key.x * shape.edge, key.y * shape.edge, key.z * shape.edge)
}

/**
 * Convert chunk + local coordinates to world coordinates.
 */
export function localToWorld(
  key: ChunkKey,
  local: ILocalCoordinate,
  shape: ChunkShape = DEFAULT_CHUNK_SHAPE
): Vector3 {
  return chunkOrigin(key, shape).add(new Vector3(local.x, local.y, local.z))
}
