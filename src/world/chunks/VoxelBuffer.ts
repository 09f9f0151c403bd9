import type { VoxelId } from '../blocks/VoxelIds.ts'
import { ChunkShape, DEFAULT_CHUNK_SHAPE } from '../coordinates/CoordinateUtils.ts'

/**
 * Dense voxel storage for one chunk, indexed by ChunkShape.linearize3d.
 * Owned by a single generation call; generators must not keep a reference.
 */
export class VoxelBuffer {
  readonly shape: ChunkShape

  private readonly voxels: Uint16Array

  constructor(voxels: Uint16Array, shape: ChunkShape = DEFAULT_CHUNK_SHAPE) {
    if (voxels.length !== shape.volume) {
      throw new RangeError(
        `Voxel buffer holds ${voxels.length} voxels, expected ${shape.volume} for edge ${shape.edge}`
      )
    }
    this.voxels = voxels
    this.shape = shape
  }

  /**
   * Create a new buffer filled with EMPTY.
   */
  static create(shape: ChunkShape = DEFAULT_CHUNK_SHAPE): VoxelBuffer {
    return new VoxelBuffer(new Uint16Array(shape.volume), shape)
  }

  get length(): number {
    return this.voxels.length
  }

  get(index: number): VoxelId {
    this.assertIndex(index)
    return this.voxels[index]
  }

  /**
   * Set voxel at a linear index.
   * Returns true if the voxel changed.
   */
  set(index: number, voxel: VoxelId): boolean {
    this.assertIndex(index)
    if (this.voxels[index] === voxel) {
      return false
    }
    this.voxels[index] = voxel
    return true
  }

  getAt(x: number, y: number, z: number): VoxelId {
    return this.voxels[this.shape.linearize3d(x, y, z)]
  }

  setAt(x: number, y: number, z: number, voxel: VoxelId): boolean {
    return this.set(this.shape.linearize3d(x, y, z), voxel)
  }

  /**
   * Get the raw voxel array for meshing/transfer.
   */
  getData(): Uint16Array {
    return this.voxels
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.voxels.length) {
      throw new RangeError(`Voxel index ${index} outside [0, ${this.voxels.length})`)
    }
  }
}
