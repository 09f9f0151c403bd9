import { isSolidVoxel, VoxelIds, type VoxelId } from '../blocks/VoxelIds.ts'
import type { VoxelBuffer } from '../chunks/VoxelBuffer.ts'
import type { ChunkKey, ILocalCoordinate } from '../interfaces/ICoordinates.ts'

export type BiomeType = 'basic-land' | 'dry-land' | 'snow-land' | 'sand-land' | 'blue-land'

/**
 * Everything a biome needs to decorate one surface column.
 */
export interface BiomeColumnInfo {
  readonly chunkKey: ChunkKey
  readonly voxels: VoxelBuffer
  /** Linear index of the surface voxel in the chunk buffer */
  readonly chunkIndex: number
  /** Linear index of the column in the biome attribute field */
  readonly planeIndex: number
  /** World-space height of the surface voxel */
  readonly height: number
  readonly local: ILocalCoordinate
}

/**
 * A biome's surface rule. Implementations are stateless singletons and may only
 * write to the column they are given, inside the given buffer.
 */
export interface IBiomeGenerator {
  readonly type: BiomeType

  genLandWithInfo(info: BiomeColumnInfo): void
}

/**
 * Derive height and local coordinates for a surface voxel, then hand the column
 * to the generator.
 */
export function genLand(
  generator: IBiomeGenerator,
  chunkKey: ChunkKey,
  voxels: VoxelBuffer,
  chunkIndex: number,
  planeIndex: number
): void {
  const local = voxels.shape.delinearize3d(chunkIndex)
  const height = chunkKey.y * voxels.shape.edge + local.y

  generator.genLandWithInfo({
    chunkKey,
    voxels,
    chunkIndex,
    planeIndex,
    height,
    local,
  })
}

/**
 * Replace up to `depth` solid voxels directly below `local`.
 * Stops at the chunk floor; air and water pockets are left alone.
 * Returns the number of voxels written.
 */
export function layDown(
  voxels: VoxelBuffer,
  local: ILocalCoordinate,
  depth: number,
  voxel: VoxelId
): number {
  let written = 0
  const bottom = Math.max(0, local.y - depth)

  for (let y = local.y - 1; y >= bottom; y--) {
    if (!isSolidVoxel(voxels.getAt(local.x, y, local.z))) continue
    voxels.setAt(local.x, y, local.z, voxel)
    written++
  }

  return written
}

/**
 * Fill empty voxels above `local` up to (not including) local height `topY`.
 * Clamped to the chunk ceiling. Returns the number of voxels written.
 */
export function fillAbove(
  voxels: VoxelBuffer,
  local: ILocalCoordinate,
  topY: number,
  voxel: VoxelId
): number {
  let written = 0
  const top = Math.min(topY, voxels.shape.edge)

  for (let y = local.y + 1; y < top; y++) {
    if (voxels.getAt(local.x, y, local.z) !== VoxelIds.EMPTY) continue
    voxels.setAt(local.x, y, local.z, voxel)
    written++
  }

  return written
}
