/**
 * Voxel ID type - uint16 supports 0-65535 voxel types.
 */
export type VoxelId = number

/**
 * Central registry of the voxel IDs biome generation writes.
 * 0 is reserved for EMPTY: air, and the "not yet set" marker for later passes.
 */
export enum VoxelIds {
  EMPTY = 0,
  STONE = 1,
  DIRT = 2,
  GRASS = 3,
  SAND = 4,
  SANDSTONE = 5,
  SNOW = 6,
  DRY_GRASS = 7,
  GRAVEL = 8,
  WATER = 9,
}

export function isSolidVoxel(id: VoxelId): boolean {
  return id !== VoxelIds.EMPTY && id !== VoxelIds.WATER
}
