/**
 * World-space height bands used by the biome generators, relative to the
 * -60 baseline of the world floor.
 */
export const WORLD_BASELINE = -60

export const SEA_LEVEL = WORLD_BASELINE + 76

/**
 * Mountain line and snow line share one threshold.
 */
export const HIGH_ALTITUDE_LEVEL = WORLD_BASELINE + 100

export const MOUNTAIN_LEVEL = HIGH_ALTITUDE_LEVEL
export const SNOW_LEVEL = HIGH_ALTITUDE_LEVEL
