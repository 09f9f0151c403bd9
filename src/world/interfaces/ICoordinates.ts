/**
 * Chunk key: integer position of a chunk in chunk space (not world units).
 * Treated as an immutable value; compare with chunkKeysEqual, hash with chunkKeyToString.
 */
export interface ChunkKey {
  readonly x: number
  readonly y: number
  readonly z: number
}

/**
 * Local coordinates within a chunk (0 to edge - 1 on every axis).
 */
export interface ILocalCoordinate {
  readonly x: number
  readonly y: number
  readonly z: number
}

/**
 * Local coordinates within a chunk's horizontal footprint.
 */
export interface IPlaneCoordinate {
  readonly x: number
  readonly z: number
}

/**
 * String form of a chunk key for Map-based storage.
 * Format: "x,y,z"
 */
export type ChunkKeyString = string

/**
 * Create a chunk key from chunk-space coordinates.
 */
export function createChunkKey(x: number, y: number, z: number): ChunkKey {
  if (!Number.isSafeInteger(x) || !Number.isSafeInteger(y) || !Number.isSafeInteger(z)) {
    throw new RangeError(`Chunk key must be integral, got (${x}, ${y}, ${z})`)
  }
  return Object.freeze({ x, y, z })
}

export function chunkKeysEqual(a: ChunkKey, b: ChunkKey): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z
}

export function chunkKeyToString(key: ChunkKey): ChunkKeyString {
  return `${key.x},${key.y},${key.z}`
}

/**
 * Parse a chunk key string back to a key.
 */
export function parseChunkKey(value: ChunkKeyString): ChunkKey {
  const parts = value.split(',')
  if (parts.length !== 3 || parts.some((part) => !/^-?\d+$/.test(part))) {
    throw new Error(`Invalid chunk key: "${value}"`)
  }
  const [x, y, z] = parts.map((part) => Number(part))
  return createChunkKey(x, y, z)
}
