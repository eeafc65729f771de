// lib/shelf-pack-types.ts
export const UNPLACED = -1

/** A placed rectangle. Frozen once returned by the packer. */
export type Bin = Readonly<{
  id: number
  w: number
  h: number
  x: number
  y: number
}>

/**
 * Caller-owned request. `x`/`y` are absent (or `UNPLACED`) until a batch
 * packed with `inPlace` writes the placement back.
 */
export type BinRequest = {
  id?: number
  w: number
  h: number
  x?: number
  y?: number
}

export type IdGenerator = () => number

export type ShelfPackOptions = {
  autoResize?: boolean
  /** Supplies ids for bins packed without one. Defaults to a per-packer sequence. */
  idGenerator?: IdGenerator
}

export type PackOptions = {
  /** Write `x`, `y` and `id` back onto the request objects. */
  inPlace?: boolean
  /** Shrink the surface to the bounding box of the shelves after the batch. */
  shrink?: boolean
}

export type ShelfSnapshot = {
  y: number
  w: number
  h: number
  wfree: number
}

export type SurfaceSize = { width: number; height: number }
