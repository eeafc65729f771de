import type { Bin } from "../shelf-pack-types"

/** Interiors intersect. Bins sharing only an edge do not overlap. */
export const binsOverlap = (a: Bin, b: Bin): boolean =>
  a.x < b.x + b.w && b.x < a.x + a.w && a.y < b.y + b.h && b.y < a.y + a.h
