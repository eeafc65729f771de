import type { Shelf } from "../Shelf"

export type ShelfSelection =
  | { type: "exact"; shelf: Shelf }
  | { type: "best-fit"; shelf: Shelf; waste: number }
  | { type: "new-shelf"; y: number }
  | { type: "no-space"; y: number }

/**
 * Shelf Best-Height-Fit.
 *
 * An exact height match with room wins immediately. Otherwise the shelf
 * wasting the least height is chosen, the earliest one on ties. With no
 * usable shelf, a new shelf goes at the bottom of the stack if the surface
 * has room for it.
 */
export const selectShelf = (params: {
  shelves: readonly Shelf[]
  w: number
  h: number
  width: number
  height: number
}): ShelfSelection => {
  const { shelves, w, h, width, height } = params

  let y = 0
  let best: { shelf: Shelf; waste: number } | null = null

  for (const shelf of shelves) {
    y += shelf.h

    if (h === shelf.h && w <= shelf.wfree) {
      return { type: "exact", shelf }
    }
    if (h > shelf.h || w > shelf.wfree) {
      continue
    }

    const waste = shelf.h - h
    if (!best || waste < best.waste) {
      best = { shelf, waste }
    }
  }

  if (best) {
    return { type: "best-fit", ...best }
  }

  if (y + h <= height && w <= width) {
    return { type: "new-shelf", y }
  }

  return { type: "no-space", y }
}
