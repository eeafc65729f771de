import type { Bin } from "../shelf-pack-types"
import { findOverlappingBins } from "./findOverlappingBins"

const describeBin = (bin: Bin) =>
  `{x:${bin.x}, y:${bin.y}, w:${bin.w}, h:${bin.h}}`

/**
 * Strict validation of a set of placements.
 * This should NEVER fail for bins produced by ShelfPack - if it does, it's a
 * bug in the shelf bookkeeping. Throws on the first problem found.
 */
export function validatePlacements(params: {
  bins: readonly Bin[]
  width: number
  height: number
}): void {
  const { bins, width, height } = params

  for (const bin of bins) {
    if (
      bin.x < 0 ||
      bin.y < 0 ||
      bin.x + bin.w > width ||
      bin.y + bin.h > height
    ) {
      throw new Error(
        `VALIDATION ERROR: Bin ${bin.id} lies outside the ${width}x${height} surface. ` +
          `Bin: ${describeBin(bin)}`,
      )
    }
  }

  const [overlap] = findOverlappingBins(bins)
  if (overlap) {
    const [a, b] = overlap
    throw new Error(
      `VALIDATION ERROR: Bin ${a.id} overlaps with bin ${b.id}. ` +
        `Bin1: ${describeBin(a)}. Bin2: ${describeBin(b)}`,
    )
  }
}
