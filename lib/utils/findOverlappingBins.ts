import RBush from "rbush"
import type { Bin } from "../shelf-pack-types"
import { binToTree, type BinTreeRect } from "./binToTree"
import { binsOverlap } from "./binsOverlap"

/**
 * Every pair of bins whose interiors intersect, each pair reported once in
 * input order.
 */
export const findOverlappingBins = (
  bins: readonly Bin[],
): Array<[Bin, Bin]> => {
  const treeRects = bins.map((bin, index) => binToTree(bin, index))
  const index = new RBush<BinTreeRect>()
  index.load(treeRects)

  const pairs: Array<[Bin, Bin]> = []
  for (const treeRect of treeRects) {
    const hits = index
      .search(treeRect)
      .filter(
        (hit) =>
          hit.index > treeRect.index && binsOverlap(treeRect.bin, hit.bin),
      )
      .sort((a, b) => a.index - b.index)

    for (const hit of hits) {
      pairs.push([treeRect.bin, hit.bin])
    }
  }
  return pairs
}
