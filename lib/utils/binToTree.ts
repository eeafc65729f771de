import type { Bin } from "../shelf-pack-types"

export type BinTreeRect = {
  minX: number
  minY: number
  maxX: number
  maxY: number
  bin: Bin
  index: number
}

export const binToTree = (bin: Bin, index: number): BinTreeRect => ({
  minX: bin.x,
  minY: bin.y,
  maxX: bin.x + bin.w,
  maxY: bin.y + bin.h,
  bin,
  index,
})
