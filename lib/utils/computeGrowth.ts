import { SHELF_PACK_CONFIG } from "../../shelf-pack.config"
import type { SurfaceSize } from "../shelf-pack-types"

/**
 * Next surface size for a request of `w` x `h` that found no room.
 *
 * The smaller dimension doubles, width first on a square surface. A request
 * larger than the surface along an axis grows that axis from the request
 * size instead of the surface size.
 */
export const computeGrowth = (params: {
  width: number
  height: number
  w: number
  h: number
}): SurfaceSize => {
  const { width, height, w, h } = params
  const factor = SHELF_PACK_CONFIG.GROWTH_FACTOR

  let nextWidth = width
  let nextHeight = height

  if (width <= height || w > width) {
    nextWidth = Math.max(w, width) * factor
  }
  if (height < width || h > height) {
    nextHeight = Math.max(h, height) * factor
  }

  return { width: nextWidth, height: nextHeight }
}
