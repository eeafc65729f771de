import type { GraphicsObject } from "graphics-debug"
import type { Bin, ShelfSnapshot } from "./shelf-pack-types"
import { getColorForShelf } from "./utils/getColorForShelf"

const COLOR_MAP = {
  surfaceStroke: "#111827",
  shelfStroke: "#9ca3af",
}

/**
 * Surface bounds, shelf strips and placed bins. Bins are colored by the
 * shelf they sit on.
 */
export function visualizeShelfPack(params: {
  width: number
  height: number
  shelves: readonly ShelfSnapshot[]
  bins: readonly Bin[]
  title?: string
}): GraphicsObject {
  const { width, height, shelves, bins } = params
  const rects: NonNullable<GraphicsObject["rects"]> = []

  rects.push({
    center: { x: width / 2, y: height / 2 },
    width,
    height,
    fill: "none",
    stroke: COLOR_MAP.surfaceStroke,
    label: `surface\n${width} × ${height}`,
  })

  const shelfIndexByY = new Map<number, number>()
  shelves.forEach((shelf, index) => {
    shelfIndexByY.set(shelf.y, index)
    rects.push({
      center: { x: shelf.w / 2, y: shelf.y + shelf.h / 2 },
      width: shelf.w,
      height: shelf.h,
      fill: "none",
      stroke: COLOR_MAP.shelfStroke,
      layer: "shelf",
      label: `shelf ${index}\ny: ${shelf.y}, h: ${shelf.h}\nfree: ${shelf.wfree}`,
    })
  })

  for (const bin of bins) {
    const colors = getColorForShelf(shelfIndexByY.get(bin.y) ?? 0)
    rects.push({
      center: { x: bin.x + bin.w / 2, y: bin.y + bin.h / 2 },
      width: bin.w,
      height: bin.h,
      fill: colors.fill,
      stroke: colors.stroke,
      layer: "bin",
      label: `bin ${bin.id}\nsize: ${bin.w} × ${bin.h}\npos: (${bin.x}, ${bin.y})`,
    })
  }

  return {
    title: params.title ?? `ShelfPack (${width} × ${height})`,
    coordinateSystem: "cartesian",
    rects,
    points: [],
    lines: [],
  }
}
