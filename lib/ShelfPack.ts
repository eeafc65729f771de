// lib/ShelfPack.ts
import { SHELF_PACK_CONFIG } from "../shelf-pack.config"
import { Shelf } from "./Shelf"
import type {
  Bin,
  BinRequest,
  IdGenerator,
  PackOptions,
  ShelfPackOptions,
  ShelfSnapshot,
} from "./shelf-pack-types"
import { computeGrowth } from "./utils/computeGrowth"
import { createIdSequence } from "./utils/createIdSequence"
import { selectShelf } from "./utils/selectShelf"

const isValidDimension = (value: number) =>
  Number.isFinite(value) && value > 0

/**
 * Shelf bin allocator using the Shelf Best-Height-Fit heuristic.
 *
 * Bins are packed onto horizontal shelves stacked from the top of the
 * surface. With `autoResize` the surface grows when a request finds no room.
 */
export class ShelfPack {
  readonly autoResize: boolean

  private _width: number
  private _height: number
  private shelves: Shelf[] = []
  private stats = new Map<number, number>()
  private binsById = new Map<number, Bin>()
  private nextId: IdGenerator

  constructor(width = 0, height = 0, options: ShelfPackOptions = {}) {
    this._width = width > 0 ? width : SHELF_PACK_CONFIG.DEFAULT_WIDTH
    this._height = height > 0 ? height : SHELF_PACK_CONFIG.DEFAULT_HEIGHT
    this.autoResize = options.autoResize ?? false
    this.nextId = options.idGenerator ?? createIdSequence()
  }

  get width(): number {
    return this._width
  }

  get height(): number {
    return this._height
  }

  /**
   * Pack a batch of requests in order. Requests with a zero dimension, an
   * id that is already placed, or no space are left out of the result.
   */
  pack(bins: BinRequest[], options: PackOptions = {}): Bin[] {
    const results: Bin[] = []

    for (const request of bins) {
      if (!request.w || !request.h) continue
      if (request.id !== undefined && this.binsById.has(request.id)) continue

      const allocation = this.packOne(request.w, request.h, request.id)
      if (!allocation) continue

      if (options.inPlace) {
        request.id = allocation.id
        request.x = allocation.x
        request.y = allocation.y
      }
      results.push(allocation)
    }

    if (options.shrink) {
      this.shrink()
    }

    return results
  }

  /**
   * Pack a single bin. Returns null when it does not fit and the surface
   * cannot grow. Packing an id that is already placed returns that bin.
   */
  packOne(w: number, h: number, id?: number): Bin | null {
    if (!isValidDimension(w) || !isValidDimension(h)) {
      return null
    }
    if (id !== undefined) {
      const existing = this.binsById.get(id)
      if (existing) return existing
    }

    while (true) {
      const selection = selectShelf({
        shelves: this.shelves,
        w,
        h,
        width: this._width,
        height: this._height,
      })

      if (selection.type === "no-space") {
        if (!this.autoResize) return null
        const next = computeGrowth({
          width: this._width,
          height: this._height,
          w,
          h,
        })
        // growth that overflows to Infinity is rejected by resize
        if (!this.resize(next.width, next.height)) return null
        continue
      }

      const shelf =
        selection.type === "new-shelf"
          ? this.addShelf(selection.y, h)
          : selection.shelf

      const bin = shelf.alloc(id ?? this.generateId(), w, h)
      if (!bin) return null

      this.stats.set(h, (this.stats.get(h) ?? 0) + 1)
      this.binsById.set(bin.id, bin)
      return bin
    }
  }

  /**
   * Grow the surface. Fails without changing anything when either dimension
   * would shrink.
   */
  resize(width: number, height: number): boolean {
    if (!isValidDimension(width) || !isValidDimension(height)) {
      return false
    }
    if (width < this._width || height < this._height) {
      return false
    }

    this._width = width
    this._height = height
    for (const shelf of this.shelves) {
      shelf.resize(width)
    }
    return true
  }

  /**
   * Shrink the surface to the bounding box of the shelves. Free space at the
   * right end of each shelf is trimmed to the new width; bins never move.
   */
  shrink(): void {
    if (this.shelves.length === 0) return

    let width = 0
    let height = 0
    for (const shelf of this.shelves) {
      height += shelf.h
      width = Math.max(width, shelf.used)
    }

    this._width = width
    this._height = height
    for (const shelf of this.shelves) {
      shelf.trim(width)
    }
  }

  clear(): void {
    this.shelves = []
    this.stats.clear()
    this.binsById.clear()
  }

  getBin(id: number): Bin | undefined {
    return this.binsById.get(id)
  }

  /** Placed bins in allocation order. */
  getBins(): Bin[] {
    return [...this.binsById.values()]
  }

  getShelves(): ShelfSnapshot[] {
    return this.shelves.map((shelf) => shelf.toSnapshot())
  }

  /** Allocation count per exact requested height. */
  getStats(): ReadonlyMap<number, number> {
    return new Map(this.stats)
  }

  private addShelf(y: number, h: number): Shelf {
    const shelf = new Shelf(y, this._width, h)
    this.shelves.push(shelf)
    return shelf
  }

  private generateId(): number {
    let id = this.nextId()
    while (this.binsById.has(id)) {
      id = this.nextId()
    }
    return id
  }
}
