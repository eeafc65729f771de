// lib/Shelf.ts
import type { Bin, ShelfSnapshot } from "./shelf-pack-types"

/**
 * A horizontal strip of fixed height at a fixed y. Bins are appended left to
 * right; space is never reused.
 */
export class Shelf {
  readonly y: number
  readonly h: number
  w: number
  wfree: number

  constructor(y: number, w: number, h: number) {
    this.y = y
    this.w = w
    this.h = h
    this.wfree = w
  }

  get used(): number {
    return this.w - this.wfree
  }

  /** Returns null when the bin is too wide for the free space or too tall. */
  alloc(id: number, w: number, h: number): Bin | null {
    if (w > this.wfree || h > this.h) {
      return null
    }
    const x = this.used
    this.wfree -= w
    return Object.freeze({ id, w, h, x, y: this.y })
  }

  /** Grow-only. A narrower width is rejected and nothing changes. */
  resize(w: number): boolean {
    if (w < this.w) {
      return false
    }
    this.wfree += w - this.w
    this.w = w
    return true
  }

  /** Drop free width from the right end, never below the used width. */
  trim(w: number): void {
    const next = Math.max(w, this.used)
    if (next >= this.w) return
    this.wfree -= this.w - next
    this.w = next
  }

  toSnapshot(): ShelfSnapshot {
    return { y: this.y, w: this.w, h: this.h, wfree: this.wfree }
  }
}
