// lib/solvers/shelf-pack/ShelfPackSolver.ts
import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import { ShelfPack } from "../../ShelfPack"
import type { Bin, BinRequest, IdGenerator } from "../../shelf-pack-types"
import { validatePlacements } from "../../utils/validatePlacements"
import { visualizeShelfPack } from "../../visualizeShelfPack"

export interface ShelfPackSolverInput {
  bins: BinRequest[]
  width?: number
  height?: number
  autoResize?: boolean
  /** Shrink the surface to the shelf bounding box once every bin is packed. */
  shrink?: boolean
  idGenerator?: IdGenerator
}

export interface ShelfPackSolverOutput {
  placed: Bin[]
  skipped: BinRequest[]
  width: number
  height: number
}

/**
 * Packs a batch of bins one request per step, so the packing can be watched
 * in a solver debugger.
 */
export class ShelfPackSolver extends BaseSolver {
  private packInput: ShelfPackSolverInput
  private packer!: ShelfPack
  private binIndex = 0
  private placed: Bin[] = []
  private skipped: BinRequest[] = []

  constructor(input: ShelfPackSolverInput) {
    super()
    this.packInput = input
  }

  override _setup() {
    const { width, height, autoResize, idGenerator } = this.packInput
    this.packer = new ShelfPack(width, height, { autoResize, idGenerator })
    this.updateStats()
  }

  /** Packs exactly ONE request per call. */
  override _step() {
    const request = this.packInput.bins[this.binIndex]
    if (!request) {
      this.finalizePacking()
      return
    }
    this.binIndex++

    // skipped the same way ShelfPack.pack skips it
    const isRepeat =
      request.id !== undefined && this.packer.getBin(request.id) !== undefined
    const bin =
      request.w && request.h && !isRepeat
        ? this.packer.packOne(request.w, request.h, request.id)
        : null

    if (bin) {
      this.placed.push(bin)
    } else {
      this.skipped.push(request)
    }
    this.updateStats()
  }

  computeProgress(): number {
    if (this.solved) return 1
    const total = this.packInput.bins.length
    return total > 0 ? this.binIndex / total : 0
  }

  override getOutput(): ShelfPackSolverOutput {
    return {
      placed: [...this.placed],
      skipped: [...this.skipped],
      width: this.packer?.width ?? 0,
      height: this.packer?.height ?? 0,
    }
  }

  override visualize(): GraphicsObject {
    if (!this.packer) {
      return { title: "ShelfPack (init)", rects: [], points: [], lines: [] }
    }
    return visualizeShelfPack({
      width: this.packer.width,
      height: this.packer.height,
      shelves: this.packer.getShelves(),
      bins: this.placed,
      title: `ShelfPack (${this.binIndex}/${this.packInput.bins.length})`,
    })
  }

  private finalizePacking() {
    if (this.packInput.shrink) {
      this.packer.shrink()
    }
    validatePlacements({
      bins: this.placed,
      width: this.packer.width,
      height: this.packer.height,
    })
    this.updateStats()
    this.solved = true
  }

  private updateStats() {
    this.stats = {
      packed: this.placed.length,
      skipped: this.skipped.length,
      width: this.packer.width,
      height: this.packer.height,
      shelves: this.packer.getShelves().length,
    }
  }
}
