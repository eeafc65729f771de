export { ShelfPack } from "./ShelfPack"
export { Shelf } from "./Shelf"
export { UNPLACED } from "./shelf-pack-types"
export type {
  Bin,
  BinRequest,
  IdGenerator,
  PackOptions,
  ShelfPackOptions,
  ShelfSnapshot,
  SurfaceSize,
} from "./shelf-pack-types"
export { selectShelf, type ShelfSelection } from "./utils/selectShelf"
export { computeGrowth } from "./utils/computeGrowth"
export { createIdSequence } from "./utils/createIdSequence"
export { findOverlappingBins } from "./utils/findOverlappingBins"
export { validatePlacements } from "./utils/validatePlacements"
export { visualizeShelfPack } from "./visualizeShelfPack"
export {
  ShelfPackSolver,
  type ShelfPackSolverInput,
  type ShelfPackSolverOutput,
} from "./solvers/shelf-pack/ShelfPackSolver"
export { SHELF_PACK_CONFIG } from "../shelf-pack.config"
