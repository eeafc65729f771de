// shelf-pack.config.ts
/**
 * Configuration constants for ShelfPack.
 * These are exposed at the top level for easy experimentation and tuning.
 */

export const SHELF_PACK_CONFIG = {
  /** Surface width used when the constructor gets no positive width. */
  DEFAULT_WIDTH: 64,
  /** Surface height used when the constructor gets no positive height. */
  DEFAULT_HEIGHT: 64,
  /**
   * Multiplier applied to a surface dimension when auto-resize grows it.
   * Must be greater than 1 so every growth step strictly enlarges the surface.
   */
  GROWTH_FACTOR: 2,
}
