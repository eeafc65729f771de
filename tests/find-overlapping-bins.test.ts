import { expect, test } from "vitest"
import type { Bin } from "../lib/shelf-pack-types"
import { findOverlappingBins } from "../lib/utils/findOverlappingBins"
import { validatePlacements } from "../lib/utils/validatePlacements"

const a: Bin = { id: 1, x: 0, y: 0, w: 10, h: 10 }
const b: Bin = { id: 2, x: 10, y: 0, w: 10, h: 10 }
const c: Bin = { id: 3, x: 5, y: 5, w: 10, h: 10 }
const d: Bin = { id: 4, x: 0, y: 10, w: 20, h: 5 }

test("bins that only share an edge do not overlap", () => {
  expect(findOverlappingBins([a, b, d])).toEqual([])
})

test("findOverlappingBins reports each overlapping pair once", () => {
  const pairs = findOverlappingBins([a, b, c, d])

  expect(pairs.map(([first, second]) => [first.id, second.id])).toEqual([
    [1, 3],
    [2, 3],
    [3, 4],
  ])
})

test("validatePlacements accepts disjoint bins inside the surface", () => {
  expect(() =>
    validatePlacements({ bins: [a, b, d], width: 20, height: 15 }),
  ).not.toThrow()
})

test("validatePlacements throws on overlap", () => {
  expect(() =>
    validatePlacements({ bins: [a, c], width: 64, height: 64 }),
  ).toThrow("VALIDATION ERROR: Bin 1 overlaps with bin 3.")
})

test("validatePlacements throws on a bin outside the surface", () => {
  expect(() =>
    validatePlacements({
      bins: [{ id: 9, x: 60, y: 0, w: 10, h: 10 }],
      width: 64,
      height: 64,
    }),
  ).toThrow("VALIDATION ERROR: Bin 9 lies outside the 64x64 surface.")
})
