import { expect, test } from "vitest"
import { Shelf } from "../lib/Shelf"
import { selectShelf } from "../lib/utils/selectShelf"

const makeShelves = (heights: number[], width = 64): Shelf[] => {
  const shelves: Shelf[] = []
  let y = 0
  for (const h of heights) {
    shelves.push(new Shelf(y, width, h))
    y += h
  }
  return shelves
}

test("selectShelf short-circuits on an exact height match", () => {
  const shelves = makeShelves([20, 12, 10])

  const selection = selectShelf({ shelves, w: 10, h: 10, width: 64, height: 64 })

  expect(selection).toEqual({ type: "exact", shelf: shelves[2] })
})

test("selectShelf skips an exact match without enough free width", () => {
  const shelves = makeShelves([10, 20])
  shelves[0]?.alloc(1, 60, 10)

  const selection = selectShelf({ shelves, w: 10, h: 10, width: 64, height: 64 })

  expect(selection).toEqual({ type: "best-fit", shelf: shelves[1], waste: 10 })
})

test("selectShelf picks the shelf with the least waste", () => {
  const shelves = makeShelves([20, 12, 30])

  const selection = selectShelf({ shelves, w: 10, h: 11, width: 64, height: 64 })

  expect(selection).toEqual({ type: "best-fit", shelf: shelves[1], waste: 1 })
})

test("selectShelf keeps the first shelf on equal waste", () => {
  const shelves = makeShelves([20, 20])

  const selection = selectShelf({ shelves, w: 10, h: 15, width: 64, height: 64 })

  expect(selection.type).toBe("best-fit")
  if (selection.type === "best-fit") {
    expect(selection.shelf).toBe(shelves[0])
    expect(selection.waste).toBe(5)
  }
})

test("selectShelf opens a new shelf below the existing ones", () => {
  const shelves = makeShelves([10, 15])

  const selection = selectShelf({ shelves, w: 10, h: 20, width: 64, height: 64 })

  expect(selection).toEqual({ type: "new-shelf", y: 25 })
})

test("selectShelf reports no space when the surface is full", () => {
  const shelves = makeShelves([30, 30])

  expect(
    selectShelf({ shelves, w: 10, h: 4, width: 64, height: 64 }),
  ).toEqual({ type: "new-shelf", y: 60 })
  expect(
    selectShelf({ shelves, w: 10, h: 40, width: 64, height: 64 }),
  ).toEqual({ type: "no-space", y: 60 })
  expect(
    selectShelf({ shelves: [], w: 65, h: 5, width: 64, height: 64 }),
  ).toEqual({ type: "no-space", y: 0 })
})
