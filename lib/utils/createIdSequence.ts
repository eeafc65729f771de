import type { IdGenerator } from "../shelf-pack-types"

export const createIdSequence = (start = 1): IdGenerator => {
  let next = start
  return () => next++
}
