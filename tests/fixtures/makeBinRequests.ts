import type { BinRequest } from "../../lib/shelf-pack-types"

/**
 * Deterministic pseudo-random requests (LCG) so property-style tests stay
 * reproducible.
 */
export const makeBinRequests = (params: {
  count: number
  seed?: number
  maxW?: number
  maxH?: number
}): BinRequest[] => {
  const { count, maxW = 32, maxH = 32 } = params
  let state = params.seed ?? 1
  const next = () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff
    return state / 2147483648
  }

  const requests: BinRequest[] = []
  for (let i = 0; i < count; i++) {
    requests.push({
      w: 1 + Math.floor(next() * maxW),
      h: 1 + Math.floor(next() * maxH),
    })
  }
  return requests
}
